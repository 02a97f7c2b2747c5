import type { ClassifiedMessage } from '../entities/Turn.js';

/**
 * Port for the natural-language understanding front-end.
 * Treated as a frozen black box: text in, intent label and entities out.
 */
export interface INluClassifier {
  classify(text: string, signal?: AbortSignal): Promise<ClassifiedMessage>;
}
