import type { ScoredChunk } from '../../domain/entities/DocumentChunk.js';

export const SYSTEM_PROMPT =
  "You are a sustainable travel assistant. Use the following context to answer the user's question. " +
  "If you don't know, say so honestly. Be concise, factual, and eco-friendly.";

/**
 * User prompt with the numbered context chunks followed by the question
 */
export function buildGroundedPrompt(query: string, chunks: ScoredChunk[]): string {
  const context = chunks.map((chunk, index) => `[${index + 1}] ${chunk.text}`).join('\n\n');
  return `Context:\n${context}\n\nQuestion:\n${query}\n\nEco-Travel Answer:`;
}
