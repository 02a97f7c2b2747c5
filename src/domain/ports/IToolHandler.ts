import type { ToolName } from '../entities/IntentSchema.js';
import type { SlotValue } from '../entities/Slot.js';
import type { ToolPayload } from '../entities/ToolResult.js';

/**
 * Validated inputs handed to a tool, keyed by slot name
 */
export type ToolInputs = Readonly<Record<string, SlotValue>>;

/**
 * A capability the dispatcher can invoke (routing, weather, emissions).
 * `execute` resolves with the payload or rejects; the dispatcher turns rejections into typed results.
 */
export interface IToolHandler {
  readonly name: ToolName;
  /** Human name of the capability, used in user-facing failure messages */
  readonly capability: string;
  /** Slot names (and their entity types) that must be present before `execute` is called */
  readonly requiredInputs: ReadonlyArray<{ name: string; entityType: string }>;

  execute(inputs: ToolInputs, signal?: AbortSignal): Promise<ToolPayload>;
}

/**
 * Thrown by a handler when a slot value is well formed but unusable,
 * e.g. a travel mode without an emission factor
 */
export class ToolInputError extends Error {
  constructor(
    readonly slot: string,
    message: string
  ) {
    super(message);
    this.name = 'ToolInputError';
  }
}
