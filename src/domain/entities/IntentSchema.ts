import type { EntityType } from './Turn.js';

/**
 * Capabilities the dispatcher can invoke
 */
export type ToolName = 'routing' | 'weather' | 'emissions';

/**
 * Where a ready intent is sent
 */
export type IntentTarget =
  | { kind: 'tool'; tool: ToolName }
  | { kind: 'retrieval' };

/**
 * Declaration of one slot an intent collects
 */
export interface SlotDeclaration {
  name: string;
  entityType: EntityType;
  /** Question asked when the slot is missing */
  prompt: string;
  /** Human label used in failure messages ("starting point") */
  label: string;
}

/**
 * Static mapping from intent label to the slots it needs and its target
 */
export interface IntentSchema {
  intent: string;
  required: SlotDeclaration[];
  optional: SlotDeclaration[];
  target: IntentTarget;
}

export type IntentCatalog = ReadonlyMap<string, IntentSchema>;

/**
 * All slot declarations of a schema in declaration order (required first)
 */
export function allSlots(schema: IntentSchema): SlotDeclaration[] {
  return [...schema.required, ...schema.optional];
}

export function findSlot(schema: IntentSchema, name: string): SlotDeclaration | undefined {
  return allSlots(schema).find((slot) => slot.name === name);
}
