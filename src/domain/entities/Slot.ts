import type { CandidateAttributes, EntityType } from './Turn.js';

/**
 * Value bound to a filled slot, taken from a resolved candidate
 */
export interface SlotValue {
  entityType: EntityType;
  id: string;
  /** Text the user typed for this value */
  surfaceText: string;
  attributes: CandidateAttributes;
}

export type SlotStatus = 'unset' | 'pending' | 'filled';

export type Slot =
  | { name: string; status: 'unset' }
  | { name: string; status: 'pending' }
  | { name: string; status: 'filled'; value: SlotValue };

/**
 * Display label for a slot value ("London, Ontario" when a label attribute exists)
 */
export function describeSlotValue(value: SlotValue): string {
  const label = value.attributes.label;
  return typeof label === 'string' && label.length > 0 ? label : value.surfaceText;
}
