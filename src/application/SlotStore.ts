import type { IntentSchema } from '../domain/entities/IntentSchema.js';
import type { Slot, SlotValue } from '../domain/entities/Slot.js';

type SlotEntry = { status: 'pending' } | { status: 'filled'; value: SlotValue };

export type SlotSnapshot = ReadonlyMap<string, SlotEntry>;

/**
 * Per-conversation slot memory.
 * Only mutated by the turn that holds the conversation's lock.
 */
export class SlotStore {
  private entries = new Map<string, SlotEntry>();

  /**
   * Last write wins; a pending slot becomes filled
   */
  fill(name: string, value: SlotValue): void {
    this.entries.set(name, { status: 'filled', value: { ...value, attributes: { ...value.attributes } } });
  }

  markPending(name: string): void {
    this.entries.set(name, { status: 'pending' });
  }

  clear(name: string): void {
    this.entries.delete(name);
  }

  clearAll(): void {
    this.entries.clear();
  }

  get(name: string): Slot {
    const entry = this.entries.get(name);
    if (!entry) return { name, status: 'unset' };
    if (entry.status === 'pending') return { name, status: 'pending' };
    return { name, status: 'filled', value: entry.value };
  }

  isFilled(name: string): boolean {
    return this.entries.get(name)?.status === 'filled';
  }

  /**
   * Required slot names without a filled value of the declared type, in schema order
   */
  missingRequired(schema: IntentSchema): string[] {
    return schema.required
      .filter((declaration) => {
        const entry = this.entries.get(declaration.name);
        return entry?.status !== 'filled' || entry.value.entityType !== declaration.entityType;
      })
      .map((declaration) => declaration.name);
  }

  filledValues(): Record<string, SlotValue> {
    const values: Record<string, SlotValue> = {};
    for (const [name, entry] of this.entries) {
      if (entry.status === 'filled') values[name] = entry.value;
    }
    return values;
  }

  filledNames(): string[] {
    return Object.keys(this.filledValues());
  }

  snapshot(): SlotSnapshot {
    return new Map(this.entries);
  }

  restore(snapshot: SlotSnapshot): void {
    this.entries = new Map(snapshot);
  }
}
