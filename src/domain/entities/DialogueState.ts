import type { CandidateResolution } from './Turn.js';

export type DialoguePhase =
  | 'AwaitingIntent'
  | 'CollectingSlots'
  | 'ReadyToDispatch'
  | 'AwaitingClarification'
  | 'Responding';

/**
 * One candidate offered to the user during clarification
 */
export interface ClarificationOption {
  /** 1-based position in the question */
  ordinal: number;
  candidate: CandidateResolution;
  label: string;
  /** Attribute value that tells this option apart from the others (e.g. "Ontario") */
  distinguishing: string;
  /** Text shown to the user: "London, Ontario" */
  display: string;
}

export interface PendingClarification {
  slot: string;
  entityType: string;
  surfaceText: string;
  options: ClarificationOption[];
  /** Replies received so far that matched no option */
  failedAttempts: number;
}

/**
 * Per-conversation dialogue state. Replaced, never mutated in place.
 */
export interface DialogueState {
  readonly phase: DialoguePhase;
  /** Intent whose slots are being collected, or the last one answered */
  readonly activeIntent: string | null;
  readonly pending: PendingClarification | null;
}

export const INITIAL_DIALOGUE_STATE: DialogueState = Object.freeze({
  phase: 'AwaitingIntent',
  activeIntent: null,
  pending: null,
});
