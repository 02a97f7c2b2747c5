import type { SlotDeclaration } from './IntentSchema.js';
import type { ClarificationOption } from './DialogueState.js';
import type { ErrorKind, ToolResult } from './ToolResult.js';
import type { RetrievalResult } from './DocumentChunk.js';

/**
 * Ask the user for a missing required slot
 */
export interface AskSlotAction {
  type: 'ask_slot';
  intent: string;
  slot: SlotDeclaration;
  /** Text of a value the tool could not use, when the slot is asked again */
  rejectedValue?: string;
}

/**
 * Ask the user to choose between ambiguous candidates
 */
export interface ClarifyAction {
  type: 'clarify';
  intent: string;
  slot: SlotDeclaration;
  surfaceText: string;
  options: ClarificationOption[];
  /** True when repeating a question the previous reply didn't answer */
  repeated: boolean;
}

export interface ClarificationExhaustedAction {
  type: 'clarification_exhausted';
  intent: string;
  slot: SlotDeclaration;
  errorKind: Extract<ErrorKind, 'ClarificationExhausted'>;
}

export interface ToolResultAction {
  type: 'tool_result';
  intent: string;
  result: ToolResult;
}

export interface RetrievalAction {
  type: 'retrieval';
  intent: string;
  result: RetrievalResult;
}

/**
 * Turn could not be completed (invariant violation or unexpected fault)
 */
export interface FailureAction {
  type: 'failure';
  errorKind: ErrorKind | 'Internal';
  /** Capability that failed, when a collaborator is to blame */
  capability?: string;
}

/**
 * Background query answered while a travel intent is still collecting slots
 */
export interface BackgroundAction {
  type: 'background';
  answer: ToolResultAction | RetrievalAction | FailureAction;
  resume: AskSlotAction | ClarifyAction;
}

export type AgentAction =
  | AskSlotAction
  | ClarifyAction
  | ClarificationExhaustedAction
  | ToolResultAction
  | RetrievalAction
  | FailureAction
  | BackgroundAction;

export type ResponseMessage =
  | { type: 'text'; text: string }
  | {
      type: 'options';
      prompt: string;
      options: Array<{ ordinal: number; id: string; label: string }>;
    }
  | { type: 'data'; kind: string; payload: unknown };

/**
 * Side-effect-free result handed to the transport layer for one turn
 */
export interface ComposedResponse {
  sessionId: string;
  action: AgentAction['type'];
  messages: ResponseMessage[];
}

/**
 * Summary of a live conversation, for status endpoints
 */
export interface ConversationSummary {
  sessionId: string;
  phase: string;
  activeIntent: string | null;
  filledSlots: string[];
  turnCount: number;
  startedAt: Date;
  lastActivityAt: Date;
}
