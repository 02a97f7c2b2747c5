import type { ComposedResponse, ConversationSummary } from '../entities/AgentAction.js';

/**
 * Port exposed to the transport layer
 */
export interface IConversationService {
  /**
   * Process one user message and return the ordered messages for this turn
   */
  handleMessage(sessionId: string, messageText: string): Promise<ComposedResponse>;

  /**
   * Destroy a conversation (explicit reset)
   */
  resetConversation(sessionId: string): Promise<boolean>;

  listConversations(): ConversationSummary[];
}
