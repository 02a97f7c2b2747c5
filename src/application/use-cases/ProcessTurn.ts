import type { ComposedResponse } from '../../domain/entities/AgentAction.js';
import { createTurn, type ClassifiedMessage } from '../../domain/entities/Turn.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import type { INluClassifier } from '../../domain/ports/INluClassifier.js';
import { isTimeoutError, withTimeout } from '../../infrastructure/utils/withTimeout.js';
import type { ConversationManager } from '../ConversationManager.js';
import type { DialogueStateMachine } from '../DialogueStateMachine.js';
import type { ResponseComposer } from '../ResponseComposer.js';

export interface ProcessTurnInput {
  sessionId: string;
  text: string;
}

export interface ProcessTurnConfig {
  nluTimeoutMs: number;
}

export const NLU_CAPABILITY = 'language understanding';

/**
 * Use case for one user message: inside the conversation's exclusive scope,
 * classify, run the dialogue and compose the reply
 */
export class ProcessTurn {
  private readonly logger: ILogger;

  constructor(
    private readonly classifier: INluClassifier,
    private readonly conversations: ConversationManager,
    private readonly stateMachine: DialogueStateMachine,
    private readonly composer: ResponseComposer,
    logger: ILogger,
    private readonly config: ProcessTurnConfig
  ) {
    this.logger = logger.child({ component: 'ProcessTurn' });
  }

  async execute(input: ProcessTurnInput): Promise<ComposedResponse> {
    const sessionId = input.sessionId.trim();
    if (sessionId.length === 0) {
      throw new Error('Session id is required');
    }
    if (!input.text || input.text.trim().length === 0) {
      throw new Error('Text input is required');
    }

    const text = input.text.trim();
    this.logger.info('Executing ProcessTurn use case', { sessionId, length: text.length });

    // Classification runs inside the session scope so turns keep their arrival order
    return this.conversations.withConversation(sessionId, async (conversation) => {
      let classified: ClassifiedMessage;
      try {
        classified = await withTimeout('nlu', this.config.nluTimeoutMs, (signal) =>
          this.classifier.classify(text, signal)
        );
      } catch (error) {
        const errorKind = isTimeoutError(error) ? 'ToolTimeout' : 'ToolUnavailable';
        this.logger.warn('Classification failed', {
          sessionId,
          errorKind,
          error: error instanceof Error ? error.message : String(error),
        });
        return this.composer.compose(sessionId, { type: 'failure', errorKind, capability: NLU_CAPABILITY });
      }

      const turn = createTurn(classified, text);
      const action = await this.stateMachine.handleTurn(conversation, turn);
      this.logger.info('Turn processed', {
        sessionId,
        intent: turn.intent,
        action: action.type,
        phase: conversation.state.phase,
      });
      return this.composer.compose(sessionId, action);
    });
  }
}
