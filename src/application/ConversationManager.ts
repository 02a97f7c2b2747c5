import type { ConversationSummary } from '../domain/entities/AgentAction.js';
import { INITIAL_DIALOGUE_STATE, type DialogueState } from '../domain/entities/DialogueState.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import { KeyedMutex } from './KeyedMutex.js';
import { SlotStore } from './SlotStore.js';

/**
 * One conversation: its slot memory and dialogue state, addressed by session key
 */
export interface Conversation {
  readonly sessionId: string;
  readonly slots: SlotStore;
  state: DialogueState;
  turnCount: number;
  readonly createdAt: Date;
  lastActivityAt: Date;
}

export interface ConversationManagerConfig {
  /** Conversations idle longer than this are evicted */
  idleTimeoutMs: number;
  sweepIntervalMs: number;
}

/**
 * Owns every live conversation. A conversation is only reachable through
 * `withConversation`, which holds that session's lock for the whole turn.
 */
export class ConversationManager {
  private readonly conversations = new Map<string, Conversation>();
  private readonly mutex = new KeyedMutex();
  private readonly logger: ILogger;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(
    logger: ILogger,
    private readonly config: ConversationManagerConfig,
    private readonly clock: () => Date = () => new Date()
  ) {
    this.logger = logger.child({ component: 'ConversationManager' });
  }

  get size(): number {
    return this.conversations.size;
  }

  /**
   * Run `task` with exclusive access to the session's conversation, creating it on first use.
   * The lock is released on every exit path.
   */
  withConversation<T>(sessionId: string, task: (conversation: Conversation) => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(sessionId, async () => {
      const conversation = this.getOrCreate(sessionId);
      try {
        return await task(conversation);
      } finally {
        conversation.lastActivityAt = this.clock();
      }
    });
  }

  /**
   * Destroy a conversation. Waits for an in-flight turn of the same session.
   */
  reset(sessionId: string): Promise<boolean> {
    return this.mutex.runExclusive(sessionId, async () => {
      const existed = this.conversations.delete(sessionId);
      this.logger.info('Conversation reset', { sessionId, existed });
      return existed;
    });
  }

  /**
   * Remove conversations idle past the timeout. Sessions with a running or queued turn are kept.
   */
  evictIdle(now: Date = this.clock()): string[] {
    const evicted: string[] = [];
    for (const [sessionId, conversation] of this.conversations) {
      if (this.mutex.isLocked(sessionId)) continue;
      if (now.getTime() - conversation.lastActivityAt.getTime() > this.config.idleTimeoutMs) {
        this.conversations.delete(sessionId);
        evicted.push(sessionId);
      }
    }

    if (evicted.length > 0) {
      this.logger.info('Evicted idle conversations', { count: evicted.length, sessionIds: evicted });
    }
    return evicted;
  }

  /** Start the periodic idle sweep */
  start(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      this.evictIdle();
    }, this.config.sweepIntervalMs);
    this.sweepTimer.unref();
    this.logger.debug('Idle sweep started', { intervalMs: this.config.sweepIntervalMs });
  }

  /** Stop the idle sweep; conversations are kept */
  stop(): void {
    if (!this.sweepTimer) return;
    clearInterval(this.sweepTimer);
    this.sweepTimer = null;
    this.logger.debug('Idle sweep stopped');
  }

  list(): ConversationSummary[] {
    return [...this.conversations.values()].map((conversation) => ({
      sessionId: conversation.sessionId,
      phase: conversation.state.phase,
      activeIntent: conversation.state.activeIntent,
      filledSlots: conversation.slots.filledNames(),
      turnCount: conversation.turnCount,
      startedAt: conversation.createdAt,
      lastActivityAt: conversation.lastActivityAt,
    }));
  }

  private getOrCreate(sessionId: string): Conversation {
    const existing = this.conversations.get(sessionId);
    if (existing) return existing;

    const now = this.clock();
    const conversation: Conversation = {
      sessionId,
      slots: new SlotStore(),
      state: INITIAL_DIALOGUE_STATE,
      turnCount: 0,
      createdAt: now,
      lastActivityAt: now,
    };
    this.conversations.set(sessionId, conversation);
    this.logger.info('Conversation created', { sessionId });
    return conversation;
  }
}
