import type {
  AgentAction,
  AskSlotAction,
  ClarifyAction,
  RetrievalAction,
  ToolResultAction,
} from '../domain/entities/AgentAction.js';
import type {
  ClarificationOption,
  DialogueState,
  PendingClarification,
} from '../domain/entities/DialogueState.js';
import {
  allSlots,
  findSlot,
  type IntentCatalog,
  type IntentSchema,
  type SlotDeclaration,
} from '../domain/entities/IntentSchema.js';
import type { SlotValue } from '../domain/entities/Slot.js';
import type { CandidateResolution, ExtractedEntity, Turn } from '../domain/entities/Turn.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import type { Conversation } from './ConversationManager.js';
import type { EntityResolver } from './EntityResolver.js';
import type { RetrievalPipeline } from './RetrievalPipeline.js';
import { SlotStore } from './SlotStore.js';
import { ToolResultCache, type ToolRegistry } from './ToolRegistry.js';

export interface DialogueConfig {
  /** Intents answered without resetting an in-progress slot collection */
  backgroundIntents: string[];
  /** Intents the classifier uses for bare replies ("the second one") */
  clarificationIntents: string[];
  /** Unmatched clarification replies tolerated before the slot is abandoned */
  maxClarificationAttempts: number;
}

interface Ambiguity {
  slot: SlotDeclaration;
  surfaceText: string;
  options: ClarificationOption[];
}

const ORDINAL_WORDS: Record<string, number> = {
  first: 1,
  '1st': 1,
  second: 2,
  '2nd': 2,
  third: 3,
  '3rd': 3,
  fourth: 4,
  '4th': 4,
  fifth: 5,
  '5th': 5,
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function containsPhrase(text: string, phrase: string): boolean {
  const needle = phrase.trim().toLowerCase();
  if (needle.length === 0) return false;
  return new RegExp(`(^|[^a-z0-9])${escapeRegExp(needle)}([^a-z0-9]|$)`).test(text);
}

function toSlotValue(
  candidate: CandidateResolution,
  entityType: string,
  surfaceText: string
): SlotValue {
  return { entityType, id: candidate.id, surfaceText, attributes: { ...candidate.attributes } };
}

/**
 * Interpret a reply to a clarification question.
 * Tries, in order: an entity resolving to exactly one offered candidate, the option's
 * label or distinguishing attribute named in the text, then an ordinal ("2", "second", "last").
 */
export function matchClarificationChoice(
  turn: Pick<Turn, 'text' | 'entities'>,
  options: ClarificationOption[]
): ClarificationOption | null {
  for (const entity of turn.entities) {
    if (entity.candidates.length !== 1) continue;
    const match = options.find((option) => option.candidate.id === entity.candidates[0].id);
    if (match) return match;
  }

  const text = turn.text.toLowerCase();
  const named = options.filter(
    (option) => containsPhrase(text, option.label) || containsPhrase(text, option.distinguishing)
  );
  if (named.length === 1) return named[0];

  const tokens = text.match(/[a-z0-9]+/g) ?? [];
  for (const token of tokens) {
    let ordinal: number | undefined;
    if (/^\d+$/.test(token)) ordinal = Number(token);
    else if (token === 'last') ordinal = options.length;
    else ordinal = ORDINAL_WORDS[token];

    if (ordinal !== undefined && ordinal >= 1 && ordinal <= options.length) {
      return options[ordinal - 1];
    }
  }

  return null;
}

/**
 * Per-turn orchestrator: decides whether to ask for a slot, ask a clarification,
 * dispatch a tool or answer from retrieval, and advances the conversation state.
 */
export class DialogueStateMachine {
  private readonly logger: ILogger;

  constructor(
    private readonly catalog: IntentCatalog,
    private readonly resolver: EntityResolver,
    private readonly registry: ToolRegistry,
    private readonly pipeline: RetrievalPipeline,
    logger: ILogger,
    private readonly config: DialogueConfig
  ) {
    this.logger = logger.child({ component: 'DialogueStateMachine' });
  }

  /**
   * Process one turn. Never throws: unexpected faults roll the conversation back
   * to its state before the turn and yield a failure action.
   */
  async handleTurn(conversation: Conversation, turn: Turn): Promise<AgentAction> {
    const stateBefore = conversation.state;
    const slotsBefore = conversation.slots.snapshot();
    conversation.turnCount += 1;

    try {
      return await this.advance(conversation, turn, new ToolResultCache());
    } catch (error) {
      conversation.state = stateBefore;
      conversation.slots.restore(slotsBefore);
      this.logger.error('Turn failed, conversation rolled back', error, {
        sessionId: conversation.sessionId,
        intent: turn.intent,
        phase: stateBefore.phase,
      });
      return { type: 'failure', errorKind: 'Internal' };
    }
  }

  private async advance(
    conversation: Conversation,
    turn: Turn,
    cache: ToolResultCache
  ): Promise<AgentAction> {
    const { state } = conversation;

    if (state.phase === 'AwaitingClarification' && state.pending && state.activeIntent) {
      const reply = await this.handleClarificationReply(
        conversation,
        turn,
        state.activeIntent,
        state.pending,
        cache
      );
      if (reply) return reply;
    }

    return this.handleIntent(conversation, turn, cache);
  }

  /**
   * Returns null when the turn is not a reply to the pending question
   * (background query or context switch).
   */
  private async handleClarificationReply(
    conversation: Conversation,
    turn: Turn,
    activeIntent: string,
    pending: PendingClarification,
    cache: ToolResultCache
  ): Promise<AgentAction | null> {
    const schema = this.requireSchema(activeIntent);
    const slot = findSlot(schema, pending.slot);
    if (!slot) {
      throw new Error(`Pending slot "${pending.slot}" is not declared by intent "${activeIntent}"`);
    }

    const choice = matchClarificationChoice(turn, pending.options);
    if (choice) {
      conversation.slots.fill(slot.name, toSlotValue(choice.candidate, slot.entityType, pending.surfaceText));
      this.transition(conversation, { phase: 'CollectingSlots', activeIntent, pending: null });
      this.logger.info('Clarification answered', {
        sessionId: conversation.sessionId,
        slot: slot.name,
        candidateId: choice.candidate.id,
      });
      return this.proceed(conversation, schema, turn, cache);
    }

    if (this.isBackground(turn.intent, activeIntent)) return null;

    const isReply =
      turn.intent === activeIntent ||
      this.config.clarificationIntents.includes(turn.intent) ||
      !this.catalog.has(turn.intent);
    if (!isReply) return null;

    const failedAttempts = pending.failedAttempts + 1;
    if (failedAttempts >= this.config.maxClarificationAttempts) {
      conversation.slots.clear(slot.name);
      this.transition(conversation, { phase: 'AwaitingIntent', activeIntent: null, pending: null });
      this.logger.info('Clarification attempts exhausted', {
        sessionId: conversation.sessionId,
        slot: slot.name,
        attempts: failedAttempts,
      });
      return {
        type: 'clarification_exhausted',
        intent: activeIntent,
        slot,
        errorKind: 'ClarificationExhausted',
      };
    }

    this.transition(conversation, {
      phase: 'AwaitingClarification',
      activeIntent,
      pending: { ...pending, failedAttempts },
    });
    return this.clarifyAction(activeIntent, slot, pending, true);
  }

  private async handleIntent(
    conversation: Conversation,
    turn: Turn,
    cache: ToolResultCache
  ): Promise<AgentAction> {
    const { state } = conversation;
    const intent =
      state.activeIntent !== null && this.config.clarificationIntents.includes(turn.intent)
        ? state.activeIntent
        : turn.intent;
    const schema = this.catalog.get(intent);
    if (!schema) {
      this.logger.error('Turn classified with an unknown intent', undefined, {
        sessionId: conversation.sessionId,
        intent: turn.intent,
        errorKind: 'UnknownIntent',
      });
      return { type: 'failure', errorKind: 'UnknownIntent' };
    }

    if (state.activeIntent !== null && this.isBackground(intent, state.activeIntent)) {
      const background = await this.tryBackground(conversation, turn, schema, cache);
      if (background) return background;
    }

    if (intent !== state.activeIntent) {
      conversation.slots.clearAll();
      this.logger.debug('Context switch', {
        sessionId: conversation.sessionId,
        from: state.activeIntent,
        to: intent,
      });
    }
    this.transition(conversation, { phase: 'CollectingSlots', activeIntent: schema.intent, pending: null });

    const ambiguity = this.mergeEntities(conversation.slots, schema, turn.entities);
    if (ambiguity) {
      conversation.slots.markPending(ambiguity.slot.name);
      const pending: PendingClarification = {
        slot: ambiguity.slot.name,
        entityType: ambiguity.slot.entityType,
        surfaceText: ambiguity.surfaceText,
        options: ambiguity.options,
        failedAttempts: 0,
      };
      this.transition(conversation, { phase: 'AwaitingClarification', activeIntent: schema.intent, pending });
      return this.clarifyAction(schema.intent, ambiguity.slot, pending, false);
    }

    return this.proceed(conversation, schema, turn, cache);
  }

  /**
   * Ask for the next missing slot, or dispatch once every required slot is filled
   */
  private async proceed(
    conversation: Conversation,
    schema: IntentSchema,
    turn: Turn,
    cache: ToolResultCache
  ): Promise<AgentAction> {
    const ask = this.nextQuestion(schema, conversation.slots);
    if (ask) {
      this.transition(conversation, { phase: 'CollectingSlots', activeIntent: schema.intent, pending: null });
      return ask;
    }

    this.transition(conversation, { phase: 'ReadyToDispatch', activeIntent: schema.intent, pending: null });
    const answer = await this.execute(schema, conversation.slots, turn, cache);
    const retry = this.reaskRejectedSlot(conversation, schema, answer);
    if (retry) return retry;
    this.transition(conversation, { phase: 'Responding', activeIntent: schema.intent, pending: null });
    this.transition(conversation, { phase: 'AwaitingIntent', activeIntent: schema.intent, pending: null });
    return answer;
  }

  /**
   * Answer a background query against a scratch slot store, leaving the
   * in-progress collection untouched. Null when the query itself needs more input.
   */
  private async tryBackground(
    conversation: Conversation,
    turn: Turn,
    schema: IntentSchema,
    cache: ToolResultCache
  ): Promise<AgentAction | null> {
    const scratch = new SlotStore();
    const ambiguity = this.mergeEntities(scratch, schema, turn.entities);
    if (ambiguity || scratch.missingRequired(schema).length > 0) {
      this.logger.debug('Background intent needs its own slots, treating as context switch', {
        sessionId: conversation.sessionId,
        intent: schema.intent,
      });
      return null;
    }

    const answer = await this.execute(schema, scratch, turn, cache);
    const resume = this.resumeAction(conversation);
    this.logger.info('Background intent answered', {
      sessionId: conversation.sessionId,
      intent: schema.intent,
      resumes: resume?.type ?? null,
    });
    return resume ? { type: 'background', answer, resume } : answer;
  }

  private resumeAction(conversation: Conversation): AskSlotAction | ClarifyAction | null {
    const { state } = conversation;
    if (state.activeIntent === null) return null;
    const schema = this.catalog.get(state.activeIntent);
    if (!schema) return null;

    if (state.phase === 'AwaitingClarification' && state.pending) {
      const slot = findSlot(schema, state.pending.slot);
      return slot ? this.clarifyAction(schema.intent, slot, state.pending, false) : null;
    }
    if (state.phase === 'CollectingSlots') {
      return this.nextQuestion(schema, conversation.slots);
    }
    return null;
  }

  private async execute(
    schema: IntentSchema,
    slots: SlotStore,
    turn: Turn,
    cache: ToolResultCache
  ): Promise<ToolResultAction | RetrievalAction> {
    if (schema.target.kind === 'retrieval') {
      const result = await this.pipeline.answer(turn.text);
      return { type: 'retrieval', intent: schema.intent, result };
    }

    const result = await this.registry.dispatch(schema.intent, slots.filledValues(), cache);
    return { type: 'tool_result', intent: schema.intent, result };
  }

  /**
   * A value the tool rejected is treated as unresolved: drop it and ask for the slot again
   */
  private reaskRejectedSlot(
    conversation: Conversation,
    schema: IntentSchema,
    answer: ToolResultAction | RetrievalAction
  ): AskSlotAction | null {
    if (answer.type !== 'tool_result' || answer.result.success || answer.result.errorKind !== 'InvalidInput') {
      return null;
    }
    const { invalidSlot } = answer.result;
    const slot = invalidSlot === undefined ? undefined : findSlot(schema, invalidSlot);
    if (!slot) return null;

    const rejected = conversation.slots.get(slot.name);
    conversation.slots.clear(slot.name);
    this.transition(conversation, { phase: 'CollectingSlots', activeIntent: schema.intent, pending: null });
    return {
      type: 'ask_slot',
      intent: schema.intent,
      slot,
      ...(rejected.status === 'filled' && { rejectedValue: rejected.value.surfaceText }),
    };
  }

  private nextQuestion(schema: IntentSchema, slots: SlotStore): AskSlotAction | null {
    const [firstMissing] = slots.missingRequired(schema);
    if (firstMissing === undefined) return null;
    const slot = findSlot(schema, firstMissing);
    if (!slot) return null;
    return { type: 'ask_slot', intent: schema.intent, slot };
  }

  /**
   * Resolve and bind the turn's entities. Resolved values fill their slot; the first
   * ambiguous entity is returned so its slot can be clarified.
   */
  private mergeEntities(
    store: SlotStore,
    schema: IntentSchema,
    entities: readonly ExtractedEntity[]
  ): Ambiguity | null {
    const boundThisTurn = new Set<string>();
    let ambiguity: Ambiguity | null = null;

    for (const entity of entities) {
      const slot = this.bindSlot(schema, entity, store, boundThisTurn);
      if (!slot) continue;

      const resolution = this.resolver.resolve(entity);
      switch (resolution.kind) {
        case 'resolved':
          store.fill(slot.name, toSlotValue(resolution.candidate, slot.entityType, entity.surfaceText));
          boundThisTurn.add(slot.name);
          break;
        case 'ambiguous':
          if (!ambiguity) {
            ambiguity = { slot, surfaceText: entity.surfaceText, options: resolution.options };
            boundThisTurn.add(slot.name);
          }
          break;
        case 'unresolved':
          this.logger.debug('Entity left unresolved', { type: entity.type, surfaceText: entity.surfaceText });
          break;
      }
    }

    return ambiguity;
  }

  /**
   * Slot an entity fills: the slot named by its role, otherwise the first declared slot
   * of its type not yet filled, otherwise the first not already bound in this turn
   */
  private bindSlot(
    schema: IntentSchema,
    entity: ExtractedEntity,
    store: SlotStore,
    boundThisTurn: Set<string>
  ): SlotDeclaration | null {
    const sameType = allSlots(schema).filter((slot) => slot.entityType === entity.type);
    if (entity.role) {
      return sameType.find((slot) => slot.name === entity.role) ?? null;
    }
    return (
      sameType.find((slot) => !boundThisTurn.has(slot.name) && !store.isFilled(slot.name)) ??
      sameType.find((slot) => !boundThisTurn.has(slot.name)) ??
      null
    );
  }

  private clarifyAction(
    intent: string,
    slot: SlotDeclaration,
    pending: PendingClarification,
    repeated: boolean
  ): ClarifyAction {
    return {
      type: 'clarify',
      intent,
      slot,
      surfaceText: pending.surfaceText,
      options: pending.options,
      repeated,
    };
  }

  private isBackground(intent: string, activeIntent: string): boolean {
    return intent !== activeIntent && this.config.backgroundIntents.includes(intent);
  }

  private requireSchema(intent: string): IntentSchema {
    const schema = this.catalog.get(intent);
    if (!schema) {
      throw new Error(`No schema for in-progress intent "${intent}"`);
    }
    return schema;
  }

  private transition(conversation: Conversation, next: DialogueState): void {
    const previous = conversation.state;
    conversation.state = Object.freeze(next);
    if (previous.phase !== next.phase) {
      this.logger.debug('Dialogue transition', {
        sessionId: conversation.sessionId,
        from: previous.phase,
        to: next.phase,
        intent: next.activeIntent,
      });
    }
  }
}
