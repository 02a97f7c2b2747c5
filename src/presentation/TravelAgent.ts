import type { ComposedResponse, ConversationSummary } from '../domain/entities/AgentAction.js';
import type { SourceDocument } from '../domain/entities/DocumentChunk.js';
import type { IntentCatalog } from '../domain/entities/IntentSchema.js';
import type { IConversationService } from '../domain/ports/IConversationService.js';
import type { IEmbeddingService } from '../domain/ports/IEmbeddingService.js';
import type { IGenerationService } from '../domain/ports/IGenerationService.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import type { INluClassifier } from '../domain/ports/INluClassifier.js';
import type { IToolHandler } from '../domain/ports/IToolHandler.js';
import type { IVectorIndex } from '../domain/ports/IVectorIndex.js';
import {
  ConversationManager,
  DialogueStateMachine,
  EntityResolver,
  IngestDocuments,
  ProcessTurn,
  ResponseComposer,
  RetrievalPipeline,
  ToolRegistry,
  type IngestDocumentsOutput,
} from '../application/index.js';

export interface TravelAgentDependencies {
  catalog: IntentCatalog;
  classifier: INluClassifier;
  tools: IToolHandler[];
  embedder: IEmbeddingService;
  vectorIndex: IVectorIndex;
  generator: IGenerationService;
}

export interface TravelAgentConfig {
  name: string;
  confidenceMargin: number;
  maxClarificationCandidates: number;
  maxClarificationAttempts: number;
  backgroundIntents: string[];
  clarificationIntents: string[];
  idleTimeoutMs: number;
  sweepIntervalMs: number;
  topK: number;
  contextBudgetChars: number;
  relevanceThreshold: number;
  chunkSizeWords: number;
  nluTimeoutMs: number;
  toolTimeoutMs: number;
  embeddingTimeoutMs: number;
  vectorQueryTimeoutMs: number;
  generationTimeoutMs: number;
}

export interface AgentStatus {
  name: string;
  uptime: number;
  conversations: number;
  indexedChunks: number;
  intents: string[];
  tools: string[];
}

/**
 * Facade wiring the dialogue core to its collaborators; the surface the transport layer talks to
 */
export class TravelAgent implements IConversationService {
  private readonly registry: ToolRegistry;
  private readonly conversations: ConversationManager;
  private readonly processTurnUseCase: ProcessTurn;
  private readonly ingestDocumentsUseCase: IngestDocuments;
  private readonly startTime = Date.now();

  constructor(
    private readonly deps: TravelAgentDependencies,
    private readonly logger: ILogger,
    private readonly config: TravelAgentConfig
  ) {
    this.registry = new ToolRegistry(deps.catalog, logger, { toolTimeoutMs: config.toolTimeoutMs });
    for (const tool of deps.tools) {
      this.registry.register(tool);
    }

    const resolver = new EntityResolver({
      confidenceMargin: config.confidenceMargin,
      maxCandidates: config.maxClarificationCandidates,
    });
    const pipeline = new RetrievalPipeline(deps.embedder, deps.vectorIndex, deps.generator, logger, {
      topK: config.topK,
      contextBudgetChars: config.contextBudgetChars,
      relevanceThreshold: config.relevanceThreshold,
      embeddingTimeoutMs: config.embeddingTimeoutMs,
      vectorQueryTimeoutMs: config.vectorQueryTimeoutMs,
      generationTimeoutMs: config.generationTimeoutMs,
    });
    const stateMachine = new DialogueStateMachine(deps.catalog, resolver, this.registry, pipeline, logger, {
      backgroundIntents: config.backgroundIntents,
      clarificationIntents: config.clarificationIntents,
      maxClarificationAttempts: config.maxClarificationAttempts,
    });
    const composer = new ResponseComposer({
      capabilities: {
        routing: this.registry.capabilityOf('routing'),
        weather: this.registry.capabilityOf('weather'),
        emissions: this.registry.capabilityOf('emissions'),
      },
      knowledgeCapability: 'travel knowledge',
    });

    this.conversations = new ConversationManager(logger, {
      idleTimeoutMs: config.idleTimeoutMs,
      sweepIntervalMs: config.sweepIntervalMs,
    });
    this.processTurnUseCase = new ProcessTurn(
      deps.classifier,
      this.conversations,
      stateMachine,
      composer,
      logger,
      { nluTimeoutMs: config.nluTimeoutMs }
    );
    this.ingestDocumentsUseCase = new IngestDocuments(deps.embedder, deps.vectorIndex, logger, {
      chunkSizeWords: config.chunkSizeWords,
    });

    this.logger.info('Agent initialized', { name: config.name });
  }

  /**
   * Validate the intent table against the registered tools and start the idle sweep.
   * Throws CatalogValidationError when they disagree.
   */
  start(): void {
    this.logger.info('Starting agent', { name: this.config.name });
    this.registry.validateCatalog();
    this.conversations.start();
    this.logger.info('Agent started successfully');
  }

  stop(): void {
    this.conversations.stop();
    this.logger.info('Agent stopped');
  }

  handleMessage(sessionId: string, messageText: string): Promise<ComposedResponse> {
    return this.processTurnUseCase.execute({ sessionId, text: messageText });
  }

  resetConversation(sessionId: string): Promise<boolean> {
    return this.conversations.reset(sessionId);
  }

  listConversations(): ConversationSummary[] {
    return this.conversations.list();
  }

  ingestDocuments(documents: SourceDocument[]): Promise<IngestDocumentsOutput> {
    return this.ingestDocumentsUseCase.execute({ documents });
  }

  async getStatus(): Promise<AgentStatus> {
    return {
      name: this.config.name,
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      conversations: this.conversations.size,
      indexedChunks: await this.deps.vectorIndex.size(),
      intents: [...this.deps.catalog.keys()],
      tools: this.deps.tools.map((tool) => tool.name),
    };
  }
}
