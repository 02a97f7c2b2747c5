import type {
  RetrievalContext,
  RetrievalFailureKind,
  RetrievalResult,
  ScoredChunk,
} from '../domain/entities/DocumentChunk.js';
import type { IEmbeddingService } from '../domain/ports/IEmbeddingService.js';
import type { IGenerationService } from '../domain/ports/IGenerationService.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import type { IVectorIndex } from '../domain/ports/IVectorIndex.js';
import { isTimeoutError, withTimeout } from '../infrastructure/utils/withTimeout.js';

export interface RetrievalPipelineConfig {
  topK: number;
  /** Maximum total characters of chunk text handed to the generator */
  contextBudgetChars: number;
  /** Best similarity below this means nothing relevant was found */
  relevanceThreshold: number;
  embeddingTimeoutMs: number;
  vectorQueryTimeoutMs: number;
  generationTimeoutMs: number;
}

/**
 * Outcome of the deterministic part of the pipeline (embed, search, assemble)
 */
export type RetrievalStep =
  | { ok: true; context: RetrievalContext; bestSimilarity: number }
  | { ok: false; errorKind: RetrievalFailureKind; context: RetrievalContext };

const EMPTY_CONTEXT: RetrievalContext = Object.freeze({ chunks: [], totalLength: 0 });

export function rankChunks(chunks: ScoredChunk[]): ScoredChunk[] {
  return [...chunks].sort((a, b) => {
    if (a.similarity !== b.similarity) return b.similarity - a.similarity;
    if (a.chunkId < b.chunkId) return -1;
    if (a.chunkId > b.chunkId) return 1;
    return 0;
  });
}

/**
 * Append ranked chunks until the next one would overflow the budget.
 * Chunks are never cut; the overflowing chunk and everything after it are left out.
 */
export function assembleContext(ranked: ScoredChunk[], budgetChars: number): RetrievalContext {
  const chunks: ScoredChunk[] = [];
  let totalLength = 0;

  for (const chunk of ranked) {
    if (totalLength + chunk.text.length > budgetChars) break;
    chunks.push(chunk);
    totalLength += chunk.text.length;
  }

  return { chunks, totalLength };
}

function failureKind(error: unknown): RetrievalFailureKind {
  return isTimeoutError(error) ? 'ToolTimeout' : 'ToolUnavailable';
}

/**
 * Retrieval-augmented answering: embed the query, search the shared index,
 * assemble a bounded context and generate an answer grounded in it.
 */
export class RetrievalPipeline {
  private readonly logger: ILogger;

  constructor(
    private readonly embedder: IEmbeddingService,
    private readonly index: IVectorIndex,
    private readonly generator: IGenerationService,
    logger: ILogger,
    private readonly config: RetrievalPipelineConfig
  ) {
    this.logger = logger.child({ component: 'RetrievalPipeline' });
  }

  /**
   * Steps 1-3. Deterministic for a fixed index, query, k and threshold.
   */
  async retrieve(queryText: string): Promise<RetrievalStep> {
    const { config } = this;

    let ranked: ScoredChunk[];
    try {
      const indexSize = await withTimeout('vector-size', config.vectorQueryTimeoutMs, () => this.index.size());
      if (indexSize === 0) {
        this.logger.warn('Retrieval against an empty index');
        return { ok: false, errorKind: 'EmptyIndex', context: EMPTY_CONTEXT };
      }

      const vector = await withTimeout('embed', config.embeddingTimeoutMs, (signal) =>
        this.embedder.embed(queryText, signal)
      );
      const hits = await withTimeout('vector-query', config.vectorQueryTimeoutMs, () =>
        this.index.query(vector, config.topK)
      );
      ranked = rankChunks(hits).slice(0, config.topK);
    } catch (error) {
      const errorKind = failureKind(error);
      this.logger.warn('Retrieval collaborator failed', {
        errorKind,
        error: error instanceof Error ? error.message : String(error),
      });
      return { ok: false, errorKind, context: EMPTY_CONTEXT };
    }

    const bestSimilarity = ranked.length > 0 ? ranked[0].similarity : Number.NEGATIVE_INFINITY;
    if (bestSimilarity < config.relevanceThreshold) {
      this.logger.info('No chunk above relevance threshold', {
        bestSimilarity: ranked.length > 0 ? bestSimilarity : null,
        threshold: config.relevanceThreshold,
      });
      return { ok: false, errorKind: 'NoRelevantContext', context: EMPTY_CONTEXT };
    }

    const relevant = ranked.filter((chunk) => chunk.similarity >= config.relevanceThreshold);
    const context = assembleContext(relevant, config.contextBudgetChars);
    if (context.chunks.length === 0) {
      this.logger.info('Best chunk exceeds the context budget on its own', {
        budget: config.contextBudgetChars,
        chunkId: relevant[0].chunkId,
      });
      return { ok: false, errorKind: 'NoRelevantContext', context };
    }

    this.logger.debug('Context assembled', {
      chunkIds: context.chunks.map((chunk) => chunk.chunkId),
      totalLength: context.totalLength,
      bestSimilarity,
    });
    return { ok: true, context, bestSimilarity };
  }

  async answer(queryText: string): Promise<RetrievalResult> {
    const step = await this.retrieve(queryText);
    if (!step.ok) {
      return { grounded: false, context: step.context, errorKind: step.errorKind };
    }

    try {
      const generated = await withTimeout('generate', this.config.generationTimeoutMs, (signal) =>
        this.generator.generate(queryText, step.context.chunks, signal)
      );
      const groundedAnswer = generated.trim();
      if (groundedAnswer.length === 0) {
        this.logger.warn('Generator returned an empty answer');
        return { grounded: false, context: step.context, errorKind: 'ToolUnavailable' };
      }

      return {
        grounded: true,
        context: step.context,
        groundedAnswer,
        sources: this.sourcesOf(step.context),
      };
    } catch (error) {
      const errorKind = failureKind(error);
      this.logger.warn('Generation failed', {
        errorKind,
        error: error instanceof Error ? error.message : String(error),
      });
      return { grounded: false, context: step.context, errorKind };
    }
  }

  private sourcesOf(context: RetrievalContext): string[] {
    const sources = new Set<string>();
    for (const chunk of context.chunks) {
      const source = chunk.metadata.source;
      sources.add(typeof source === 'string' && source.length > 0 ? source : chunk.chunkId);
    }
    return [...sources];
  }
}
