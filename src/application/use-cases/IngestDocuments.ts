import type { ChunkMetadata, SourceDocument } from '../../domain/entities/DocumentChunk.js';
import type { IEmbeddingService } from '../../domain/ports/IEmbeddingService.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import type { IVectorIndex } from '../../domain/ports/IVectorIndex.js';

export interface IngestDocumentsInput {
  documents: SourceDocument[];
}

export interface IngestDocumentsOutput {
  documents: number;
  chunks: number;
  chunkIds: string[];
}

export interface IngestDocumentsConfig {
  chunkSizeWords: number;
}

/**
 * Collapse runs of whitespace and trim
 */
export function normalizeText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Split normalized text into consecutive chunks of at most `chunkSizeWords` words
 */
export function chunkWords(text: string, chunkSizeWords: number): string[] {
  const words = normalizeText(text).split(' ').filter((word) => word.length > 0);
  const chunks: string[] = [];
  for (let start = 0; start < words.length; start += chunkSizeWords) {
    chunks.push(words.slice(start, start + chunkSizeWords).join(' '));
  }
  return chunks;
}

/**
 * Administrative use case: chunk, embed and index source documents
 */
export class IngestDocuments {
  private readonly logger: ILogger;

  constructor(
    private readonly embedder: IEmbeddingService,
    private readonly index: IVectorIndex,
    logger: ILogger,
    private readonly config: IngestDocumentsConfig
  ) {
    this.logger = logger.child({ component: 'IngestDocuments' });
  }

  async execute(input: IngestDocumentsInput): Promise<IngestDocumentsOutput> {
    this.logger.info('Executing IngestDocuments use case', { documents: input.documents.length });

    const chunkIds: string[] = [];
    for (const document of input.documents) {
      if (!document.id || document.id.trim().length === 0) {
        throw new Error('Document id is required');
      }

      const pieces = chunkWords(document.text, this.config.chunkSizeWords);
      if (pieces.length === 0) {
        this.logger.warn('Skipping empty document', { documentId: document.id });
        continue;
      }

      for (const [position, text] of pieces.entries()) {
        const chunkId = `${document.id}#${position}`;
        const metadata: ChunkMetadata = {
          ...document.metadata,
          documentId: document.id,
          position,
        };
        const vector = await this.embedder.embed(text);
        await this.index.upsert(chunkId, vector, text, metadata);
        chunkIds.push(chunkId);
      }
    }

    this.logger.info('Documents indexed', { documents: input.documents.length, chunks: chunkIds.length });
    return { documents: input.documents.length, chunks: chunkIds.length, chunkIds };
  }
}
