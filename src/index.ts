import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { fileURLToPath } from 'url';
import { loadConfig, validateConfig, type AppConfig } from './infrastructure/config/Config.js';
import { createIntentCatalog } from './infrastructure/config/IntentCatalog.js';
import { PinoLogger } from './infrastructure/logging/PinoLogger.js';
import { HttpNluClassifier } from './infrastructure/nlu/HttpNluClassifier.js';
import { OpenMeteoGeocoder } from './infrastructure/geocoding/OpenMeteoGeocoder.js';
import { WeatherTool } from './infrastructure/tools/WeatherTool.js';
import { RoutingTool } from './infrastructure/tools/RoutingTool.js';
import { EmissionsTool } from './infrastructure/tools/EmissionsTool.js';
import { HashingEmbeddingService } from './infrastructure/embedding/HashingEmbeddingService.js';
import { OpenAiEmbeddingService } from './infrastructure/embedding/OpenAiEmbeddingService.js';
import { ExtractiveGenerationService } from './infrastructure/generation/ExtractiveGenerationService.js';
import { OpenAiGenerationService } from './infrastructure/generation/OpenAiGenerationService.js';
import { InMemoryVectorIndex } from './infrastructure/vector/InMemoryVectorIndex.js';
import { TravelAgent, type TravelAgentConfig } from './presentation/TravelAgent.js';
import { HttpServer, parseDocuments } from './presentation/HttpServer.js';
import type { IEmbeddingService } from './domain/ports/IEmbeddingService.js';
import type { IGenerationService } from './domain/ports/IGenerationService.js';
import type { ILogger } from './domain/ports/ILogger.js';

function toAgentConfig(config: AppConfig): TravelAgentConfig {
  return {
    name: config.agent.name,
    ...config.dialogue,
    ...config.conversations,
    topK: config.retrieval.topK,
    contextBudgetChars: config.retrieval.contextBudgetChars,
    relevanceThreshold: config.retrieval.relevanceThreshold,
    chunkSizeWords: config.retrieval.chunkSizeWords,
    embeddingTimeoutMs: config.retrieval.embeddingTimeoutMs,
    vectorQueryTimeoutMs: config.retrieval.vectorQueryTimeoutMs,
    generationTimeoutMs: config.retrieval.generationTimeoutMs,
    nluTimeoutMs: config.nlu.timeoutMs,
    toolTimeoutMs: config.tools.timeoutMs,
  };
}

function createModelAdapters(
  config: AppConfig,
  logger: ILogger
): { embedder: IEmbeddingService; generator: IGenerationService } {
  const { apiKey, embeddingModel, chatModel } = config.openai;
  if (apiKey) {
    logger.info('Using OpenAI models', { embeddingModel, chatModel });
    return {
      embedder: new OpenAiEmbeddingService({ apiKey, model: embeddingModel }),
      generator: new OpenAiGenerationService({ apiKey, model: chatModel }),
    };
  }

  logger.info('OPENAI_API_KEY not set, using offline hashing embeddings and extractive answers', {
    dimension: config.embedding.dimension,
  });
  return {
    embedder: new HashingEmbeddingService(config.embedding.dimension),
    generator: new ExtractiveGenerationService(),
  };
}

/**
 * Index the seed documents shipped with the service, if the file exists
 */
async function seedKnowledgeBase(agent: TravelAgent, path: string, logger: ILogger): Promise<void> {
  const fullPath = resolve(path);
  if (!existsSync(fullPath)) {
    logger.warn('Knowledge base file not found, starting with an empty index', { path: fullPath });
    return;
  }

  const raw: unknown = JSON.parse(await readFile(fullPath, 'utf-8'));
  const result = await agent.ingestDocuments(parseDocuments(raw));
  logger.info('Knowledge base loaded', { path: fullPath, documents: result.documents, chunks: result.chunks });
}

/**
 * Main entry point for the travel planner agent
 */
async function main(): Promise<void> {
  // Load and validate configuration
  const config = loadConfig();
  validateConfig(config);

  // Initialize logger
  const logger = new PinoLogger({
    name: config.agent.name,
    level: config.logging.level,
    pretty: config.logging.pretty,
  });

  logger.info('Travel planner agent starting', {
    name: config.agent.name,
    nluUrl: config.nlu.url,
  });

  const geocoder = new OpenMeteoGeocoder(config.tools.geocodingUrl);
  const { embedder, generator } = createModelAdapters(config, logger);

  const agent = new TravelAgent(
    {
      catalog: createIntentCatalog(),
      classifier: new HttpNluClassifier(config.nlu.url, logger),
      tools: [
        new RoutingTool(geocoder, config.tools.routingUrl),
        new WeatherTool(geocoder, config.tools.weatherUrl),
        new EmissionsTool(),
      ],
      embedder,
      vectorIndex: new InMemoryVectorIndex(embedder.dimension),
      generator,
    },
    logger.child({ component: 'TravelAgent' }),
    toAgentConfig(config)
  );

  const httpServer = new HttpServer(agent, logger.child({ component: 'HttpServer' }), {
    port: config.http.port,
    host: config.http.host,
  });

  // Handle graceful shutdown
  const shutdown = async (): Promise<void> => {
    logger.info('Shutting down...');
    await httpServer.stop();
    agent.stop();
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      logger.fatal('Shutdown failed', error);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    agent.start();
    await seedKnowledgeBase(agent, config.retrieval.knowledgeBasePath, logger);
    await httpServer.start();
    logger.info('Travel planner agent is running. Press Ctrl+C to stop.');
  } catch (error) {
    logger.fatal('Failed to start agent', error);
    process.exit(1);
  }
}

// Run only when executed directly, not when imported as a library
if (process.argv[1] && resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main().catch((error: unknown) => {
    console.error('Unhandled error:', error);
    process.exit(1);
  });
}

// Export for programmatic use
export { TravelAgent } from './presentation/TravelAgent.js';
export { HttpServer } from './presentation/HttpServer.js';
export { createIntentCatalog } from './infrastructure/config/IntentCatalog.js';
export { loadConfig, validateConfig } from './infrastructure/config/Config.js';
export { PinoLogger } from './infrastructure/logging/PinoLogger.js';
export * from './domain/index.js';
