import dotenv from 'dotenv';
import type { LogLevel } from '../../domain/ports/ILogger.js';
import { DEFAULT_GEOCODING_URL } from '../geocoding/OpenMeteoGeocoder.js';
import { DEFAULT_ROUTING_URL } from '../tools/RoutingTool.js';
import { DEFAULT_WEATHER_URL } from '../tools/WeatherTool.js';

// Load environment variables from .env
dotenv.config();

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

export interface AppConfig {
  agent: {
    name: string;
  };
  http: {
    port: number;
    host: string;
  };
  logging: {
    level: LogLevel;
    pretty: boolean;
  };
  nlu: {
    url: string;
    timeoutMs: number;
  };
  dialogue: {
    confidenceMargin: number;
    maxClarificationCandidates: number;
    maxClarificationAttempts: number;
    backgroundIntents: string[];
    clarificationIntents: string[];
  };
  conversations: {
    idleTimeoutMs: number;
    sweepIntervalMs: number;
  };
  retrieval: {
    topK: number;
    contextBudgetChars: number;
    relevanceThreshold: number;
    chunkSizeWords: number;
    knowledgeBasePath: string;
    embeddingTimeoutMs: number;
    vectorQueryTimeoutMs: number;
    generationTimeoutMs: number;
  };
  embedding: {
    dimension: number;
  };
  openai: {
    apiKey?: string;
    embeddingModel: string;
    chatModel: string;
  };
  tools: {
    timeoutMs: number;
    geocodingUrl: string;
    weatherUrl: string;
    routingUrl: string;
  };
}

function getEnvOrDefault(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvFloat(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvList(key: string, defaultValue: string[]): string[] {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function getLogLevel(key: string, defaultValue: LogLevel): LogLevel {
  const value = process.env[key];
  return LOG_LEVELS.find((level) => level === value) ?? defaultValue;
}

/**
 * Load configuration from the environment (.env supported)
 */
export function loadConfig(): AppConfig {
  return {
    agent: {
      name: getEnvOrDefault('AGENT_NAME', 'travel-planner'),
    },
    http: {
      port: getEnvNumber('HTTP_PORT', 3000),
      host: getEnvOrDefault('HTTP_HOST', '0.0.0.0'),
    },
    logging: {
      level: getLogLevel('LOG_LEVEL', 'info'),
      pretty: process.env.NODE_ENV !== 'production',
    },
    nlu: {
      url: getEnvOrDefault('NLU_URL', 'http://localhost:5005/model/parse'),
      timeoutMs: getEnvNumber('NLU_TIMEOUT_MS', 5000),
    },
    dialogue: {
      confidenceMargin: getEnvFloat('CONFIDENCE_MARGIN', 0.2),
      maxClarificationCandidates: getEnvNumber('MAX_CLARIFICATION_CANDIDATES', 3),
      maxClarificationAttempts: getEnvNumber('MAX_CLARIFICATION_ATTEMPTS', 3),
      backgroundIntents: getEnvList('BACKGROUND_INTENTS', ['ask_knowledge']),
      clarificationIntents: getEnvList('CLARIFICATION_INTENTS', ['inform', 'select_option']),
    },
    conversations: {
      idleTimeoutMs: getEnvNumber('CONVERSATION_IDLE_TIMEOUT_MS', 30 * 60 * 1000),
      sweepIntervalMs: getEnvNumber('CONVERSATION_SWEEP_INTERVAL_MS', 60 * 1000),
    },
    retrieval: {
      topK: getEnvNumber('RETRIEVAL_TOP_K', 5),
      contextBudgetChars: getEnvNumber('RETRIEVAL_CONTEXT_BUDGET', 6000),
      relevanceThreshold: getEnvFloat('RETRIEVAL_RELEVANCE_THRESHOLD', 0.3),
      chunkSizeWords: getEnvNumber('CHUNK_SIZE_WORDS', 200),
      knowledgeBasePath: getEnvOrDefault('KNOWLEDGE_BASE_PATH', 'data/knowledge-base.json'),
      embeddingTimeoutMs: getEnvNumber('EMBEDDING_TIMEOUT_MS', 5000),
      vectorQueryTimeoutMs: getEnvNumber('VECTOR_QUERY_TIMEOUT_MS', 2000),
      generationTimeoutMs: getEnvNumber('GENERATION_TIMEOUT_MS', 20000),
    },
    embedding: {
      dimension: getEnvNumber('EMBEDDING_DIMENSION', 256),
    },
    openai: {
      apiKey: process.env.OPENAI_API_KEY || undefined,
      embeddingModel: getEnvOrDefault('OPENAI_EMBEDDING_MODEL', 'text-embedding-3-small'),
      chatModel: getEnvOrDefault('OPENAI_CHAT_MODEL', 'gpt-4o-mini'),
    },
    tools: {
      timeoutMs: getEnvNumber('TOOL_TIMEOUT_MS', 8000),
      geocodingUrl: getEnvOrDefault('GEOCODING_URL', DEFAULT_GEOCODING_URL),
      weatherUrl: getEnvOrDefault('WEATHER_URL', DEFAULT_WEATHER_URL),
      routingUrl: getEnvOrDefault('ROUTING_URL', DEFAULT_ROUTING_URL),
    },
  };
}

function isHttpUrl(value: string): boolean {
  return value.startsWith('http://') || value.startsWith('https://');
}

/**
 * Validate configuration
 */
export function validateConfig(config: AppConfig): void {
  const { dialogue, retrieval } = config;

  if (dialogue.confidenceMargin < 0 || dialogue.confidenceMargin > 1) {
    throw new Error('CONFIDENCE_MARGIN must be between 0 and 1');
  }
  if (dialogue.maxClarificationCandidates < 2) {
    throw new Error('MAX_CLARIFICATION_CANDIDATES must be at least 2');
  }
  if (dialogue.maxClarificationAttempts < 1) {
    throw new Error('MAX_CLARIFICATION_ATTEMPTS must be at least 1');
  }
  if (retrieval.topK < 1) {
    throw new Error('RETRIEVAL_TOP_K must be at least 1');
  }
  if (retrieval.contextBudgetChars <= 0) {
    throw new Error('RETRIEVAL_CONTEXT_BUDGET must be positive');
  }
  if (retrieval.relevanceThreshold < -1 || retrieval.relevanceThreshold > 1) {
    throw new Error('RETRIEVAL_RELEVANCE_THRESHOLD must be between -1 and 1');
  }
  if (retrieval.chunkSizeWords < 1) {
    throw new Error('CHUNK_SIZE_WORDS must be at least 1');
  }
  if (config.embedding.dimension < 1) {
    throw new Error('EMBEDDING_DIMENSION must be at least 1');
  }

  const timeouts: Record<string, number> = {
    NLU_TIMEOUT_MS: config.nlu.timeoutMs,
    TOOL_TIMEOUT_MS: config.tools.timeoutMs,
    EMBEDDING_TIMEOUT_MS: retrieval.embeddingTimeoutMs,
    VECTOR_QUERY_TIMEOUT_MS: retrieval.vectorQueryTimeoutMs,
    GENERATION_TIMEOUT_MS: retrieval.generationTimeoutMs,
    CONVERSATION_IDLE_TIMEOUT_MS: config.conversations.idleTimeoutMs,
    CONVERSATION_SWEEP_INTERVAL_MS: config.conversations.sweepIntervalMs,
  };
  for (const [key, value] of Object.entries(timeouts)) {
    if (value <= 0) {
      throw new Error(`${key} must be positive`);
    }
  }

  const urls: Record<string, string> = {
    NLU_URL: config.nlu.url,
    GEOCODING_URL: config.tools.geocodingUrl,
    WEATHER_URL: config.tools.weatherUrl,
    ROUTING_URL: config.tools.routingUrl,
  };
  for (const [key, value] of Object.entries(urls)) {
    if (!isHttpUrl(value)) {
      throw new Error(`${key} must start with http:// or https://`);
    }
  }
}
