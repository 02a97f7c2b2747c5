import { describe, it, expect, vi, afterEach } from 'vitest';
import { loadConfig, validateConfig } from './Config.js';

describe('loadConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should fall back to defaults for unset variables', () => {
    const config = loadConfig();

    expect(config.dialogue).toEqual({
      confidenceMargin: 0.2,
      maxClarificationCandidates: 3,
      maxClarificationAttempts: 3,
      backgroundIntents: ['ask_knowledge'],
      clarificationIntents: ['inform', 'select_option'],
    });
    expect(config.retrieval.topK).toBe(5);
    expect(config.tools.routingUrl).toBe('https://router.project-osrm.org');
  });

  it('should read numbers, floats and lists from the environment', () => {
    vi.stubEnv('CONFIDENCE_MARGIN', '0.35');
    vi.stubEnv('RETRIEVAL_TOP_K', '8');
    vi.stubEnv('BACKGROUND_INTENTS', 'ask_knowledge, ask_weather,');
    vi.stubEnv('CLARIFICATION_INTENTS', '');

    const config = loadConfig();

    expect(config.dialogue.confidenceMargin).toBe(0.35);
    expect(config.retrieval.topK).toBe(8);
    expect(config.dialogue.backgroundIntents).toEqual(['ask_knowledge', 'ask_weather']);
    expect(config.dialogue.clarificationIntents).toEqual([]);
  });

  it('should ignore unparseable values', () => {
    vi.stubEnv('HTTP_PORT', 'eighty');
    vi.stubEnv('LOG_LEVEL', 'verbose');

    const config = loadConfig();

    expect(config.http.port).toBe(3000);
    expect(config.logging.level).toBe('info');
  });

  it('should leave the OpenAI key unset when blank', () => {
    vi.stubEnv('OPENAI_API_KEY', '');

    expect(loadConfig().openai.apiKey).toBeUndefined();
  });
});

describe('validateConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should accept the defaults', () => {
    expect(() => validateConfig(loadConfig())).not.toThrow();
  });

  it('should reject a margin outside [0, 1]', () => {
    vi.stubEnv('CONFIDENCE_MARGIN', '1.5');

    expect(() => validateConfig(loadConfig())).toThrow('CONFIDENCE_MARGIN must be between 0 and 1');
  });

  it('should require at least two clarification candidates', () => {
    vi.stubEnv('MAX_CLARIFICATION_CANDIDATES', '1');

    expect(() => validateConfig(loadConfig())).toThrow('MAX_CLARIFICATION_CANDIDATES must be at least 2');
  });

  it('should reject a non-positive timeout', () => {
    vi.stubEnv('TOOL_TIMEOUT_MS', '0');

    expect(() => validateConfig(loadConfig())).toThrow('TOOL_TIMEOUT_MS must be positive');
  });

  it('should reject a service URL without an http scheme', () => {
    vi.stubEnv('NLU_URL', 'localhost:5005');

    expect(() => validateConfig(loadConfig())).toThrow('NLU_URL must start with http:// or https://');
  });
});
