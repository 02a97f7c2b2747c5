import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { ProcessTurn } from './ProcessTurn.js';
import { ConversationManager } from '../ConversationManager.js';
import { DialogueStateMachine } from '../DialogueStateMachine.js';
import { EntityResolver } from '../EntityResolver.js';
import { GENERIC_APOLOGY, ResponseComposer } from '../ResponseComposer.js';
import { RetrievalPipeline } from '../RetrievalPipeline.js';
import { ToolRegistry } from '../ToolRegistry.js';
import { createIntentCatalog } from '../../infrastructure/config/IntentCatalog.js';
import type { ClassifiedMessage } from '../../domain/entities/Turn.js';
import type { WeatherReport } from '../../domain/entities/ToolResult.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import type { INluClassifier } from '../../domain/ports/INluClassifier.js';

const forecast: WeatherReport = {
  kind: 'weather',
  location: 'Lisbon',
  date: '2025-06-01',
  temperatureMin: 16,
  temperatureMax: 24,
  condition: 'Clear',
  precipitationProbability: 0.1,
  recommendations: [],
};

const weatherInLisbon: ClassifiedMessage = {
  intent: 'ask_weather',
  entities: [
    {
      type: 'place',
      surfaceText: 'Lisbon',
      candidates: [{ id: 'geo-lis', attributes: { label: 'Lisbon' }, confidence: 0.9 }],
      confidence: 0.9,
    },
  ],
};

const NLU_DOWN = "Sorry, the language understanding service isn't available right now. Please try again in a moment.";

describe('ProcessTurn', () => {
  let mockLogger: ILogger;
  let classify: Mock<INluClassifier['classify']>;
  let conversations: ConversationManager;
  let useCase: ProcessTurn;

  beforeEach(() => {
    mockLogger = {
      trace: vi.fn(),
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      fatal: vi.fn(),
      child: vi.fn().mockReturnThis(),
    };

    const catalog = createIntentCatalog();
    const registry = new ToolRegistry(catalog, mockLogger, { toolTimeoutMs: 100 });
    registry.register({
      name: 'weather',
      capability: 'weather',
      requiredInputs: [{ name: 'location', entityType: 'place' }],
      execute: vi.fn(async () => forecast),
    });
    const pipeline = new RetrievalPipeline(
      { dimension: 2, embed: vi.fn(async () => [1, 0]) },
      { query: vi.fn(async () => []), upsert: vi.fn(async () => {}), size: vi.fn(async () => 0) },
      { generate: vi.fn(async () => '') },
      mockLogger,
      {
        topK: 3,
        contextBudgetChars: 500,
        relevanceThreshold: 0.3,
        embeddingTimeoutMs: 100,
        vectorQueryTimeoutMs: 100,
        generationTimeoutMs: 100,
      }
    );
    const stateMachine = new DialogueStateMachine(
      catalog,
      new EntityResolver({ confidenceMargin: 0.2, maxCandidates: 3 }),
      registry,
      pipeline,
      mockLogger,
      { backgroundIntents: ['ask_knowledge'], clarificationIntents: ['inform'], maxClarificationAttempts: 2 }
    );
    const composer = new ResponseComposer({
      capabilities: { routing: 'route planning', weather: 'weather', emissions: 'emissions estimate' },
      knowledgeCapability: 'travel knowledge',
    });

    classify = vi.fn<INluClassifier['classify']>(async () => weatherInLisbon);
    conversations = new ConversationManager(mockLogger, { idleTimeoutMs: 60_000, sweepIntervalMs: 1_000 });
    useCase = new ProcessTurn({ classify }, conversations, stateMachine, composer, mockLogger, { nluTimeoutMs: 100 });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should classify the trimmed text and return the composed forecast', async () => {
    const response = await useCase.execute({ sessionId: 's-1', text: '  Weather in Lisbon?  ' });

    expect(classify).toHaveBeenCalledWith('Weather in Lisbon?', expect.any(AbortSignal));
    expect(response).toEqual({
      sessionId: 's-1',
      action: 'tool_result',
      messages: [
        {
          type: 'text',
          text: 'The forecast for Lisbon on 2025-06-01: clear, between 16°C and 24°C with a 10% chance of precipitation.',
        },
        { type: 'data', kind: 'weather', payload: forecast },
      ],
    });
  });

  it('should ask for the missing location', async () => {
    classify.mockResolvedValueOnce({ intent: 'ask_weather', entities: [] });

    const response = await useCase.execute({ sessionId: 's-1', text: 'What will the weather be?' });

    expect(response.action).toBe('ask_slot');
    expect(response.messages).toEqual([{ type: 'text', text: 'Which place would you like the forecast for?' }]);
  });

  it('should require a session id and text', async () => {
    await expect(useCase.execute({ sessionId: '  ', text: 'Hello' })).rejects.toThrow('Session id is required');
    await expect(useCase.execute({ sessionId: 's-1', text: '   ' })).rejects.toThrow('Text input is required');
    expect(classify).not.toHaveBeenCalled();
  });

  it('should answer with an unavailable message when the classifier fails', async () => {
    classify.mockRejectedValueOnce(new Error('NLU request failed with status 503'));

    const response = await useCase.execute({ sessionId: 's-1', text: 'Weather in Lisbon?' });

    expect(response).toEqual({
      sessionId: 's-1',
      action: 'failure',
      messages: [{ type: 'text', text: NLU_DOWN }],
    });
    expect(conversations.list().map((summary) => [summary.phase, summary.activeIntent])).toEqual([
      ['AwaitingIntent', null],
    ]);
  });

  it('should treat a slow classifier as a timeout', async () => {
    vi.useFakeTimers();
    classify.mockImplementationOnce(() => new Promise<ClassifiedMessage>(() => {}));

    const pending = useCase.execute({ sessionId: 's-1', text: 'Weather in Lisbon?' });
    await vi.advanceTimersByTimeAsync(0);
    await vi.advanceTimersByTimeAsync(100);

    expect((await pending).messages).toEqual([{ type: 'text', text: NLU_DOWN }]);
    expect(mockLogger.warn).toHaveBeenCalledWith(
      'Classification failed',
      expect.objectContaining({ sessionId: 's-1', errorKind: 'ToolTimeout' })
    );
  });

  it('should keep each session in its own conversation', async () => {
    classify.mockResolvedValueOnce({ intent: 'ask_weather', entities: [] });
    await useCase.execute({ sessionId: 's-1', text: 'What will the weather be?' });

    classify.mockResolvedValueOnce({ intent: 'inform', entities: weatherInLisbon.entities });
    const other = await useCase.execute({ sessionId: 's-2', text: 'Lisbon' });

    expect(other.messages).toEqual([{ type: 'text', text: GENERIC_APOLOGY }]);
    expect(conversations.list().map((summary) => [summary.sessionId, summary.activeIntent])).toEqual([
      ['s-1', 'ask_weather'],
      ['s-2', null],
    ]);
  });

  it('should process turns of one session in arrival order when classification is slow', async () => {
    let releaseFirst: (message: ClassifiedMessage) => void = () => {};
    classify.mockImplementationOnce(
      () =>
        new Promise<ClassifiedMessage>((resolve) => {
          releaseFirst = resolve;
        })
    );
    classify.mockResolvedValueOnce({ intent: 'inform', entities: weatherInLisbon.entities });

    const first = useCase.execute({ sessionId: 's-1', text: 'What is the weather like?' });
    const second = useCase.execute({ sessionId: 's-1', text: 'Lisbon' });
    await vi.waitFor(() => expect(classify).toHaveBeenCalledTimes(1));
    releaseFirst({ intent: 'ask_weather', entities: [] });

    const [asked, answered] = await Promise.all([first, second]);

    expect(asked.action).toBe('ask_slot');
    expect(answered.action).toBe('tool_result');
    expect(classify.mock.calls.map(([text]) => text)).toEqual(['What is the weather like?', 'Lisbon']);
  });
});
