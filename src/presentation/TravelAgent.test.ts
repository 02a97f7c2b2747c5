import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { TravelAgent, type TravelAgentConfig } from './TravelAgent.js';
import { CatalogValidationError } from '../application/ToolRegistry.js';
import { createIntentCatalog } from '../infrastructure/config/IntentCatalog.js';
import { HashingEmbeddingService } from '../infrastructure/embedding/HashingEmbeddingService.js';
import { ExtractiveGenerationService } from '../infrastructure/generation/ExtractiveGenerationService.js';
import { EmissionsTool } from '../infrastructure/tools/EmissionsTool.js';
import { InMemoryVectorIndex } from '../infrastructure/vector/InMemoryVectorIndex.js';
import type { ClassifiedMessage } from '../domain/entities/Turn.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import type { INluClassifier } from '../domain/ports/INluClassifier.js';
import type { IToolHandler } from '../domain/ports/IToolHandler.js';

const config: TravelAgentConfig = {
  name: 'test-agent',
  confidenceMargin: 0.2,
  maxClarificationCandidates: 3,
  maxClarificationAttempts: 2,
  backgroundIntents: ['ask_knowledge'],
  clarificationIntents: ['inform', 'select_option'],
  idleTimeoutMs: 60_000,
  sweepIntervalMs: 10_000,
  topK: 3,
  contextBudgetChars: 1_000,
  relevanceThreshold: 0.99,
  chunkSizeWords: 50,
  nluTimeoutMs: 100,
  toolTimeoutMs: 100,
  embeddingTimeoutMs: 100,
  vectorQueryTimeoutMs: 100,
  generationTimeoutMs: 100,
};

const trainTrip: ClassifiedMessage = {
  intent: 'estimate_emissions',
  entities: [
    {
      type: 'travel_mode',
      surfaceText: 'train',
      candidates: [{ id: 'train', attributes: {}, confidence: 0.95 }],
      confidence: 0.95,
    },
    {
      type: 'distance',
      surfaceText: '300 km',
      candidates: [{ id: '300', attributes: { value: 300 }, confidence: 0.95 }],
      confidence: 0.95,
    },
  ],
};

function unusedTool(name: 'routing' | 'weather', requiredInputs: IToolHandler['requiredInputs']): IToolHandler {
  return {
    name,
    capability: name,
    requiredInputs,
    execute: vi.fn(async () => {
      throw new Error(`${name} should not be called`);
    }),
  };
}

describe('TravelAgent', () => {
  let mockLogger: ILogger;
  let classify: Mock<INluClassifier['classify']>;
  let tools: IToolHandler[];
  let agent: TravelAgent;

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
    classify = vi.fn<INluClassifier['classify']>(async () => trainTrip);
    tools = [
      unusedTool('routing', [
        { name: 'origin', entityType: 'place' },
        { name: 'destination', entityType: 'place' },
      ]),
      unusedTool('weather', [{ name: 'location', entityType: 'place' }]),
      new EmissionsTool(),
    ];
    agent = createAgent(tools);
  });

  afterEach(() => {
    agent.stop();
  });

  function createAgent(handlers: IToolHandler[]): TravelAgent {
    const embedder = new HashingEmbeddingService(64);
    return new TravelAgent(
      {
        catalog: createIntentCatalog(),
        classifier: { classify },
        tools: handlers,
        embedder,
        vectorIndex: new InMemoryVectorIndex(embedder.dimension),
        generator: new ExtractiveGenerationService(),
      },
      mockLogger,
      config
    );
  }

  it('should refuse to start when a tool intent has no handler', () => {
    const incomplete = createAgent([new EmissionsTool()]);

    expect(() => incomplete.start()).toThrow(CatalogValidationError);
  });

  it('should estimate trip emissions end to end', async () => {
    agent.start();

    const response = await agent.handleMessage('s-1', 'How much CO2 for a 300 km train ride?');

    expect(response.action).toBe('tool_result');
    expect(response.messages.slice(0, 2)).toEqual([
      {
        type: 'text',
        text:
          'A 300 km trip by train for 1 traveller emits about 12.3 kg CO2e (sustainability grade A). ' +
          'Offsetting it would cost roughly $0.25.',
      },
      { type: 'text', text: 'Great job! Your trip is highly sustainable.' },
    ]);
  });

  it('should ask again for a travel mode without an emission factor', async () => {
    classify.mockResolvedValueOnce({
      intent: 'estimate_emissions',
      entities: [
        {
          type: 'travel_mode',
          surfaceText: 'ferry',
          candidates: [{ id: 'ferry', attributes: {}, confidence: 0.9 }],
          confidence: 0.9,
        },
        {
          type: 'distance',
          surfaceText: '40 km',
          candidates: [{ id: '40', attributes: { value: 40 }, confidence: 0.9 }],
          confidence: 0.9,
        },
      ],
    });
    classify.mockResolvedValueOnce({ intent: 'inform', entities: [trainTrip.entities[0]] });

    const rejected = await agent.handleMessage('s-1', 'Footprint of a 40 km ferry ride?');
    const retried = await agent.handleMessage('s-1', 'By train then');

    expect(rejected).toEqual({
      sessionId: 's-1',
      action: 'ask_slot',
      messages: [
        {
          type: 'text',
          text: 'I can\'t work with "ferry" as the travel mode. How will you travel: by train, bus, car or plane?',
        },
      ],
    });
    expect(retried.action).toBe('tool_result');
    expect(retried.messages[0]).toEqual({
      type: 'text',
      text:
        'A 40 km trip by train for 1 traveller emits about 1.6 kg CO2e (sustainability grade A). ' +
        'Offsetting it would cost roughly $0.03.',
    });
  });

  it('should deflect knowledge questions until documents are ingested', async () => {
    const question = 'Night trains save a hotel night. They also cut emissions.';
    classify.mockResolvedValue({ intent: 'ask_knowledge', entities: [] });

    const before = await agent.handleMessage('s-1', question);
    expect(before.messages[0]).toEqual({
      type: 'text',
      text: "My travel knowledge base is empty right now, so I can't answer that reliably. I can still help with routes, weather and trip emissions.",
    });

    await agent.ingestDocuments([
      { id: 'rail', text: question, metadata: { source: 'rail-guide' } },
      { id: 'tips', text: 'Pack a reusable bottle and a tote bag.', metadata: { source: 'tips' } },
    ]);
    const after = await agent.handleMessage('s-1', question);

    expect(after).toEqual({
      sessionId: 's-1',
      action: 'retrieval',
      messages: [
        { type: 'text', text: 'Night trains save a hotel night. They also cut emissions.' },
        { type: 'text', text: 'Sources: rail-guide' },
      ],
    });
  });

  it('should report status and reset conversations', async () => {
    await agent.handleMessage('s-1', 'How much CO2 for a 300 km train ride?');

    const status = await agent.getStatus();
    expect(status).toMatchObject({
      name: 'test-agent',
      conversations: 1,
      indexedChunks: 0,
      intents: ['plan_route', 'ask_weather', 'estimate_emissions', 'ask_knowledge'],
      tools: ['routing', 'weather', 'emissions'],
    });
    expect(agent.listConversations().map((summary) => summary.activeIntent)).toEqual(['estimate_emissions']);

    expect(await agent.resetConversation('s-1')).toBe(true);
    expect(await agent.resetConversation('s-1')).toBe(false);
  });
});
