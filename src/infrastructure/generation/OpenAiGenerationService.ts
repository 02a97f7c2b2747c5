import OpenAI from 'openai';
import type { ScoredChunk } from '../../domain/entities/DocumentChunk.js';
import type { IGenerationService } from '../../domain/ports/IGenerationService.js';
import { buildGroundedPrompt, SYSTEM_PROMPT } from './prompt.js';

/**
 * The part of the OpenAI client this adapter calls
 */
export interface ChatCompletionsApi {
  chat: {
    completions: {
      create(
        params: {
          model: string;
          messages: Array<{ role: 'system' | 'user'; content: string }>;
          temperature: number;
          max_tokens: number;
        },
        options?: { signal?: AbortSignal }
      ): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export interface OpenAiGenerationOptions {
  apiKey: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Grounded answers through OpenAI chat completions
 */
export class OpenAiGenerationService implements IGenerationService {
  private readonly client: ChatCompletionsApi;

  constructor(
    private readonly options: OpenAiGenerationOptions,
    client?: ChatCompletionsApi
  ) {
    this.client = client ?? new OpenAI({ apiKey: options.apiKey });
  }

  async generate(query: string, contextChunks: ScoredChunk[], signal?: AbortSignal): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: this.options.model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: buildGroundedPrompt(query, contextChunks) },
        ],
        temperature: this.options.temperature ?? 0.2,
        max_tokens: this.options.maxTokens ?? 512,
      },
      { signal }
    );
    return response.choices[0]?.message?.content ?? '';
  }
}
