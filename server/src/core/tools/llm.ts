import OpenAI from 'openai';

import type { ChatMessage } from '../@types';
import { logger } from '../shared/logger';
import { planOfflineReply } from './offlinePlanner';

export type LlmProvider = 'mock' | 'openai';

export interface GenerateChatCompletionInput {
  messages: ChatMessage[];
  model: string;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface GenerateChatCompletionOutput {
  text: string;
  model: string;
  provider: LlmProvider;
  promptTokens: number;
  completionTokens: number;
  finishReason: string | null;
}

export interface LlmTool {
  readonly provider: LlmProvider;
  generateChatCompletion(input: GenerateChatCompletionInput): Promise<GenerateChatCompletionOutput>;
}

export const MOCK_MODEL = 'deterministic-mock-v1';

const DEFAULT_COMPLETION_TOKENS = 400;
const MIN_COMPLETION_TOKENS = 64;
const MAX_COMPLETION_TOKENS = 2000;

const clampCompletionTokens = (requested?: number): number => {
  if (typeof requested !== 'number' || !Number.isFinite(requested)) {
    return DEFAULT_COMPLETION_TOKENS;
  }

  return Math.max(MIN_COMPLETION_TOKENS, Math.min(MAX_COMPLETION_TOKENS, Math.floor(requested)));
};

export const estimateTokens = (value: string): number => {
  return Math.ceil(value.length / 4);
};

/**
 * Offline stand-in used when no provider key is configured. It answers with the same
 * JSON decision protocol as a real model, driven by simple arithmetic intent matching.
 */
class DeterministicMockLlmTool implements LlmTool {
  public readonly provider = 'mock' as const;

  public generateChatCompletion(
    input: GenerateChatCompletionInput,
  ): Promise<GenerateChatCompletionOutput> {
    if (input.signal?.aborted) {
      return Promise.reject(new Error('Request was aborted.'));
    }

    const text = JSON.stringify(planOfflineReply(input.messages));
    const prompt = input.messages.map((message) => message.content).join('\n');

    return Promise.resolve({
      text,
      model: MOCK_MODEL,
      provider: 'mock',
      promptTokens: estimateTokens(prompt),
      completionTokens: estimateTokens(text),
      finishReason: 'stop',
    });
  }
}

class OpenAiLlmTool implements LlmTool {
  public readonly provider = 'openai' as const;
  private readonly client: OpenAI;

  public constructor(apiKey: string, baseUrl: string | undefined, timeoutMs: number) {
    this.client = new OpenAI({
      apiKey,
      baseURL: baseUrl,
      timeout: timeoutMs,
      maxRetries: 0,
    });
  }

  public async generateChatCompletion(
    input: GenerateChatCompletionInput,
  ): Promise<GenerateChatCompletionOutput> {
    try {
      const completion = await this.client.chat.completions.create(
        {
          model: input.model,
          temperature: input.temperature,
          max_tokens: clampCompletionTokens(input.maxTokens),
          response_format: { type: 'json_object' },
          messages: input.messages.map((message) => ({
            role: message.role,
            content: message.content,
          })),
        },
        { signal: input.signal },
      );

      const choice = completion.choices[0];

      return {
        text: choice?.message.content?.trim() ?? '',
        model: completion.model.trim() || input.model,
        provider: 'openai',
        promptTokens: completion.usage?.prompt_tokens ?? 0,
        completionTokens: completion.usage?.completion_tokens ?? 0,
        finishReason: choice?.finish_reason ?? null,
      };
    } catch (error: unknown) {
      const status = error instanceof OpenAI.APIError ? error.status : undefined;
      logger.warn('openai_completion_failed', {
        status,
        model: input.model,
        error: error instanceof Error ? error.message : String(error),
      });

      if (status === 429) {
        throw new Error('Language model provider rate limit reached.', { cause: error });
      }

      throw error;
    }
  }
}

export interface CreateLlmToolInput {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs: number;
}

export const createLlmTool = (input: CreateLlmToolInput): LlmTool => {
  if (!input.apiKey) {
    logger.warn('llm_provider_not_configured', { fallback: MOCK_MODEL });
    return new DeterministicMockLlmTool();
  }

  return new OpenAiLlmTool(input.apiKey, input.baseUrl, input.timeoutMs);
};

export const createDeterministicMockLlmTool = (): LlmTool => {
  return new DeterministicMockLlmTool();
};
