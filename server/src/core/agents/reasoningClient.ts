import { z } from 'zod';

import {
  FINAL_ANSWER_ACTION,
  type ChatMessage,
  type Decision,
  type ReasoningContext,
  type ReasoningResult,
} from '../@types';
import { ProviderError } from '../shared/errors/agent-errors';
import { errorMessageOf, logger } from '../shared/logger';
import { buildCorrectiveInstruction } from '../shared/prompts';
import { calculateCost } from '../shared/tokenPricing';
import type { LlmTool } from '../tools/llm';

const decisionSchema = z.object({
  thought: z.string(),
  action: z.string().trim().min(1),
  args: z.record(z.unknown()).default({}),
});

export type DecisionParseResult = { ok: true; decision: Decision } | { ok: false; problem: string };

const stripCodeFence = (text: string): string => {
  const trimmed = text.trim();
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(trimmed);
  return fenced?.[1] ?? trimmed;
};

/**
 * Validates one raw provider reply against the decision protocol and narrows it into the
 * tagged `Decision` variant.
 */
export const parseDecision = (raw: string): DecisionParseResult => {
  let json: unknown;

  try {
    json = JSON.parse(stripCodeFence(raw));
  } catch {
    return { ok: false, problem: 'the reply was not valid JSON' };
  }

  const parsed = decisionSchema.safeParse(json);

  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.') || 'reply').join(', ');
    return { ok: false, problem: `missing or invalid fields: ${fields}` };
  }

  const { thought, action, args } = parsed.data;

  if (action === FINAL_ANSWER_ACTION) {
    const answer = args.answer;

    if (typeof answer !== 'string' && typeof answer !== 'number') {
      return { ok: false, problem: `"${FINAL_ANSWER_ACTION}" requires a string "args.answer"` };
    }

    return { ok: true, decision: { kind: 'final_answer', thought, answer: String(answer) } };
  }

  return { ok: true, decision: { kind: 'tool_call', thought, tool: action, args } };
};

export const buildMessages = (context: ReasoningContext): ChatMessage[] => {
  const messages: ChatMessage[] = [{ role: 'system', content: context.systemPrompt }];

  for (const turn of context.history) {
    messages.push({ role: 'user', content: turn.userInput });
    messages.push({ role: 'assistant', content: turn.finalOutput });
  }

  messages.push({ role: 'user', content: context.userInput });
  messages.push(...context.scratchpad);

  return messages;
};

export interface ReasoningClientOptions {
  maxRetries: number;
  maxTokens?: number;
}

/**
 * One logical reasoning round-trip. Malformed replies and provider failures share a
 * single retry budget; usage from every attempt is summed into the returned result.
 */
export class ReasoningClient {
  public constructor(
    private readonly llm: LlmTool,
    private readonly options: ReasoningClientOptions,
  ) {}

  public async decide(context: ReasoningContext, signal?: AbortSignal): Promise<ReasoningResult> {
    const startedAt = Date.now();
    const maxAttempts = Math.max(0, this.options.maxRetries) + 1;
    const corrections: ChatMessage[] = [];
    let promptTokens = 0;
    let completionTokens = 0;
    let model = context.model;
    let lastProblem = 'no reply';
    const spent = () => ({
      usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
      costUsd: calculateCost(model, promptTokens, completionTokens).totalCostUsd,
    });

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      if (signal?.aborted) {
        throw new ProviderError('Reasoning call was aborted.', attempt - 1, spent());
      }

      try {
        const completion = await this.llm.generateChatCompletion({
          messages: [...buildMessages(context), ...corrections],
          model: context.model,
          temperature: context.temperature,
          maxTokens: this.options.maxTokens,
          signal,
        });

        promptTokens += completion.promptTokens;
        completionTokens += completion.completionTokens;
        model = completion.model;

        const parsed = parseDecision(completion.text);

        if (parsed.ok) {
          return {
            decision: parsed.decision,
            ...spent(),
            model,
            latencyMs: Date.now() - startedAt,
            attempts: attempt,
          };
        }

        lastProblem = parsed.problem;
        corrections.push(
          { role: 'assistant', content: completion.text },
          { role: 'user', content: buildCorrectiveInstruction(parsed.problem) },
        );
      } catch (error: unknown) {
        if (signal?.aborted) {
          throw new ProviderError('Reasoning call was aborted.', attempt, { ...spent(), cause: error });
        }

        lastProblem = errorMessageOf(error);
      }

      logger.warn('reasoning_retry', {
        attempt,
        maxAttempts,
        model,
        problem: lastProblem,
      });
    }

    throw new ProviderError(
      `Language model did not return a usable decision after ${maxAttempts} attempts: ${lastProblem}`,
      maxAttempts,
      spent(),
    );
  }
}
