import { describe, expect, it } from 'vitest';

import type { ReasoningContext } from '../../@types';
import { ProviderError } from '../../shared/errors/agent-errors';
import { buildCorrectiveInstruction } from '../../shared/prompts';
import { finalAnswer, ScriptedLlmTool, toolCall } from '../../__tests__/fixtures';
import { buildMessages, parseDecision, ReasoningClient } from '../reasoningClient';

const context: ReasoningContext = {
  systemPrompt: 'You are a test agent.',
  history: [],
  userInput: 'What is 2 + 2?',
  scratchpad: [],
  model: 'gpt-4o-mini',
  temperature: 0,
};

describe('parseDecision', () => {
  it('reads a tool call', () => {
    expect(parseDecision(toolCall('calculator', { expression: '2 + 2' }, 'Add them.'))).toEqual({
      ok: true,
      decision: {
        kind: 'tool_call',
        thought: 'Add them.',
        tool: 'calculator',
        args: { expression: '2 + 2' },
      },
    });
  });

  it('reads a final answer and accepts numeric answers', () => {
    expect(parseDecision(finalAnswer('4'))).toEqual({
      ok: true,
      decision: { kind: 'final_answer', thought: 'I have the answer.', answer: '4' },
    });
    expect(
      parseDecision('{"thought":"done","action":"final_answer","args":{"answer":42}}'),
    ).toEqual({
      ok: true,
      decision: { kind: 'final_answer', thought: 'done', answer: '42' },
    });
  });

  it('strips a markdown code fence', () => {
    const result = parseDecision('```json\n{"thought":"t","action":"calculator","args":{"expression":"1"}}\n```');

    expect(result.ok).toBe(true);
  });

  it('defaults missing args to an empty object', () => {
    expect(parseDecision('{"thought":"t","action":"calculator"}')).toEqual({
      ok: true,
      decision: { kind: 'tool_call', thought: 't', tool: 'calculator', args: {} },
    });
  });

  it('explains why a reply was rejected', () => {
    expect(parseDecision('The answer is 4')).toEqual({
      ok: false,
      problem: 'the reply was not valid JSON',
    });
    expect(parseDecision('{"thought":"t"}')).toEqual({
      ok: false,
      problem: 'missing or invalid fields: action',
    });
    expect(parseDecision('[1]')).toEqual({
      ok: false,
      problem: 'missing or invalid fields: reply',
    });
    expect(parseDecision('{"thought":"t","action":"final_answer","args":{}}')).toEqual({
      ok: false,
      problem: '"final_answer" requires a string "args.answer"',
    });
  });
});

describe('buildMessages', () => {
  it('orders system prompt, history, input and scratchpad', () => {
    const messages = buildMessages({
      ...context,
      history: [{ userInput: '1 + 1', finalOutput: '2' }],
      scratchpad: [{ role: 'assistant', content: 'scratch' }],
    });

    expect(messages).toEqual([
      { role: 'system', content: 'You are a test agent.' },
      { role: 'user', content: '1 + 1' },
      { role: 'assistant', content: '2' },
      { role: 'user', content: 'What is 2 + 2?' },
      { role: 'assistant', content: 'scratch' },
    ]);
  });
});

describe('ReasoningClient', () => {
  it('retries a malformed reply with a corrective instruction', async () => {
    const llm = new ScriptedLlmTool(['not json', finalAnswer('4')]);
    const client = new ReasoningClient(llm, { maxRetries: 2 });

    const result = await client.decide(context);

    expect(result.attempts).toBe(2);
    expect(result.decision).toEqual({ kind: 'final_answer', thought: 'I have the answer.', answer: '4' });
    expect(result.usage).toEqual({ promptTokens: 20, completionTokens: 10, totalTokens: 30 });
    expect(result.costUsd).toBeCloseTo(0.000009, 9);
    expect(result.model).toBe('gpt-4o-mini');

    const secondCall = llm.calls[1]?.messages ?? [];
    expect(secondCall.slice(-2)).toEqual([
      { role: 'assistant', content: 'not json' },
      { role: 'user', content: buildCorrectiveInstruction('the reply was not valid JSON') },
    ]);
  });

  it('gives up after the retry budget', async () => {
    const llm = new ScriptedLlmTool(['nope', 'still nope', 'never']);
    const client = new ReasoningClient(llm, { maxRetries: 2 });

    const error = await client.decide(context).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({
      kind: 'ProviderError',
      attempts: 3,
      message:
        'Language model did not return a usable decision after 3 attempts: the reply was not valid JSON',
    });
    expect(llm.calls).toHaveLength(3);
  });

  it('carries the usage of failed attempts on the error', async () => {
    const llm = new ScriptedLlmTool(['nope', 'still nope', 'never']);
    const client = new ReasoningClient(llm, { maxRetries: 2 });

    const error = await client.decide(context).catch((caught: unknown) => caught);

    if (!(error instanceof ProviderError)) {
      throw new Error('expected a ProviderError');
    }
    expect(error.usage).toEqual({ promptTokens: 30, completionTokens: 15, totalTokens: 45 });
    expect(error.costUsd).toBeCloseTo(0.0000135, 5);
  });

  it('retries provider failures', async () => {
    const llm = new ScriptedLlmTool([new Error('connection reset'), finalAnswer('4')]);
    const client = new ReasoningClient(llm, { maxRetries: 1 });

    const result = await client.decide(context);

    expect(result.attempts).toBe(2);
    expect(llm.calls[1]?.messages).toHaveLength(2);
  });

  it('reports the last provider failure when retries run out', async () => {
    const llm = new ScriptedLlmTool([new Error('connection reset')]);
    const client = new ReasoningClient(llm, { maxRetries: 0 });

    await expect(client.decide(context)).rejects.toThrow(
      'Language model did not return a usable decision after 1 attempts: connection reset',
    );
  });

  it('stops when the signal is already aborted', async () => {
    const llm = new ScriptedLlmTool([finalAnswer('4')]);
    const client = new ReasoningClient(llm, { maxRetries: 2 });
    const controller = new AbortController();
    controller.abort();

    await expect(client.decide(context, controller.signal)).rejects.toThrow('Reasoning call was aborted.');
    expect(llm.calls).toHaveLength(0);
  });
});
