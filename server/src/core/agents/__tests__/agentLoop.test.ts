import { afterEach, describe, expect, it, vi } from 'vitest';

import type { NewStepRecord, StepRecord } from '../../@types';
import type { AgentEngine } from '../../engine';
import { InMemoryTraceStore } from '../../memory/inMemoryTraceStore';
import { logger } from '../../shared/logger';
import { buildObservationMessage, buildUnknownToolObservation } from '../../shared/prompts';
import { createDeterministicMockLlmTool } from '../../tools/llm';
import {
  createTestEngine,
  finalAnswer,
  openTestSession,
  ScriptedLlmTool,
  toolCall,
} from '../../__tests__/fixtures';

const lastMessageOf = (llm: ScriptedLlmTool, call: number): string | undefined => {
  return llm.calls[call]?.messages.at(-1)?.content;
};

const startRun = async (engine: AgentEngine, userInput: string, maxIterations?: number) => {
  const { session } = await openTestSession(engine);
  const outcome = await engine.runner.start({ sessionId: session.id, userInput, maxIterations });
  const steps = await engine.traceStore.listSteps(outcome.trace.id);
  return { session, outcome, steps };
};

describe('AgentLoop', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reasons, calls a tool, and answers', async () => {
    const llm = new ScriptedLlmTool([
      toolCall('calculator', { expression: '2 + 2' }),
      finalAnswer('2 + 2 is 4.'),
    ]);
    const engine = createTestEngine(llm);

    const { outcome, steps } = await startRun(engine, 'What is 2 + 2?');

    expect(outcome.state).toBe('DONE');
    expect(outcome.stepsTaken).toBe(5);
    expect(outcome.trace).toMatchObject({
      status: 'completed',
      isSuccessful: true,
      finalOutput: '2 + 2 is 4.',
      totalTokens: 30,
      errorKind: null,
    });
    expect(steps.map((step) => [step.sequenceOrder, step.stepType])).toEqual([
      [1, 'thought'],
      [2, 'tool_call'],
      [3, 'tool_result'],
      [4, 'thought'],
      [5, 'response'],
    ]);
    expect(steps[1]).toMatchObject({
      stepName: 'calculator',
      inputPayload: { expression: '2 + 2' },
      isError: false,
    });
    expect(steps[1]?.completedAt).not.toBeNull();
    expect(steps[2]?.outputPayload).toEqual({ result: '4' });
    expect(steps[4]?.outputPayload).toEqual({ response: '2 + 2 is 4.' });
    expect(lastMessageOf(llm, 1)).toBe(buildObservationMessage('calculator', '4'));
  });

  it('records the run configuration on the trace', async () => {
    const engine = createTestEngine(new ScriptedLlmTool([finalAnswer('hello')]));

    const { outcome } = await startRun(engine, 'hi');

    expect(outcome.trace.modelConfigSnapshot).toEqual({
      model: 'gpt-4o-mini',
      provider: 'mock',
      temperature: 0,
      maxIterations: 10,
      historyWindow: 5,
      timeoutSeconds: 300,
      tools: ['calculator'],
    });
    expect(outcome.trace.systemPromptSnapshot?.startsWith('You are a test agent.')).toBe(true);
    expect(outcome.trace.systemPromptSnapshot).toContain('- calculator: ');
  });

  it('feeds tool errors back to the model', async () => {
    const llm = new ScriptedLlmTool([
      toolCall('calculator', { expression: '1 / 0' }),
      finalAnswer('Division by zero is undefined.'),
    ]);
    const engine = createTestEngine(llm);

    const { outcome, steps } = await startRun(engine, 'What is 1 / 0?');

    expect(outcome.trace.status).toBe('completed');
    expect(steps[2]).toMatchObject({
      stepType: 'tool_result',
      isError: true,
      errorMessage: 'Error: Cannot divide by zero',
      outputPayload: { result: 'Error: Cannot divide by zero' },
    });
    expect(lastMessageOf(llm, 1)).toBe(
      'Observation (calculator): Error: Cannot divide by zero',
    );
  });

  it('lets the model correct a single unknown tool', async () => {
    const llm = new ScriptedLlmTool([toolCall('browse', { url: 'example' }), finalAnswer('done')]);
    const engine = createTestEngine(llm);

    const { outcome, steps } = await startRun(engine, 'look it up');

    expect(outcome.trace.status).toBe('completed');
    expect(steps.map((step) => step.stepType)).toEqual(['thought', 'tool_call', 'thought', 'response']);
    expect(steps[1]).toMatchObject({
      stepName: 'browse',
      isError: true,
      errorMessage: "Unknown tool 'browse'",
    });
    expect(lastMessageOf(llm, 1)).toBe(buildUnknownToolObservation('browse', ['calculator']));
    expect(lastMessageOf(llm, 1)?.endsWith(
      'Available tools: calculator. Call one of them or use "final_answer".',
    )).toBe(true);
  });

  it('fails after two unknown tools in a row', async () => {
    const llm = new ScriptedLlmTool([toolCall('browse', {}), toolCall('browse', {})]);
    const engine = createTestEngine(llm);

    const { outcome, steps } = await startRun(engine, 'look it up');

    expect(outcome.state).toBe('ERROR');
    expect(outcome.trace).toMatchObject({
      status: 'failed',
      isSuccessful: false,
      errorKind: 'UnknownTool',
      errorMessage: 'Model requested unknown tool "browse" twice in a row.',
      finalOutput: 'Model requested unknown tool "browse" twice in a row.',
    });
    expect(steps).toHaveLength(4);
  });

  it('stops at the iteration budget', async () => {
    const llm = new ScriptedLlmTool([
      toolCall('calculator', { expression: '1 + 1' }),
      toolCall('calculator', { expression: '2 + 2' }),
      toolCall('calculator', { expression: '3 + 3' }),
    ]);
    const engine = createTestEngine(llm);

    const { outcome, steps } = await startRun(engine, 'keep going', 3);

    expect(outcome.trace).toMatchObject({
      status: 'failed',
      errorKind: 'LoopBudgetExceeded',
      errorMessage: 'Agent did not reach a final answer within 3 reasoning cycles.',
      totalTokens: 45,
    });
    expect(outcome.trace.modelConfigSnapshot?.maxIterations).toBe(3);
    expect(steps).toHaveLength(9);
    expect(llm.calls).toHaveLength(3);
  });

  it('does not collapse identical tool calls', async () => {
    const llm = new ScriptedLlmTool([
      toolCall('calculator', { expression: '2 + 2' }),
      toolCall('calculator', { expression: '2 + 2' }),
      finalAnswer('4'),
    ]);
    const engine = createTestEngine(llm);

    const { steps } = await startRun(engine, 'twice');

    const calls = steps.filter((step) => step.stepType === 'tool_call');
    expect(calls.map((step) => step.inputPayload)).toEqual([
      { expression: '2 + 2' },
      { expression: '2 + 2' },
    ]);
    expect(steps).toHaveLength(8);
  });

  it('fails the trace when the model never produces a decision', async () => {
    const engine = createTestEngine(new ScriptedLlmTool(['?', '??', '???']));

    const { outcome, steps } = await startRun(engine, 'hi');

    expect(outcome.trace).toMatchObject({
      status: 'failed',
      errorKind: 'ProviderError',
      errorMessage:
        'Language model did not return a usable decision after 3 attempts: the reply was not valid JSON',
      totalTokens: 0,
    });
    expect(steps).toHaveLength(0);
  });

  it('logs the tokens spent by a decision that never arrived', async () => {
    const warn = vi.spyOn(logger, 'warn');
    const engine = createTestEngine(new ScriptedLlmTool(['?', '??', '???']));

    const { outcome } = await startRun(engine, 'hi');

    expect(warn).toHaveBeenCalledWith('reasoning_usage_unrecorded', {
      traceId: outcome.trace.id,
      attempts: 3,
      totalTokens: 45,
      costUsd: expect.closeTo(0.0000135, 5),
    });
  });

  it('fails the trace when a step cannot be stored', async () => {
    class FullDiskTraceStore extends InMemoryTraceStore {
      public override async insertStep(_step: NewStepRecord): Promise<StepRecord> {
        throw new Error('disk full');
      }
    }
    const engine = createTestEngine(new ScriptedLlmTool([finalAnswer('4')]), {
      traceStore: new FullDiskTraceStore(),
    });

    const { outcome } = await startRun(engine, 'What is 2 + 2?');

    expect(outcome.trace).toMatchObject({
      status: 'failed',
      errorKind: 'PersistenceError',
      errorMessage: 'Trace storage failed during append_step: disk full',
    });
  });

  it('stops when an operator cancels the run', async () => {
    const traceId = 'trace-cancel';
    let engine: AgentEngine | undefined;
    const llm = new ScriptedLlmTool([
      () => {
        engine?.runs.cancel(traceId);
        return toolCall('calculator', { expression: '2 + 2' });
      },
    ]);
    engine = createTestEngine(llm);
    const { session } = await openTestSession(engine);

    const outcome = await engine.runner.start({ sessionId: session.id, userInput: 'hi', traceId });

    expect(outcome.state).toBe('CANCELLED');
    expect(outcome.trace).toMatchObject({
      id: traceId,
      status: 'cancelled',
      errorKind: 'Cancelled',
      errorMessage: null,
      finalOutput: 'Run cancelled by operator.',
    });
    expect(await engine.traceStore.listSteps(traceId)).toHaveLength(0);
    expect(engine.runs.isActive(traceId)).toBe(false);
  });

  it('stops when the run exceeds its time limit', async () => {
    const llm = new ScriptedLlmTool([
      (input) =>
        new Promise<string>((resolve) => {
          input.signal?.addEventListener('abort', () => resolve(finalAnswer('too late')));
        }),
    ]);
    const engine = createTestEngine(llm, { settings: { timeoutMs: 30 } });

    const { outcome } = await startRun(engine, 'slow question');

    expect(outcome.state).toBe('CANCELLED');
    expect(outcome.trace).toMatchObject({
      status: 'cancelled',
      errorKind: 'Timeout',
      finalOutput: 'Run exceeded the time limit of 0.03s.',
    });
  });

  it('passes only the most recent completed turns as history', async () => {
    const llm = new ScriptedLlmTool(Array.from({ length: 7 }, (_, index) => finalAnswer(`a${index}`)));
    const engine = createTestEngine(llm);
    const { session } = await openTestSession(engine);

    for (let index = 0; index < 7; index += 1) {
      await engine.runner.start({ sessionId: session.id, userInput: `q${index}` });
    }

    const messages = llm.calls[6]?.messages ?? [];
    expect(messages).toHaveLength(12);
    expect(messages[1]).toEqual({ role: 'user', content: 'q1' });
    expect(messages[10]).toEqual({ role: 'assistant', content: 'a5' });
    expect(messages[11]).toEqual({ role: 'user', content: 'q6' });
  });

  it('resolves references to the previous answer with the offline model', async () => {
    const engine = createTestEngine(createDeterministicMockLlmTool());
    const { session } = await openTestSession(engine);

    const first = await engine.runner.start({ sessionId: session.id, userInput: '1 + 1' });
    const second = await engine.runner.start({ sessionId: session.id, userInput: 'Multiply that by 3' });

    expect(first.trace.finalOutput).toBe('2');
    expect(second.trace.finalOutput).toBe('6');

    const steps = await engine.traceStore.listSteps(second.trace.id);
    expect(steps.find((step) => step.stepType === 'tool_call')?.inputPayload).toEqual({
      expression: '2 * 3',
    });
  });
});
