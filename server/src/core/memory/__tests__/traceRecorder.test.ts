import { beforeEach, describe, expect, it } from 'vitest';

import type {
  NewStepRecord,
  StepRecord,
  TraceBusEvent,
  TraceCompletion,
  TraceRecord,
} from '../../@types';
import { TraceEventBus } from '../../realtime/traceEventBus';
import { PersistenceError } from '../../shared/errors/agent-errors';
import { NotFoundError } from '../../shared/errors/app-error';
import { InMemoryTraceStore } from '../inMemoryTraceStore';
import { TraceAlreadyFinalizedError, TraceRecorder } from '../traceRecorder';

class RecordingTraceStore extends InMemoryTraceStore {
  public readonly log: string[] = [];
  public failInserts = 0;
  public failCompletions = 0;

  public override async insertStep(step: NewStepRecord): Promise<StepRecord> {
    if (this.failInserts > 0) {
      this.failInserts -= 1;
      throw new Error('disk full');
    }

    const stored = await super.insertStep(step);
    this.log.push(`commit:${stored.sequenceOrder}`);
    return stored;
  }

  public override async completeTrace(
    traceId: string,
    completion: TraceCompletion,
  ): Promise<TraceRecord | null> {
    if (this.failCompletions > 0) {
      this.failCompletions -= 1;
      throw new Error('disk full');
    }

    return super.completeTrace(traceId, completion);
  }
}

const START = new Date('2026-01-01T10:00:00.000Z');

describe('TraceRecorder', () => {
  let store: RecordingTraceStore;
  let bus: TraceEventBus;
  let events: TraceBusEvent[];
  let now: Date;
  let recorder: TraceRecorder;

  const begin = (userInput = 'What is 2 + 2?', sessionId = 'session-1'): Promise<TraceRecord> =>
    recorder.begin({
      sessionId,
      agentId: 'agent-1',
      userInput,
      systemPromptSnapshot: 'You are a test agent.',
      modelConfigSnapshot: { model: 'gpt-4o-mini' },
    });

  beforeEach(() => {
    store = new RecordingTraceStore();
    bus = new TraceEventBus();
    events = [];
    now = START;
    recorder = new TraceRecorder(store, bus, () => now);
    bus.subscribe((event) => {
      events.push(event);
      if (event.type === 'step_committed') {
        store.log.push(`publish:${event.step.sequenceOrder}`);
      }
    });
  });

  it('begins a running trace and announces it', async () => {
    const trace = await recorder.begin({
      id: 'trace-fixed',
      sessionId: 'session-1',
      agentId: 'agent-1',
      userInput: 'hi',
      runName: 'smoke',
      systemPromptSnapshot: 'prompt',
      modelConfigSnapshot: {},
    });

    expect(trace).toMatchObject({
      id: 'trace-fixed',
      status: 'running',
      runName: 'smoke',
      replayedFromTraceId: null,
      completedAt: null,
      createdAt: START,
    });
    expect(events.map((event) => event.type)).toEqual(['trace_started']);
  });

  it('assigns gap-free sequence numbers to concurrent appends', async () => {
    const trace = await begin();

    const steps = await Promise.all([
      recorder.appendStep(trace, { stepType: 'thought' }),
      recorder.appendStep(trace, { stepType: 'tool_call', stepName: 'calculator' }),
      recorder.appendStep(trace, { stepType: 'tool_result' }),
    ]);

    expect(steps.map((step) => step.sequenceOrder)).toEqual([1, 2, 3]);
    expect((await store.listSteps(trace.id)).map((step) => step.stepType)).toEqual([
      'thought',
      'tool_call',
      'tool_result',
    ]);
  });

  it('publishes a step only after the store committed it', async () => {
    const trace = await begin();

    await recorder.appendStep(trace, { stepType: 'thought' });
    await recorder.appendStep(trace, { stepType: 'response' });

    expect(store.log).toEqual(['commit:1', 'publish:1', 'commit:2', 'publish:2']);
  });

  it('leaves a step open when completedAt is null', async () => {
    const trace = await begin();

    const step = await recorder.appendStep(trace, { stepType: 'tool_call', completedAt: null });
    expect(step.completedAt).toBeNull();

    const completedAt = new Date(START.getTime() + 40);
    await recorder.completeStep(trace.id, step.id, { completedAt, latencyMs: 40 });

    const [stored] = await store.listSteps(trace.id);
    expect(stored).toMatchObject({ completedAt, latencyMs: 40 });
  });

  it('wraps store failures and keeps the counter where it was', async () => {
    const trace = await begin();
    store.failInserts = 1;

    const error = await recorder
      .appendStep(trace, { stepType: 'thought' })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(PersistenceError);
    expect(error).toMatchObject({
      kind: 'PersistenceError',
      message: 'Trace storage failed during append_step: disk full',
    });
    expect(events.map((event) => event.type)).toEqual(['trace_started']);

    const step = await recorder.appendStep(trace, { stepType: 'thought' });
    expect(step.sequenceOrder).toBe(1);
  });

  it('computes aggregates from committed steps when finalizing', async () => {
    const trace = await begin();
    await recorder.appendStep(trace, { stepType: 'thought', tokens: 10, costUsd: 0.0001 });
    await recorder.appendStep(trace, { stepType: 'response', tokens: 5, costUsd: 0.0002 });
    now = new Date(START.getTime() + 1500);

    const finalized = await recorder.finalize(trace.id, { finalOutput: '4', status: 'completed' });

    expect(finalized).toMatchObject({
      status: 'completed',
      isSuccessful: true,
      finalOutput: '4',
      totalTokens: 15,
      totalCost: 0.0003,
      latencyMs: 1500,
      errorKind: null,
      errorMessage: null,
      completedAt: now,
    });
    expect(events.map((event) => event.type)).toEqual([
      'trace_started',
      'step_committed',
      'step_committed',
      'trace_finalized',
    ]);
  });

  it('refuses to finalize a trace twice', async () => {
    const trace = await begin();
    await recorder.finalize(trace.id, { finalOutput: 'done', status: 'completed' });

    const error = await recorder
      .finalize(trace.id, { finalOutput: 'again', status: 'failed' })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TraceAlreadyFinalizedError);
    expect(error).toMatchObject({ statusCode: 409, code: 'TRACE_ALREADY_FINALIZED' });
    expect((await store.getTrace(trace.id))?.finalOutput).toBe('done');
  });

  it('reports unknown traces', async () => {
    await expect(
      recorder.finalize('missing', { finalOutput: 'x', status: 'failed' }),
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it('sweeps runs left open by a previous process', async () => {
    await store.createTrace({
      id: 'orphan',
      sessionId: 'session-1',
      agentId: 'agent-1',
      userInput: '1 + 1',
      runName: null,
      systemPromptSnapshot: 'prompt',
      modelConfigSnapshot: {},
      replayedFromTraceId: null,
      createdAt: START,
    });
    const active = await begin();

    await expect(recorder.sweepInterruptedRuns()).resolves.toBe(1);

    expect(await store.getTrace('orphan')).toMatchObject({
      status: 'failed',
      errorKind: 'Interrupted',
      finalOutput: 'Run interrupted by server restart.',
    });
    expect((await store.getTrace(active.id))?.status).toBe('running');
  });

  it('releases a run whose finalize failed so the sweep can close it', async () => {
    const trace = await begin();
    store.failCompletions = 1;

    await expect(
      recorder.finalize(trace.id, { finalOutput: '4', status: 'completed' }),
    ).rejects.toThrow('Trace storage failed during finalize: disk full');

    await expect(recorder.sweepInterruptedRuns()).resolves.toBe(1);
    expect(await store.getTrace(trace.id)).toMatchObject({
      status: 'failed',
      errorKind: 'Interrupted',
    });
  });

  it('loads the most recent completed turns oldest first', async () => {
    const finish = async (input: string, output: string, status: 'completed' | 'failed') => {
      const trace = await begin(input);
      await recorder.finalize(trace.id, { finalOutput: output, status });
      now = new Date(now.getTime() + 1000);
    };

    await finish('1 + 1', '2', 'completed');
    await finish('2 + 2', '4', 'completed');
    await finish('oops', 'failed', 'failed');
    await finish('3 + 3', '6', 'completed');

    await expect(recorder.loadHistory('session-1', 2)).resolves.toEqual([
      { userInput: '2 + 2', finalOutput: '4' },
      { userInput: '3 + 3', finalOutput: '6' },
    ]);
    await expect(recorder.loadHistory('session-1', 0)).resolves.toEqual([]);
    await expect(recorder.loadHistory('session-2', 5)).resolves.toEqual([]);
  });
});
