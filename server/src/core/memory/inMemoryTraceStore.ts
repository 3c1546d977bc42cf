import { randomUUID } from 'node:crypto';

import type {
  NewStepRecord,
  NewTraceRecord,
  StepCompletion,
  StepRecord,
  TraceCompletion,
  TraceListFilter,
  TraceRecord,
  UsageFilter,
  UsageSummary,
} from '../@types';
import { NotFoundError } from '../shared/errors/app-error';
import type { TraceStore } from './traceStore';

const byCreatedAt = (left: TraceRecord, right: TraceRecord): number => {
  return left.createdAt.getTime() - right.createdAt.getTime();
};

const cloneTrace = (trace: TraceRecord): TraceRecord => ({
  ...trace,
  modelConfigSnapshot: trace.modelConfigSnapshot ? { ...trace.modelConfigSnapshot } : null,
});

const cloneStep = (step: StepRecord): StepRecord => ({
  ...step,
  inputPayload: step.inputPayload ? structuredClone(step.inputPayload) : null,
  outputPayload: step.outputPayload ? structuredClone(step.outputPayload) : null,
});

/**
 * Map-backed trace storage for tests and for running without a database. Records are
 * copied on the way in and out so callers cannot mutate stored history.
 */
export class InMemoryTraceStore implements TraceStore {
  private readonly traces = new Map<string, TraceRecord>();
  private readonly steps = new Map<string, StepRecord[]>();
  private readonly stepIndex = new Map<string, StepRecord>();

  public async createTrace(record: NewTraceRecord): Promise<TraceRecord> {
    const trace: TraceRecord = {
      ...record,
      finalOutput: null,
      totalTokens: 0,
      totalCost: 0,
      latencyMs: 0,
      status: 'running',
      isSuccessful: false,
      errorKind: null,
      errorMessage: null,
      completedAt: null,
    };

    this.traces.set(trace.id, trace);
    this.steps.set(trace.id, []);
    return cloneTrace(trace);
  }

  public async getTrace(traceId: string): Promise<TraceRecord | null> {
    const trace = this.traces.get(traceId);
    return trace ? cloneTrace(trace) : null;
  }

  public async listTraces(filter: TraceListFilter): Promise<TraceRecord[]> {
    const traces = this.filterBySession(filter.sessionId)
      .sort(byCreatedAt)
      .reverse()
      .slice(filter.offset, filter.offset + filter.limit);

    return traces.map(cloneTrace);
  }

  public async countTraces(sessionId?: string): Promise<number> {
    return this.filterBySession(sessionId).length;
  }

  public async listSessionTraces(sessionId: string): Promise<TraceRecord[]> {
    return this.filterBySession(sessionId).sort(byCreatedAt).map(cloneTrace);
  }

  public async listRecentCompletedTraces(
    sessionId: string,
    limit: number,
  ): Promise<TraceRecord[]> {
    const traces = this.filterBySession(sessionId)
      .filter((trace) => trace.status === 'completed')
      .sort(byCreatedAt);

    return traces.slice(Math.max(0, traces.length - limit)).map(cloneTrace);
  }

  public async listRunningTraces(): Promise<TraceRecord[]> {
    const traces = [...this.traces.values()].filter((trace) => trace.completedAt === null);
    return traces.sort(byCreatedAt).map(cloneTrace);
  }

  public async completeTrace(
    traceId: string,
    completion: TraceCompletion,
  ): Promise<TraceRecord | null> {
    const trace = this.mustGetTrace(traceId);

    if (trace.completedAt !== null) {
      return null;
    }

    Object.assign(trace, completion);
    return cloneTrace(trace);
  }

  public async insertStep(step: NewStepRecord): Promise<StepRecord> {
    const steps = this.steps.get(step.traceId);

    if (!steps) {
      throw new NotFoundError('Trace', step.traceId);
    }

    if (steps.some((existing) => existing.sequenceOrder === step.sequenceOrder)) {
      throw new Error(`Step ${step.sequenceOrder} already exists for trace ${step.traceId}.`);
    }

    const stored: StepRecord = cloneStep({ ...step, id: randomUUID() });
    steps.push(stored);
    this.stepIndex.set(stored.id, stored);
    return cloneStep(stored);
  }

  public async completeStep(stepId: string, completion: StepCompletion): Promise<void> {
    const step = this.stepIndex.get(stepId);

    if (!step) {
      throw new NotFoundError('Step', stepId);
    }

    step.completedAt = completion.completedAt;
    step.latencyMs = completion.latencyMs;
    if (completion.isError !== undefined) {
      step.isError = completion.isError;
    }
    if (completion.errorMessage !== undefined) {
      step.errorMessage = completion.errorMessage;
    }
  }

  public async countSteps(traceId: string): Promise<number> {
    return this.steps.get(traceId)?.length ?? 0;
  }

  public async listSteps(traceId: string): Promise<StepRecord[]> {
    const steps = [...(this.steps.get(traceId) ?? [])].sort(
      (left, right) => left.sequenceOrder - right.sequenceOrder,
    );
    return steps.map(cloneStep);
  }

  public async summarizeUsage(filter: UsageFilter): Promise<UsageSummary> {
    const traceIds = new Set(
      [...this.traces.values()]
        .filter((trace) => filter.sessionId === undefined || trace.sessionId === filter.sessionId)
        .filter((trace) => filter.traceId === undefined || trace.id === filter.traceId)
        .filter((trace) => filter.since === undefined || trace.createdAt >= filter.since)
        .map((trace) => trace.id),
    );

    const steps = [...traceIds].flatMap((traceId) => this.steps.get(traceId) ?? []);
    const totalCostUsd = steps.reduce((sum, step) => sum + step.costUsd, 0);

    return {
      totalTokens: steps.reduce((sum, step) => sum + step.tokens, 0),
      totalCostUsd: Math.round(totalCostUsd * 1_000_000) / 1_000_000,
      traceCount: new Set(steps.map((step) => step.traceId)).size,
      stepCount: steps.length,
    };
  }

  private filterBySession(sessionId?: string): TraceRecord[] {
    return [...this.traces.values()].filter(
      (trace) => sessionId === undefined || trace.sessionId === sessionId,
    );
  }

  private mustGetTrace(traceId: string): TraceRecord {
    const trace = this.traces.get(traceId);

    if (!trace) {
      throw new NotFoundError('Trace', traceId);
    }

    return trace;
  }
}
