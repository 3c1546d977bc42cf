import { IsNull, type DataSource, type Repository } from 'typeorm';

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
} from '../../core/@types';
import type { TraceStore } from '../../core/memory/traceStore';
import { Trace } from '../entities/Trace';
import { TraceStep } from '../entities/TraceStep';

interface UsageRow {
  totalTokens: string | null;
  totalCostUsd: string | null;
  traceCount: string | null;
  stepCount: string | null;
}

export const toTraceRecord = (trace: Trace): TraceRecord => ({
  id: trace.id,
  sessionId: trace.sessionId,
  agentId: trace.agentId,
  userInput: trace.userInput,
  finalOutput: trace.finalOutput,
  runName: trace.runName,
  totalTokens: trace.totalTokens,
  totalCost: trace.totalCost,
  latencyMs: trace.latencyMs,
  status: trace.status,
  isSuccessful: trace.isSuccessful,
  errorKind: trace.errorKind,
  errorMessage: trace.errorMessage,
  systemPromptSnapshot: trace.systemPromptSnapshot,
  modelConfigSnapshot: trace.modelConfigSnapshot,
  replayedFromTraceId: trace.replayedFromTraceId,
  createdAt: trace.createdAt,
  completedAt: trace.completedAt,
});

export const toStepRecord = (step: TraceStep): StepRecord => ({
  id: step.id,
  traceId: step.traceId,
  sequenceOrder: step.sequenceOrder,
  stepType: step.stepType,
  stepName: step.stepName,
  inputPayload: step.inputPayload,
  outputPayload: step.outputPayload,
  latencyMs: step.latencyMs,
  tokens: step.tokens,
  costUsd: step.costUsd,
  isError: step.isError,
  errorMessage: step.errorMessage,
  startedAt: step.startedAt,
  completedAt: step.completedAt,
});

export class TypeOrmTraceStore implements TraceStore {
  private readonly traces: Repository<Trace>;
  private readonly steps: Repository<TraceStep>;

  public constructor(dataSource: DataSource) {
    this.traces = dataSource.getRepository(Trace);
    this.steps = dataSource.getRepository(TraceStep);
  }

  public async createTrace(record: NewTraceRecord): Promise<TraceRecord> {
    const trace = this.traces.create({
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
    });

    return toTraceRecord(await this.traces.save(trace));
  }

  public async getTrace(traceId: string): Promise<TraceRecord | null> {
    const trace = await this.traces.findOneBy({ id: traceId });
    return trace ? toTraceRecord(trace) : null;
  }

  public async listTraces(filter: TraceListFilter): Promise<TraceRecord[]> {
    const traces = await this.traces.find({
      where: filter.sessionId ? { sessionId: filter.sessionId } : {},
      order: { createdAt: 'DESC' },
      skip: filter.offset,
      take: filter.limit,
    });

    return traces.map(toTraceRecord);
  }

  public countTraces(sessionId?: string): Promise<number> {
    return this.traces.count({ where: sessionId ? { sessionId } : {} });
  }

  public async listSessionTraces(sessionId: string): Promise<TraceRecord[]> {
    const traces = await this.traces.find({
      where: { sessionId },
      order: { createdAt: 'ASC' },
    });

    return traces.map(toTraceRecord);
  }

  public async listRecentCompletedTraces(sessionId: string, limit: number): Promise<TraceRecord[]> {
    const traces = await this.traces.find({
      where: { sessionId, status: 'completed' },
      order: { createdAt: 'DESC' },
      take: limit,
    });

    return traces.reverse().map(toTraceRecord);
  }

  public async listRunningTraces(): Promise<TraceRecord[]> {
    const traces = await this.traces.find({
      where: { status: 'running' },
      order: { createdAt: 'ASC' },
    });

    return traces.map(toTraceRecord);
  }

  public async completeTrace(
    traceId: string,
    completion: TraceCompletion,
  ): Promise<TraceRecord | null> {
    const result = await this.traces.update(
      { id: traceId, completedAt: IsNull() },
      {
        finalOutput: completion.finalOutput,
        status: completion.status,
        isSuccessful: completion.isSuccessful,
        errorKind: completion.errorKind,
        errorMessage: completion.errorMessage,
        totalTokens: completion.totalTokens,
        totalCost: completion.totalCost,
        latencyMs: completion.latencyMs,
        completedAt: completion.completedAt,
      },
    );

    if (!result.affected) {
      return null;
    }

    return this.getTrace(traceId);
  }

  public async insertStep(step: NewStepRecord): Promise<StepRecord> {
    const saved = await this.steps.save(this.steps.create(step));
    return toStepRecord(saved);
  }

  public async completeStep(stepId: string, completion: StepCompletion): Promise<void> {
    await this.steps.update(
      { id: stepId },
      {
        completedAt: completion.completedAt,
        latencyMs: completion.latencyMs,
        ...(completion.isError !== undefined ? { isError: completion.isError } : {}),
        ...(completion.errorMessage !== undefined ? { errorMessage: completion.errorMessage } : {}),
      },
    );
  }

  public countSteps(traceId: string): Promise<number> {
    return this.steps.count({ where: { traceId } });
  }

  public async listSteps(traceId: string): Promise<StepRecord[]> {
    const steps = await this.steps.find({
      where: { traceId },
      order: { sequenceOrder: 'ASC' },
    });

    return steps.map(toStepRecord);
  }

  public async summarizeUsage(filter: UsageFilter): Promise<UsageSummary> {
    const query = this.steps
      .createQueryBuilder('step')
      .innerJoin('step.trace', 'trace')
      .select('COALESCE(SUM(step.tokens), 0)', 'totalTokens')
      .addSelect('COALESCE(SUM(step.cost_usd), 0)', 'totalCostUsd')
      .addSelect('COUNT(DISTINCT step.trace_id)', 'traceCount')
      .addSelect('COUNT(step.id)', 'stepCount');

    if (filter.sessionId) {
      query.andWhere('trace.session_id = :sessionId', { sessionId: filter.sessionId });
    }

    if (filter.traceId) {
      query.andWhere('step.trace_id = :traceId', { traceId: filter.traceId });
    }

    if (filter.since) {
      query.andWhere('trace.created_at >= :since', { since: filter.since });
    }

    const row = await query.getRawOne<UsageRow>();

    return {
      totalTokens: Number(row?.totalTokens ?? 0),
      totalCostUsd: Math.round(Number(row?.totalCostUsd ?? 0) * 1_000_000) / 1_000_000,
      traceCount: Number(row?.traceCount ?? 0),
      stepCount: Number(row?.stepCount ?? 0),
    };
  }
}
