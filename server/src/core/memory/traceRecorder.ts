import { randomUUID } from 'node:crypto';

import type {
  AgentErrorKind,
  HistoryTurn,
  JsonObject,
  StepCompletion,
  StepKind,
  StepRecord,
  TraceRecord,
  TraceStatus,
} from '../@types';
import type { TraceEventBus } from '../realtime/traceEventBus';
import { AgentRunError, PersistenceError } from '../shared/errors/agent-errors';
import { AppError, NotFoundError } from '../shared/errors/app-error';
import { errorMessageOf, logger } from '../shared/logger';
import type { TraceStore } from './traceStore';

export interface BeginTraceInput {
  id?: string;
  sessionId: string;
  agentId: string;
  userInput: string;
  runName?: string | null;
  systemPromptSnapshot: string;
  modelConfigSnapshot: JsonObject;
  replayedFromTraceId?: string | null;
}

export interface AppendStepInput {
  stepType: StepKind;
  stepName?: string | null;
  inputPayload?: JsonObject | null;
  outputPayload?: JsonObject | null;
  latencyMs?: number;
  tokens?: number;
  costUsd?: number;
  isError?: boolean;
  errorMessage?: string | null;
  startedAt?: Date;
  /** `null` leaves the step open until `completeStep`. Defaults to `startedAt`. */
  completedAt?: Date | null;
}

export interface FinalizeTraceInput {
  finalOutput: string;
  status: Exclude<TraceStatus, 'running'>;
  errorKind?: AgentErrorKind | null;
  errorMessage?: string | null;
}

export class TraceAlreadyFinalizedError extends AppError {
  public constructor(traceId: string) {
    super(409, `Trace ${traceId} is already finalized.`, 'TRACE_ALREADY_FINALIZED');
  }
}

const roundUsd = (value: number): number => Math.round(value * 1_000_000) / 1_000_000;

/**
 * Owns the write side of traces. Sequence numbers come from a per-trace counter held
 * here and only advance after the store has committed the step; every write for one
 * trace is chained so steps land in order. Listeners on the event bus only ever see
 * committed records.
 */
export class TraceRecorder {
  private readonly counters = new Map<string, number>();
  private readonly writeChains = new Map<string, Promise<void>>();

  public constructor(
    private readonly store: TraceStore,
    private readonly bus?: TraceEventBus,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  public async loadHistory(sessionId: string, limit: number): Promise<HistoryTurn[]> {
    if (limit <= 0) {
      return [];
    }

    const traces = await this.guard('load_history', () =>
      this.store.listRecentCompletedTraces(sessionId, limit),
    );

    return traces
      .filter((trace): trace is TraceRecord & { finalOutput: string } => trace.finalOutput !== null)
      .map((trace) => ({ userInput: trace.userInput, finalOutput: trace.finalOutput }));
  }

  public async begin(input: BeginTraceInput): Promise<TraceRecord> {
    const trace = await this.guard('begin', () =>
      this.store.createTrace({
        id: input.id ?? randomUUID(),
        sessionId: input.sessionId,
        agentId: input.agentId,
        userInput: input.userInput,
        runName: input.runName ?? null,
        systemPromptSnapshot: input.systemPromptSnapshot,
        modelConfigSnapshot: input.modelConfigSnapshot,
        replayedFromTraceId: input.replayedFromTraceId ?? null,
        createdAt: this.clock(),
      }),
    );

    this.counters.set(trace.id, 0);
    logger.debug('trace_started', { traceId: trace.id, sessionId: trace.sessionId });

    this.bus?.publish({
      type: 'trace_started',
      traceId: trace.id,
      sessionId: trace.sessionId,
      trace,
    });

    return trace;
  }

  public appendStep(trace: TraceRecord, input: AppendStepInput): Promise<StepRecord> {
    return this.serialize(trace.id, async () => {
      const current =
        this.counters.get(trace.id) ??
        (await this.guard('count_steps', () => this.store.countSteps(trace.id)));
      const startedAt = input.startedAt ?? this.clock();

      const step = await this.guard('append_step', () =>
        this.store.insertStep({
          traceId: trace.id,
          sequenceOrder: current + 1,
          stepType: input.stepType,
          stepName: input.stepName ?? null,
          inputPayload: input.inputPayload ?? null,
          outputPayload: input.outputPayload ?? null,
          latencyMs: input.latencyMs ?? 0,
          tokens: input.tokens ?? 0,
          costUsd: input.costUsd ?? 0,
          isError: input.isError ?? false,
          errorMessage: input.errorMessage ?? null,
          startedAt,
          completedAt: input.completedAt === undefined ? startedAt : input.completedAt,
        }),
      );

      this.counters.set(trace.id, step.sequenceOrder);

      this.bus?.publish({
        type: 'step_committed',
        traceId: trace.id,
        sessionId: trace.sessionId,
        step,
      });

      return step;
    });
  }

  public completeStep(traceId: string, stepId: string, completion: StepCompletion): Promise<void> {
    return this.serialize(traceId, () =>
      this.guard('complete_step', () => this.store.completeStep(stepId, completion)),
    );
  }

  /**
   * Writes the terminal state. Aggregates are recomputed from the committed steps rather
   * than carried along by the caller.
   */
  public finalize(traceId: string, input: FinalizeTraceInput): Promise<TraceRecord> {
    // Runs end here even when the write fails; the startup sweep closes such traces.
    return this.serialize(traceId, () =>
      this.writeFinal(traceId, input).finally(() => {
        this.counters.delete(traceId);
      }),
    );
  }

  /**
   * Closes traces a previous process left running so history never shows a run that
   * will not finish. Only safe while this process is the sole writer.
   */
  public async sweepInterruptedRuns(): Promise<number> {
    const running = await this.guard('sweep', () => this.store.listRunningTraces());
    let swept = 0;

    for (const trace of running) {
      if (this.counters.has(trace.id)) {
        continue;
      }

      try {
        await this.finalize(trace.id, {
          finalOutput: 'Run interrupted by server restart.',
          status: 'failed',
          errorKind: 'Interrupted',
          errorMessage: 'Run interrupted by server restart.',
        });
        swept += 1;
      } catch (error: unknown) {
        logger.warn('trace_sweep_failed', {
          traceId: trace.id,
          error: errorMessageOf(error),
        });
      }
    }

    return swept;
  }

  private async writeFinal(traceId: string, input: FinalizeTraceInput): Promise<TraceRecord> {
    const existing = await this.guard('finalize', () => this.store.getTrace(traceId));

    if (!existing) {
      throw new NotFoundError('Trace', traceId);
    }

    if (existing.completedAt !== null) {
      throw new TraceAlreadyFinalizedError(traceId);
    }

    const steps = await this.guard('finalize', () => this.store.listSteps(traceId));
    const completedAt = this.clock();

    const trace = await this.guard('finalize', () =>
      this.store.completeTrace(traceId, {
        finalOutput: input.finalOutput,
        status: input.status,
        isSuccessful: input.status === 'completed',
        errorKind: input.errorKind ?? null,
        errorMessage: input.errorMessage ?? null,
        totalTokens: steps.reduce((sum, step) => sum + step.tokens, 0),
        totalCost: roundUsd(steps.reduce((sum, step) => sum + step.costUsd, 0)),
        latencyMs: Math.max(0, completedAt.getTime() - existing.createdAt.getTime()),
        completedAt,
      }),
    );

    if (!trace) {
      throw new TraceAlreadyFinalizedError(traceId);
    }

    logger.info('trace_finalized', {
      traceId,
      status: trace.status,
      errorKind: trace.errorKind,
      steps: steps.length,
      totalTokens: trace.totalTokens,
      totalCost: trace.totalCost,
      latencyMs: trace.latencyMs,
    });

    this.bus?.publish({
      type: 'trace_finalized',
      traceId,
      sessionId: trace.sessionId,
      trace,
    });

    return trace;
  }

  private serialize<T>(traceId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.writeChains.get(traceId) ?? Promise.resolve();
    const result = previous.then(task);

    // The chain only tracks ordering; failures reach the caller through `result`.
    const chain = result.then(
      () => undefined,
      () => undefined,
    );
    this.writeChains.set(traceId, chain);

    void chain.then(() => {
      if (this.writeChains.get(traceId) === chain) {
        this.writeChains.delete(traceId);
      }
    });

    return result;
  }

  private async guard<T>(operation: string, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error: unknown) {
      if (error instanceof AgentRunError || error instanceof AppError) {
        throw error;
      }

      logger.error('trace_store_failed', {
        operation,
        error: errorMessageOf(error),
      });
      throw new PersistenceError(operation, error);
    }
  }
}
