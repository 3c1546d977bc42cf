import type {
  CancelResponse,
  ReplayResponse,
  TraceDetailResponse,
  TraceListResponse,
  TraceRecord,
} from '../../core/@types';
import type { AgentEngine } from '../../core/engine';
import { NotFoundError } from '../../core/shared/errors/app-error';
import { toStepResponse, toTraceResponse } from '../../core/shared/serializers';
import type { ListTracesQuery } from './traces.schema';

export class TracesService {
  public constructor(private readonly engine: AgentEngine) {}

  public async listTraces(query: ListTracesQuery): Promise<TraceListResponse> {
    const [traces, total] = await Promise.all([
      this.engine.traceStore.listTraces({
        sessionId: query.session_id,
        limit: query.limit,
        offset: query.offset,
      }),
      this.engine.traceStore.countTraces(query.session_id),
    ]);

    return {
      traces: traces.map(toTraceResponse),
      total,
      limit: query.limit,
      offset: query.offset,
    };
  }

  public async getTrace(traceId: string): Promise<TraceDetailResponse> {
    const trace = await this.mustGetTrace(traceId);
    const steps = await this.engine.traceStore.listSteps(traceId);

    return {
      ...toTraceResponse(trace),
      steps: steps.map(toStepResponse),
    };
  }

  public async replayTrace(traceId: string): Promise<ReplayResponse> {
    const result = await this.engine.replay.replay(traceId);

    return {
      original_trace_id: result.originalTraceId,
      new_trace_id: result.newTraceId,
      status: result.outcome.trace.status,
      message: `Trace replayed. Status: ${result.outcome.trace.status}`,
    };
  }

  public async cancelTrace(traceId: string): Promise<CancelResponse> {
    await this.mustGetTrace(traceId);

    return {
      trace_id: traceId,
      cancelled: this.engine.runs.cancel(traceId),
    };
  }

  private async mustGetTrace(traceId: string): Promise<TraceRecord> {
    const trace = await this.engine.traceStore.getTrace(traceId);

    if (!trace) {
      throw new NotFoundError('Trace', traceId);
    }

    return trace;
  }
}
