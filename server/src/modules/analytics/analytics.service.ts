import type { TraceTokenBreakdownResponse, UsageStatsResponse } from '../../core/@types';
import type { AgentEngine } from '../../core/engine';
import { NotFoundError } from '../../core/shared/errors/app-error';
import { toUsageStatsResponse } from '../../core/shared/serializers';

const DAY_MS = 24 * 60 * 60 * 1000;

export class AnalyticsService {
  public constructor(
    private readonly engine: AgentEngine,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  public async getSessionUsage(sessionId: string): Promise<UsageStatsResponse> {
    const session = await this.engine.sessionStore.getSession(sessionId);

    if (!session) {
      throw new NotFoundError('Session', sessionId);
    }

    return toUsageStatsResponse(await this.engine.traceStore.summarizeUsage({ sessionId }));
  }

  public async getTraceBreakdown(traceId: string): Promise<TraceTokenBreakdownResponse> {
    const trace = await this.engine.traceStore.getTrace(traceId);

    if (!trace) {
      throw new NotFoundError('Trace', traceId);
    }

    const steps = await this.engine.traceStore.listSteps(traceId);

    return {
      trace_id: trace.id,
      total_tokens: steps.reduce((sum, step) => sum + step.tokens, 0),
      total_cost_usd:
        Math.round(steps.reduce((sum, step) => sum + step.costUsd, 0) * 1_000_000) / 1_000_000,
      steps: steps
        .filter((step) => step.tokens > 0 || step.costUsd > 0)
        .map((step) => ({
          sequence_order: step.sequenceOrder,
          step_type: step.stepType,
          step_name: step.stepName,
          tokens: step.tokens,
          cost_usd: step.costUsd,
        })),
    };
  }

  public async getGlobalUsage(days: number): Promise<UsageStatsResponse> {
    const since = new Date(this.clock().getTime() - days * DAY_MS);
    return toUsageStatsResponse(await this.engine.traceStore.summarizeUsage({ since }));
  }
}
