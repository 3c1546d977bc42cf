import type { TraceStore } from '../memory/traceStore';
import { NotFoundError } from '../shared/errors/app-error';
import { logger } from '../shared/logger';
import type { AgentRunOutcome } from './agentLoop';
import type { AgentRunner } from './agentRunner';

export interface ReplayOutcome {
  originalTraceId: string;
  newTraceId: string;
  outcome: AgentRunOutcome;
}

/**
 * Re-runs the input of a recorded trace as a new trace in the same session. Only the
 * original's input and session are read; its steps are never touched. The new run sees
 * the session history as it is now, which includes the original trace.
 */
export class ReplayCoordinator {
  public constructor(
    private readonly traces: TraceStore,
    private readonly runner: AgentRunner,
  ) {}

  public async replay(traceId: string, options: { newTraceId?: string } = {}): Promise<ReplayOutcome> {
    const original = await this.traces.getTrace(traceId);

    if (!original) {
      throw new NotFoundError('Trace', traceId);
    }

    logger.info('trace_replay_started', { originalTraceId: original.id, sessionId: original.sessionId });

    const outcome = await this.runner.start({
      sessionId: original.sessionId,
      userInput: original.userInput,
      traceId: options.newTraceId,
      runName: original.runName ? `replay of ${original.runName}` : null,
      replayedFromTraceId: original.id,
    });

    return {
      originalTraceId: original.id,
      newTraceId: outcome.trace.id,
      outcome,
    };
  }
}
