import { randomUUID } from 'node:crypto';

import type { SessionStore } from '../memory/traceStore';
import { AppError, NotFoundError } from '../shared/errors/app-error';
import type { AgentLoop, AgentRunOutcome } from './agentLoop';
import type { RunRegistry } from './runRegistry';

export interface StartRunInput {
  sessionId: string;
  userInput: string;
  traceId?: string;
  maxIterations?: number;
  runName?: string | null;
  replayedFromTraceId?: string | null;
}

/**
 * Resolves the session and its agent, registers the run for operator cancellation, and
 * hands the run to the loop.
 */
export class AgentRunner {
  public constructor(
    private readonly loop: AgentLoop,
    private readonly sessions: SessionStore,
    private readonly runs: RunRegistry,
  ) {}

  public async start(input: StartRunInput): Promise<AgentRunOutcome> {
    const session = await this.sessions.getSession(input.sessionId);

    if (!session) {
      throw new NotFoundError('Session', input.sessionId);
    }

    if (!session.isActive) {
      throw new AppError(409, `Session ${session.id} is closed.`, 'SESSION_INACTIVE');
    }

    const agent = await this.sessions.getAgent(session.agentId);

    if (!agent) {
      throw new NotFoundError('Agent', session.agentId);
    }

    const traceId = input.traceId ?? randomUUID();
    const controller = this.runs.register(traceId);

    try {
      await this.sessions.touchSession(session.id, new Date());

      return await this.loop.run({
        sessionId: session.id,
        agentId: agent.id,
        userInput: input.userInput,
        systemPrompt: agent.systemPrompt,
        traceId,
        maxIterations: input.maxIterations,
        runName: input.runName,
        replayedFromTraceId: input.replayedFromTraceId,
        signal: controller.signal,
      });
    } finally {
      this.runs.release(traceId);
    }
  }
}
