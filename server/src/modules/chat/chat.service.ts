import { randomUUID } from 'node:crypto';

import type { ChatResponse } from '../../core/@types';
import type { AgentRunOutcome } from '../../core/agents/agentLoop';
import type { AgentEngine } from '../../core/engine';
import type { SessionsService } from '../sessions/sessions.service';
import type { ChatRequestBody } from './chat.schema';

export interface PreparedRun {
  sessionId: string;
  traceId: string;
  message: string;
  maxIterations?: number;
  runName?: string;
}

export class ChatService {
  public constructor(
    private readonly engine: AgentEngine,
    private readonly sessionsService: SessionsService,
  ) {}

  /**
   * Resolves (or opens) the session and reserves the trace id so a stream can attach
   * before the run begins.
   */
  public async prepareRun(payload: ChatRequestBody): Promise<PreparedRun> {
    const session = payload.session_id
      ? await this.sessionsService.mustGetSession(payload.session_id)
      : await this.sessionsService.openSession(payload.user_id);

    return {
      sessionId: session.id,
      traceId: randomUUID(),
      message: payload.message,
      maxIterations: payload.max_iterations,
      runName: payload.run_name,
    };
  }

  public execute(prepared: PreparedRun): Promise<AgentRunOutcome> {
    return this.engine.runner.start({
      sessionId: prepared.sessionId,
      userInput: prepared.message,
      traceId: prepared.traceId,
      maxIterations: prepared.maxIterations,
      runName: prepared.runName ?? null,
    });
  }

  public async chat(payload: ChatRequestBody): Promise<ChatResponse> {
    const prepared = await this.prepareRun(payload);
    const outcome = await this.execute(prepared);

    return {
      session_id: prepared.sessionId,
      trace_id: outcome.trace.id,
      response: outcome.trace.finalOutput ?? '',
      steps_taken: outcome.stepsTaken,
      status: outcome.trace.status,
    };
  }
}
