import { randomUUID } from 'node:crypto';

import type {
  AgentRunState,
  Decision,
  JsonObject,
  ModelSettings,
  ReasoningContext,
  ToolCallDecision,
  TraceRecord,
} from '../@types';
import type { TraceRecorder } from '../memory/traceRecorder';
import {
  AgentRunError,
  LoopBudgetExceededError,
  ProviderError,
  UnknownToolError,
} from '../shared/errors/agent-errors';
import { errorMessageOf, logger } from '../shared/logger';
import {
  buildObservationMessage,
  buildSystemPrompt,
  buildUnknownToolObservation,
  DEFAULT_AGENT_SYSTEM_PROMPT,
  serializeDecision,
} from '../shared/prompts';
import { isToolError, toolResultText, type ToolRegistry } from '../tools/toolRegistry';
import type { ReasoningClient } from './reasoningClient';
import { RunCancellation } from './runCancellation';

export interface AgentLoopSettings extends ModelSettings {
  maxIterations: number;
  historyWindow: number;
  timeoutMs: number;
}

export interface AgentRunRequest {
  sessionId: string;
  agentId: string;
  userInput: string;
  /** Base prompt of the agent; the tool protocol is appended to it. */
  systemPrompt?: string;
  /** Lets a caller subscribe to the trace before the run starts. */
  traceId?: string;
  maxIterations?: number;
  runName?: string | null;
  replayedFromTraceId?: string | null;
  signal?: AbortSignal;
}

export interface AgentRunOutcome {
  trace: TraceRecord;
  state: Extract<AgentRunState, 'DONE' | 'ERROR' | 'CANCELLED'>;
  stepsTaken: number;
}

const TRANSITIONS: Record<AgentRunState, readonly AgentRunState[]> = {
  INIT: ['REASONING', 'ERROR', 'CANCELLED'],
  REASONING: ['REASONING', 'TOOL_EXEC', 'RESPONDING', 'ERROR', 'CANCELLED'],
  TOOL_EXEC: ['REASONING', 'ERROR', 'CANCELLED'],
  RESPONDING: ['DONE', 'ERROR', 'CANCELLED'],
  DONE: [],
  ERROR: [],
  CANCELLED: [],
};

export class InvalidTransitionError extends Error {
  public constructor(from: AgentRunState, to: AgentRunState) {
    super(`Invalid agent state transition ${from} -> ${to}.`);
    this.name = 'InvalidTransitionError';
  }
}

/** Mutable state of one run. Nothing here outlives the run; durable state is the trace. */
class AgentRun {
  public state: AgentRunState = 'INIT';
  public trace: TraceRecord | null = null;
  public stepsTaken = 0;
  public iterations = 0;

  public constructor(public readonly traceId: string) {}

  public transition(next: AgentRunState): void {
    if (!TRANSITIONS[this.state].includes(next)) {
      throw new InvalidTransitionError(this.state, next);
    }

    logger.debug('agent_state_transition', { traceId: this.traceId, from: this.state, to: next });
    this.state = next;
  }

  public requireTrace(): TraceRecord {
    if (!this.trace) {
      throw new Error(`Run ${this.traceId} has no trace yet.`);
    }

    return this.trace;
  }
}

/**
 * Bounded reason/act state machine:
 * INIT -> REASONING -> (TOOL_EXEC -> REASONING)* -> RESPONDING -> DONE, with ERROR and
 * CANCELLED reachable from every non-terminal state. Every transition that produces
 * output goes through the recorder before the run moves on.
 */
export class AgentLoop {
  public constructor(
    private readonly reasoning: ReasoningClient,
    private readonly tools: ToolRegistry,
    private readonly recorder: TraceRecorder,
    private readonly settings: AgentLoopSettings,
  ) {}

  public async run(request: AgentRunRequest): Promise<AgentRunOutcome> {
    const run = new AgentRun(request.traceId ?? randomUUID());
    const maxIterations = request.maxIterations ?? this.settings.maxIterations;
    const cancellation = new RunCancellation(request.signal, this.settings.timeoutMs);
    const systemPrompt = buildSystemPrompt(
      request.systemPrompt ?? DEFAULT_AGENT_SYSTEM_PROMPT,
      this.tools.describe(),
    );

    logger.info('agent_run_started', {
      traceId: run.traceId,
      sessionId: request.sessionId,
      maxIterations,
      replayedFromTraceId: request.replayedFromTraceId ?? null,
    });

    try {
      run.trace = await this.recorder.begin({
        id: run.traceId,
        sessionId: request.sessionId,
        agentId: request.agentId,
        userInput: request.userInput,
        runName: request.runName,
        systemPromptSnapshot: systemPrompt,
        modelConfigSnapshot: this.snapshotModelConfig(maxIterations),
        replayedFromTraceId: request.replayedFromTraceId,
      });

      const history = await this.recorder.loadHistory(request.sessionId, this.settings.historyWindow);
      const context: ReasoningContext = {
        systemPrompt,
        history,
        userInput: request.userInput,
        scratchpad: [],
        model: this.settings.model,
        temperature: this.settings.temperature,
      };

      run.transition('REASONING');
      const answer = await this.reasonUntilAnswer(run, context, maxIterations, cancellation);

      run.transition('RESPONDING');
      await this.recorder.appendStep(run.requireTrace(), {
        stepType: 'response',
        stepName: 'final_answer',
        outputPayload: { response: answer },
      });
      run.stepsTaken += 1;

      const trace = await this.recorder.finalize(run.traceId, {
        finalOutput: answer,
        status: 'completed',
      });
      run.transition('DONE');

      logger.info('agent_run_completed', {
        traceId: run.traceId,
        iterations: run.iterations,
        stepsTaken: run.stepsTaken,
      });

      return { trace, state: 'DONE', stepsTaken: run.stepsTaken };
    } catch (error: unknown) {
      return await this.terminate(run, error, cancellation);
    } finally {
      cancellation.dispose();
    }
  }

  private async reasonUntilAnswer(
    run: AgentRun,
    context: ReasoningContext,
    maxIterations: number,
    cancellation: RunCancellation,
  ): Promise<string> {
    const trace = run.requireTrace();
    let consecutiveUnknownTools = 0;

    while (run.iterations < maxIterations) {
      cancellation.throwIfCancelled();
      run.iterations += 1;

      const result = await this.reasoning.decide(context, cancellation.signal);
      cancellation.throwIfCancelled();

      const decision: Decision = result.decision;
      await this.recorder.appendStep(trace, {
        stepType: 'thought',
        stepName: result.model,
        inputPayload: { iteration: run.iterations, attempts: result.attempts },
        outputPayload: { thought: decision.thought },
        latencyMs: result.latencyMs,
        tokens: result.usage.totalTokens,
        costUsd: result.costUsd,
      });
      run.stepsTaken += 1;
      context.scratchpad.push({ role: 'assistant', content: serializeDecision(decision) });

      if (decision.kind === 'final_answer') {
        return decision.answer;
      }

      if (!this.tools.has(decision.tool)) {
        consecutiveUnknownTools += 1;
        await this.recordUnknownTool(run, decision);

        if (consecutiveUnknownTools > 1) {
          throw new UnknownToolError(decision.tool);
        }

        context.scratchpad.push({
          role: 'user',
          content: buildUnknownToolObservation(decision.tool, this.tools.getToolNames()),
        });
        run.transition('REASONING');
        continue;
      }

      consecutiveUnknownTools = 0;
      run.transition('TOOL_EXEC');
      const observation = await this.executeTool(run, decision);
      context.scratchpad.push({
        role: 'user',
        content: buildObservationMessage(decision.tool, observation),
      });
      run.transition('REASONING');
    }

    throw new LoopBudgetExceededError(maxIterations);
  }

  private async executeTool(run: AgentRun, decision: ToolCallDecision): Promise<string> {
    const trace = run.requireTrace();
    const startedAt = new Date();

    const callStep = await this.recorder.appendStep(trace, {
      stepType: 'tool_call',
      stepName: decision.tool,
      inputPayload: decision.args,
      startedAt,
      completedAt: null,
    });
    run.stepsTaken += 1;

    const result = await this.tools.invoke(decision.tool, decision.args);
    const completedAt = new Date();
    const latencyMs = completedAt.getTime() - startedAt.getTime();
    const text = toolResultText(result);

    await this.recorder.completeStep(trace.id, callStep.id, { completedAt, latencyMs });
    await this.recorder.appendStep(trace, {
      stepType: 'tool_result',
      stepName: decision.tool,
      outputPayload: { result: text },
      latencyMs,
      isError: isToolError(result),
      errorMessage: isToolError(result) ? text : null,
      startedAt: completedAt,
    });
    run.stepsTaken += 1;

    logger.debug('agent_tool_invoked', {
      traceId: trace.id,
      tool: decision.tool,
      isError: isToolError(result),
      latencyMs,
    });

    return text;
  }

  private async recordUnknownTool(run: AgentRun, decision: ToolCallDecision): Promise<void> {
    const message = `Unknown tool '${decision.tool}'`;

    logger.warn('agent_unknown_tool', { traceId: run.traceId, tool: decision.tool });

    await this.recorder.appendStep(run.requireTrace(), {
      stepType: 'tool_call',
      stepName: decision.tool,
      inputPayload: decision.args,
      isError: true,
      errorMessage: message,
    });
    run.stepsTaken += 1;
  }

  private async terminate(
    run: AgentRun,
    error: unknown,
    cancellation: RunCancellation,
  ): Promise<AgentRunOutcome> {
    const cancelled = cancellation.error;
    const trace = run.trace;

    if (!trace) {
      logger.error('agent_run_not_started', { traceId: run.traceId, error: errorMessageOf(error) });
      throw error;
    }

    const message = cancelled ? cancelled.message : errorMessageOf(error);
    const errorKind = cancelled?.kind ?? (error instanceof AgentRunError ? error.kind : null);
    const terminalState = cancelled ? 'CANCELLED' : 'ERROR';

    logger.warn(cancelled ? 'agent_run_cancelled' : 'agent_run_failed', {
      traceId: run.traceId,
      state: run.state,
      errorKind,
      error: message,
    });

    if (error instanceof ProviderError && error.usage.totalTokens > 0) {
      logger.warn('reasoning_usage_unrecorded', {
        traceId: run.traceId,
        attempts: error.attempts,
        totalTokens: error.usage.totalTokens,
        costUsd: error.costUsd,
      });
    }

    run.transition(terminalState);

    try {
      const finalized = await this.recorder.finalize(trace.id, {
        finalOutput: message,
        status: cancelled ? 'cancelled' : 'failed',
        errorKind,
        errorMessage: cancelled ? null : message,
      });

      return { trace: finalized, state: terminalState, stepsTaken: run.stepsTaken };
    } catch (finalizeError: unknown) {
      logger.error('agent_run_finalize_failed', {
        traceId: run.traceId,
        error: errorMessageOf(finalizeError),
      });
      throw finalizeError;
    }
  }

  private snapshotModelConfig(maxIterations: number): JsonObject {
    return {
      model: this.settings.model,
      provider: this.settings.provider,
      temperature: this.settings.temperature,
      maxIterations,
      historyWindow: this.settings.historyWindow,
      timeoutSeconds: Math.round(this.settings.timeoutMs / 1000),
      tools: this.tools.getToolNames(),
    };
  }
}
