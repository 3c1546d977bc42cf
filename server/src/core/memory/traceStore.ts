import type {
  AgentProfileRecord,
  ChatSessionRecord,
  NewAgentProfile,
  NewChatSession,
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

/**
 * Durable storage for traces and their steps. Implementations must commit a write
 * before resolving, since resolved steps are surfaced to live listeners.
 */
export interface TraceStore {
  createTrace(record: NewTraceRecord): Promise<TraceRecord>;
  getTrace(traceId: string): Promise<TraceRecord | null>;
  /** Newest first. */
  listTraces(filter: TraceListFilter): Promise<TraceRecord[]>;
  countTraces(sessionId?: string): Promise<number>;
  /** Oldest first. */
  listSessionTraces(sessionId: string): Promise<TraceRecord[]>;
  /**
   * The last `limit` traces of a session with status `completed`, oldest first. Failed and
   * cancelled turns are left out, so their error text never reaches the model as history.
   */
  listRecentCompletedTraces(sessionId: string, limit: number): Promise<TraceRecord[]>;
  listRunningTraces(): Promise<TraceRecord[]>;
  /**
   * Sets the terminal fields of a trace. Resolves to `null` when the trace was already
   * completed, leaving the stored record untouched.
   */
  completeTrace(traceId: string, completion: TraceCompletion): Promise<TraceRecord | null>;
  insertStep(step: NewStepRecord): Promise<StepRecord>;
  completeStep(stepId: string, completion: StepCompletion): Promise<void>;
  countSteps(traceId: string): Promise<number>;
  /** Ordered by `sequenceOrder`. */
  listSteps(traceId: string): Promise<StepRecord[]>;
  summarizeUsage(filter: UsageFilter): Promise<UsageSummary>;
}

export interface SessionStore {
  createAgent(profile: NewAgentProfile): Promise<AgentProfileRecord>;
  getAgent(agentId: string): Promise<AgentProfileRecord | null>;
  findAgentBySlug(slug: string): Promise<AgentProfileRecord | null>;
  createSession(input: NewChatSession): Promise<ChatSessionRecord>;
  getSession(sessionId: string): Promise<ChatSessionRecord | null>;
  touchSession(sessionId: string, at: Date): Promise<void>;
}
