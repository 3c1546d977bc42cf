import type {
  ChatSessionRecord,
  SessionResponse,
  StepRecord,
  StepResponse,
  TraceRecord,
  TraceResponse,
  UsageStatsResponse,
  UsageSummary,
} from '../@types';

const isoOrNull = (value: Date | null): string | null => (value ? value.toISOString() : null);

export const toSessionResponse = (session: ChatSessionRecord): SessionResponse => ({
  id: session.id,
  user_id: session.userId,
  agent_id: session.agentId,
  is_active: session.isActive,
  context_data: session.contextData,
  last_active_at: session.lastActiveAt.toISOString(),
  created_at: session.createdAt.toISOString(),
});

export const toTraceResponse = (trace: TraceRecord): TraceResponse => ({
  id: trace.id,
  session_id: trace.sessionId,
  agent_id: trace.agentId,
  user_input: trace.userInput,
  final_output: trace.finalOutput,
  run_name: trace.runName,
  total_tokens: trace.totalTokens,
  total_cost: trace.totalCost,
  latency_ms: trace.latencyMs,
  status: trace.status,
  is_successful: trace.isSuccessful,
  error_kind: trace.errorKind,
  error_message: trace.errorMessage,
  system_prompt_snapshot: trace.systemPromptSnapshot,
  model_config_snapshot: trace.modelConfigSnapshot,
  replayed_from_trace_id: trace.replayedFromTraceId,
  created_at: trace.createdAt.toISOString(),
  completed_at: isoOrNull(trace.completedAt),
});

export const toStepResponse = (step: StepRecord): StepResponse => ({
  id: step.id,
  trace_id: step.traceId,
  sequence_order: step.sequenceOrder,
  step_type: step.stepType,
  step_name: step.stepName,
  input_payload: step.inputPayload,
  output_payload: step.outputPayload,
  latency_ms: step.latencyMs,
  tokens: step.tokens,
  cost_usd: step.costUsd,
  is_error: step.isError,
  error_message: step.errorMessage,
  started_at: step.startedAt.toISOString(),
  completed_at: isoOrNull(step.completedAt),
});

const roundUsd = (value: number): number => Math.round(value * 1_000_000) / 1_000_000;

export const toUsageStatsResponse = (summary: UsageSummary): UsageStatsResponse => ({
  total_tokens: summary.totalTokens,
  total_cost_usd: summary.totalCostUsd,
  trace_count: summary.traceCount,
  step_count: summary.stepCount,
  avg_tokens_per_trace:
    summary.traceCount > 0 ? Math.round(summary.totalTokens / summary.traceCount) : 0,
  avg_cost_per_trace: summary.traceCount > 0 ? roundUsd(summary.totalCostUsd / summary.traceCount) : 0,
});
