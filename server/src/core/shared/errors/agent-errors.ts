import type { AgentErrorKind, TokenUsage } from '../../@types';

/**
 * Base class for failures that end an agent run. The `kind` is persisted on the trace
 * as `error_kind` and decides whether the run is recorded as failed or cancelled.
 */
export class AgentRunError extends Error {
  public readonly kind: AgentErrorKind;

  public constructor(kind: AgentErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = kind;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export interface ProviderErrorOptions {
  cause?: unknown;
  /** Tokens the provider billed for the failed attempts. No step records them. */
  usage?: TokenUsage;
  costUsd?: number;
}

export class ProviderError extends AgentRunError {
  public readonly attempts: number;
  public readonly usage: TokenUsage;
  public readonly costUsd: number;

  public constructor(message: string, attempts: number, options: ProviderErrorOptions = {}) {
    super('ProviderError', message, { cause: options.cause });
    this.attempts = attempts;
    this.usage = options.usage ?? { promptTokens: 0, completionTokens: 0, totalTokens: 0 };
    this.costUsd = options.costUsd ?? 0;
  }
}

export class UnknownToolError extends AgentRunError {
  public constructor(toolName: string) {
    super('UnknownTool', `Model requested unknown tool "${toolName}" twice in a row.`);
  }
}

export class LoopBudgetExceededError extends AgentRunError {
  public constructor(maxIterations: number) {
    super(
      'LoopBudgetExceeded',
      `Agent did not reach a final answer within ${maxIterations} reasoning cycles.`,
    );
  }
}

export class PersistenceError extends AgentRunError {
  public constructor(operation: string, cause: unknown) {
    super(
      'PersistenceError',
      `Trace storage failed during ${operation}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
  }
}

export class RunCancelledError extends AgentRunError {
  public constructor(kind: 'Cancelled' | 'Timeout', message: string) {
    super(kind, message);
  }
}

export const isCancellationKind = (kind: AgentErrorKind): boolean => {
  return kind === 'Cancelled' || kind === 'Timeout';
};
