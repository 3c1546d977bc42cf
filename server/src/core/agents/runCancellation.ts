import { RunCancelledError } from '../shared/errors/agent-errors';

/**
 * Joins an operator abort signal and the whole-run timeout into one signal for a run.
 * The first trigger wins and decides the error kind.
 */
export class RunCancellation {
  private readonly controller = new AbortController();
  private readonly timer: NodeJS.Timeout;
  private readonly detachExternal: () => void;
  private cancelledWith: RunCancelledError | null = null;

  public constructor(external: AbortSignal | undefined, timeoutMs: number) {
    this.timer = setTimeout(() => {
      this.cancel(new RunCancelledError('Timeout', `Run exceeded the time limit of ${timeoutMs / 1000}s.`));
    }, timeoutMs);
    this.timer.unref();

    const onAbort = (): void => {
      this.cancel(new RunCancelledError('Cancelled', 'Run cancelled by operator.'));
    };

    if (external?.aborted) {
      onAbort();
    } else {
      external?.addEventListener('abort', onAbort, { once: true });
    }

    this.detachExternal = () => {
      external?.removeEventListener('abort', onAbort);
    };
  }

  public get signal(): AbortSignal {
    return this.controller.signal;
  }

  public get error(): RunCancelledError | null {
    return this.cancelledWith;
  }

  public throwIfCancelled(): void {
    if (this.cancelledWith) {
      throw this.cancelledWith;
    }
  }

  public dispose(): void {
    clearTimeout(this.timer);
    this.detachExternal();
  }

  private cancel(error: RunCancelledError): void {
    if (this.cancelledWith) {
      return;
    }

    this.cancelledWith = error;
    this.controller.abort(error);
  }
}
