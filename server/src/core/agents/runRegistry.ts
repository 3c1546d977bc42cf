import { logger } from '../shared/logger';

/** Abort controllers of the runs executing in this process, keyed by trace id. */
export class RunRegistry {
  private readonly runs = new Map<string, AbortController>();

  public register(traceId: string): AbortController {
    const controller = new AbortController();
    this.runs.set(traceId, controller);
    return controller;
  }

  public isActive(traceId: string): boolean {
    return this.runs.has(traceId);
  }

  public cancel(traceId: string): boolean {
    const controller = this.runs.get(traceId);

    if (!controller) {
      return false;
    }

    logger.info('agent_run_cancel_requested', { traceId });
    controller.abort();
    return true;
  }

  public release(traceId: string): void {
    this.runs.delete(traceId);
  }

  public get activeCount(): number {
    return this.runs.size;
  }
}
