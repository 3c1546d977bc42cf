import type { TraceBusEvent } from '../@types';
import { logger } from '../shared/logger';

export type TraceEventListener = (event: TraceBusEvent) => void;

/**
 * In-process fan-out of committed trace events. Listeners run synchronously in publish
 * order; a throwing listener is logged and never affects the publisher or other listeners.
 */
export class TraceEventBus {
  private readonly listeners = new Set<TraceEventListener>();

  public subscribe(listener: TraceEventListener): () => void {
    this.listeners.add(listener);

    return () => {
      this.listeners.delete(listener);
    };
  }

  public subscribeToTrace(traceId: string, listener: TraceEventListener): () => void {
    return this.subscribe((event) => {
      if (event.traceId === traceId) {
        listener(event);
      }
    });
  }

  public publish(event: TraceBusEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error: unknown) {
        logger.warn('trace_listener_failed', {
          error: error instanceof Error ? error.message : String(error),
          eventType: event.type,
          traceId: event.traceId,
        });
      }
    }
  }

  public get listenerCount(): number {
    return this.listeners.size;
  }
}
