import type { Response } from 'express';

import type { StepRecord, StreamEvent, TraceBusEvent, TraceRecord } from '../@types';
import { errorMessageOf, logger } from '../shared/logger';
import type { TraceEventBus } from './traceEventBus';

export interface StreamSink {
  write(event: StreamEvent): void;
}

const textOf = (value: unknown): string => {
  if (typeof value === 'string') {
    return value;
  }

  return value === undefined || value === null ? '' : JSON.stringify(value);
};

export const toStepEvent = (step: StepRecord): StreamEvent => {
  const input = step.inputPayload ?? {};
  const output = step.outputPayload ?? {};

  switch (step.stepType) {
    case 'thought':
      return { type: 'thought', content: { thought: textOf(output.thought) } };
    case 'tool_call':
      return { type: 'tool_call', name: step.stepName ?? '', args: input };
    case 'tool_result':
      return { type: 'tool_result', result: textOf(output.result) };
    case 'response':
      return { type: 'response', content: textOf(output.response) };
  }
};

export const toTerminalEvent = (trace: TraceRecord): StreamEvent => {
  if (trace.status === 'completed') {
    return { type: 'complete', success: true, trace_id: trace.id };
  }

  return {
    type: 'error',
    error: trace.errorMessage ?? trace.finalOutput ?? `Run ended with status ${trace.status}.`,
  };
};

/**
 * Translates committed bus events into stream events. Returns `null` for events that
 * have no stream counterpart.
 */
export const toStreamEvent = (event: TraceBusEvent): StreamEvent | null => {
  switch (event.type) {
    case 'trace_started':
      return { type: 'start', session_id: event.sessionId, trace_id: event.traceId };
    case 'step_committed':
      return toStepEvent(event.step);
    case 'trace_finalized':
      return toTerminalEvent(event.trace);
    default:
      return null;
  }
};

/**
 * One consumer attached to one trace. Detaching only stops delivery; the run that feeds
 * the bus is unaware of it.
 */
export class StreamSubscription {
  private unsubscribe: (() => void) | null = null;
  private lastSequence = 0;
  private resolveDone: (event: StreamEvent | null) => void = () => undefined;

  /** Resolves with the terminal event, or `null` when the consumer went away first. */
  public readonly done: Promise<StreamEvent | null>;

  public constructor(
    public readonly traceId: string,
    private readonly sink: StreamSink,
  ) {
    this.done = new Promise<StreamEvent | null>((resolve) => {
      this.resolveDone = resolve;
    });
  }

  public get isOpen(): boolean {
    return this.unsubscribe !== null;
  }

  public bind(unsubscribe: () => void): void {
    this.unsubscribe = unsubscribe;
  }

  public handle(event: TraceBusEvent): void {
    if (!this.isOpen) {
      return;
    }

    if (event.type === 'step_committed') {
      if (event.step.sequenceOrder <= this.lastSequence) {
        return;
      }
      this.lastSequence = event.step.sequenceOrder;
    }

    const streamEvent = toStreamEvent(event);

    if (!streamEvent) {
      return;
    }

    if (!this.deliver(streamEvent)) {
      return;
    }

    if (event.type === 'trace_finalized') {
      this.close(streamEvent);
    }
  }

  /** Sends an event that did not come from the bus, such as a failure before the run began. */
  public fail(message: string): void {
    const event: StreamEvent = { type: 'error', error: message };

    if (this.isOpen && this.deliver(event)) {
      this.close(event);
    }
  }

  public detach(): void {
    this.close(null);
  }

  private deliver(event: StreamEvent): boolean {
    try {
      this.sink.write(event);
      return true;
    } catch (error: unknown) {
      logger.warn('stream_sink_write_failed', {
        traceId: this.traceId,
        eventType: event.type,
        error: errorMessageOf(error),
      });
      this.close(null);
      return false;
    }
  }

  private close(terminal: StreamEvent | null): void {
    if (!this.unsubscribe) {
      return;
    }

    this.unsubscribe();
    this.unsubscribe = null;
    this.resolveDone(terminal);
  }
}

export class StreamPublisher {
  public constructor(private readonly bus: TraceEventBus) {}

  /** Attach before the run begins so the `start` event is not missed. */
  public attach(traceId: string, sink: StreamSink): StreamSubscription {
    const subscription = new StreamSubscription(traceId, sink);
    subscription.bind(this.bus.subscribeToTrace(traceId, (event) => subscription.handle(event)));
    return subscription;
  }
}

/** Writes stream events as Server-Sent Events and detaches when the client disconnects. */
export const openSseStream = (
  publisher: StreamPublisher,
  traceId: string,
  res: Response,
): StreamSubscription => {
  res.status(200);
  res.setHeader('Content-Type', 'text/event-stream');
  res.setHeader('Cache-Control', 'no-cache');
  res.setHeader('Connection', 'keep-alive');
  res.setHeader('X-Accel-Buffering', 'no');
  res.flushHeaders();

  const subscription = publisher.attach(traceId, {
    write: (event) => {
      if (res.writableEnded || res.destroyed) {
        throw new Error('Stream consumer is gone.');
      }
      res.write(`data: ${JSON.stringify(event)}\n\n`);
    },
  });

  res.on('close', () => {
    if (subscription.isOpen) {
      logger.info('stream_consumer_disconnected', { traceId });
      subscription.detach();
    }
  });

  void subscription.done.then(() => {
    if (!res.writableEnded) {
      res.end();
    }
  });

  return subscription;
};
