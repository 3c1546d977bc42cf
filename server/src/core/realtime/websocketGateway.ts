import type { IncomingHttpHeaders, Server as HttpServer } from 'node:http';

import { Server as SocketIoServer, type Namespace, type Socket } from 'socket.io';
import { z } from 'zod';

import type {
  RealtimeClientCommand,
  TraceBusEvent,
  WsConnectedPayload,
  WsEnvelope,
  WsErrorPayload,
  WsSubscriptionPayload,
  WsTraceEventPayload,
} from '../@types';
import { logger } from '../shared/logger';
import { API_KEY_HEADER, matchesApiKey } from '../shared/middlewares/api-key';
import { toStreamEvent } from './streamPublisher';
import type { TraceEventBus } from './traceEventBus';

const SOCKET_IO_PATH = '/socket.io';
const TRACES_NAMESPACE = '/traces';

const nowIso = (): string => new Date().toISOString();

export const toEnvelope = <TType extends string, TPayload>(
  type: TType,
  payload: TPayload,
  sessionId?: string,
): WsEnvelope<TType, TPayload> => ({
  type,
  timestamp: nowIso(),
  sessionId,
  payload,
});

export const toRoomName = (sessionId: string): string => `session:${sessionId}`;

const clientCommandSchema = z.object({
  type: z.enum(['subscribe', 'unsubscribe', 'ping']),
  sessionId: z.string().min(1).optional(),
});

const sessionRefSchema = z.union([
  z.string().min(1),
  z.object({ sessionId: z.string().min(1) }).transform((value) => value.sessionId),
]);

const traceRefSchema = z.object({ traceId: z.string().min(1) });

export const parseClientCommand = (raw: unknown): RealtimeClientCommand | null => {
  const parsed = clientCommandSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
};

export const parseSessionId = (raw: unknown): string | null => {
  const parsed = sessionRefSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
};

/**
 * Wraps a committed bus event in the `trace.event` envelope sent to session rooms, or
 * returns `null` when the event has no stream form.
 */
export const toTraceEventEnvelope = (
  event: TraceBusEvent,
): WsEnvelope<'trace.event', WsTraceEventPayload> | null => {
  const streamEvent = toStreamEvent(event);

  if (!streamEvent) {
    return null;
  }

  return toEnvelope('trace.event', { traceId: event.traceId, event: streamEvent }, event.sessionId);
};

export interface HandshakeCredentials {
  auth: Record<string, unknown>;
  headers: IncomingHttpHeaders;
}

/**
 * Same rule as the HTTP `x-api-key` check. Clients pass the key as `auth.apiKey` or as
 * the header on the handshake request.
 */
export const isAuthorizedHandshake = (handshake: HandshakeCredentials, apiKey?: string): boolean => {
  if (!apiKey) {
    return true;
  }

  const header = handshake.headers[API_KEY_HEADER];
  const provided =
    typeof handshake.auth.apiKey === 'string'
      ? handshake.auth.apiKey
      : Array.isArray(header)
        ? header[0]
        : header;

  return typeof provided === 'string' && matchesApiKey(provided, apiKey);
};

export interface AttachWebSocketGatewayOptions {
  bus: TraceEventBus;
  corsOrigin: string;
  cancelRun: (traceId: string) => boolean;
  apiKey?: string;
}

class TraceSocketGateway {
  private readonly io: SocketIoServer;
  private readonly tracesNamespace: Namespace;
  private readonly unsubscribeBus: () => void;

  public constructor(
    server: HttpServer,
    private readonly options: AttachWebSocketGatewayOptions,
  ) {
    this.io = new SocketIoServer(server, {
      path: SOCKET_IO_PATH,
      cors: {
        origin: options.corsOrigin === '*' ? true : options.corsOrigin,
        credentials: true,
      },
    });

    this.tracesNamespace = this.io.of(TRACES_NAMESPACE);
    this.tracesNamespace.use((socket, next) => {
      if (isAuthorizedHandshake(socket.handshake, options.apiKey)) {
        next();
        return;
      }

      logger.warn('socket_client_rejected', { socketId: socket.id, reason: 'invalid_api_key' });
      next(new Error('Missing or invalid API key.'));
    });
    this.tracesNamespace.on('connection', (socket) => {
      this.handleConnection(socket);
    });

    this.unsubscribeBus = options.bus.subscribe((event) => {
      this.broadcastTraceEvent(event);
    });
  }

  public close(): Promise<void> {
    this.unsubscribeBus();

    return new Promise((resolve) => {
      void this.io.close(() => resolve());
    });
  }

  private handleConnection(socket: Socket): void {
    logger.info('socket_client_connected', {
      socketId: socket.id,
      transport: socket.conn.transport.name,
    });

    const connectedPayload: WsConnectedPayload = {
      connectionId: socket.id,
      endpoint: `${SOCKET_IO_PATH}${TRACES_NAMESPACE}`,
    };

    socket.emit('connection.ready', toEnvelope('connection.ready', connectedPayload));

    const querySessionId = socket.handshake.query.sessionId;
    if (typeof querySessionId === 'string' && querySessionId.length > 0) {
      this.subscribeSocketToSession(socket, querySessionId);
    }

    socket.on('disconnect', (reason) => {
      logger.info('socket_client_disconnected', {
        socketId: socket.id,
        reason,
      });
    });

    socket.on('subscribe', (payload: unknown) => {
      const sessionId = parseSessionId(payload);

      if (!sessionId) {
        this.emitError(socket, 'sessionId is required for subscribe event.');
        return;
      }

      this.subscribeSocketToSession(socket, sessionId);
    });

    socket.on('unsubscribe', (payload: unknown) => {
      const sessionId = parseSessionId(payload);

      if (!sessionId) {
        this.emitError(socket, 'sessionId is required for unsubscribe event.');
        return;
      }

      this.unsubscribeSocketFromSession(socket, sessionId);
    });

    socket.on('ping', () => {
      socket.emit('system.pong', toEnvelope('system.pong', { ok: true }));
    });

    socket.on('command', (payload: unknown) => {
      const command = parseClientCommand(payload);

      if (!command) {
        this.emitError(
          socket,
          'Invalid command payload. Expected { type: subscribe|unsubscribe|ping, sessionId?: string }.',
        );
        return;
      }

      if (command.type === 'ping') {
        socket.emit('system.pong', toEnvelope('system.pong', { ok: true }));
        return;
      }

      if (!command.sessionId) {
        this.emitError(socket, 'sessionId is required for subscribe/unsubscribe command.');
        return;
      }

      if (command.type === 'subscribe') {
        this.subscribeSocketToSession(socket, command.sessionId);
        return;
      }

      this.unsubscribeSocketFromSession(socket, command.sessionId);
    });

    socket.on('trace.cancel', (rawPayload: unknown) => {
      const parsed = traceRefSchema.safeParse(rawPayload);

      if (!parsed.success) {
        this.emitError(socket, 'traceId is required for trace.cancel event.');
        return;
      }

      const cancelled = this.options.cancelRun(parsed.data.traceId);
      socket.emit(
        'trace.cancel_result',
        toEnvelope('trace.cancel_result', { traceId: parsed.data.traceId, cancelled }),
      );
    });
  }

  private emitError(socket: Socket, message: string): void {
    const errorPayload: WsErrorPayload = { message };
    socket.emit('system.error', toEnvelope('system.error', errorPayload));
  }

  private subscribeSocketToSession(socket: Socket, sessionId: string): void {
    void socket.join(toRoomName(sessionId));
    logger.info('socket_session_subscribed', {
      socketId: socket.id,
      sessionId,
    });

    const payload: WsSubscriptionPayload = { sessionId };
    socket.emit('subscription.confirmed', toEnvelope('subscription.confirmed', payload, sessionId));
  }

  private unsubscribeSocketFromSession(socket: Socket, sessionId: string): void {
    void socket.leave(toRoomName(sessionId));
    logger.info('socket_session_unsubscribed', {
      socketId: socket.id,
      sessionId,
    });

    const payload: WsSubscriptionPayload = { sessionId };
    socket.emit('subscription.removed', toEnvelope('subscription.removed', payload, sessionId));
  }

  private broadcastTraceEvent(event: TraceBusEvent): void {
    const envelope = toTraceEventEnvelope(event);

    if (!envelope) {
      return;
    }

    this.tracesNamespace.to(toRoomName(event.sessionId)).emit('trace.event', envelope);
  }
}

export interface WebSocketGateway {
  close(): Promise<void>;
}

export const attachTraceWebSocketGateway = (
  server: HttpServer,
  options: AttachWebSocketGatewayOptions,
): WebSocketGateway => {
  const gateway = new TraceSocketGateway(server, options);

  logger.info('socket_gateway_started', {
    path: SOCKET_IO_PATH,
    namespaces: [TRACES_NAMESPACE],
  });

  return {
    close: () => gateway.close(),
  };
};
