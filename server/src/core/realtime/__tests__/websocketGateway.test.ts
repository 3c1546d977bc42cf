import { describe, expect, it } from 'vitest';

import type { StepRecord, TraceBusEvent } from '../../@types';
import {
  isAuthorizedHandshake,
  parseClientCommand,
  parseSessionId,
  toEnvelope,
  toRoomName,
  toTraceEventEnvelope,
} from '../websocketGateway';

const step: StepRecord = {
  id: 'step-1',
  traceId: 'trace-1',
  sequenceOrder: 1,
  stepType: 'tool_result',
  stepName: 'calculator',
  inputPayload: null,
  outputPayload: { result: '4' },
  latencyMs: 2,
  tokens: 0,
  costUsd: 0,
  isError: false,
  errorMessage: null,
  startedAt: new Date('2026-01-01T00:00:00.000Z'),
  completedAt: new Date('2026-01-01T00:00:00.002Z'),
};

describe('websocket gateway helpers', () => {
  it('names session rooms', () => {
    expect(toRoomName('abc')).toBe('session:abc');
  });

  it('accepts a session id as a string or an object', () => {
    expect(parseSessionId('abc')).toBe('abc');
    expect(parseSessionId({ sessionId: 'abc' })).toBe('abc');
    expect(parseSessionId({})).toBeNull();
    expect(parseSessionId('')).toBeNull();
  });

  it('validates client commands', () => {
    expect(parseClientCommand({ type: 'subscribe', sessionId: 'abc' })).toEqual({
      type: 'subscribe',
      sessionId: 'abc',
    });
    expect(parseClientCommand({ type: 'ping' })).toEqual({ type: 'ping' });
    expect(parseClientCommand({ type: 'shutdown' })).toBeNull();
  });

  it('wraps payloads in a timestamped envelope', () => {
    const envelope = toEnvelope('system.pong', { ok: true }, 'abc');

    expect(envelope).toMatchObject({ type: 'system.pong', sessionId: 'abc', payload: { ok: true } });
    expect(Number.isNaN(Date.parse(envelope.timestamp))).toBe(false);
  });

  it('turns committed steps into trace events for session rooms', () => {
    const event: TraceBusEvent = {
      type: 'step_committed',
      traceId: 'trace-1',
      sessionId: 'session-1',
      step,
    };

    expect(toTraceEventEnvelope(event)).toMatchObject({
      type: 'trace.event',
      sessionId: 'session-1',
      payload: { traceId: 'trace-1', event: { type: 'tool_result', result: '4' } },
    });
  });

  it('lets every client in when no API key is configured', () => {
    expect(isAuthorizedHandshake({ auth: {}, headers: {} })).toBe(true);
  });

  it('requires the configured API key on the handshake', () => {
    expect(isAuthorizedHandshake({ auth: { apiKey: 'test-secret' }, headers: {} }, 'test-secret')).toBe(true);
    expect(
      isAuthorizedHandshake({ auth: {}, headers: { 'x-api-key': 'test-secret' } }, 'test-secret'),
    ).toBe(true);
    expect(isAuthorizedHandshake({ auth: {}, headers: {} }, 'test-secret')).toBe(false);
    expect(isAuthorizedHandshake({ auth: { apiKey: 'wrong' }, headers: {} }, 'test-secret')).toBe(false);
    expect(isAuthorizedHandshake({ auth: { apiKey: 42 }, headers: {} }, 'test-secret')).toBe(false);
  });
});
