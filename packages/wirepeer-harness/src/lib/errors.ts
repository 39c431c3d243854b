import { Data, Duration } from 'effect';

export class ConfigurationError extends Data.TaggedError('ConfigurationError')<
  Readonly<{
    readonly variable: string;
    readonly value: string;
    readonly details: string;
  }>
> {}

export type TimedOperation = 'accept' | 'read' | 'write' | 'handshake' | 'join';

export class TimeoutError extends Data.TaggedError('TimeoutError')<
  Readonly<{
    readonly operation: TimedOperation;
    readonly message: string;
    readonly timeout: Duration.Duration;
  }>
> {}

export class PeerIoError extends Data.TaggedError('PeerIoError')<
  Readonly<{
    readonly operation: 'read' | 'write' | 'handshake';
    readonly message: string;
    readonly cause?: unknown;
  }>
> {}

export class ListenerError extends Data.TaggedError('ListenerError')<
  Readonly<{
    readonly operation: 'bind' | 'permissions' | 'close';
    readonly endpoint: string;
    readonly message: string;
    readonly cause?: unknown;
  }>
> {}

export class ServerStateError extends Data.TaggedError('ServerStateError')<
  Readonly<{
    readonly message: string;
    readonly state: string;
  }>
> {}

export const isHarnessError = (
  u: unknown
): u is ConfigurationError | TimeoutError | PeerIoError | ListenerError | ServerStateError => {
  if (typeof u !== 'object' || u === null || !('_tag' in u)) return false;
  return [
    'ConfigurationError',
    'TimeoutError',
    'PeerIoError',
    'ListenerError',
    'ServerStateError',
  ].includes(String(u._tag));
};

const messageOf = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);

// Error creation helpers
export const timeoutError = {
  operation: (operation: Exclude<TimedOperation, 'join'>, timeout: Duration.Duration) =>
    new TimeoutError({
      operation,
      timeout,
      message: `${operation} did not complete within ${Duration.format(timeout)}`,
    }),
  join: (timeout: Duration.Duration) =>
    new TimeoutError({
      operation: 'join',
      timeout,
      message: 'background worker is still running after timeout',
    }),
};

export const peerIoError = {
  read: (cause: unknown) =>
    new PeerIoError({ operation: 'read', message: `read failed: ${messageOf(cause)}`, cause }),
  write: (cause: unknown) =>
    new PeerIoError({ operation: 'write', message: `write failed: ${messageOf(cause)}`, cause }),
  handshake: (cause: unknown) =>
    new PeerIoError({
      operation: 'handshake',
      message: `TLS handshake failed: ${messageOf(cause)}`,
      cause,
    }),
};

export const listenerError =
  (operation: ListenerError['operation'], endpoint: string) => (cause: unknown) =>
    new ListenerError({
      operation,
      endpoint,
      message: `${operation} failed for ${endpoint}: ${messageOf(cause)}`,
      cause,
    });
