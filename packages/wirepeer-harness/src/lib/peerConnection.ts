/**
 * Peer Connection
 *
 * Server-side view of the single accepted client socket. Reads and writes are
 * Effects bounded by a per-operation timeout, which starts out as whatever was
 * left of the test budget when the client connected.
 */

import type * as net from 'node:net';
import * as tls from 'node:tls';
import { Data, Duration, Effect, Option, Queue, Ref, Scope, pipe } from 'effect';
import {
  type FramingError,
  type WireMessage,
  concatBytes,
  encodeAll,
  framingError,
} from '@wirepeer/protocol';
import {
  type PeerIoError,
  type TimeoutError,
  peerIoError,
  timeoutError,
} from './errors';

// ============================================================================
// Types
// ============================================================================

export type PeerTlsOptions = Readonly<tls.SecureContextOptions>;

export interface PeerConnection {
  readonly remoteAddress: string;
  readonly encrypted: boolean;
  /**
   * Up to `maxBytes` bytes; an empty array means the client closed its side.
   */
  readonly recv: (maxBytes: number) => Effect.Effect<Uint8Array, PeerIoError | TimeoutError>;
  readonly recvExact: (
    length: number
  ) => Effect.Effect<Uint8Array, PeerIoError | TimeoutError | FramingError>;
  readonly send: (
    data: Uint8Array | ReadonlyArray<WireMessage>
  ) => Effect.Effect<void, PeerIoError | TimeoutError>;
  readonly timeout: Effect.Effect<Duration.Duration>;
  readonly setTimeout: (timeout: Duration.DurationInput) => Effect.Effect<void>;
  /**
   * Upgrades the connection to TLS as the server side of the handshake. The
   * encrypted connection is closed when the scope ends.
   */
  readonly startTls: (
    options: PeerTlsOptions
  ) => Effect.Effect<PeerConnection, PeerIoError | TimeoutError, Scope.Scope>;
  readonly close: Effect.Effect<void>;
}

type Inbound = Data.TaggedEnum<{
  Chunk: { readonly bytes: Uint8Array };
  End: {};
  Failure: { readonly cause: Error };
}>;

const Inbound = Data.taggedEnum<Inbound>();

interface ConnectionState {
  readonly inbox: Queue.Queue<Inbound>;
  readonly pending: Ref.Ref<Uint8Array>;
  readonly terminal: Ref.Ref<Option.Option<Inbound>>;
  readonly timeout: Ref.Ref<Duration.Duration>;
  readonly detach: () => void;
}

const EMPTY = new Uint8Array(0);

// ============================================================================
// Socket Events
// ============================================================================

const attachListeners = (socket: net.Socket, inbox: Queue.Queue<Inbound>): (() => void) => {
  const onData = (chunk: Buffer) => {
    Queue.unsafeOffer(inbox, Inbound.Chunk({ bytes: new Uint8Array(chunk) }));
  };
  const onEnd = () => {
    Queue.unsafeOffer(inbox, Inbound.End());
  };
  const onError = (cause: Error) => {
    Queue.unsafeOffer(inbox, Inbound.Failure({ cause }));
  };

  socket.on('data', onData);
  socket.on('end', onEnd);
  socket.on('close', onEnd);
  socket.on('error', onError);

  return () => {
    socket.off('data', onData);
    socket.off('end', onEnd);
    socket.off('close', onEnd);
    socket.off('error', onError);
  };
};

// ============================================================================
// Reading
// ============================================================================

// A chunk is parked in `pending` before the take can be interrupted again.
const record = (state: ConnectionState) =>
  Inbound.$match({
    Chunk: ({ bytes }) => Ref.set(state.pending, bytes),
    End: (event) => Ref.set(state.terminal, Option.some<Inbound>(event)),
    Failure: (event) => Ref.set(state.terminal, Option.some<Inbound>(event)),
  });

// Once the client has gone away every later read sees the same outcome.
const nextInbound = (state: ConnectionState): Effect.Effect<Inbound> =>
  pipe(
    Ref.get(state.terminal),
    Effect.flatMap(
      Option.match({
        onSome: Effect.succeed,
        onNone: () =>
          Effect.uninterruptibleMask((restore) =>
            pipe(
              restore(Queue.take(state.inbox)),
              Effect.tap(record(state))
            )
          ),
      })
    )
  );

const takePending = (state: ConnectionState, maxBytes: number) =>
  Ref.modify(state.pending, (pending): [Uint8Array, Uint8Array] => [
    pending.subarray(0, maxBytes),
    pending.subarray(maxBytes),
  ]);

const recvOnce = (
  state: ConnectionState,
  maxBytes: number
): Effect.Effect<Uint8Array, PeerIoError> =>
  pipe(
    Ref.get(state.pending),
    Effect.flatMap((pending) =>
      pending.length > 0
        ? takePending(state, maxBytes)
        : pipe(
            nextInbound(state),
            Effect.flatMap(
              Inbound.$match({
                Chunk: () => recvOnce(state, maxBytes),
                End: () => Effect.succeed(EMPTY),
                Failure: ({ cause }) => Effect.fail(peerIoError.read(cause)),
              })
            )
          )
    )
  );

const recvInto = (
  state: ConnectionState,
  length: number,
  received: Uint8Array
): Effect.Effect<Uint8Array, PeerIoError | FramingError> =>
  received.length >= length
    ? Effect.succeed(received)
    : pipe(
        recvOnce(state, length - received.length),
        Effect.flatMap((chunk) =>
          chunk.length === 0
            ? Effect.fail(
                framingError.unexpected(
                  `connection closed after ${received.length} of ${length} bytes`
                )
              )
            : recvInto(state, length, concatBytes([received, chunk]))
        )
      );

// ============================================================================
// Writing
// ============================================================================

const write = (socket: net.Socket, bytes: Uint8Array): Effect.Effect<void, PeerIoError> =>
  Effect.async<void, PeerIoError>((resume) => {
    socket.write(bytes, (error) => {
      resume(error ? Effect.fail(peerIoError.write(error)) : Effect.void);
    });
  });

const toBytes = (data: Uint8Array | ReadonlyArray<WireMessage>): Uint8Array =>
  data instanceof Uint8Array ? data : encodeAll(data);

// ============================================================================
// Timeouts
// ============================================================================

const withOperationTimeout =
  (state: ConnectionState, operation: 'read' | 'write' | 'handshake') =>
  <A, E>(self: Effect.Effect<A, E>): Effect.Effect<A, E | TimeoutError> =>
    pipe(
      Ref.get(state.timeout),
      Effect.flatMap((timeout) =>
        Effect.timeoutFail(self, {
          duration: timeout,
          onTimeout: () => timeoutError.operation(operation, timeout),
        })
      )
    );

// ============================================================================
// TLS
// ============================================================================

const handshake = (
  socket: net.Socket,
  options: PeerTlsOptions
): Effect.Effect<tls.TLSSocket, PeerIoError> =>
  pipe(
    Effect.try({
      try: () => tls.createSecureContext({ ...options }),
      catch: peerIoError.handshake,
    }),
    Effect.flatMap((secureContext) =>
      Effect.async<tls.TLSSocket, PeerIoError>((resume) => {
        const secureSocket = new tls.TLSSocket(socket, { isServer: true, secureContext });
        const onError = (cause: Error) => {
          resume(Effect.fail(peerIoError.handshake(cause)));
        };
        secureSocket.once('error', onError);
        secureSocket.once('secure', () => {
          secureSocket.off('error', onError);
          resume(Effect.succeed(secureSocket));
        });
        return Effect.sync(() => secureSocket.destroy());
      })
    )
  );

// ============================================================================
// Construction
// ============================================================================

const buildPeerConnection = (socket: net.Socket, state: ConnectionState): PeerConnection => ({
  remoteAddress: socket.remoteAddress ?? 'local',
  encrypted: socket instanceof tls.TLSSocket,
  recv: (maxBytes) => pipe(recvOnce(state, maxBytes), withOperationTimeout(state, 'read')),
  recvExact: (length) => pipe(recvInto(state, length, EMPTY), withOperationTimeout(state, 'read')),
  send: (data) => pipe(write(socket, toBytes(data)), withOperationTimeout(state, 'write')),
  timeout: Ref.get(state.timeout),
  setTimeout: (timeout) => Ref.set(state.timeout, Duration.decode(timeout)),
  startTls: (options) =>
    pipe(
      Ref.get(state.timeout),
      Effect.flatMap((timeout) =>
        Effect.acquireRelease(
          pipe(
            Effect.sync(state.detach),
            Effect.andThen(handshake(socket, options)),
            withOperationTimeout(state, 'handshake'),
            Effect.flatMap((secureSocket) => makePeerConnection(secureSocket, timeout))
          ),
          (secure) => secure.close
        )
      )
    ),
  close: Effect.sync(() => {
    state.detach();
    socket.destroy();
  }),
});

export const makePeerConnection = (
  socket: net.Socket,
  timeout: Duration.DurationInput
): Effect.Effect<PeerConnection> =>
  pipe(
    Effect.all({
      inbox: Queue.unbounded<Inbound>(),
      pending: Ref.make<Uint8Array>(EMPTY),
      terminal: Ref.make(Option.none<Inbound>()),
      timeout: Ref.make(Duration.decode(timeout)),
    }),
    Effect.map((resources) =>
      buildPeerConnection(socket, {
        ...resources,
        detach: attachListeners(socket, resources.inbox),
      })
    )
  );

/**
 * Runs `use` over a TLS-upgraded connection and closes the encrypted side afterwards.
 */
export const withTls = <A, E, R>(
  peer: PeerConnection,
  options: PeerTlsOptions,
  use: (secure: PeerConnection) => Effect.Effect<A, E, R>
): Effect.Effect<A, E | PeerIoError | TimeoutError, Exclude<R, Scope.Scope>> =>
  Effect.scoped(pipe(peer.startTls(options), Effect.flatMap(use)));
