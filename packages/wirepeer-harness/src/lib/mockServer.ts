/**
 * Mock Server
 *
 * A listening socket that accepts exactly one client and hands it to a
 * user-supplied handler running on a background fiber. The listener, the
 * socket file and the worker are all registered on the test's ResourceStack,
 * so the worker is joined (and its failure re-raised) before the listener
 * closes.
 */

import * as fs from 'node:fs/promises';
import * as net from 'node:net';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  Chunk,
  Data,
  Deferred,
  Duration,
  Effect,
  Exit,
  Option,
  Queue,
  Ref,
  pipe,
} from 'effect';
import {
  type ListenerError,
  type PeerIoError,
  ServerStateError,
  type TimeoutError,
  listenerError,
  timeoutError,
} from './errors';
import { type PeerConnection, makePeerConnection } from './peerConnection';
import { ResourceStack } from './resourceStack';
import { TimeoutBudget, type TimeoutBudgetService, withinBudget } from './timeoutBudget';

// ============================================================================
// Types
// ============================================================================

export type ListenConfig = Data.TaggedEnum<{
  Unix: { readonly directory: string; readonly port: number };
  Tcp: { readonly host: string; readonly port: number };
}>;

export const ListenConfig = Data.taggedEnum<ListenConfig>();

export type ServerState = 'Idle' | 'Listening' | 'Accepted' | 'Completed' | 'Failed' | 'Joined';

export type ConnInfoValue = string | number;

export type PeerHandler<E> = (peer: PeerConnection) => Effect.Effect<void, E>;

export type WorkerFailure = TimeoutError | PeerIoError;

export interface BackgroundWorker<E> {
  /**
   * Waits for the worker and re-raises its failure. Only the first join reports
   * the outcome; later joins succeed immediately.
   */
  readonly join: Effect.Effect<void, E | WorkerFailure>;
}

export interface MockServer {
  readonly listen: ListenConfig;
  readonly port: number;
  readonly socketPath: Option.Option<string>;
  /**
   * Connection parameters that point a client at this server.
   */
  readonly conninfo: Readonly<Record<string, ConnInfoValue>>;
  readonly state: Effect.Effect<ServerState>;
  readonly background: <E>(
    handler: PeerHandler<E>
  ) => Effect.Effect<BackgroundWorker<E>, ServerStateError>;
}

export const DEFAULT_PORT = 5432;
export const LOOPBACK = '127.0.0.1';

// Extra time a join waits beyond the budget, so a worker that failed on its own
// timeout can still report that failure.
const JOIN_GRACE = Duration.seconds(1);

export const supportsUnixSockets = process.platform !== 'win32';

export const socketPathFor = (directory: string, port: number): string =>
  path.join(directory, `.s.PGSQL.${port}`);

const describeEndpoint = ListenConfig.$match({
  Unix: ({ directory, port }) => socketPathFor(directory, port),
  Tcp: ({ host, port }) => `${host}:${port}`,
});

// ============================================================================
// Listener
// ============================================================================

const listenOptions = ListenConfig.$match({
  Unix: ({ directory, port }): net.ListenOptions => ({
    path: socketPathFor(directory, port),
    backlog: 1,
  }),
  Tcp: ({ host, port }): net.ListenOptions => ({ host, port, backlog: 1 }),
});

const startListening = (
  listen: ListenConfig,
  accepted: Queue.Queue<net.Socket>
): Effect.Effect<net.Server, ListenerError> =>
  Effect.async<net.Server, ListenerError>((resume) => {
    const server = net.createServer((socket) => {
      if (!Queue.unsafeOffer(accepted, socket)) socket.destroy();
    });
    const onError = (cause: Error) => {
      resume(Effect.fail(listenerError('bind', describeEndpoint(listen))(cause)));
    };
    server.once('error', onError);
    server.listen(listenOptions(listen), () => {
      server.off('error', onError);
      resume(Effect.succeed(server));
    });
  });

const countConnections = (server: net.Server): Effect.Effect<number> =>
  Effect.async<number>((resume) => {
    server.getConnections((error, count) => {
      resume(Effect.succeed(error ? 0 : count));
    });
  });

const awaitClose = (server: net.Server, endpoint: string): Effect.Effect<void, ListenerError> =>
  Effect.async<void, ListenerError>((resume) => {
    server.close((error) => {
      resume(error ? Effect.fail(listenerError('close', endpoint)(error)) : Effect.void);
    });
  });

/**
 * Closes the listener. Sockets still held by an abandoned worker are reported
 * and left behind rather than waited for.
 */
const stopListening = (
  server: net.Server,
  accepted: Queue.Queue<net.Socket>,
  endpoint: string
): Effect.Effect<void, ListenerError> =>
  pipe(
    Queue.takeAll(accepted),
    Effect.tap((unclaimed) => Effect.sync(() => Chunk.forEach(unclaimed, (s) => s.destroy()))),
    Effect.andThen(countConnections(server)),
    Effect.flatMap((open) =>
      open > 0
        ? pipe(
            Effect.logWarning(
              `leaking ${open} connection(s) still held by an abandoned background worker`
            ),
            Effect.annotateLogs('endpoint', endpoint),
            Effect.andThen(
              Effect.sync(() => {
                server.close();
                server.unref();
              })
            )
          )
        : awaitClose(server, endpoint)
    )
  );

const restrictSocketFile = (socketPath: string): Effect.Effect<void, ListenerError> =>
  Effect.tryPromise({
    try: () => fs.chmod(socketPath, 0o600),
    catch: listenerError('permissions', socketPath),
  });

const removeSocketFile = (socketPath: string): Effect.Effect<void, ListenerError> =>
  Effect.tryPromise({
    try: () => fs.rm(socketPath, { force: true }),
    catch: listenerError('close', socketPath),
  });

const boundPort = (server: net.Server, listen: ListenConfig): number => {
  const address = server.address();
  return typeof address === 'object' && address !== null ? address.port : listen.port;
};

// ============================================================================
// Background Worker
// ============================================================================

const acceptClient = (
  accepted: Queue.Queue<net.Socket>
): Effect.Effect<net.Socket, TimeoutError, TimeoutBudget> =>
  pipe(
    Queue.take(accepted),
    withinBudget((timeout) => timeoutError.operation('accept', timeout))
  );

const serveClient = <E>(
  socket: net.Socket,
  handler: PeerHandler<E>,
  budget: TimeoutBudgetService
): Effect.Effect<void, E> =>
  Effect.acquireUseRelease(
    pipe(
      budget.remaining,
      Effect.flatMap((remaining) => makePeerConnection(socket, remaining))
    ),
    handler,
    (peer) => peer.close
  );

const runWorker = <E>(
  handler: PeerHandler<E>,
  accepted: Queue.Queue<net.Socket>,
  budget: TimeoutBudgetService,
  state: Ref.Ref<ServerState>,
  outcome: Deferred.Deferred<void, E | WorkerFailure>
): Effect.Effect<void> =>
  pipe(
    acceptClient(accepted),
    Effect.tap(() => Ref.set(state, 'Accepted')),
    Effect.flatMap((socket) => serveClient(socket, handler, budget)),
    Effect.exit,
    Effect.tap((exit) => Ref.set(state, Exit.isSuccess(exit) ? 'Completed' : 'Failed')),
    Effect.tap((exit) =>
      Exit.isFailure(exit) ? Effect.logDebug('background worker failed', exit.cause) : Effect.void
    ),
    Effect.flatMap((exit) => Deferred.done(outcome, exit)),
    Effect.asVoid,
    Effect.provideService(TimeoutBudget, budget)
  );

const makeWorker = <E>(
  outcome: Deferred.Deferred<void, E | WorkerFailure>,
  budget: TimeoutBudgetService,
  state: Ref.Ref<ServerState>,
  joined: Ref.Ref<boolean>
): BackgroundWorker<E> => {
  const awaitOutcome = pipe(
    Effect.exit(Deferred.await(outcome)),
    withinBudget(timeoutError.join, JOIN_GRACE),
    Effect.tapError(() =>
      Effect.logWarning('background worker is still running after timeout; abandoning it')
    ),
    Effect.tap(() => Ref.set(state, 'Joined')),
    Effect.flatten,
    Effect.provideService(TimeoutBudget, budget)
  );

  return {
    join: pipe(
      Ref.getAndSet(joined, true),
      Effect.flatMap((alreadyJoined) => (alreadyJoined ? Effect.void : awaitOutcome))
    ),
  };
};

// ============================================================================
// Construction
// ============================================================================

const conninfoFor = (listen: ListenConfig, port: number): Readonly<Record<string, ConnInfoValue>> =>
  ListenConfig.$match(listen, {
    Unix: ({ directory }) => ({ host: directory, port }),
    Tcp: ({ host }) => ({ hostaddr: host, port }),
  });

/**
 * Binds a listener for `listen` and registers its cleanup on the ResourceStack.
 * Binding failures are fatal to the test.
 */
export const makeMockServer = (
  listen: ListenConfig
): Effect.Effect<MockServer, ListenerError, ResourceStack | TimeoutBudget> =>
  Effect.gen(function* () {
    const stack = yield* ResourceStack;
    const budget = yield* TimeoutBudget;
    const endpoint = describeEndpoint(listen);

    const state = yield* Ref.make<ServerState>('Idle');
    const started = yield* Ref.make(false);
    const accepted = yield* Queue.bounded<net.Socket>(1);

    const server = yield* stack.acquire(startListening(listen, accepted), (listener) =>
      stopListening(listener, accepted, endpoint)
    );

    const socketPath = ListenConfig.$is('Unix')(listen)
      ? Option.some(socketPathFor(listen.directory, listen.port))
      : Option.none();

    yield* Option.match(socketPath, {
      onNone: () => Effect.void,
      onSome: (file) =>
        pipe(stack.defer(removeSocketFile(file)), Effect.andThen(restrictSocketFile(file))),
    });

    yield* Ref.set(state, 'Listening');
    yield* Effect.logDebug('mock server listening').pipe(Effect.annotateLogs('endpoint', endpoint));

    const port = boundPort(server, listen);

    return {
      listen,
      port,
      socketPath,
      conninfo: conninfoFor(listen, port),
      state: Ref.get(state),
      background: <E>(handler: PeerHandler<E>) =>
        pipe(
          Ref.getAndSet(started, true),
          Effect.flatMap((alreadyStarted) =>
            alreadyStarted
              ? pipe(
                  Ref.get(state),
                  Effect.flatMap((current) =>
                    Effect.fail(
                      new ServerStateError({
                        message: 'a background worker has already been started on this server',
                        state: current,
                      })
                    )
                  )
                )
              : Effect.void
          ),
          Effect.andThen(Deferred.make<void, E | WorkerFailure>()),
          Effect.flatMap((outcome) =>
            pipe(
              Ref.make(false),
              Effect.map((joined) => makeWorker(outcome, budget, state, joined)),
              Effect.tap((worker) => stack.defer(worker.join)),
              Effect.tap(() =>
                pipe(
                  runWorker(handler, accepted, budget, state, outcome),
                  Effect.annotateLogs('endpoint', endpoint),
                  Effect.forkDaemon
                )
              )
            )
          )
        ),
    };
  });

/**
 * A private temporary directory, removed with its contents at teardown.
 */
export const makeTemporaryDirectory: Effect.Effect<string, ListenerError, ResourceStack> = pipe(
  ResourceStack,
  Effect.flatMap((stack) =>
    stack.acquire(
      Effect.tryPromise({
        try: () => fs.mkdtemp(path.join(os.tmpdir(), 'wirepeer-')),
        catch: listenerError('bind', os.tmpdir()),
      }),
      (directory) =>
        Effect.tryPromise({
          try: () => fs.rm(directory, { recursive: true, force: true }),
          catch: listenerError('close', directory),
        })
    )
  )
);

export const makeUnixServer = (
  port: number = DEFAULT_PORT
): Effect.Effect<MockServer, ListenerError, ResourceStack | TimeoutBudget> =>
  pipe(
    makeTemporaryDirectory,
    Effect.flatMap((directory) => makeMockServer(ListenConfig.Unix({ directory, port })))
  );

export const makeTcpServer = (
  host: string = LOOPBACK
): Effect.Effect<MockServer, ListenerError, ResourceStack | TimeoutBudget> =>
  makeMockServer(ListenConfig.Tcp({ host, port: 0 }));
