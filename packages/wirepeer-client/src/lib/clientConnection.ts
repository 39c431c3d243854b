/**
 * Client Connection
 *
 * Connects through the ClientLibrary and registers every handle and result on
 * the test's ResourceStack, so nothing outlives the test even when connecting
 * or a query fails.
 */

import { Duration, Effect, pipe } from 'effect';
import { ResourceStack, type ResourceStackService, TimeoutBudget } from '@wirepeer/harness';
import {
  ClientLibrary,
  ConnStatus,
  ExecStatus,
  type NativeConnection,
  type NativeResult,
} from './clientLibrary';
import { type ConnInfoParameters, formatConnInfo } from './connInfo';
import { ConnectionError, QueryError } from './errors';

export interface QueryResult {
  readonly query: string;
  readonly status: Effect.Effect<ExecStatus>;
  /**
   * Releases the result early; the ResourceStack skips it afterwards.
   */
  readonly clear: Effect.Effect<void>;
}

export interface ClientConnection {
  readonly conninfo: string;
  readonly execute: (query: string) => Effect.Effect<QueryResult, QueryError>;
  readonly close: Effect.Effect<void>;
}

interface Owned<A> {
  readonly native: A;
  readonly release: Effect.Effect<void>;
}

const own = <A>(native: A, release: Effect.Effect<void>): Effect.Effect<Owned<A>> =>
  pipe(
    Effect.once(release),
    Effect.map((once) => ({ native, release: once }))
  );

const FAILED_STATUSES: ReadonlyArray<ExecStatus> = [
  ExecStatus.PGRES_BAD_RESPONSE,
  ExecStatus.PGRES_FATAL_ERROR,
];

/**
 * Whole seconds left in the budget, never less than one, since a
 * connect_timeout of zero means wait forever.
 */
export const connectTimeoutSeconds: Effect.Effect<number, never, TimeoutBudget> = pipe(
  TimeoutBudget,
  Effect.flatMap((budget) => budget.remaining),
  Effect.map((remaining) => Math.max(Math.trunc(Duration.toSeconds(remaining)), 1))
);

const withConnectTimeout = (
  options: ConnInfoParameters
): Effect.Effect<ConnInfoParameters, never, TimeoutBudget> =>
  'connect_timeout' in options
    ? Effect.succeed(options)
    : pipe(
        connectTimeoutSeconds,
        Effect.map((seconds) => ({ ...options, connect_timeout: seconds }))
      );

const execute =
  (connection: NativeConnection, stack: ResourceStackService) =>
  (query: string): Effect.Effect<QueryResult, QueryError> =>
    pipe(
      stack.acquire(
        pipe(
          connection.exec(query),
          Effect.flatMap((result) => own<NativeResult>(result, result.clear))
        ),
        (owned) => owned.release
      ),
      Effect.flatMap((owned) =>
        pipe(
          owned.native.status,
          Effect.flatMap((status) =>
            FAILED_STATUSES.includes(status)
              ? pipe(
                  owned.native.errorMessage,
                  Effect.flatMap((message) =>
                    Effect.fail(new QueryError({ message, query, status }))
                  )
                )
              : Effect.succeed({ query, status: owned.native.status, clear: owned.release })
          )
        )
      )
    );

/**
 * Opens a connection, adding a connect_timeout derived from the remaining
 * budget unless one is given. The handle is registered for release before its
 * status is checked.
 */
export const connect = (
  options: ConnInfoParameters
): Effect.Effect<ClientConnection, ConnectionError, ClientLibrary | ResourceStack | TimeoutBudget> =>
  Effect.gen(function* () {
    const library = yield* ClientLibrary;
    const stack = yield* ResourceStack;
    const conninfo = formatConnInfo(yield* withConnectTimeout(options));

    const owned = yield* stack.acquire(
      pipe(
        library.connectdb(conninfo),
        Effect.flatMap((connection) => own(connection, connection.finish))
      ),
      (handle) => handle.release
    );

    return yield* pipe(
      owned.native.status,
      Effect.filterOrElse(
        (status) => status === ConnStatus.CONNECTION_OK,
        () =>
          pipe(
            owned.native.errorMessage,
            Effect.tap((message) =>
              Effect.logDebug('connection failed').pipe(Effect.annotateLogs({ conninfo, message }))
            ),
            Effect.flatMap((message) => Effect.fail(new ConnectionError({ message, conninfo })))
          )
      ),
      Effect.as({
        conninfo,
        execute: execute(owned.native, stack),
        close: owned.release,
      })
    );
  });

/**
 * Connects, runs `use` and closes the connection when `use` finishes.
 */
export const withConnection = <A, E, R>(
  options: ConnInfoParameters,
  use: (connection: ClientConnection) => Effect.Effect<A, E, R>
): Effect.Effect<
  A,
  E | ConnectionError,
  R | ClientLibrary | ResourceStack | TimeoutBudget
> =>
  pipe(
    connect(options),
    Effect.flatMap((connection) => pipe(use(connection), Effect.ensuring(connection.close)))
  );
