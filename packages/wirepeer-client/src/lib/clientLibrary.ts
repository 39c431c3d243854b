/**
 * Client Library Boundary
 *
 * The handful of calls the test suite makes into a PostgreSQL client library:
 * open a connection from a connection string, inspect its status and error
 * message, run a simple query and release what was acquired. Errors are
 * reported through statuses rather than failures, the way libpq does.
 */

import { Context, type Effect } from 'effect';

export const ConnStatus = {
  CONNECTION_OK: 0,
  CONNECTION_BAD: 1,
} as const;

export type ConnStatus = (typeof ConnStatus)[keyof typeof ConnStatus];

export const ExecStatus = {
  PGRES_EMPTY_QUERY: 0,
  PGRES_COMMAND_OK: 1,
  PGRES_TUPLES_OK: 2,
  PGRES_COPY_OUT: 3,
  PGRES_COPY_IN: 4,
  PGRES_BAD_RESPONSE: 5,
  PGRES_NONFATAL_ERROR: 6,
  PGRES_FATAL_ERROR: 7,
} as const;

export type ExecStatus = (typeof ExecStatus)[keyof typeof ExecStatus];

export interface NativeResult {
  readonly status: Effect.Effect<ExecStatus>;
  readonly errorMessage: Effect.Effect<string>;
  readonly clear: Effect.Effect<void>;
}

export interface NativeConnection {
  readonly status: Effect.Effect<ConnStatus>;
  readonly errorMessage: Effect.Effect<string>;
  readonly exec: (query: string) => Effect.Effect<NativeResult>;
  readonly finish: Effect.Effect<void>;
}

export interface ClientLibraryService {
  /**
   * Always yields a handle, even when connecting failed; the handle's status
   * says which.
   */
  readonly connectdb: (conninfo: string) => Effect.Effect<NativeConnection>;
}

export class ClientLibrary extends Context.Tag('ClientLibrary')<
  ClientLibrary,
  ClientLibraryService
>() {}
