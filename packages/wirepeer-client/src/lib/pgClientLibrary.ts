/**
 * ClientLibrary on node-postgres
 *
 * Translates connection-string keywords into a `pg` client configuration and
 * exposes the client through the status-based ClientLibrary interface. The
 * socket is created here and handed to `pg`, so a connection that never
 * completed its handshake can be dropped without sending Terminate.
 */

import * as fs from 'node:fs/promises';
import * as net from 'node:net';
import type { ConnectionOptions } from 'node:tls';
import { Duration, Effect, Either, Layer, Match, Option, Ref, identity, pipe } from 'effect';
import { Client, type ClientConfig, type QueryResult } from 'pg';
import {
  ClientLibrary,
  ConnStatus,
  ExecStatus,
  type NativeConnection,
  type NativeResult,
} from './clientLibrary';
import { parseConnInfo } from './connInfo';

// ============================================================================
// Connection Settings
// ============================================================================

const SSL_MODES = ['disable', 'allow', 'prefer', 'require', 'verify-ca', 'verify-full'] as const;

export type SslMode = (typeof SSL_MODES)[number];

const isSslMode = (value: string): value is SslMode => SSL_MODES.some((mode) => mode === value);

export interface ConnectSettings {
  readonly host?: string;
  readonly hostaddr?: string;
  readonly port?: number;
  readonly dbname?: string;
  readonly user?: string;
  readonly password?: string;
  readonly connectTimeout?: number;
  readonly applicationName?: string;
  readonly sslmode: SslMode;
  readonly sslrootcert?: string;
  readonly sslcert?: string;
  readonly sslkey?: string;
}

const DEFAULT_SETTINGS: ConnectSettings = { sslmode: 'prefer' };

type OptionSetter = (
  settings: ConnectSettings,
  value: string,
  keyword: string
) => Either.Either<ConnectSettings, string>;

const INTEGER = /^\s*[+-]?\d+\s*$/;

const integerValue = (keyword: string, value: string): Either.Either<number, string> =>
  INTEGER.test(value)
    ? Either.right(Number.parseInt(value.trim(), 10))
    : Either.left(`invalid integer value "${value}" for connection option "${keyword}"`);

const nonEmpty = (value: string): string | undefined => (value === '' ? undefined : value);

const textOption =
  (set: (settings: ConnectSettings, value: string | undefined) => ConnectSettings): OptionSetter =>
  (settings, value) =>
    Either.right(set(settings, nonEmpty(value)));

const integerOption =
  (set: (settings: ConnectSettings, value: number) => ConnectSettings): OptionSetter =>
  (settings, value, keyword) =>
    value === ''
      ? Either.right(settings)
      : pipe(
          integerValue(keyword, value),
          Either.map((parsed) => set(settings, parsed))
        );

const optionSetters = new Map<string, OptionSetter>([
  ['host', textOption((settings, host) => ({ ...settings, host }))],
  ['hostaddr', textOption((settings, hostaddr) => ({ ...settings, hostaddr }))],
  ['port', integerOption((settings, port) => ({ ...settings, port }))],
  ['dbname', textOption((settings, dbname) => ({ ...settings, dbname }))],
  ['user', textOption((settings, user) => ({ ...settings, user }))],
  ['password', textOption((settings, password) => ({ ...settings, password }))],
  [
    'connect_timeout',
    integerOption((settings, connectTimeout) => ({ ...settings, connectTimeout })),
  ],
  [
    'application_name',
    textOption((settings, applicationName) => ({ ...settings, applicationName })),
  ],
  [
    'sslmode',
    (settings, value) =>
      isSslMode(value)
        ? Either.right({ ...settings, sslmode: value })
        : Either.left(`invalid sslmode value: "${value}"`),
  ],
  ['sslrootcert', textOption((settings, sslrootcert) => ({ ...settings, sslrootcert }))],
  ['sslcert', textOption((settings, sslcert) => ({ ...settings, sslcert }))],
  ['sslkey', textOption((settings, sslkey) => ({ ...settings, sslkey }))],
]);

const applyOption = (
  settings: ConnectSettings,
  [keyword, value]: readonly [string, string]
): Either.Either<ConnectSettings, string> =>
  pipe(
    Option.fromNullable(optionSetters.get(keyword)),
    Either.fromOption(() => `invalid connection option "${keyword}"`),
    Either.flatMap((setter) => setter(settings, value, keyword))
  );

export const settingsFromConnInfo = (conninfo: string): Either.Either<ConnectSettings, string> =>
  pipe(
    parseConnInfo(conninfo),
    Either.mapLeft((error) => error.message),
    Either.flatMap((parameters) =>
      Object.entries(parameters).reduce<Either.Either<ConnectSettings, string>>(
        (settings, entry) => Either.flatMap(settings, (current) => applyOption(current, entry)),
        Either.right(DEFAULT_SETTINGS)
      )
    )
  );

// ============================================================================
// TLS
// ============================================================================

const messageOf = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);

const readPemFile = (
  file: string | undefined,
  description: string
): Effect.Effect<string | undefined, string> =>
  file === undefined
    ? Effect.succeed(undefined)
    : Effect.tryPromise({
        try: () => fs.readFile(file, 'utf8'),
        catch: (cause) => `could not read ${description} file "${file}": ${messageOf(cause)}`,
      });

const clientCertificate = (settings: ConnectSettings) =>
  Effect.all({
    cert: readPemFile(settings.sslcert, 'certificate'),
    key: readPemFile(settings.sslkey, 'private key'),
  });

const verifiedTls = (settings: ConnectSettings) =>
  pipe(
    Effect.all({
      certificate: clientCertificate(settings),
      ca: readPemFile(settings.sslrootcert, 'root certificate'),
    }),
    Effect.map(
      ({ certificate, ca }): ConnectionOptions => ({ ...certificate, ca, rejectUnauthorized: true })
    )
  );

// pg cannot fall back between plaintext and TLS, so the opportunistic modes
// connect without TLS.
const tlsOptions = (
  settings: ConnectSettings
): Effect.Effect<false | ConnectionOptions, string> =>
  Match.value(settings.sslmode).pipe(
    Match.whenOr('disable', 'allow', 'prefer', () => Effect.succeed<false | ConnectionOptions>(false)),
    Match.when('require', () =>
      pipe(
        clientCertificate(settings),
        Effect.map((certificate): ConnectionOptions => ({ ...certificate, rejectUnauthorized: false }))
      )
    ),
    Match.when('verify-ca', () =>
      pipe(
        verifiedTls(settings),
        Effect.map((options): ConnectionOptions => ({
          ...options,
          checkServerIdentity: () => undefined,
        }))
      )
    ),
    Match.when('verify-full', () =>
      pipe(
        verifiedTls(settings),
        Effect.map((options): ConnectionOptions => ({
          ...options,
          servername: settings.host ?? settings.hostaddr,
        }))
      )
    ),
    Match.exhaustive
  );

/**
 * The `pg` configuration for a connection string, minus the socket. `hostaddr`
 * is dialled when present; `host` then only names the server for TLS.
 */
export const clientConfigFromConnInfo = (conninfo: string): Effect.Effect<ClientConfig, string> =>
  pipe(
    settingsFromConnInfo(conninfo),
    Effect.flatMap((settings) =>
      pipe(
        tlsOptions(settings),
        Effect.map(
          (ssl): ClientConfig => ({
            host: settings.hostaddr ?? settings.host,
            port: settings.port,
            database: settings.dbname,
            user: settings.user,
            password: settings.password,
            application_name: settings.applicationName,
            connectionTimeoutMillis:
              settings.connectTimeout !== undefined && settings.connectTimeout > 0
                ? settings.connectTimeout * 1000
                : undefined,
            ssl,
          })
        )
      )
    )
  );

// ============================================================================
// Results
// ============================================================================

const makeNativeResult = (status: ExecStatus, errorMessage: string): Effect.Effect<NativeResult> =>
  pipe(
    Ref.make(false),
    Effect.map((cleared) => ({
      status: pipe(
        Ref.get(cleared),
        Effect.map((isCleared) => (isCleared ? ExecStatus.PGRES_FATAL_ERROR : status))
      ),
      errorMessage: Effect.succeed(errorMessage),
      clear: Ref.set(cleared, true),
    }))
  );

const classifyResult = (result: QueryResult): ExecStatus =>
  result.fields.length > 0
    ? ExecStatus.PGRES_TUPLES_OK
    : !result.command
      ? ExecStatus.PGRES_EMPTY_QUERY
      : ExecStatus.PGRES_COMMAND_OK;

// ============================================================================
// Connections
// ============================================================================

interface ConnectionState {
  readonly status: Ref.Ref<ConnStatus>;
  readonly errorMessage: Ref.Ref<string>;
}

// client.end() waits for the server to close its side.
const FINISH_GRACE = Duration.seconds(5);

const runQuery = (
  client: Client,
  state: ConnectionState,
  query: string
): Effect.Effect<NativeResult> =>
  pipe(
    Effect.tryPromise({ try: () => client.query(query), catch: identity }),
    Effect.match({
      onFailure: (error) => ({ status: ExecStatus.PGRES_FATAL_ERROR, message: messageOf(error) }),
      onSuccess: (result) => ({ status: classifyResult(result), message: '' }),
    }),
    Effect.tap(({ status, message }) =>
      status === ExecStatus.PGRES_FATAL_ERROR ? Ref.set(state.errorMessage, message) : Effect.void
    ),
    Effect.flatMap(({ status, message }) => makeNativeResult(status, message))
  );

const endClient = (client: Client): Effect.Effect<void> =>
  pipe(
    Effect.tryPromise({ try: () => client.end(), catch: identity }),
    Effect.timeout(FINISH_GRACE),
    Effect.catchAll((error) => Effect.logWarning('connection did not shut down cleanly', error))
  );

const makeNativeConnection = (
  client: Client,
  socket: net.Socket,
  state: ConnectionState
): NativeConnection => ({
  status: Ref.get(state.status),
  errorMessage: Ref.get(state.errorMessage),
  exec: (query) =>
    pipe(
      Ref.get(state.status),
      Effect.flatMap((status) =>
        status === ConnStatus.CONNECTION_OK
          ? runQuery(client, state, query)
          : makeNativeResult(ExecStatus.PGRES_FATAL_ERROR, 'connection is not open')
      )
    ),
  finish: pipe(
    Ref.getAndSet(state.status, ConnStatus.CONNECTION_BAD),
    Effect.flatMap((status) => (status === ConnStatus.CONNECTION_OK ? endClient(client) : Effect.void)),
    Effect.andThen(Effect.sync(() => socket.destroy()))
  ),
});

const makeConnectionState = (errorMessage: string) =>
  Effect.all({
    status: Ref.make<ConnStatus>(ConnStatus.CONNECTION_BAD),
    errorMessage: Ref.make(errorMessage),
  });

const rejectedConnection = (errorMessage: string): Effect.Effect<NativeConnection> =>
  pipe(
    makeConnectionState(errorMessage),
    Effect.map(
      (state): NativeConnection => ({
        status: Ref.get(state.status),
        errorMessage: Ref.get(state.errorMessage),
        exec: () => makeNativeResult(ExecStatus.PGRES_FATAL_ERROR, 'connection is not open'),
        finish: Effect.void,
      })
    )
  );

const openConnection = (config: ClientConfig): Effect.Effect<NativeConnection> =>
  pipe(
    makeConnectionState(''),
    Effect.flatMap((state) =>
      pipe(
        Effect.sync(() => {
          const socket = new net.Socket();
          const client = new Client({ ...config, stream: () => socket });
          client.on('error', (error) => {
            Effect.runSync(Ref.set(state.errorMessage, error.message));
          });
          return { client, socket };
        }),
        Effect.tap(({ client }) =>
          pipe(
            Effect.tryPromise({ try: () => client.connect(), catch: identity }),
            Effect.matchEffect({
              onFailure: (error) => Ref.set(state.errorMessage, messageOf(error)),
              onSuccess: () => Ref.set(state.status, ConnStatus.CONNECTION_OK),
            })
          )
        ),
        Effect.map(({ client, socket }) => makeNativeConnection(client, socket, state))
      )
    )
  );

export const connectdb = (conninfo: string): Effect.Effect<NativeConnection> =>
  pipe(
    clientConfigFromConnInfo(conninfo),
    Effect.matchEffect({ onFailure: rejectedConnection, onSuccess: openConnection })
  );

export const PgClientLibraryLive = Layer.succeed(ClientLibrary, { connectdb });
