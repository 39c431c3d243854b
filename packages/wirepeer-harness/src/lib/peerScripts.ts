/**
 * Peer Scripts
 *
 * Building blocks for mock-server handlers. Each step reads exactly one message
 * (or sends a fixed sequence) and fails with a FramingError when the client
 * deviates from the expected exchange.
 */

import { Effect, Either, pipe } from 'effect';
import type { ReadonlyDeep } from 'type-fest';
import {
  type FrontendMessage,
  type FramingError,
  type SimpleQuery,
  type StartupMessage,
  type StartupPacket,
  LENGTH_FIELD_BYTES,
  PROTOCOL_VERSION_3,
  STARTUP_HEADER_BYTES,
  TAG_BYTES,
  authenticationOk,
  backendKeyData,
  concatBytes,
  decodeFrontend,
  decodeStartup,
  framingError,
  parameterStatus,
  readLength,
  readyForQuery,
  sslResponse,
} from '@wirepeer/protocol';
import type { PeerIoError, TimeoutError } from './errors';
import type { PeerConnection } from './peerConnection';

export type ScriptError = FramingError | PeerIoError | TimeoutError;

// Largest startup packet a PostgreSQL server will read.
export const MAX_STARTUP_PACKET_LENGTH = 10000;

const readBody = (
  peer: PeerConnection,
  header: Uint8Array,
  offset: number,
  minimum: number,
  maximum: number
): Effect.Effect<Uint8Array, ScriptError> =>
  pipe(
    readLength(header, offset),
    Either.filterOrLeft(
      (length) => length >= minimum && length <= maximum,
      (length) =>
        framingError.unexpected(`declared length ${length} is outside ${minimum}..${maximum}`)
    ),
    Effect.flatMap((length) => peer.recvExact(length - LENGTH_FIELD_BYTES)),
    Effect.map((body) => concatBytes([header, body]))
  );

// ============================================================================
// Reading
// ============================================================================

export const readStartupMessage = (
  peer: PeerConnection
): Effect.Effect<StartupMessage, ScriptError> =>
  pipe(
    peer.recvExact(LENGTH_FIELD_BYTES),
    Effect.flatMap((header) =>
      readBody(peer, header, 0, STARTUP_HEADER_BYTES, MAX_STARTUP_PACKET_LENGTH)
    ),
    Effect.flatMap(decodeStartup)
  );

export const readFrontendMessage = (
  peer: PeerConnection
): Effect.Effect<FrontendMessage, ScriptError> =>
  pipe(
    peer.recvExact(TAG_BYTES + LENGTH_FIELD_BYTES),
    Effect.flatMap((header) =>
      readBody(peer, header, TAG_BYTES, LENGTH_FIELD_BYTES, Number.MAX_SAFE_INTEGER)
    ),
    Effect.flatMap(decodeFrontend)
  );

// ============================================================================
// Expectations
// ============================================================================

export const expectStartupPacket = (
  peer: PeerConnection,
  version: Readonly<{ major: number; minor: number }> = PROTOCOL_VERSION_3
): Effect.Effect<StartupPacket, ScriptError> =>
  pipe(
    readStartupMessage(peer),
    Effect.flatMap((message) =>
      message._tag === 'StartupPacket'
        ? Effect.succeed(message)
        : Effect.fail(framingError.unexpected(`expected a startup packet, received ${message._tag}`))
    ),
    Effect.filterOrFail(
      (packet) => packet.major === version.major && packet.minor === version.minor,
      (packet) =>
        framingError.unexpected(
          `expected protocol version ${version.major}.${version.minor}, received ${packet.major}.${packet.minor}`
        )
    )
  );

export const expectSslRequest = (peer: PeerConnection): Effect.Effect<void, ScriptError> =>
  pipe(
    readStartupMessage(peer),
    Effect.filterOrFail(
      (message) => message._tag === 'SSLRequest',
      (message) => framingError.unexpected(`expected an SSLRequest, received ${message._tag}`)
    ),
    Effect.asVoid
  );

export const acceptSslRequest = (peer: PeerConnection): Effect.Effect<void, ScriptError> =>
  pipe(expectSslRequest(peer), Effect.andThen(peer.send([sslResponse(true)])));

export const refuseSslRequest = (peer: PeerConnection): Effect.Effect<void, ScriptError> =>
  pipe(expectSslRequest(peer), Effect.andThen(peer.send([sslResponse(false)])));

/**
 * Reads a simple query. When `text` is given the query must match it exactly.
 */
export const expectQuery = (
  peer: PeerConnection,
  text?: string
): Effect.Effect<SimpleQuery, ScriptError> =>
  pipe(
    readFrontendMessage(peer),
    Effect.flatMap((message) =>
      message._tag === 'SimpleQuery'
        ? Effect.succeed(message)
        : Effect.fail(framingError.unexpected(`expected a query, received ${message._tag}`))
    ),
    Effect.filterOrFail(
      (query) => text === undefined || query.text === text,
      (query) =>
        framingError.unexpected(
          `expected query ${JSON.stringify(text)}, received ${JSON.stringify(query.text)}`
        )
    )
  );

export const expectTerminate = (peer: PeerConnection): Effect.Effect<void, ScriptError> =>
  pipe(
    readFrontendMessage(peer),
    Effect.filterOrFail(
      (message) => message._tag === 'Terminate',
      (message) => framingError.unexpected(`expected Terminate, received ${message._tag}`)
    ),
    Effect.asVoid
  );

export const expectClosed = (peer: PeerConnection): Effect.Effect<void, ScriptError> =>
  pipe(
    peer.recv(1),
    Effect.filterOrFail(
      (bytes) => bytes.length === 0,
      () => framingError.unexpected('client sent unexpected data')
    ),
    Effect.asVoid
  );

// ============================================================================
// Responses
// ============================================================================

export type StartupLitanyOptions = ReadonlyDeep<{
  parameters?: Record<string, string>;
  processId?: number;
  secretKey?: number;
}>;

export const DEFAULT_SERVER_PARAMETERS: Readonly<Record<string, string>> = {
  client_encoding: 'UTF-8',
  DateStyle: 'ISO, MDY',
};

/**
 * Sends what a server says after accepting a startup packet without a password:
 * AuthenticationOk, ParameterStatus for each parameter, BackendKeyData and
 * ReadyForQuery.
 */
export const sendStartupLitany = (
  peer: PeerConnection,
  options: StartupLitanyOptions = {}
): Effect.Effect<void, ScriptError> =>
  peer.send([
    authenticationOk(),
    ...Object.entries(options.parameters ?? DEFAULT_SERVER_PARAMETERS).map(([name, value]) =>
      parameterStatus(name, value)
    ),
    backendKeyData(options.processId ?? 1234, options.secretKey ?? 1234),
    readyForQuery('I'),
  ]);
