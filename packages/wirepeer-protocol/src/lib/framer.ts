/**
 * Protocol Framer
 *
 * Stateless encoding and decoding of wire messages. Every decoder takes the
 * complete bytes of exactly one message and checks the declared length against
 * what is actually there; a mismatch is a FramingError, never a truncation.
 */

import { Either, Match, Option, pipe } from 'effect';
import { FramingError, framingError } from './errors';
import {
  SSL_REQUEST_CODE,
  authenticationOk,
  backendKeyData,
  emptyQueryResponse,
  parameterStatus,
  readyForQuery,
  simpleQuery,
  sslRequest,
  sslResponse,
  startupPacket,
  terminate,
  type BackendMessage,
  type ErrorField,
  type FrontendMessage,
  type SSLResponse,
  type StartupMessage,
  type TransactionStatus,
  type WireMessage,
} from './messages';

export const LENGTH_FIELD_BYTES = 4;
export const TAG_BYTES = 1;

/**
 * Length of a startup packet header: length word plus the version word.
 */
export const STARTUP_HEADER_BYTES = 8;

const NUL = Uint8Array.of(0);

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

// ============================================================================
// Byte Helpers
// ============================================================================

const view = (bytes: Uint8Array): DataView =>
  new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

export const concatBytes = (parts: ReadonlyArray<Uint8Array>): Uint8Array => {
  const out = new Uint8Array(parts.reduce((total, part) => total + part.length, 0));
  parts.reduce((offset, part) => {
    out.set(part, offset);
    return offset + part.length;
  }, 0);
  return out;
};

const uint16 = (value: number): Uint8Array => {
  const out = new Uint8Array(2);
  view(out).setUint16(0, value);
  return out;
};

const uint32 = (value: number): Uint8Array => {
  const out = new Uint8Array(4);
  view(out).setUint32(0, value);
  return out;
};

const tagByte = (tag: string): Uint8Array => Uint8Array.of(tag.charCodeAt(0));

const cstring = (value: string): Uint8Array => concatBytes([textEncoder.encode(value), NUL]);

const lengthPrefixed = (payload: ReadonlyArray<Uint8Array>): Uint8Array => {
  const body = concatBytes(payload);
  return concatBytes([uint32(LENGTH_FIELD_BYTES + body.length), body]);
};

const tagged = (tag: string, payload: ReadonlyArray<Uint8Array>): Uint8Array =>
  concatBytes([tagByte(tag), lengthPrefixed(payload)]);

// ============================================================================
// Encoding
// ============================================================================

const encodeParameters = (parameters: Readonly<Record<string, string>>): Uint8Array[] => [
  ...Object.entries(parameters).flatMap(([name, value]) => [cstring(name), cstring(value)]),
  NUL,
];

const encodeErrorFields = (fields: ReadonlyArray<ErrorField>): Uint8Array[] => [
  ...fields.flatMap((field) => [tagByte(field.code), cstring(field.value)]),
  NUL,
];

export const encode: (message: WireMessage) => Uint8Array = Match.type<WireMessage>().pipe(
  Match.tag('StartupPacket', (message) =>
    lengthPrefixed([
      uint16(message.major),
      uint16(message.minor),
      ...encodeParameters(message.parameters),
    ])
  ),
  Match.tag('SSLRequest', () =>
    lengthPrefixed([uint16(SSL_REQUEST_CODE.major), uint16(SSL_REQUEST_CODE.minor)])
  ),
  Match.tag('SSLResponse', (message) => tagByte(message.accepted ? 'S' : 'N')),
  Match.tag('AuthenticationOK', () => tagged('R', [uint32(0)])),
  Match.tag('ParameterStatus', (message) =>
    tagged('S', [cstring(message.name), cstring(message.value)])
  ),
  Match.tag('BackendKeyData', (message) =>
    tagged('K', [uint32(message.processId), uint32(message.secretKey)])
  ),
  Match.tag('ReadyForQuery', (message) => tagged('Z', [tagByte(message.status)])),
  Match.tag('EmptyQueryResponse', () => tagged('I', [])),
  Match.tag('ErrorResponse', (message) => tagged('E', encodeErrorFields(message.fields))),
  Match.tag('SimpleQuery', (message) => tagged('Q', [cstring(message.text)])),
  Match.tag('Terminate', () => tagged('X', [])),
  Match.exhaustive
);

export const encodeAll = (messages: ReadonlyArray<WireMessage>): Uint8Array =>
  concatBytes(messages.map(encode));

// ============================================================================
// Decoding Primitives
// ============================================================================

type Read<A> = Either.Either<readonly [A, number], FramingError>;

/**
 * Reads the big-endian length word at `offset`.
 */
export const readLength = (bytes: Uint8Array, offset = 0): Either.Either<number, FramingError> =>
  bytes.length < offset + LENGTH_FIELD_BYTES
    ? Either.left(framingError.truncated(offset + LENGTH_FIELD_BYTES, bytes.length))
    : Either.right(view(bytes).getUint32(offset));

const readCStringAt = (bytes: Uint8Array, offset: number): Read<string> => {
  const end = bytes.indexOf(0, offset);
  return end === -1
    ? Either.left(framingError.unexpected(`unterminated string at offset ${offset}`))
    : Either.right([textDecoder.decode(bytes.subarray(offset, end)), end + 1] as const);
};

const expectFrameLength = (
  bytes: Uint8Array,
  lengthOffset: number,
  minimumLength: number
): Either.Either<number, FramingError> =>
  pipe(
    readLength(bytes, lengthOffset),
    Either.filterOrLeft(
      (declared) => declared >= minimumLength,
      (declared) =>
        framingError.unexpected(
          `declared length ${declared} is below the minimum of ${minimumLength}`
        )
    ),
    Either.filterOrLeft(
      (declared) => lengthOffset + declared === bytes.length,
      (declared) => framingError.lengthMismatch(declared, bytes.length - lengthOffset)
    )
  );

const expectPayloadSize = (
  tag: string,
  payload: Uint8Array,
  expectedBytes: number
): Either.Either<Uint8Array, FramingError> =>
  payload.length === expectedBytes
    ? Either.right(payload)
    : Either.left(framingError.payloadSize(tag, expectedBytes, payload.length));

const expectConsumed =
  (tag: string, payload: Uint8Array) =>
  <A>([value, offset]: readonly [A, number]): Either.Either<A, FramingError> =>
    offset === payload.length
      ? Either.right(value)
      : Either.left(
          framingError.unexpected(
            `'${tag}' message has ${payload.length - offset} unexpected trailing bytes`
          )
        );

// ============================================================================
// Startup and Negotiation Decoding
// ============================================================================

const readParameters = (
  bytes: Uint8Array,
  offset: number,
  parameters: Readonly<Record<string, string>>
): Either.Either<Readonly<Record<string, string>>, FramingError> => {
  if (offset >= bytes.length) {
    return Either.left(framingError.unexpected('startup parameters are missing their terminator'));
  }
  if (bytes[offset] === 0) {
    return offset === bytes.length - 1
      ? Either.right(parameters)
      : Either.left(
          framingError.unexpected(
            `unexpected ${bytes.length - offset - 1} bytes after startup parameters`
          )
        );
  }
  return pipe(
    readCStringAt(bytes, offset),
    Either.flatMap(([name, valueOffset]) =>
      pipe(
        readCStringAt(bytes, valueOffset),
        Either.flatMap(([value, next]) =>
          readParameters(bytes, next, { ...parameters, [name]: value })
        )
      )
    )
  );
};

const decodeVersionedStartup = (bytes: Uint8Array): Either.Either<StartupMessage, FramingError> => {
  const major = view(bytes).getUint16(4);
  const minor = view(bytes).getUint16(6);

  if (major === SSL_REQUEST_CODE.major && minor === SSL_REQUEST_CODE.minor) {
    return bytes.length === STARTUP_HEADER_BYTES
      ? Either.right(sslRequest())
      : Either.left(
          framingError.unexpected(`SSLRequest must be exactly 8 bytes, got ${bytes.length}`)
        );
  }

  return pipe(
    readParameters(bytes, STARTUP_HEADER_BYTES, {}),
    Either.map((parameters) => startupPacket(parameters, { major, minor }))
  );
};

/**
 * Decodes a length-prefixed message sent before the protocol is established:
 * a StartupPacket or an SSLRequest.
 */
export const decodeStartup = (bytes: Uint8Array): Either.Either<StartupMessage, FramingError> =>
  pipe(
    expectFrameLength(bytes, 0, STARTUP_HEADER_BYTES),
    Either.flatMap(() => decodeVersionedStartup(bytes))
  );

export const decodeSslResponse = (bytes: Uint8Array): Either.Either<SSLResponse, FramingError> => {
  if (bytes.length !== 1) {
    return Either.left(
      framingError.unexpected(`SSL response must be a single byte, got ${bytes.length}`)
    );
  }
  return Match.value(String.fromCharCode(bytes[0] ?? 0)).pipe(
    Match.when('S', () => Either.right(sslResponse(true))),
    Match.when('N', () => Either.right(sslResponse(false))),
    Match.orElse((other) =>
      Either.left(framingError.unexpected(`unexpected SSL response byte ${JSON.stringify(other)}`))
    )
  );
};

// ============================================================================
// Tagged Message Decoding
// ============================================================================

const decodeTaggedFrame = (
  bytes: Uint8Array
): Either.Either<readonly [string, Uint8Array], FramingError> =>
  pipe(
    expectFrameLength(bytes, TAG_BYTES, LENGTH_FIELD_BYTES),
    Either.map(
      () =>
        [String.fromCharCode(bytes[0] ?? 0), bytes.subarray(TAG_BYTES + LENGTH_FIELD_BYTES)] as const
    )
  );

const decodeAuthentication = (payload: Uint8Array): Either.Either<BackendMessage, FramingError> =>
  pipe(
    expectPayloadSize('R', payload, 4),
    Either.flatMap((body) => {
      const code = view(body).getUint32(0);
      return code === 0
        ? Either.right(authenticationOk())
        : Either.left(framingError.unexpected(`unsupported authentication request code ${code}`));
    })
  );

const decodeParameterStatus = (payload: Uint8Array): Either.Either<BackendMessage, FramingError> =>
  pipe(
    readCStringAt(payload, 0),
    Either.flatMap(([name, valueOffset]) =>
      pipe(
        readCStringAt(payload, valueOffset),
        Either.map(([value, next]) => [parameterStatus(name, value), next] as const)
      )
    ),
    Either.flatMap(expectConsumed('S', payload))
  );

const decodeBackendKeyData = (payload: Uint8Array): Either.Either<BackendMessage, FramingError> =>
  pipe(
    expectPayloadSize('K', payload, 8),
    Either.map((body) => backendKeyData(view(body).getUint32(0), view(body).getUint32(4)))
  );

const isTransactionStatus = (status: string): status is TransactionStatus =>
  status === 'I' || status === 'T' || status === 'E';

const decodeReadyForQuery = (payload: Uint8Array): Either.Either<BackendMessage, FramingError> =>
  pipe(
    expectPayloadSize('Z', payload, 1),
    Either.map((body) => String.fromCharCode(body[0] ?? 0)),
    Either.filterOrLeft(isTransactionStatus, (status) =>
      framingError.unexpected(`invalid transaction status ${JSON.stringify(status)}`)
    ),
    Either.map(readyForQuery)
  );

const decodeEmptyQueryResponse = (
  payload: Uint8Array
): Either.Either<BackendMessage, FramingError> =>
  pipe(expectPayloadSize('I', payload, 0), Either.map(emptyQueryResponse));

const readErrorFields = (
  payload: Uint8Array,
  offset: number,
  fields: ReadonlyArray<ErrorField>
): Read<ReadonlyArray<ErrorField>> => {
  if (offset >= payload.length) {
    return Either.left(framingError.unexpected('error fields are missing their terminator'));
  }
  if (payload[offset] === 0) {
    return Either.right([fields, offset + 1] as const);
  }
  const code = String.fromCharCode(payload[offset] ?? 0);
  return pipe(
    readCStringAt(payload, offset + 1),
    Either.flatMap(([value, next]) => readErrorFields(payload, next, [...fields, { code, value }]))
  );
};

const decodeErrorResponse = (payload: Uint8Array): Either.Either<BackendMessage, FramingError> =>
  pipe(
    readErrorFields(payload, 0, []),
    Either.flatMap(expectConsumed('E', payload)),
    Either.map((fields): BackendMessage => ({ _tag: 'ErrorResponse', fields }))
  );

const decodeSimpleQuery = (payload: Uint8Array): Either.Either<FrontendMessage, FramingError> =>
  pipe(
    readCStringAt(payload, 0),
    Either.flatMap(expectConsumed('Q', payload)),
    Either.map(simpleQuery)
  );

const decodeTerminate = (payload: Uint8Array): Either.Either<FrontendMessage, FramingError> =>
  pipe(expectPayloadSize('X', payload, 0), Either.map(terminate));

type PayloadDecoders<A> = Partial<
  Record<string, (payload: Uint8Array) => Either.Either<A, FramingError>>
>;

const backendDecoders: PayloadDecoders<BackendMessage> = {
  R: decodeAuthentication,
  S: decodeParameterStatus,
  K: decodeBackendKeyData,
  Z: decodeReadyForQuery,
  I: decodeEmptyQueryResponse,
  E: decodeErrorResponse,
};

const frontendDecoders: PayloadDecoders<FrontendMessage> = {
  Q: decodeSimpleQuery,
  X: decodeTerminate,
};

const decodeWith =
  <A>(direction: string, decoders: PayloadDecoders<A>) =>
  (bytes: Uint8Array): Either.Either<A, FramingError> =>
    pipe(
      decodeTaggedFrame(bytes),
      Either.flatMap(([tag, payload]) =>
        pipe(
          Option.fromNullable(decoders[tag]),
          Option.match({
            onNone: () =>
              Either.left(
                framingError.unexpected(
                  `unknown ${direction} message type ${JSON.stringify(tag)}`
                )
              ),
            onSome: (decoder) => decoder(payload),
          })
        )
      )
    );

/**
 * Decodes one tagged server-to-client message.
 */
export const decodeBackend = decodeWith('backend', backendDecoders);

/**
 * Decodes one tagged client-to-server message.
 */
export const decodeFrontend = decodeWith('frontend', frontendDecoders);
