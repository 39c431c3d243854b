/**
 * Wire Messages
 *
 * Schemas for the subset of the PostgreSQL v3 protocol a scripted peer needs:
 * the startup/negotiation handshake and the simple query exchange.
 */

import { Schema } from 'effect';

// ============================================================================
// Protocol Constants
// ============================================================================

export const PROTOCOL_VERSION_3 = { major: 3, minor: 0 } as const;

/**
 * The version word of an SSLRequest (80877103 once packed as major<<16|minor).
 */
export const SSL_REQUEST_CODE = { major: 1234, minor: 5679 } as const;

// ============================================================================
// Field Types
// ============================================================================

export const UInt16 = Schema.Number.pipe(Schema.int(), Schema.between(0, 0xffff));

export const UInt32 = Schema.Number.pipe(Schema.int(), Schema.between(0, 0xffffffff));

// ============================================================================
// Startup and Negotiation Messages
// ============================================================================

export const StartupPacket = Schema.TaggedStruct('StartupPacket', {
  major: UInt16,
  minor: UInt16,
  parameters: Schema.Record({ key: Schema.String, value: Schema.String }),
});

export const SSLRequest = Schema.TaggedStruct('SSLRequest', {});

/**
 * Single unframed byte: 'S' accepts the upgrade, 'N' refuses it.
 */
export const SSLResponse = Schema.TaggedStruct('SSLResponse', {
  accepted: Schema.Boolean,
});

// ============================================================================
// Server-to-Client Messages
// ============================================================================

export const AuthenticationOK = Schema.TaggedStruct('AuthenticationOK', {});

export const ParameterStatus = Schema.TaggedStruct('ParameterStatus', {
  name: Schema.String,
  value: Schema.String,
});

export const BackendKeyData = Schema.TaggedStruct('BackendKeyData', {
  processId: UInt32,
  secretKey: UInt32,
});

export const TransactionStatus = Schema.Literal('I', 'T', 'E');

export const ReadyForQuery = Schema.TaggedStruct('ReadyForQuery', {
  status: TransactionStatus,
});

export const EmptyQueryResponse = Schema.TaggedStruct('EmptyQueryResponse', {});

export const ErrorField = Schema.Struct({
  code: Schema.String,
  value: Schema.String,
});

export const ErrorResponse = Schema.TaggedStruct('ErrorResponse', {
  fields: Schema.Array(ErrorField),
});

// ============================================================================
// Client-to-Server Messages
// ============================================================================

export const SimpleQuery = Schema.TaggedStruct('SimpleQuery', {
  text: Schema.String,
});

export const Terminate = Schema.TaggedStruct('Terminate', {});

// ============================================================================
// Union Types
// ============================================================================

export const StartupMessage = Schema.Union(StartupPacket, SSLRequest);

export const BackendMessage = Schema.Union(
  AuthenticationOK,
  ParameterStatus,
  BackendKeyData,
  ReadyForQuery,
  EmptyQueryResponse,
  ErrorResponse
);

export const FrontendMessage = Schema.Union(SimpleQuery, Terminate);

export const WireMessage = Schema.Union(
  StartupPacket,
  SSLRequest,
  SSLResponse,
  AuthenticationOK,
  ParameterStatus,
  BackendKeyData,
  ReadyForQuery,
  EmptyQueryResponse,
  ErrorResponse,
  SimpleQuery,
  Terminate
);

export type StartupPacket = Schema.Schema.Type<typeof StartupPacket>;
export type SSLRequest = Schema.Schema.Type<typeof SSLRequest>;
export type SSLResponse = Schema.Schema.Type<typeof SSLResponse>;
export type AuthenticationOK = Schema.Schema.Type<typeof AuthenticationOK>;
export type ParameterStatus = Schema.Schema.Type<typeof ParameterStatus>;
export type BackendKeyData = Schema.Schema.Type<typeof BackendKeyData>;
export type TransactionStatus = Schema.Schema.Type<typeof TransactionStatus>;
export type ReadyForQuery = Schema.Schema.Type<typeof ReadyForQuery>;
export type EmptyQueryResponse = Schema.Schema.Type<typeof EmptyQueryResponse>;
export type ErrorField = Schema.Schema.Type<typeof ErrorField>;
export type ErrorResponse = Schema.Schema.Type<typeof ErrorResponse>;
export type SimpleQuery = Schema.Schema.Type<typeof SimpleQuery>;
export type Terminate = Schema.Schema.Type<typeof Terminate>;
export type StartupMessage = Schema.Schema.Type<typeof StartupMessage>;
export type BackendMessage = Schema.Schema.Type<typeof BackendMessage>;
export type FrontendMessage = Schema.Schema.Type<typeof FrontendMessage>;
export type WireMessage = Schema.Schema.Type<typeof WireMessage>;

// ============================================================================
// Message Constructors
// ============================================================================

export const startupPacket = (
  parameters: Readonly<Record<string, string>> = {},
  version: Readonly<{ major: number; minor: number }> = PROTOCOL_VERSION_3
): StartupPacket =>
  StartupPacket.make({ major: version.major, minor: version.minor, parameters });

export const sslRequest = (): SSLRequest => ({ _tag: 'SSLRequest' });

export const sslResponse = (accepted: boolean): SSLResponse => ({ _tag: 'SSLResponse', accepted });

export const authenticationOk = (): AuthenticationOK => ({ _tag: 'AuthenticationOK' });

export const parameterStatus = (name: string, value: string): ParameterStatus => ({
  _tag: 'ParameterStatus',
  name,
  value,
});

/**
 * Throws when either value does not fit an unsigned 32-bit field.
 */
export const backendKeyData = (processId: number, secretKey: number): BackendKeyData =>
  BackendKeyData.make({ processId, secretKey });

export const readyForQuery = (status: TransactionStatus = 'I'): ReadyForQuery => ({
  _tag: 'ReadyForQuery',
  status,
});

export const emptyQueryResponse = (): EmptyQueryResponse => ({ _tag: 'EmptyQueryResponse' });

/**
 * Builds an ErrorResponse with the severity, SQLSTATE and message fields a client
 * needs to report a failure.
 */
export const errorResponse = (
  message: string,
  options?: Readonly<{ severity?: string; sqlState?: string }>
): ErrorResponse => ({
  _tag: 'ErrorResponse',
  fields: [
    { code: 'S', value: options?.severity ?? 'FATAL' },
    { code: 'C', value: options?.sqlState ?? '08000' },
    { code: 'M', value: message },
  ],
});

export const simpleQuery = (text: string): SimpleQuery => ({ _tag: 'SimpleQuery', text });

export const terminate = (): Terminate => ({ _tag: 'Terminate' });
