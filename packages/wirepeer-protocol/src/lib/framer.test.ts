import { describe, expect, it } from '@effect/vitest';
import { Either, identity } from 'effect';
import { FramingError } from './errors';
import {
  decodeBackend,
  decodeFrontend,
  decodeSslResponse,
  decodeStartup,
  encode,
  encodeAll,
  readLength,
} from './framer';
import {
  authenticationOk,
  backendKeyData,
  emptyQueryResponse,
  errorResponse,
  parameterStatus,
  readyForQuery,
  simpleQuery,
  sslRequest,
  sslResponse,
  startupPacket,
  terminate,
} from './messages';

const bytesOf = (...values: ReadonlyArray<number>) => Uint8Array.from(values);

const ascii = (text: string) => Array.from(text, (char) => char.charCodeAt(0));

const expectFramingError = <A>(result: Either.Either<A, FramingError>): FramingError =>
  Either.match(result, {
    onLeft: identity,
    onRight: (value) => {
      throw new Error(`expected a FramingError, decoded ${JSON.stringify(value)}`);
    },
  });

describe('Protocol Framer', () => {
  describe('encode', () => {
    it('should encode the SSLRequest sentinel version', () => {
      expect(encode(sslRequest())).toEqual(bytesOf(0, 0, 0, 8, 0x04, 0xd2, 0x16, 0x2f));
    });

    it('should encode SSL responses as a single unframed byte', () => {
      expect(encode(sslResponse(true))).toEqual(bytesOf(0x53));
      expect(encode(sslResponse(false))).toEqual(bytesOf(0x4e));
    });

    it('should encode a startup packet with protocol version 3.0', () => {
      const encoded = encode(startupPacket({ user: 'postgres' }));

      expect(encoded).toEqual(
        bytesOf(0, 0, 0, 23, 0, 3, 0, 0, ...ascii('user'), 0, ...ascii('postgres'), 0, 0)
      );
    });

    it('should encode fixed-size server messages', () => {
      expect(encode(authenticationOk())).toEqual(bytesOf(0x52, 0, 0, 0, 8, 0, 0, 0, 0));
      expect(encode(backendKeyData(1234, 1234))).toEqual(
        bytesOf(0x4b, 0, 0, 0, 12, 0, 0, 0x04, 0xd2, 0, 0, 0x04, 0xd2)
      );
      expect(encode(readyForQuery('I'))).toEqual(bytesOf(0x5a, 0, 0, 0, 5, 0x49));
      expect(encode(emptyQueryResponse())).toEqual(bytesOf(0x49, 0, 0, 0, 4));
    });

    it('should count both strings of a ParameterStatus in its length', () => {
      const encoded = encode(parameterStatus('DateStyle', 'ISO, MDY'));

      expect(encoded[0]).toBe(0x53);
      expect(Either.getOrThrow(readLength(encoded, 1))).toBe(4 + 10 + 9);
      expect(encoded.length).toBe(1 + 4 + 10 + 9);
    });

    it('should encode client messages', () => {
      expect(encode(simpleQuery(''))).toEqual(bytesOf(0x51, 0, 0, 0, 5, 0));
      expect(encode(terminate())).toEqual(bytesOf(0x58, 0, 0, 0, 4));
    });

    it('should reject integer fields that do not fit their width', () => {
      expect(() => backendKeyData(-1, 1)).toThrow();
      expect(() => backendKeyData(1, 2 ** 33)).toThrow();
      expect(() => backendKeyData(1.5, 1)).toThrow();
      expect(() => startupPacket({}, { major: 0x10000, minor: 0 })).toThrow();
    });

    it('should encode the widest values each field allows', () => {
      expect(encode(backendKeyData(0xffffffff, 0))).toEqual(
        bytesOf(0x4b, 0, 0, 0, 12, 0xff, 0xff, 0xff, 0xff, 0, 0, 0, 0)
      );
      expect(encode(startupPacket({}, { major: 0xffff, minor: 0 }))).toEqual(
        bytesOf(0, 0, 0, 9, 0xff, 0xff, 0, 0, 0)
      );
    });

    it('should concatenate a sequence of messages', () => {
      expect(encodeAll([emptyQueryResponse(), readyForQuery('I')])).toEqual(
        bytesOf(0x49, 0, 0, 0, 4, 0x5a, 0, 0, 0, 5, 0x49)
      );
    });
  });

  describe('decodeStartup', () => {
    it('should decode a startup packet with its parameters', () => {
      const packet = startupPacket({ user: 'postgres', database: 'app' });

      expect(Either.getOrThrow(decodeStartup(encode(packet)))).toEqual(packet);
    });

    it('should recognize an SSLRequest', () => {
      expect(Either.getOrThrow(decodeStartup(encode(sslRequest())))).toEqual(sslRequest());
    });

    it('should reject a declared length longer than the bytes available', () => {
      const error = expectFramingError(decodeStartup(bytesOf(0, 0, 0, 9, 0, 3, 0, 0)));

      expect(error.declaredLength).toBe(9);
      expect(error.availableLength).toBe(8);
    });

    it('should reject trailing bytes beyond the declared length', () => {
      const encoded = encode(startupPacket({ user: 'postgres' }));
      const padded = Uint8Array.from([...encoded, 0]);

      const error = expectFramingError(decodeStartup(padded));

      expect(error.declaredLength).toBe(23);
      expect(error.availableLength).toBe(24);
    });

    it('should reject an SSLRequest that carries a payload', () => {
      const error = expectFramingError(
        decodeStartup(bytesOf(0, 0, 0, 9, 0x04, 0xd2, 0x16, 0x2f, 0))
      );

      expect(error.message).toBe('SSLRequest must be exactly 8 bytes, got 9');
    });

    it('should reject startup parameters without a terminator', () => {
      const error = expectFramingError(
        decodeStartup(bytesOf(0, 0, 0, 13, 0, 3, 0, 0, ...ascii('user'), 0))
      );

      expect(error.message).toBe('unterminated string at offset 13');
    });
  });

  describe('decodeSslResponse', () => {
    it('should decode acceptance and refusal', () => {
      expect(Either.getOrThrow(decodeSslResponse(bytesOf(0x53)))).toEqual(sslResponse(true));
      expect(Either.getOrThrow(decodeSslResponse(bytesOf(0x4e)))).toEqual(sslResponse(false));
    });

    it('should reject any other byte', () => {
      expect(expectFramingError(decodeSslResponse(bytesOf(0x45))).message).toBe(
        'unexpected SSL response byte "E"'
      );
    });

    it('should reject anything but a single byte', () => {
      expect(expectFramingError(decodeSslResponse(bytesOf(0x53, 0x53))).message).toBe(
        'SSL response must be a single byte, got 2'
      );
    });
  });

  describe('decodeBackend', () => {
    it('should decode the messages it encodes', () => {
      const messages = [
        authenticationOk(),
        parameterStatus('client_encoding', 'UTF-8'),
        backendKeyData(4321, 8765),
        readyForQuery('T'),
        emptyQueryResponse(),
        errorResponse('something is wrong'),
      ];

      messages.forEach((message) => {
        expect(Either.getOrThrow(decodeBackend(encode(message)))).toEqual(message);
      });
    });

    it('should reject a declared length that exceeds the available bytes', () => {
      const error = expectFramingError(decodeBackend(bytesOf(0x5a, 0, 0, 0, 6, 0x49)));

      expect(error.declaredLength).toBe(6);
      expect(error.availableLength).toBe(5);
    });

    it('should reject a declared length shorter than the bytes available', () => {
      const error = expectFramingError(decodeBackend(bytesOf(0x49, 0, 0, 0, 4, 0x00)));

      expect(error.declaredLength).toBe(4);
      expect(error.availableLength).toBe(5);
    });

    it('should reject a declared length below the length word itself', () => {
      const error = expectFramingError(decodeBackend(bytesOf(0x49, 0, 0, 0, 3)));

      expect(error.message).toBe('declared length 3 is below the minimum of 4');
    });

    it('should reject a header cut short', () => {
      const error = expectFramingError(decodeBackend(bytesOf(0x5a, 0, 0)));

      expect(error.message).toBe('message truncated: expected at least 5 bytes, got 3');
    });

    it('should reject a fixed-size message with the wrong payload size', () => {
      const error = expectFramingError(decodeBackend(bytesOf(0x4b, 0, 0, 0, 8, 0, 0, 0, 1)));

      expect(error.message).toBe("'K' message carries 4 payload bytes, expected 8");
    });

    it('should reject an invalid transaction status', () => {
      const error = expectFramingError(decodeBackend(bytesOf(0x5a, 0, 0, 0, 5, 0x51)));

      expect(error.message).toBe('invalid transaction status "Q"');
    });

    it('should reject authentication requests other than OK', () => {
      const error = expectFramingError(decodeBackend(bytesOf(0x52, 0, 0, 0, 8, 0, 0, 0, 3)));

      expect(error.message).toBe('unsupported authentication request code 3');
    });

    it('should reject unknown message types', () => {
      const error = expectFramingError(decodeBackend(bytesOf(0x57, 0, 0, 0, 4)));

      expect(error.message).toBe('unknown backend message type "W"');
    });
  });

  describe('decodeFrontend', () => {
    it('should decode an empty simple query', () => {
      expect(Either.getOrThrow(decodeFrontend(bytesOf(0x51, 0, 0, 0, 5, 0)))).toEqual(
        simpleQuery('')
      );
    });

    it('should decode a query with text', () => {
      expect(Either.getOrThrow(decodeFrontend(encode(simpleQuery('SELECT 1'))))).toEqual(
        simpleQuery('SELECT 1')
      );
    });

    it('should decode Terminate', () => {
      expect(Either.getOrThrow(decodeFrontend(bytesOf(0x58, 0, 0, 0, 4)))).toEqual(terminate());
    });

    it('should reject bytes after the query string', () => {
      const error = expectFramingError(decodeFrontend(bytesOf(0x51, 0, 0, 0, 6, 0, 0)));

      expect(error.message).toBe("'Q' message has 1 unexpected trailing bytes");
    });

    it('should not accept server messages', () => {
      const error = expectFramingError(decodeFrontend(encode(emptyQueryResponse())));

      expect(error.message).toBe('unknown frontend message type "I"');
    });
  });
});
