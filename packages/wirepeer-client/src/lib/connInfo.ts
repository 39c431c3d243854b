/**
 * Connection Strings
 *
 * The `keyword=value` syntax PostgreSQL client libraries accept. Values are
 * backslash-escaped and single-quoted only where the grammar requires it.
 */

import { Either, pipe } from 'effect';
import type { ConnInfoValue } from '@wirepeer/harness';
import { ConnInfoError } from './errors';

export type ConnInfoParameters = Readonly<Record<string, ConnInfoValue>>;

// ============================================================================
// Formatting
// ============================================================================

const NEEDS_QUOTES = /\s/;

export const escapeConnInfoValue = (value: string): string => {
  const escaped = value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
  return escaped.length === 0 || NEEDS_QUOTES.test(escaped) ? `'${escaped}'` : escaped;
};

/**
 * Renders parameters in insertion order, separated by single spaces.
 */
export const formatConnInfo = (parameters: ConnInfoParameters): string =>
  Object.entries(parameters)
    .map(([keyword, value]) => `${keyword}=${escapeConnInfoValue(String(value))}`)
    .join(' ');

// ============================================================================
// Parsing
// ============================================================================

type Read<A> = Either.Either<readonly [A, number], ConnInfoError>;

const isSpace = (char: string | undefined): boolean =>
  char !== undefined && /^[ \t\n\v\f\r]$/.test(char);

const skipSpaces = (text: string, position: number): number =>
  isSpace(text[position]) ? skipSpaces(text, position + 1) : position;

const fail = (text: string, position: number, message: string) =>
  Either.left(new ConnInfoError({ message, conninfo: text, position }));

const keywordEnd = (text: string, position: number): number => {
  const char = text[position];
  return char === undefined || char === '=' || isSpace(char)
    ? position
    : keywordEnd(text, position + 1);
};

const readKeyword = (text: string, start: number): Read<string> => {
  const end = keywordEnd(text, start);
  const keyword = text.slice(start, end);
  const equals = skipSpaces(text, end);
  return text[equals] === '='
    ? Either.right([keyword, equals + 1] as const)
    : fail(text, equals, `missing "=" after "${keyword}" in connection info string`);
};

// A backslash takes the next character literally; whitespace ends the value.
const readUnquoted = (text: string, position: number, value: string): Read<string> => {
  const char = text[position];
  const next = text[position + 1];
  return char === undefined
    ? Either.right([value, position] as const)
    : isSpace(char)
      ? Either.right([value, position + 1] as const)
      : char !== '\\'
        ? readUnquoted(text, position + 1, value + char)
        : next === undefined
          ? Either.right([value, position + 1] as const)
          : readUnquoted(text, position + 2, value + next);
};

const readQuoted = (text: string, position: number, value: string): Read<string> => {
  const char = text[position];
  const next = text[position + 1];
  return char === undefined || (char === '\\' && next === undefined)
    ? fail(text, position, 'unterminated quoted string in connection info string')
    : char === "'"
      ? Either.right([value, position + 1] as const)
      : char === '\\' && next !== undefined
        ? readQuoted(text, position + 2, value + next)
        : readQuoted(text, position + 1, value + char);
};

const readValue = (text: string, position: number): Read<string> =>
  text[position] === "'" ? readQuoted(text, position + 1, '') : readUnquoted(text, position, '');

const parseFrom = (
  text: string,
  position: number,
  parameters: Readonly<Record<string, string>>
): Either.Either<Readonly<Record<string, string>>, ConnInfoError> => {
  const start = skipSpaces(text, position);
  return start >= text.length
    ? Either.right(parameters)
    : pipe(
        readKeyword(text, start),
        Either.flatMap(([keyword, afterEquals]) =>
          pipe(
            readValue(text, skipSpaces(text, afterEquals)),
            Either.flatMap(([value, next]) =>
              parseFrom(text, next, { ...parameters, [keyword]: value })
            )
          )
        )
      );
};

/**
 * Parses a connection string. A keyword given twice keeps its last value.
 */
export const parseConnInfo = (
  text: string
): Either.Either<Readonly<Record<string, string>>, ConnInfoError> => parseFrom(text, 0, {});
