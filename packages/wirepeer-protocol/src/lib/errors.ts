import { Data } from 'effect';

export class FramingError extends Data.TaggedError('FramingError')<
  Readonly<{
    readonly message: string;
    readonly declaredLength?: number;
    readonly availableLength?: number;
  }>
> {}

// Error creation helpers
export const framingError = {
  lengthMismatch: (declaredLength: number, availableLength: number) =>
    new FramingError({
      message: `declared length ${declaredLength} does not match the ${availableLength} bytes available`,
      declaredLength,
      availableLength,
    }),
  truncated: (expectedLength: number, availableLength: number) =>
    new FramingError({
      message: `message truncated: expected at least ${expectedLength} bytes, got ${availableLength}`,
      declaredLength: expectedLength,
      availableLength,
    }),
  payloadSize: (tag: string, expectedBytes: number, actualBytes: number) =>
    new FramingError({
      message: `'${tag}' message carries ${actualBytes} payload bytes, expected ${expectedBytes}`,
    }),
  unexpected: (message: string) => new FramingError({ message }),
};
