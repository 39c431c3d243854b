import { Config, Duration, Effect, pipe } from 'effect';
import { ConfigurationError } from './errors';

export const TIMEOUT_VARIABLE = 'PG_TEST_TIMEOUT_DEFAULT';
export const EXTRA_VARIABLE = 'PG_TEST_EXTRA';
export const DEFAULT_TIMEOUT_SECONDS = 180;

const WHOLE_SECONDS = /^\s*\+?\d+\s*$/;

const readVariable = (variable: string) =>
  pipe(
    Config.string(variable),
    Config.withDefault(''),
    Effect.mapError(
      (cause) => new ConfigurationError({ variable, value: '', details: String(cause) })
    )
  );

const parseTimeout = (raw: string): Effect.Effect<Duration.Duration, ConfigurationError> =>
  raw === ''
    ? Effect.succeed(Duration.seconds(DEFAULT_TIMEOUT_SECONDS))
    : WHOLE_SECONDS.test(raw)
      ? Effect.succeed(Duration.seconds(Number.parseInt(raw.trim(), 10)))
      : Effect.fail(
          new ConfigurationError({
            variable: TIMEOUT_VARIABLE,
            value: raw,
            details: 'expected a non-negative whole number of seconds',
          })
        );

/**
 * Per-test wall-clock budget. An unparseable value is reported as a warning and
 * the default of 180 seconds is used instead.
 */
export const defaultTimeout: Effect.Effect<Duration.Duration> = pipe(
  readVariable(TIMEOUT_VARIABLE),
  Effect.flatMap(parseTimeout),
  Effect.catchTag('ConfigurationError', (error) =>
    pipe(
      Effect.logWarning(
        `${error.variable} could not be parsed (${error.details}); using ${DEFAULT_TIMEOUT_SECONDS}s`
      ),
      Effect.annotateLogs({ variable: error.variable, value: error.value }),
      Effect.as(Duration.seconds(DEFAULT_TIMEOUT_SECONDS))
    )
  )
);

// Covers the join grace and teardown after the budget has run out.
const RUNNER_SLACK = Duration.seconds(10);
const HOOK_SLACK = Duration.seconds(5);

export interface RunnerTimeouts {
  readonly testTimeout: number;
  readonly hookTimeout: number;
}

/**
 * Test-runner limits in milliseconds that outlast the per-test budget, so a
 * stuck peer surfaces as the harness's own TimeoutError.
 */
export const runnerTimeouts: Effect.Effect<RunnerTimeouts> = pipe(
  defaultTimeout,
  Effect.map((budget) => {
    const testTimeout = Duration.sum(budget, RUNNER_SLACK);
    return {
      testTimeout: Duration.toMillis(testTimeout),
      hookTimeout: Duration.toMillis(Duration.sum(testTimeout, HOOK_SLACK)),
    };
  })
);

/**
 * Whitespace-separated opt-in keys that enable tests needing extra setup.
 */
export const testExtras: Effect.Effect<ReadonlySet<string>> = pipe(
  readVariable(EXTRA_VARIABLE),
  Effect.map((raw) => new Set(raw.split(/\s+/).filter((key) => key.length > 0))),
  Effect.catchTag('ConfigurationError', (error) =>
    pipe(
      Effect.logWarning(`${error.variable} could not be read; no extras enabled`),
      Effect.as(new Set<string>())
    )
  )
);

export const hasTestExtra = (key: string): Effect.Effect<boolean> =>
  pipe(
    testExtras,
    Effect.map((extras) => extras.has(key))
  );

export interface TestExtraRequirement {
  readonly skip: boolean;
  readonly reason: string;
}

export const requireTestExtra = (
  ...keys: ReadonlyArray<string>
): Effect.Effect<TestExtraRequirement> =>
  pipe(
    testExtras,
    Effect.map((extras) => ({
      skip: !keys.every((key) => extras.has(key)),
      reason: `requires ${keys.join(', ')} to be set in ${EXTRA_VARIABLE}`,
    }))
  );
