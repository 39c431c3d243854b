import { describe, expect, it } from '@effect/vitest';
import { ConfigProvider, Duration, Effect, Logger, pipe } from 'effect';
import { defaultTimeout, hasTestExtra, requireTestExtra, runnerTimeouts } from './config';

const withEnvironment =
  (variables: Readonly<Record<string, string>>) =>
  <A, E, R>(self: Effect.Effect<A, E, R>) =>
    Effect.withConfigProvider(self, ConfigProvider.fromMap(new Map(Object.entries(variables))));

const timeoutFor = (variables: Readonly<Record<string, string>>) =>
  pipe(defaultTimeout, Effect.map(Duration.toMillis), withEnvironment(variables));

describe('Environment Configuration', () => {
  describe('defaultTimeout', () => {
    it.effect('should default to 180 seconds when unset', () =>
      pipe(
        timeoutFor({}),
        Effect.map((millis) => expect(millis).toBe(180_000))
      )
    );

    it.effect('should read whole seconds', () =>
      pipe(
        timeoutFor({ PG_TEST_TIMEOUT_DEFAULT: '20' }),
        Effect.map((millis) => expect(millis).toBe(20_000))
      )
    );

    it.effect('should tolerate surrounding whitespace', () =>
      pipe(
        timeoutFor({ PG_TEST_TIMEOUT_DEFAULT: ' 7 ' }),
        Effect.map((millis) => expect(millis).toBe(7_000))
      )
    );

    it.effect('should accept zero', () =>
      pipe(
        timeoutFor({ PG_TEST_TIMEOUT_DEFAULT: '0' }),
        Effect.map((millis) => expect(millis).toBe(0))
      )
    );

    it.effect('should warn and fall back on a value that is not a number', () => {
      const levels: Array<string> = [];
      return pipe(
        timeoutFor({ PG_TEST_TIMEOUT_DEFAULT: 'abc' }),
        Effect.provide(
          Logger.add(
            Logger.make(({ logLevel }) => {
              levels.push(logLevel.label);
            })
          )
        ),
        Effect.map((millis) => {
          expect(millis).toBe(180_000);
          expect(levels).toEqual(['WARN']);
        })
      );
    });

    it.effect('should fall back on a negative value', () =>
      pipe(
        timeoutFor({ PG_TEST_TIMEOUT_DEFAULT: '-5' }),
        Effect.map((millis) => expect(millis).toBe(180_000))
      )
    );
  });

  describe('runnerTimeouts', () => {
    it.effect('should outlast the default budget', () =>
      pipe(
        runnerTimeouts,
        withEnvironment({}),
        Effect.map((timeouts) =>
          expect(timeouts).toEqual({ testTimeout: 190_000, hookTimeout: 195_000 })
        )
      )
    );

    it.effect('should follow a configured budget', () =>
      pipe(
        runnerTimeouts,
        withEnvironment({ PG_TEST_TIMEOUT_DEFAULT: '20' }),
        Effect.map((timeouts) => expect(timeouts).toEqual({ testTimeout: 30_000, hookTimeout: 35_000 }))
      )
    );
  });

  describe('test extras', () => {
    it.effect('should split the opt-in list on whitespace', () =>
      pipe(
        Effect.all([hasTestExtra('ssl'), hasTestExtra('kerberos'), hasTestExtra('ldap')]),
        withEnvironment({ PG_TEST_EXTRA: ' ssl\tkerberos ' }),
        Effect.map((enabled) => expect(enabled).toEqual([true, true, false]))
      )
    );

    it.effect('should skip when any required key is missing', () =>
      pipe(
        requireTestExtra('ssl', 'ldap'),
        withEnvironment({ PG_TEST_EXTRA: 'ssl' }),
        Effect.map((requirement) =>
          expect(requirement).toEqual({
            skip: true,
            reason: 'requires ssl, ldap to be set in PG_TEST_EXTRA',
          })
        )
      )
    );

    it.effect('should run when every required key is present', () =>
      pipe(
        requireTestExtra('ssl'),
        withEnvironment({ PG_TEST_EXTRA: 'ssl' }),
        Effect.map((requirement) => expect(requirement.skip).toBe(false))
      )
    );
  });
});
