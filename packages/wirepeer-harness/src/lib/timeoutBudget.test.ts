import { describe, expect, it } from '@effect/vitest';
import { ConfigProvider, Duration, Effect, Fiber, TestClock, pipe } from 'effect';
import { TimeoutError, timeoutError } from './errors';
import {
  TimeoutBudget,
  TimeoutBudgetLive,
  makeTimeoutBudget,
  timeoutBudgetLayer,
  withinBudget,
} from './timeoutBudget';

const remainingMillis = (budget: { readonly remaining: Effect.Effect<Duration.Duration> }) =>
  pipe(budget.remaining, Effect.map(Duration.toMillis));

describe('TimeoutBudget', () => {
  it.effect('should start with the whole budget', () =>
    pipe(
      makeTimeoutBudget(Duration.seconds(180)),
      Effect.flatMap(remainingMillis),
      Effect.map((millis) => expect(millis).toBe(180_000))
    )
  );

  it.effect('should count down as time passes', () =>
    pipe(
      makeTimeoutBudget(Duration.seconds(180)),
      Effect.flatMap((budget) =>
        pipe(
          TestClock.adjust(Duration.seconds(30)),
          Effect.andThen(remainingMillis(budget))
        )
      ),
      Effect.map((millis) => expect(millis).toBe(150_000))
    )
  );

  it.effect('should never go below zero', () =>
    pipe(
      makeTimeoutBudget(Duration.seconds(1)),
      Effect.flatMap((budget) =>
        pipe(
          TestClock.adjust(Duration.seconds(5)),
          Effect.andThen(remainingMillis(budget))
        )
      ),
      Effect.map((millis) => expect(millis).toBe(0))
    )
  );

  it.effect('should take its total from PG_TEST_TIMEOUT_DEFAULT', () =>
    pipe(
      TimeoutBudget,
      Effect.flatMap(remainingMillis),
      Effect.provide(TimeoutBudgetLive),
      Effect.withConfigProvider(
        ConfigProvider.fromMap(new Map([['PG_TEST_TIMEOUT_DEFAULT', '20']]))
      ),
      Effect.map((millis) => expect(millis).toBe(20_000))
    )
  );

  it.effect('should fail an effect that outlives the budget', () =>
    pipe(
      Effect.never,
      withinBudget(timeoutError.join),
      Effect.flip,
      Effect.fork,
      Effect.tap(() => TestClock.adjust(Duration.seconds(2))),
      Effect.flatMap(Fiber.join),
      Effect.provide(timeoutBudgetLayer(Duration.seconds(1))),
      Effect.map((error) => {
        expect(error).toBeInstanceOf(TimeoutError);
        expect(error.message).toBe('background worker is still running after timeout');
      })
    )
  );

  it.effect('should add the grace period to the remaining time', () =>
    pipe(
      Effect.succeed('done'),
      Effect.delay(Duration.millis(1_500)),
      withinBudget(timeoutError.join, Duration.seconds(1)),
      Effect.fork,
      Effect.tap(() => TestClock.adjust(Duration.seconds(2))),
      Effect.flatMap(Fiber.join),
      Effect.provide(timeoutBudgetLayer(Duration.seconds(1))),
      Effect.map((result) => expect(result).toBe('done'))
    )
  );
});
