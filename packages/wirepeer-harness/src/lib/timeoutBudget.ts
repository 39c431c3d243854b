import { Clock, Context, Duration, Effect, Layer, pipe } from 'effect';
import { defaultTimeout } from './config';
import { TimeoutError } from './errors';

export interface TimeoutBudgetService {
  readonly total: Duration.Duration;
  /**
   * Time left before the deadline, never negative and never increasing.
   */
  readonly remaining: Effect.Effect<Duration.Duration>;
}

export class TimeoutBudget extends Context.Tag('TimeoutBudget')<
  TimeoutBudget,
  TimeoutBudgetService
>() {}

const remainingUntil =
  (deadline: bigint) =>
  (now: bigint): Duration.Duration =>
    now >= deadline ? Duration.zero : Duration.nanos(deadline - now);

export const makeTimeoutBudget = (
  total: Duration.DurationInput
): Effect.Effect<TimeoutBudgetService> =>
  pipe(
    Clock.currentTimeNanos,
    Effect.map((startedAt) => {
      const budget = Duration.decode(total);
      return {
        total: budget,
        remaining: Duration.isFinite(budget)
          ? pipe(
              Clock.currentTimeNanos,
              Effect.map(remainingUntil(startedAt + Duration.unsafeToNanos(budget)))
            )
          : Effect.succeed(Duration.infinity),
      };
    })
  );

/**
 * Starts the clock when the layer is built, so each test providing it gets its
 * own deadline.
 */
export const TimeoutBudgetLive = Layer.effect(
  TimeoutBudget,
  pipe(defaultTimeout, Effect.flatMap(makeTimeoutBudget))
);

export const timeoutBudgetLayer = (total: Duration.DurationInput) =>
  Layer.effect(TimeoutBudget, makeTimeoutBudget(total));

/**
 * Bounds an effect by whatever is left of the budget, plus an optional grace period.
 */
export const withinBudget =
  (onTimeout: (timeout: Duration.Duration) => TimeoutError, grace: Duration.DurationInput = 0) =>
  <A, E, R>(self: Effect.Effect<A, E, R>): Effect.Effect<A, E | TimeoutError, R | TimeoutBudget> =>
    pipe(
      TimeoutBudget,
      Effect.flatMap((budget) => budget.remaining),
      Effect.map((remaining) => Duration.sum(remaining, grace)),
      Effect.flatMap((timeout) =>
        Effect.timeoutFail(self, { duration: timeout, onTimeout: () => onTimeout(timeout) })
      )
    );
