import { Effect, pipe } from 'effect';
import { withResourceStack } from './resourceStack';
import { TimeoutBudgetLive } from './timeoutBudget';

/**
 * Runs one test body with a fresh timeout budget and resource stack. Everything
 * the body registered is released before the returned effect completes.
 */
export const withHarness = <A, E, R>(body: Effect.Effect<A, E, R>) =>
  pipe(body, withResourceStack, Effect.provide(TimeoutBudgetLive));
