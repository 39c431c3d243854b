/**
 * Resource Stack
 *
 * Per-test registry of cleanup actions. Everything acquired during a test is
 * released in reverse order when the test ends, whether it passed, failed or
 * was interrupted. A failing release does not stop the ones after it.
 */

import { Cause, Context, Effect, Exit, Ref, pipe } from 'effect';

type Release = Effect.Effect<void, unknown>;

export interface ResourceStackService {
  /**
   * Runs `acquire` and, if it succeeds, pushes `release` for the acquired value.
   */
  readonly acquire: <A, E, R, E2>(
    acquire: Effect.Effect<A, E, R>,
    release: (resource: A) => Effect.Effect<void, E2>
  ) => Effect.Effect<A, E, R>;
  readonly defer: <E>(release: Effect.Effect<void, E>) => Effect.Effect<void>;
  /**
   * Releases everything registered so far, newest first. The first failure is
   * re-raised once all releases have run; any others are logged.
   */
  readonly releaseAll: Effect.Effect<void, unknown>;
  readonly size: Effect.Effect<number>;
}

export class ResourceStack extends Context.Tag('ResourceStack')<
  ResourceStack,
  ResourceStackService
>() {}

const logSecondaryFailure = (cause: Cause.Cause<unknown>) =>
  Effect.logWarning('additional failure while releasing test resources', cause);

const reraiseFirstFailure = (exits: ReadonlyArray<Exit.Exit<void, unknown>>): Release => {
  const [first, ...rest] = exits.flatMap((exit) => (Exit.isFailure(exit) ? [exit.cause] : []));
  return first === undefined
    ? Effect.void
    : pipe(
        Effect.forEach(rest, (cause) => logSecondaryFailure(cause), { discard: true }),
        Effect.andThen(Effect.failCause(first))
      );
};

export const makeResourceStack: Effect.Effect<ResourceStackService> = pipe(
  Ref.make<ReadonlyArray<Release>>([]),
  Effect.map((entries) => {
    const push = (release: Release) => Ref.update(entries, (stack) => [...stack, release]);

    return {
      acquire: <A, E, R, E2>(
        acquire: Effect.Effect<A, E, R>,
        release: (resource: A) => Effect.Effect<void, E2>
      ) =>
        Effect.uninterruptible(
          pipe(
            acquire,
            Effect.tap((resource) => push(release(resource)))
          )
        ),
      defer: <E>(release: Effect.Effect<void, E>) => push(release),
      releaseAll: Effect.uninterruptible(
        pipe(
          Ref.getAndSet(entries, []),
          Effect.flatMap((stack) => Effect.forEach([...stack].reverse(), (release) => Effect.exit(release))),
          Effect.flatMap(reraiseFirstFailure)
        )
      ),
      size: pipe(
        Ref.get(entries),
        Effect.map((stack) => stack.length)
      ),
    };
  })
);

const settle = <A, E>(
  exit: Exit.Exit<A, E>,
  releaseExit: Exit.Exit<void, unknown>
): Effect.Effect<A, unknown> =>
  Exit.isFailure(exit)
    ? pipe(
        Exit.isFailure(releaseExit) ? logSecondaryFailure(releaseExit.cause) : Effect.void,
        Effect.andThen(exit)
      )
    : pipe(releaseExit, Effect.as(exit.value));

/**
 * Runs `use` with a fresh ResourceStack and releases it afterwards. A failure of
 * `use` takes precedence over a failure during release.
 */
export const withResourceStack = <A, E, R>(
  use: Effect.Effect<A, E, R>
): Effect.Effect<A, unknown, Exclude<R, ResourceStack>> =>
  Effect.uninterruptibleMask((restore) =>
    pipe(
      makeResourceStack,
      Effect.flatMap((stack) =>
        pipe(
          restore(Effect.provideService(use, ResourceStack, stack)),
          Effect.exit,
          Effect.flatMap((exit) =>
            pipe(
              stack.releaseAll,
              Effect.exit,
              Effect.flatMap((releaseExit) => settle(exit, releaseExit))
            )
          )
        )
      )
    )
  );
