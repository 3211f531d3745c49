/**
 * weft Debouncer
 *
 * Each `run` supersedes the one before it. Only a run whose quiet period
 * elapses without a newer call executes its work. Time is read from
 * Effect's `Clock`, so `TestClock` drives it in tests.
 */

import { Deferred, Duration, Effect } from "effect";

// ============================================================================
// Results
// ============================================================================

export interface Executed<X> {
  readonly _tag: "Executed";
  readonly value: X;
}

export interface Superseded {
  readonly _tag: "Superseded";
}

export type DebounceResult<X> = Executed<X> | Superseded;

const superseded: Superseded = { _tag: "Superseded" };

export const DebounceResult = {
  Executed: <X>(value: X): DebounceResult<X> => ({ _tag: "Executed", value }),
  Superseded: superseded,
  isExecuted: <X>(result: DebounceResult<X>): result is Executed<X> =>
    result._tag === "Executed",
  isSuperseded: <X>(result: DebounceResult<X>): result is Superseded =>
    result._tag === "Superseded",
} as const;

// ============================================================================
// Debouncer
// ============================================================================

export interface Debouncer {
  readonly duration: Duration.Duration;
  /**
   * Wait out the quiet period, then run `work` unless a newer call arrived.
   * Work that already started is not interrupted by later calls.
   */
  readonly run: <X, R>(
    work: Effect.Effect<X, never, R>
  ) => Effect.Effect<DebounceResult<X>, never, R>;
  /** Supersede whatever call is pending. */
  readonly cancel: Effect.Effect<void>;
}

export const make = (duration: Duration.DurationInput): Debouncer => {
  const quiet = Duration.decode(duration);
  let generation = 0;
  let pending: Deferred.Deferred<void> | null = null;

  const supersede = (next: Deferred.Deferred<void> | null) =>
    Effect.suspend(() => {
      const previous = pending;
      generation += 1;
      pending = next;
      const current = generation;
      return previous
        ? Effect.as(Deferred.succeed(previous, undefined), current)
        : Effect.succeed(current);
    });

  const run = <X, R>(
    work: Effect.Effect<X, never, R>
  ): Effect.Effect<DebounceResult<X>, never, R> =>
    Effect.gen(function* () {
      const signal = yield* Deferred.make<void>();
      const mine = yield* supersede(signal);

      const elapsed = yield* Effect.race(
        Effect.as(Effect.sleep(quiet), true),
        Effect.as(Deferred.await(signal), false)
      );

      if (!elapsed || generation !== mine) {
        yield* Effect.logDebug("debounced call superseded");
        return DebounceResult.Superseded;
      }

      pending = null;
      const value = yield* work;
      return DebounceResult.Executed(value);
    });

  return {
    duration: quiet,
    run,
    cancel: Effect.asVoid(supersede(null)),
  };
};

export const Debouncer = {
  make,
} as const;
