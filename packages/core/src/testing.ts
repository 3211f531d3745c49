/**
 * weft Test Harness
 *
 * Wraps a coordinator with a zero registration window and records every
 * state it publishes, starting with the initial one.
 *
 * @example
 * ```ts
 * const program = Effect.gen(function* () {
 *   const harness = yield* makeTestHarness(initial, feature);
 *   yield* harness.send(Action.Load()).finish;
 *   expect(harness.latestState.loaded).toBe(true);
 * });
 *
 * await Effect.runPromise(Effect.scoped(program));
 * ```
 */

import { Effect } from "effect";
import type { Scope } from "effect";
import type { CompletionHandle, Coordinator, CoordinatorOptions, Handler } from "./types.js";
import { make } from "./coordinator.js";

export interface TestHarness<S, A> {
  readonly coordinator: Coordinator<S, A>;
  readonly send: (action: A) => CompletionHandle;
  /** Every observed state, oldest first. */
  readonly states: ReadonlyArray<S>;
  readonly latestState: S;
  /** Wait until at least `count` states have been recorded. */
  readonly waitForStates: (count: number) => Effect.Effect<ReadonlyArray<S>>;
}

export const makeTestHarness = <S, A, R = never>(
  initialState: S,
  root: Handler<S, A, R>,
  options?: CoordinatorOptions
): Effect.Effect<TestHarness<S, A>, never, R | Scope.Scope> =>
  Effect.map(
    make(initialState, root, { registrationWindow: 0, label: "test-harness", ...options }),
    (coordinator) => {
      const states: Array<S> = [coordinator.getState()];
      coordinator.subscribe((state) => {
        states.push(state);
      });

      return {
        coordinator,
        send: coordinator.dispatch,
        states,
        get latestState() {
          return coordinator.getState();
        },
        waitForStates: (count) =>
          Effect.as(
            coordinator.waitFor(() => states.length >= count),
            states
          ),
      };
    }
  );
