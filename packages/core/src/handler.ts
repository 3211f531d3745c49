/**
 * weft Handlers
 *
 * ```ts
 * const counter = Handler.interact<Counter, CounterAction>((draft, action, { none, perform }) => {
 *   switch (action._tag) {
 *     case "Increment":
 *       draft.current = { ...draft.current, count: draft.current.count + 1 };
 *       return none;
 *     case "Load":
 *       return perform((_, send) => send.update((s) => ({ ...s, loading: false })));
 *   }
 * });
 * ```
 */

import type { Draft, Emission, EmissionBuilders, Handler as HandlerShape } from "./types.js";
import { createEmissionBuilders, none } from "./emission.js";

/**
 * Leaf handler from a function. The function receives typed emission
 * builders as its third argument.
 */
export const interact = <S, A, R = never>(
  fn: (draft: Draft<S>, action: A, builders: EmissionBuilders<S, A>) => Emission<S, A, R>
): HandlerShape<S, A, R> => {
  const builders = createEmissionBuilders<S, A>();
  return {
    handle: (draft, action) => fn(draft, action, builders),
  };
};

/**
 * Handler that ignores every action.
 */
export const empty = <S, A>(): HandlerShape<S, A> => ({
  handle: () => none,
});

/**
 * Accept any object with a `handle` method as a handler.
 */
export const from = <S, A, R = never>(handler: HandlerShape<S, A, R>): HandlerShape<S, A, R> => ({
  handle: (draft, action) => handler.handle(draft, action),
});

export const Handler = {
  interact,
  empty,
  from,
} as const;

export type Handler<S, A, R = never> = HandlerShape<S, A, R>;
