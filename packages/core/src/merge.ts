import type { Handler } from "./types.js";
import { merge as mergeEmissions, none } from "./emission.js";

/**
 * Run both handlers against the same draft, in order.
 * The second sees whatever the first wrote.
 */
export const merge = <S, A, R1, R2>(
  first: Handler<S, A, R1>,
  second: Handler<S, A, R2>
): Handler<S, A, R1 | R2> => mergeMany<S, A, R1 | R2>([first, second]);

/**
 * Run every handler against the same draft, in order, and merge their emissions.
 * An empty list yields `none`.
 */
export const mergeMany = <S, A, R>(
  handlers: ReadonlyArray<Handler<S, A, R>>
): Handler<S, A, R> => ({
  handle: (draft, action) => {
    if (handlers.length === 0) return none;
    return mergeEmissions(...handlers.map((h) => h.handle(draft, action)));
  },
});
