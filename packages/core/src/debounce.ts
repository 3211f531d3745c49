import { Effect } from "effect";
import type { Duration } from "effect";
import type { Emission, Handler } from "./types.js";
import { mapWork } from "./emission.js";
import { Debouncer } from "./debouncer.js";

const debounceEmission = <S, A, R>(
  debouncer: Debouncer,
  emission: Emission<S, A, R>
): Emission<S, A, R> =>
  mapWork<S, A, R, S, R>(emission, (work, tag) =>
    tag === "Perform"
      ? (state, send) => Effect.asVoid(debouncer.run(Effect.suspend(() => work(state, send))))
      : work
  );

/**
 * Debounce the `perform` work of a child handler through a shared debouncer.
 * State changes made by the child are applied immediately; `observe` work
 * and re-dispatched actions pass through untouched.
 */
export const debounceWith = <S, A, R>(
  debouncer: Debouncer,
  child: Handler<S, A, R>
): Handler<S, A, R> => ({
  handle: (draft, action) => debounceEmission(debouncer, child.handle(draft, action)),
});

/**
 * @example
 * ```ts
 * const search = debounce("300 millis", searchHandler);
 * ```
 */
export const debounce = <S, A, R>(
  duration: Duration.DurationInput,
  child: Handler<S, A, R>
): Handler<S, A, R> => debounceWith(Debouncer.make(duration), child);
