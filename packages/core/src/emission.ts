/**
 * weft Emissions
 *
 * Emissions describe what should happen after a handler ran:
 * - `none` - nothing
 * - `action(a)` - re-dispatch synchronously through the root handler
 * - `perform(work)` - one-shot background work
 * - `observe(work)` - long-lived background work
 * - `merge(...emissions)` - several of the above, in order
 *
 * They are plain data. The coordinator is the only place work gets forked.
 */

import type {
  ActionEmission,
  Emission,
  EmissionBuilders,
  LeafEmission,
  MergeEmission,
  NoneEmission,
  ObserveEmission,
  PerformEmission,
  Work,
  WorkTag,
} from "./types.js";

// ============================================================================
// Constructors
// ============================================================================

export const none: NoneEmission = { _tag: "None" };

export const action = <A>(value: A): ActionEmission<A> => ({
  _tag: "Action",
  action: value,
});

export const perform = <S, R = never>(work: Work<S, R>): PerformEmission<S, R> => ({
  _tag: "Perform",
  work,
});

export const observe = <S, R = never>(work: Work<S, R>): ObserveEmission<S, R> => ({
  _tag: "Observe",
  work,
});

export const merge = <S, A, R = never>(
  ...emissions: ReadonlyArray<Emission<S, A, R>>
): MergeEmission<S, A, R> => ({
  _tag: "Merge",
  emissions,
});

// ============================================================================
// Guards
// ============================================================================

export const isNone = <S, A, R>(e: Emission<S, A, R>): e is NoneEmission =>
  e._tag === "None";

export const isAction = <S, A, R>(e: Emission<S, A, R>): e is ActionEmission<A> =>
  e._tag === "Action";

export const isPerform = <S, A, R>(e: Emission<S, A, R>): e is PerformEmission<S, R> =>
  e._tag === "Perform";

export const isObserve = <S, A, R>(e: Emission<S, A, R>): e is ObserveEmission<S, R> =>
  e._tag === "Observe";

export const isMerge = <S, A, R>(e: Emission<S, A, R>): e is MergeEmission<S, A, R> =>
  e._tag === "Merge";

// ============================================================================
// Traversal
// ============================================================================

/**
 * Expand nested merges depth-first, dropping `None`.
 */
export const flatten = <S, A, R>(
  emission: Emission<S, A, R>
): ReadonlyArray<LeafEmission<S, A, R>> => {
  const out: Array<LeafEmission<S, A, R>> = [];
  const visit = (e: Emission<S, A, R>) => {
    switch (e._tag) {
      case "None":
        return;
      case "Merge":
        e.emissions.forEach(visit);
        return;
      default:
        out.push(e);
    }
  };
  visit(emission);
  return out;
};

/**
 * Map every `Action` payload, keeping the shape.
 */
export const mapAction = <S, A, A2, R>(
  emission: Emission<S, A, R>,
  f: (action: A) => A2
): Emission<S, A2, R> => {
  switch (emission._tag) {
    case "Action":
      return action(f(emission.action));
    case "Merge":
      return merge(...emission.emissions.map((e) => mapAction(e, f)));
    default:
      return emission;
  }
};

/**
 * Transform every `Perform`/`Observe` work, keeping the shape and order.
 */
export const mapWork = <S, A, R, S2, R2>(
  emission: Emission<S, A, R>,
  f: (work: Work<S, R>, tag: WorkTag) => Work<S2, R2>
): Emission<S2, A, R2> => {
  switch (emission._tag) {
    case "Perform":
      return perform(f(emission.work, "Perform"));
    case "Observe":
      return observe(f(emission.work, "Observe"));
    case "Merge":
      return merge(...emission.emissions.map((e) => mapWork(e, f)));
    default:
      return emission;
  }
};

// ============================================================================
// Typed Builders
// ============================================================================

/**
 * Create emission builders bound to a state and action type.
 */
export const createEmissionBuilders = <S, A>(): EmissionBuilders<S, A> => ({
  none,
  action: (value: A) => action(value),
  perform: <R = never>(work: Work<S, R>) => perform<S, R>(work),
  observe: <R = never>(work: Work<S, R>) => observe<S, R>(work),
  merge: <R = never>(...emissions: ReadonlyArray<Emission<S, A, R>>) =>
    merge<S, A, R>(...emissions),
});
