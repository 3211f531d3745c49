/**
 * weft
 *
 * A reactive state-transition core on Effect:
 * - Handlers replace the state on a draft synchronously and describe follow-up work
 * - Combinators (merge, when, debounce) build feature trees out of handlers
 * - A coordinator serializes dispatches and background writes through one mailbox
 * - Every dispatch returns a handle that tracks the tasks it spawned
 *
 * @example
 * ```ts
 * import { Coordinator, Handler, StatePath, CasePath, when } from "@weft/core";
 * import { Data, Effect } from "effect";
 *
 * interface Counter { readonly count: number; readonly saved: boolean }
 *
 * type CounterAction = Data.TaggedEnum<{ Increment: {}; Save: {} }>;
 * const CounterAction = Data.taggedEnum<CounterAction>();
 *
 * const counter = Handler.interact<Counter, CounterAction>((draft, action, { none, perform }) => {
 *   switch (action._tag) {
 *     case "Increment":
 *       draft.current = { ...draft.current, count: draft.current.count + 1 };
 *       return none;
 *     case "Save":
 *       return perform((_, send) => send.update((s) => ({ ...s, saved: true })));
 *   }
 * });
 *
 * const program = Effect.gen(function* () {
 *   const coordinator = yield* Coordinator.make({ count: 0, saved: false }, counter);
 *   coordinator.dispatch(CounterAction.Increment());
 *   yield* coordinator.dispatch(CounterAction.Save()).finish;
 *   return coordinator.getState();
 * });
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Emissions
// ============================================================================

export {
  none,
  action,
  perform,
  observe,
  merge as mergeEmissions,
  isNone,
  isAction,
  isPerform,
  isObserve,
  isMerge,
  flatten,
  mapAction,
  mapWork,
  createEmissionBuilders,
} from "./emission.js";

// ============================================================================
// Handlers & Combinators
// ============================================================================

export { Handler, interact, empty } from "./handler.js";
export { merge, mergeMany } from "./merge.js";
export { when, whenField, whenVariant } from "./when.js";
export type { WhenOptions } from "./when.js";
export { CasePath, StatePath } from "./paths.js";
export { debounce, debounceWith } from "./debounce.js";
export { Debouncer, DebounceResult } from "./debouncer.js";
export type { Executed, Superseded } from "./debouncer.js";

// ============================================================================
// Completion & Coordinator
// ============================================================================

export {
  ActionCompletion,
  ActionCompletionContext,
  CurrentActionCompletion,
} from "./completion.js";
export type { ActionCompletionContextOptions } from "./completion.js";
export { Coordinator } from "./coordinator.js";
export { CoordinatorConfig, DEFAULT_OPTIONS } from "./config.js";

// ============================================================================
// Errors
// ============================================================================

export {
  WorkDefectError,
  ObserverError,
  SealedContextError,
  StateUpdateError,
} from "./types.js";

// ============================================================================
// Types
// ============================================================================

export type {
  // State access
  Draft,
  DynamicState,
  Send,
  Work,

  // Emission types
  Emission,
  NoneEmission,
  ActionEmission,
  PerformEmission,
  ObserveEmission,
  MergeEmission,
  LeafEmission,
  WorkTag,
  EmissionBuilders,

  // Handler utility types
  HandlerState,
  HandlerAction,
  HandlerRequirements,

  // Path types
  FieldPath,
  VariantPath,

  // Completion types
  CompletionHandle,
  ActionCompletionContextShape,

  // Coordinator types
  CoordinatorOptions,
  ResolvedCoordinatorOptions,
  CoordinatorError,
} from "./types.js";
