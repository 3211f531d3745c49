/**
 * weft Core Types
 *
 * This module defines the foundational types:
 * - Emissions (data describing follow-up work, never running tasks)
 * - Handlers (synchronous state transitions)
 * - State access for background work (DynamicState / Send)
 * - Coordinator and completion handle contracts
 */

import { Data } from "effect";
import type { Duration, Effect, Fiber, Option, Stream } from "effect";

// ============================================================================
// State Access
// ============================================================================

/**
 * Exclusive, short-lived access to a state value.
 *
 * Handlers change state by assigning a new value to `draft.current`;
 * the value it starts with is the committed snapshot that observers and
 * background work may still hold, so it is never edited in place. In debug
 * mode committed plain objects and arrays are frozen, and an in-place edit
 * throws. A draft is only valid for the duration of one handler invocation.
 */
export interface Draft<S> {
  current: S;
}

/**
 * Read-only access to the latest state from inside background work.
 * Every read goes through the coordinator, so it observes all committed writes.
 *
 * @example
 * ```ts
 * const count = yield* state.get("count");
 * const snapshot = yield* state.current;
 * ```
 */
export interface DynamicState<S> {
  readonly current: Effect.Effect<S>;
  readonly get: <K extends keyof S>(key: K) => Effect.Effect<S[K]>;
}

/**
 * Write callback handed to background work.
 *
 * `send(state)` replaces the state, `send.update(f)` derives it from the
 * latest committed value. Both are no-ops once the calling task is cancelled.
 */
export interface Send<S> {
  (state: S): Effect.Effect<void>;
  readonly update: (f: (current: S) => S) => Effect.Effect<void>;
}

/**
 * A unit of background work. Failures must be folded into state via `send`,
 * hence the `never` error channel.
 */
export type Work<S, R = never> = (
  state: DynamicState<S>,
  send: Send<S>,
) => Effect.Effect<void, never, R>;

// ============================================================================
// Emissions
// ============================================================================

export interface NoneEmission {
  readonly _tag: "None";
}

export interface ActionEmission<A> {
  readonly _tag: "Action";
  readonly action: A;
}

export interface PerformEmission<S, R = never> {
  readonly _tag: "Perform";
  readonly work: Work<S, R>;
}

export interface ObserveEmission<S, R = never> {
  readonly _tag: "Observe";
  readonly work: Work<S, R>;
}

export interface MergeEmission<S, A, R = never> {
  readonly _tag: "Merge";
  readonly emissions: ReadonlyArray<Emission<S, A, R>>;
}

/**
 * What should happen after an action has been handled.
 */
export type Emission<S, A, R = never> =
  | NoneEmission
  | ActionEmission<A>
  | PerformEmission<S, R>
  | ObserveEmission<S, R>
  | MergeEmission<S, A, R>;

/**
 * Emissions that are not `Merge` or `None`.
 */
export type LeafEmission<S, A, R = never> =
  | ActionEmission<A>
  | PerformEmission<S, R>
  | ObserveEmission<S, R>;

export type WorkTag = "Perform" | "Observe";

/**
 * Emission constructors bound to a handler's state and action types,
 * so that `perform`/`observe` infer their `DynamicState`/`Send` types.
 */
export interface EmissionBuilders<S, A> {
  readonly none: NoneEmission;
  readonly action: (action: A) => ActionEmission<A>;
  readonly perform: <R = never>(work: Work<S, R>) => PerformEmission<S, R>;
  readonly observe: <R = never>(work: Work<S, R>) => ObserveEmission<S, R>;
  readonly merge: <R = never>(
    ...emissions: ReadonlyArray<Emission<S, A, R>>
  ) => MergeEmission<S, A, R>;
}

// ============================================================================
// Handlers
// ============================================================================

/**
 * The primitive unit of composition: mutate state, describe effects.
 *
 * `handle` runs synchronously, must not block, and never forks tasks itself.
 */
export interface Handler<S, A, R = never> {
  readonly handle: (draft: Draft<S>, action: A) => Emission<S, A, R>;
}

export type HandlerState<H> = H extends Handler<infer S, infer _A, infer _R> ? S : never;
export type HandlerAction<H> = H extends Handler<infer _S, infer A, infer _R> ? A : never;
export type HandlerRequirements<H> = H extends Handler<infer _S, infer _A, infer R> ? R : never;

// ============================================================================
// Paths
// ============================================================================

/**
 * Extracts a value from one case of a union and embeds it back.
 * Law: `extract(embed(value))` is `Some(value)`.
 */
export interface CasePath<Root, Value> {
  readonly extract: (root: Root) => Option.Option<Value>;
  readonly embed: (value: Value) => Root;
}

/**
 * Locates child state inside a struct-like parent.
 */
export interface FieldPath<S, C> {
  readonly _tag: "Field";
  readonly get: (parent: S) => C;
  readonly set: (parent: S, child: C) => S;
}

/**
 * Locates child state inside one variant of an enum-like parent.
 */
export interface VariantPath<S, C> {
  readonly _tag: "Variant";
  readonly casePath: CasePath<S, C>;
}

export type StatePath<S, C> = FieldPath<S, C> | VariantPath<S, C>;

// ============================================================================
// Completion
// ============================================================================

/**
 * Handle to everything one dispatched action spawned.
 * Discardable: fire-and-forget callers may ignore it.
 */
export interface CompletionHandle {
  /** Resolves once the context is sealed and every tracked task has finished. */
  readonly finish: Effect.Effect<void>;
  readonly finishPromise: () => Promise<void>;
  readonly cancel: () => void;
  readonly isCancelled: boolean;
  readonly hasEffects: boolean;
  readonly context: ActionCompletionContextShape;
}

/**
 * Read-side view of an action completion context.
 */
export interface ActionCompletionContextShape {
  readonly id: number;
  readonly isSealed: boolean;
  readonly isCancelled: boolean;
  readonly allTasks: () => ReadonlyArray<Fiber.RuntimeFiber<unknown, unknown>>;
}

// ============================================================================
// Coordinator
// ============================================================================

export interface CoordinatorOptions {
  /**
   * How long a dispatch stays open for nested registrations after its
   * synchronous phase. Zero seals immediately.
   * @default "10 millis"
   */
  readonly registrationWindow?: Duration.DurationInput;
  /** Throw on registration into a sealed context instead of reporting it. */
  readonly debug?: boolean;
  /** Annotates every log line written by this coordinator. */
  readonly label?: string;
}

export interface ResolvedCoordinatorOptions {
  readonly registrationWindow: Duration.Duration;
  readonly debug: boolean;
  readonly label: string;
}

export interface Coordinator<S, A> {
  readonly dispatch: (action: A) => CompletionHandle;
  readonly getState: () => S;
  /** Reads the state through the coordinator. */
  readonly state: Effect.Effect<S>;
  readonly subscribe: (observer: (state: S) => void) => () => void;
  /** Every committed state, from the moment of subscription. */
  readonly changes: Stream.Stream<S>;
  /**
   * Wait for the state to satisfy the predicate.
   *
   * @example
   * ```ts
   * const loaded = yield* coordinator.waitFor((s) => s._tag === "Loaded");
   * ```
   */
  readonly waitFor: (predicate: (state: S) => boolean) => Effect.Effect<S>;
  readonly onError: (handler: (error: CoordinatorError) => void) => () => void;
  /** Interrupt every outstanding task and stop accepting work. */
  readonly stop: () => void;
  readonly isStopped: boolean;
}

// ============================================================================
// Errors (Effect TaggedErrors)
// ============================================================================

/**
 * A background task died with a defect.
 */
export class WorkDefectError extends Data.TaggedError("WorkDefectError")<{
  readonly message: string;
  readonly kind: WorkTag;
  readonly actionId: number;
  readonly cause?: unknown;
}> {}

/**
 * A state observer threw.
 */
export class ObserverError extends Data.TaggedError("ObserverError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/**
 * A task was registered with a context that no longer accepts registrations.
 */
export class SealedContextError extends Data.TaggedError("SealedContextError")<{
  readonly message: string;
  readonly actionId: number;
}> {}

/**
 * A handler threw while processing a dispatch, or a `send.update` function
 * threw while its write was applied. The state is left as it was before.
 */
export class StateUpdateError extends Data.TaggedError("StateUpdateError")<{
  readonly message: string;
  readonly source: "Dispatch" | "Commit";
  readonly actionId?: number;
  readonly cause?: unknown;
}> {}

export type CoordinatorError =
  | WorkDefectError
  | ObserverError
  | SealedContextError
  | StateUpdateError;
