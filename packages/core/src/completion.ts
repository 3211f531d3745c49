/**
 * weft Action Completion Tracking
 *
 * Every dispatch opens a context that collects the tasks it spawned,
 * directly or through nested forks. The context is:
 * - Open while the dispatch runs and for a short registration window after
 * - Sealed once that window closes (no further registrations)
 * - Resolved when every task it collected has finished, or Cancelled
 */

import { Deferred, Effect, Fiber, FiberRef, Option } from "effect";
import type { ActionCompletionContextShape, CompletionHandle } from "./types.js";
import { SealedContextError } from "./types.js";

type AnyFiber = Fiber.RuntimeFiber<unknown, unknown>;

export interface ActionCompletionContextOptions {
  readonly debug: boolean;
  /** Called for every fiber offered to the context, accepted or not. */
  readonly track?: (fiber: AnyFiber) => void;
  /** Called instead of throwing when a sealed context refuses a task outside debug mode. */
  readonly report?: (error: SealedContextError) => void;
}

let nextContextId = 0;

export class ActionCompletionContext implements ActionCompletionContextShape {
  readonly id: number;
  private readonly tasks: Array<AnyFiber> = [];
  private readonly sealSignal: Deferred.Deferred<void>;
  private _isSealed = false;
  private _isCancelled = false;

  constructor(private readonly options: ActionCompletionContextOptions) {
    this.id = ++nextContextId;
    this.sealSignal = Effect.runSync(Deferred.make<void>());
  }

  get isSealed(): boolean {
    return this._isSealed;
  }

  get isCancelled(): boolean {
    return this._isCancelled;
  }

  /**
   * Track a task until this context resolves.
   *
   * Returns `false` when the task was refused: the context is cancelled
   * (the task is interrupted) or sealed (the task keeps running untracked).
   * In debug mode a sealed context throws `SealedContextError` instead.
   */
  registerEffectTask(fiber: AnyFiber): boolean {
    this.options.track?.(fiber);

    if (this._isCancelled) {
      Effect.runFork(Fiber.interrupt(fiber));
      return false;
    }

    if (this._isSealed) {
      const error = new SealedContextError({
        message: `Action ${this.id} is sealed; task registered after its registration window`,
        actionId: this.id,
      });
      if (this.options.debug) {
        throw error;
      }
      this.options.report?.(error);
      return false;
    }

    this.tasks.push(fiber);
    return true;
  }

  seal(): void {
    if (this._isSealed) return;
    this._isSealed = true;
    Effect.runSync(Deferred.succeed(this.sealSignal, undefined));
  }

  allTasks(): ReadonlyArray<AnyFiber> {
    return this.tasks;
  }

  cancelAll(): void {
    if (this._isCancelled) return;
    this._isCancelled = true;
    this.seal();
    if (this.tasks.length > 0) {
      Effect.runFork(Fiber.interruptAll([...this.tasks]));
    }
  }

  /**
   * Wait for the seal, then for every collected task.
   */
  get await(): Effect.Effect<void> {
    return Deferred.await(this.sealSignal).pipe(
      Effect.zipRight(Effect.suspend(() => Fiber.awaitAll([...this.tasks]))),
      Effect.asVoid
    );
  }
}

// ============================================================================
// Ambient Context
// ============================================================================

/**
 * The context a fiber was spawned for. Child fibers inherit it.
 */
export const CurrentActionCompletion = FiberRef.unsafeMake<Option.Option<ActionCompletionContext>>(
  Option.none()
);

// The dispatch whose handler tree is running right now, outside any fiber.
let currentSync: ActionCompletionContext | null = null;

export const withCurrentContext = <X>(context: ActionCompletionContext, f: () => X): X => {
  const previous = currentSync;
  currentSync = context;
  try {
    return f();
  } finally {
    currentSync = previous;
  }
};

const ambient: Effect.Effect<Option.Option<ActionCompletionContext>> = Effect.map(
  FiberRef.get(CurrentActionCompletion),
  (fromFiber) => Option.orElse(fromFiber, () => Option.fromNullable(currentSync))
);

const register = (fiber: AnyFiber): Effect.Effect<boolean> =>
  Effect.flatMap(ambient, (context) =>
    Option.match(context, {
      onNone: () => Effect.succeed(false),
      onSome: (ctx) => Effect.sync(() => ctx.registerEffectTask(fiber)),
    })
  );

/**
 * Fork `effect` as a daemon and register it with the ambient context,
 * so the dispatch that caused it waits for it and can cancel it.
 *
 * @example
 * ```ts
 * perform((_, send) =>
 *   Effect.gen(function* () {
 *     yield* ActionCompletion.fork(refreshCache);
 *     yield* send.update((s) => ({ ...s, refreshing: true }));
 *   })
 * );
 * ```
 */
const fork = <X, E, R>(
  effect: Effect.Effect<X, E, R>
): Effect.Effect<Fiber.RuntimeFiber<X, E>, never, R> =>
  Effect.gen(function* () {
    const fiber = yield* Effect.forkDaemon(effect);
    yield* register(fiber);
    return fiber;
  });

export const ActionCompletion = {
  /** The context of the dispatch currently running its handlers, if any. */
  current: (): Option.Option<ActionCompletionContext> => Option.fromNullable(currentSync),
  /** The context the calling fiber belongs to. */
  ambient,
  register,
  fork,
} as const;

// ============================================================================
// Handles
// ============================================================================

export const makeCompletionHandle = (context: ActionCompletionContext): CompletionHandle => ({
  finish: context.await,
  finishPromise: () => Effect.runPromise(context.await),
  cancel: () => context.cancelAll(),
  get isCancelled() {
    return context.isCancelled;
  },
  get hasEffects() {
    return context.allTasks().length > 0;
  },
  context,
});
