/**
 * weft Coordinator
 *
 * The coordinator owns one state value and is responsible for:
 * - Serializing dispatches and background writes through one mailbox
 * - Running the root handler against a draft of the state
 * - Interpreting emissions (re-dispatch, forking work, merging)
 * - Tracking every forked task, per dispatch and overall
 * - Notifying observers after every processed item
 */

import {
  Cause,
  Duration,
  Effect,
  Fiber,
  FiberRef,
  HashSet,
  Option,
  PubSub,
  Runtime,
  Scope,
  Stream,
} from "effect";
import type {
  CompletionHandle,
  Coordinator as CoordinatorShape,
  CoordinatorError,
  CoordinatorOptions,
  Draft,
  Emission,
  Handler,
  ResolvedCoordinatorOptions,
  Work,
  WorkTag,
} from "./types.js";
import { WorkDefectError, ObserverError, StateUpdateError } from "./types.js";
import { makeDynamicState, makeSend } from "./access.js";
import {
  ActionCompletionContext,
  CurrentActionCompletion,
  makeCompletionHandle,
  withCurrentContext,
} from "./completion.js";
import { CoordinatorConfig, resolveOptions } from "./config.js";
import { freezeSnapshot } from "./snapshot.js";

// ============================================================================
// Mailbox
// ============================================================================

interface MailboxItem<T> {
  value: T;
  next: MailboxItem<T> | null;
}

class Mailbox<T> {
  private _processing = false;
  private _current: MailboxItem<T> | null = null;
  private _last: MailboxItem<T> | null = null;
  private _processor: (item: T) => void;

  constructor(processor: (item: T) => void) {
    this._processor = processor;
  }

  enqueue(value: T): void {
    const item: MailboxItem<T> = { value, next: null };

    if (this._last) {
      this._last.next = item;
      this._last = item;
    } else {
      this._current = item;
      this._last = item;
    }

    if (!this._processing) {
      this.flush();
    }
  }

  private flush(): void {
    this._processing = true;
    try {
      while (this._current) {
        const item = this._current;
        this._current = item.next;
        if (!this._current) {
          this._last = null;
        }
        this._processor(item.value);
      }
    } finally {
      this._processing = false;
    }
  }
}

type Item<S, A> =
  | { readonly _tag: "Dispatch"; readonly action: A; readonly context: ActionCompletionContext }
  | {
      readonly _tag: "Commit";
      readonly update: (current: S) => S;
      readonly actionId: number | undefined;
    };

// ============================================================================
// Coordinator
// ============================================================================

const createCoordinator = <S, A, R>(
  initialState: S,
  root: Handler<S, A, R>,
  runtime: Runtime.Runtime<R>,
  options: ResolvedCoordinatorOptions
): CoordinatorShape<S, A> => {
  // ============================================================================
  // State
  // ============================================================================

  const snapshot = (value: S): S => (options.debug ? freezeSnapshot(value) : value);

  let state = snapshot(initialState);
  let stopped = false;

  const observers = new Set<(state: S) => void>();
  const errorHandlers = new Set<(error: CoordinatorError) => void>();
  const changes = Effect.runSync(PubSub.unbounded<S>());

  // Every task ever spawned that has not finished yet
  const outstanding = new Set<Fiber.RuntimeFiber<unknown, unknown>>();
  const openContexts = new Set<ActionCompletionContext>();
  const sealTimers = new Set<Fiber.RuntimeFiber<void, never>>();

  // ============================================================================
  // Runtime Helpers
  // ============================================================================

  const runFork = <X>(eff: Effect.Effect<X, never, R>): Fiber.RuntimeFiber<X, never> =>
    Runtime.runFork(runtime)(eff);

  const annotate = <X, E, R2>(eff: Effect.Effect<X, E, R2>) =>
    Effect.annotateLogs(eff, "coordinator", options.label);

  // ============================================================================
  // Errors
  // ============================================================================

  const emitError = (error: CoordinatorError): boolean => {
    if (errorHandlers.size === 0) return false;
    errorHandlers.forEach((handler) => {
      try {
        handler(error);
      } catch (cause) {
        runFork(annotate(Effect.logError("onError handler threw", Cause.die(cause))));
      }
    });
    return true;
  };

  const report = (error: CoordinatorError) => {
    if (!emitError(error)) {
      runFork(annotate(Effect.logWarning(error.message).pipe(Effect.annotateLogs("error", error._tag))));
    }
  };

  // ============================================================================
  // Notifications
  // ============================================================================

  const notifyObservers = () => {
    observers.forEach((observer) => {
      try {
        observer(state);
      } catch (cause) {
        report(new ObserverError({ message: "State observer threw", cause }));
      }
    });
    Effect.runSync(PubSub.publish(changes, state));
  };

  // ============================================================================
  // Task Tracking
  // ============================================================================

  const track = (fiber: Fiber.RuntimeFiber<unknown, unknown>) => {
    if (stopped) {
      Effect.runFork(Fiber.interrupt(fiber));
      return;
    }
    outstanding.add(fiber);
    fiber.addObserver(() => {
      outstanding.delete(fiber);
    });
  };

  const openContext = () => {
    const context = new ActionCompletionContext({ debug: options.debug, track, report });
    openContexts.add(context);
    return context;
  };

  const seal = (context: ActionCompletionContext) => {
    context.seal();
    openContexts.delete(context);
  };

  const scheduleSeal = (context: ActionCompletionContext) => {
    if (Duration.isZero(options.registrationWindow)) {
      seal(context);
      return;
    }
    const timer = runFork(
      Effect.sleep(options.registrationWindow).pipe(Effect.zipRight(Effect.sync(() => seal(context))))
    );
    sealTimers.add(timer);
    timer.addObserver(() => {
      sealTimers.delete(timer);
    });
  };

  // ============================================================================
  // State Access For Work
  // ============================================================================

  const commit = (update: (current: S) => S): Effect.Effect<void> =>
    Effect.gen(function* () {
      if (stopped) return;
      const descriptor = yield* Effect.descriptor;
      if (HashSet.size(descriptor.interruptors) > 0) return;
      const context = yield* FiberRef.get(CurrentActionCompletion);
      if (Option.isSome(context) && context.value.isCancelled) return;
      mailbox.enqueue({
        _tag: "Commit",
        update,
        actionId: Option.getOrUndefined(Option.map(context, (c) => c.id)),
      });
    });

  const dynamicState = makeDynamicState(Effect.sync(() => state));
  const send = makeSend(commit);

  // ============================================================================
  // Emission Interpretation
  // ============================================================================

  const spawn = (kind: WorkTag, work: Work<S, R>, context: ActionCompletionContext) => {
    const program = Effect.suspend(() => work(dynamicState, send)).pipe(
      Effect.catchAllCause((cause) =>
        Cause.isInterruptedOnly(cause)
          ? Effect.void
          : Effect.logError(`${kind} work failed`, cause).pipe(
              Effect.zipRight(
                Effect.sync(() => {
                  emitError(
                    new WorkDefectError({
                      message: Cause.pretty(cause),
                      kind,
                      actionId: context.id,
                      cause: Cause.squash(cause),
                    })
                  );
                })
              )
            )
      ),
      Effect.withLogSpan(kind.toLowerCase()),
      Effect.annotateLogs("actionId", context.id),
      annotate,
      Effect.locally(CurrentActionCompletion, Option.some(context))
    );

    context.registerEffectTask(runFork(program));
  };

  const interpret = (emission: Emission<S, A, R>, context: ActionCompletionContext): void => {
    switch (emission._tag) {
      case "None":
        return;
      case "Action":
        runAction(emission.action, context);
        return;
      case "Perform":
      case "Observe":
        spawn(emission._tag, emission.work, context);
        return;
      case "Merge":
        emission.emissions.forEach((e) => interpret(e, context));
        return;
    }
  };

  const runAction = (action: A, context: ActionCompletionContext) => {
    const draft: Draft<S> = { current: state };
    const emission = root.handle(draft, action);
    state = snapshot(draft.current);
    interpret(emission, context);
  };

  // ============================================================================
  // Mailbox
  // ============================================================================

  const failUpdate = (error: StateUpdateError) => {
    runFork(annotate(Effect.logError(error.message, Cause.die(error.cause))));
    emitError(error);
  };

  // Each item is isolated: a throwing handler or update is reported against
  // its own action and the rest of the queue keeps draining.
  const processItem = (item: Item<S, A>) => {
    if (stopped) {
      if (item._tag === "Dispatch") seal(item.context);
      return;
    }

    switch (item._tag) {
      case "Dispatch": {
        const { action, context } = item;
        const before = state;
        try {
          withCurrentContext(context, () => runAction(action, context));
        } catch (cause) {
          failUpdate(
            new StateUpdateError({
              message: `Handler threw while processing action ${context.id}`,
              source: "Dispatch",
              actionId: context.id,
              cause,
            })
          );
          if (state === before) return;
        } finally {
          scheduleSeal(context);
        }
        notifyObservers();
        return;
      }
      case "Commit": {
        let next: S;
        try {
          next = item.update(state);
        } catch (cause) {
          failUpdate(
            new StateUpdateError({
              message: "State update threw; write dropped",
              source: "Commit",
              actionId: item.actionId,
              cause,
            })
          );
          return;
        }
        // A write that produced the very same value was dropped upstream
        if (next === state) return;
        state = snapshot(next);
        notifyObservers();
        return;
      }
    }
  };

  const mailbox = new Mailbox<Item<S, A>>(processItem);

  // ============================================================================
  // Coordinator API
  // ============================================================================

  const coordinator: CoordinatorShape<S, A> = {
    dispatch: (action: A): CompletionHandle => {
      if (stopped) {
        const context = new ActionCompletionContext({ debug: options.debug });
        context.seal();
        return makeCompletionHandle(context);
      }
      const context = openContext();
      mailbox.enqueue({ _tag: "Dispatch", action, context });
      return makeCompletionHandle(context);
    },

    getState: () => state,

    state: Effect.sync(() => state),

    subscribe: (observer) => {
      observers.add(observer);
      return () => {
        observers.delete(observer);
      };
    },

    changes: Stream.fromPubSub(changes),

    waitFor: (predicate) => {
      if (predicate(state)) {
        return Effect.succeed(state);
      }

      return Effect.async<S>((resume) => {
        let resolved = false;

        const observer = (next: S) => {
          if (!resolved && predicate(next)) {
            resolved = true;
            observers.delete(observer);
            resume(Effect.succeed(next));
          }
        };

        observers.add(observer);

        return Effect.sync(() => {
          observers.delete(observer);
        });
      });
    },

    onError: (handler) => {
      errorHandlers.add(handler);
      return () => {
        errorHandlers.delete(handler);
      };
    },

    stop: () => {
      if (stopped) return;
      stopped = true;

      openContexts.forEach(seal);

      if (sealTimers.size > 0) {
        Effect.runFork(Fiber.interruptAll([...sealTimers]));
      }
      if (outstanding.size > 0) {
        Effect.runFork(Fiber.interruptAll([...outstanding]));
      }

      observers.clear();
      Effect.runFork(PubSub.shutdown(changes));
    },

    get isStopped() {
      return stopped;
    },
  };

  return coordinator;
};

// ============================================================================
// Constructors
// ============================================================================

/**
 * Create a coordinator within the current Scope. Work runs on the caller's
 * runtime, so it sees its services, logger and clock.
 *
 * @example
 * ```ts
 * const program = Effect.gen(function* () {
 *   const counter = yield* Coordinator.make({ count: 0 }, counterHandler);
 *   yield* counter.dispatch(CounterAction.Load()).finish;
 *   return counter.getState();
 * });
 *
 * Effect.runPromise(Effect.scoped(program));
 * ```
 */
export const make = <S, A, R = never>(
  initialState: S,
  root: Handler<S, A, R>,
  options?: CoordinatorOptions
): Effect.Effect<CoordinatorShape<S, A>, never, R | Scope.Scope> =>
  Effect.flatMap(Effect.runtime<R>(), (runtime) => {
    const coordinator = createCoordinator(initialState, root, runtime, resolveOptions(options));

    // Stop when the scope closes
    return Effect.as(
      Effect.addFinalizer(() => Effect.sync(() => coordinator.stop())),
      coordinator
    );
  });

/**
 * Create a coordinator outside of Effect, on the default runtime.
 * The caller is responsible for calling `stop()`.
 */
export const makeSync = <S, A>(
  initialState: S,
  root: Handler<S, A>,
  options?: CoordinatorOptions
): CoordinatorShape<S, A> =>
  createCoordinator(initialState, root, Runtime.defaultRuntime, resolveOptions(options));

/**
 * Like `make`, with options read from `CoordinatorConfig`.
 */
export const makeFromConfig = <S, A, R = never>(
  initialState: S,
  root: Handler<S, A, R>,
  overrides?: CoordinatorOptions
): Effect.Effect<CoordinatorShape<S, A>, never, R | Scope.Scope> =>
  Effect.flatMap(CoordinatorConfig.load(overrides), (options) => make(initialState, root, options));

export const Coordinator = {
  make,
  makeSync,
  makeFromConfig,
} as const;

export type Coordinator<S, A> = CoordinatorShape<S, A>;
