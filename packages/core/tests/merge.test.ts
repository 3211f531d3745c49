import { describe, it, expect } from "vitest";
import { Effect } from "effect";
import { empty, from, interact } from "../src/handler.js";
import { merge, mergeMany } from "../src/merge.js";
import { isNone } from "../src/emission.js";
import type { Draft } from "../src/types.js";
import { Add, Increment, counter, initialCounter } from "./test-utils.js";
import type { CounterAction, CounterState } from "./test-utils.js";

// ============================================================================
// Handlers
// ============================================================================

describe("handlers", () => {
  it("empty ignores every action", () => {
    const draft: Draft<CounterState> = { current: initialCounter };

    const emission = empty<CounterState, CounterAction>().handle(draft, new Increment());

    expect(isNone(emission)).toBe(true);
    expect(draft.current).toBe(initialCounter);
  });

  it("from accepts any object with a handle method", () => {
    const custom = {
      calls: 0,
      handle(draft: Draft<CounterState>, _action: CounterAction) {
        this.calls += 1;
        draft.current = { ...draft.current, count: 99 };
        return { _tag: "None" } as const;
      },
    };

    const draft: Draft<CounterState> = { current: initialCounter };
    from(custom).handle(draft, new Increment());

    expect(custom.calls).toBe(1);
    expect(draft.current.count).toBe(99);
  });
});

// ============================================================================
// merge / mergeMany
// ============================================================================

describe("merge", () => {
  it("runs children in order against the same draft", () => {
    const doubler = interact<CounterState, CounterAction>((draft, _action, { none }) => {
      draft.current = { ...draft.current, count: draft.current.count * 2 };
      return none;
    });

    const draft: Draft<CounterState> = { current: { count: 3, log: [] } };
    merge(counter, doubler).handle(draft, new Add({ amount: 2 }));

    // (3 + 2) * 2
    expect(draft.current.count).toBe(10);
  });

  it("merges child emissions in child order", () => {
    const work = () => Effect.void;
    const first = interact<CounterState, CounterAction>((_draft, _action, { action }) =>
      action(new Increment())
    );
    const second = interact<CounterState, CounterAction>((_draft, _action, { perform }) =>
      perform(work)
    );

    const emission = merge(first, second).handle({ current: initialCounter }, new Increment());

    expect(emission._tag).toBe("Merge");
    if (emission._tag === "Merge") {
      expect(emission.emissions.map((e) => e._tag)).toEqual(["Action", "Perform"]);
    }
  });

  it("lets a later child see what an earlier child wrote", () => {
    const seen: Array<number> = [];
    const spy = interact<CounterState, CounterAction>((draft, _action, { none }) => {
      seen.push(draft.current.count);
      return none;
    });

    mergeMany([spy, counter, spy, counter, spy]).handle(
      { current: initialCounter },
      new Increment()
    );

    expect(seen).toEqual([0, 1, 2]);
  });

  it("mergeMany of nothing is none", () => {
    const draft: Draft<CounterState> = { current: initialCounter };

    const emission = mergeMany<CounterState, CounterAction, never>([]).handle(
      draft,
      new Increment()
    );

    expect(isNone(emission)).toBe(true);
    expect(draft.current).toBe(initialCounter);
  });
});
