import { describe, it, expect } from "vitest";
import { Effect } from "effect";
import {
  action,
  createEmissionBuilders,
  flatten,
  isAction,
  isMerge,
  isNone,
  isObserve,
  isPerform,
  mapAction,
  mapWork,
  merge,
  none,
  observe,
  perform,
} from "../src/emission.js";
import type { Emission, Work } from "../src/types.js";

interface Counter {
  readonly count: number;
}

const noop: Work<Counter> = () => Effect.void;
const other: Work<Counter> = () => Effect.void;

// ============================================================================
// Constructors & Guards
// ============================================================================

describe("emission constructors", () => {
  it("builds each variant with its tag", () => {
    expect(none._tag).toBe("None");
    expect(action("go")).toEqual({ _tag: "Action", action: "go" });
    expect(perform(noop)).toEqual({ _tag: "Perform", work: noop });
    expect(observe(noop)).toEqual({ _tag: "Observe", work: noop });
    expect(merge<Counter, string>(none, action("go")).emissions).toHaveLength(2);
  });

  it("narrows with guards", () => {
    const emissions: ReadonlyArray<Emission<Counter, string>> = [
      none,
      action("go"),
      perform(noop),
      observe(noop),
      merge(),
    ];

    expect(emissions.map(isNone)).toEqual([true, false, false, false, false]);
    expect(emissions.map(isAction)).toEqual([false, true, false, false, false]);
    expect(emissions.map(isPerform)).toEqual([false, false, true, false, false]);
    expect(emissions.map(isObserve)).toEqual([false, false, false, true, false]);
    expect(emissions.map(isMerge)).toEqual([false, false, false, false, true]);
  });

  it("binds builders to a state and action type", () => {
    const { none: empty, action: act, perform: run, observe: watch, merge: all } =
      createEmissionBuilders<Counter, string>();

    const emission = all(empty, act("a"), run(noop), watch(other));

    expect(flatten(emission).map((e) => e._tag)).toEqual(["Action", "Perform", "Observe"]);
  });
});

// ============================================================================
// flatten
// ============================================================================

describe("flatten", () => {
  it("returns nothing for none", () => {
    expect(flatten(none)).toEqual([]);
  });

  it("expands nested merges depth-first in list order", () => {
    const emission = merge<Counter, string>(
      action("first"),
      merge(action("second"), none, merge(action("third"))),
      perform(noop),
      action("fourth")
    );

    const leaves = flatten(emission);

    expect(leaves.map((e) => (e._tag === "Action" ? e.action : e._tag))).toEqual([
      "first",
      "second",
      "third",
      "Perform",
      "fourth",
    ]);
  });
});

// ============================================================================
// mapAction / mapWork
// ============================================================================

describe("mapAction", () => {
  it("maps every action payload and keeps the shape", () => {
    const emission = merge<Counter, number>(action(1), perform(noop), merge(action(2)));

    const mapped = mapAction(emission, (n) => `#${n}`);

    expect(mapped._tag).toBe("Merge");
    expect(flatten(mapped)).toEqual([
      { _tag: "Action", action: "#1" },
      { _tag: "Perform", work: noop },
      { _tag: "Action", action: "#2" },
    ]);
  });

  it("leaves none untouched", () => {
    expect(mapAction(none, (n: number) => n + 1)).toBe(none);
  });
});

describe("mapWork", () => {
  it("transforms perform and observe work and reports which one it is", () => {
    const seen: Array<string> = [];
    const emission = merge<Counter, string>(perform(noop), action("keep"), observe(other));

    const mapped = mapWork(emission, (work, tag) => {
      seen.push(tag);
      return work === noop ? other : noop;
    });

    expect(seen).toEqual(["Perform", "Observe"]);
    expect(flatten(mapped)).toEqual([
      { _tag: "Perform", work: other },
      { _tag: "Action", action: "keep" },
      { _tag: "Observe", work: noop },
    ]);
  });
});
