import { describe, it, expect } from "vitest";
import { Data, Effect, TestClock } from "effect";
import { interact } from "../src/handler.js";
import { debounce, debounceWith } from "../src/debounce.js";
import { Debouncer } from "../src/debouncer.js";
import { make } from "../src/coordinator.js";
import { mergeMany } from "../src/merge.js";
import type { Work } from "../src/types.js";
import { runWithTestClock } from "./test-utils.js";

interface SearchState {
  readonly query: string;
  readonly results: ReadonlyArray<string>;
}

class SetQuery extends Data.TaggedClass("SetQuery")<{ readonly query: string }> {}

const initialSearch: SearchState = { query: "", results: [] };

// ============================================================================
// Emission Mapping
// ============================================================================

describe("debounce (emission mapping)", () => {
  it("wraps perform work and passes observe work and actions through", () => {
    const performWork: Work<SearchState> = () => Effect.void;
    const observeWork: Work<SearchState> = () => Effect.void;

    const child = interact<SearchState, SetQuery>((_draft, action, { merge, perform, observe, action: emit }) =>
      merge(perform(performWork), observe(observeWork), emit(action))
    );

    const emission = debounce("100 millis", child).handle(
      { current: initialSearch },
      new SetQuery({ query: "x" })
    );

    expect(emission._tag).toBe("Merge");
    if (emission._tag === "Merge") {
      const [performed, observed, emitted] = emission.emissions;
      expect(performed._tag).toBe("Perform");
      if (performed._tag === "Perform") {
        expect(performed.work).not.toBe(performWork);
      }
      expect(observed).toEqual({ _tag: "Observe", work: observeWork });
      expect(emitted).toEqual({ _tag: "Action", action: new SetQuery({ query: "x" }) });
    }
  });
});

// ============================================================================
// Through A Coordinator
// ============================================================================

describe("debounce (through a coordinator)", () => {
  it("applies state at once and only runs the last perform", async () => {
    const result = await runWithTestClock(
      Effect.gen(function* () {
        const searched: Array<string> = [];

        const search = interact<SearchState, SetQuery>((draft, action, { perform }) => {
          draft.current = { ...draft.current, query: action.query };
          return perform((_state, send) =>
            Effect.gen(function* () {
              searched.push(action.query);
              yield* send.update((s) => ({ ...s, results: [`result for ${action.query}`] }));
            })
          );
        });

        const coordinator = yield* make(initialSearch, debounce("300 millis", search), {
          registrationWindow: 0,
        });

        const first = coordinator.dispatch(new SetQuery({ query: "a" }));
        const immediate = coordinator.getState().query;
        yield* TestClock.adjust("100 millis");
        const second = coordinator.dispatch(new SetQuery({ query: "ab" }));
        yield* TestClock.adjust("100 millis");
        const third = coordinator.dispatch(new SetQuery({ query: "abc" }));
        yield* TestClock.adjust("50 millis");
        const beforeWindow = { searched: [...searched], results: coordinator.getState().results };
        yield* TestClock.adjust("250 millis");

        yield* first.finish;
        yield* second.finish;
        yield* third.finish;

        return { immediate, beforeWindow, state: coordinator.getState(), searched };
      })
    );

    expect(result.immediate).toBe("a");
    expect(result.beforeWindow).toEqual({ searched: [], results: [] });
    expect(result.state).toEqual({ query: "abc", results: ["result for abc"] });
    expect(result.searched).toEqual(["abc"]);
  });

  it("shares one debouncer between handlers with debounceWith", async () => {
    const result = await runWithTestClock(
      Effect.gen(function* () {
        const debouncer = Debouncer.make("50 millis");
        const runs: Array<string> = [];

        const startingWith = (prefix: string) =>
          debounceWith(
            debouncer,
            interact<SearchState, SetQuery>((_draft, action, { none, perform }) =>
              action.query.startsWith(prefix)
                ? perform(() =>
                    Effect.sync(() => {
                      runs.push(`${prefix}:${action.query}`);
                    })
                  )
                : none
            )
          );

        const coordinator = yield* make(
          initialSearch,
          mergeMany([startingWith("a"), startingWith("b")]),
          { registrationWindow: 0 }
        );

        const first = coordinator.dispatch(new SetQuery({ query: "apple" }));
        yield* TestClock.adjust("10 millis");
        const second = coordinator.dispatch(new SetQuery({ query: "banana" }));
        yield* TestClock.adjust("50 millis");
        yield* first.finish;
        yield* second.finish;

        return runs;
      })
    );

    expect(result).toEqual(["b:banana"]);
  });
});
