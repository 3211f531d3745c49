import { Effect } from "effect";
import type { DynamicState, Send } from "./types.js";

export const makeDynamicState = <S>(current: Effect.Effect<S>): DynamicState<S> => ({
  current,
  get: <K extends keyof S>(key: K) => Effect.map(current, (state) => state[key]),
});

export const makeSend = <S>(
  update: (f: (current: S) => S) => Effect.Effect<void>
): Send<S> => Object.assign((state: S) => update(() => state), { update });
