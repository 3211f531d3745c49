/**
 * weft Paths
 *
 * Case paths pick one case out of a tagged union and put it back.
 * State paths locate child state inside a parent, either as a field
 * of a struct or as one variant of a union.
 *
 * @example
 * ```ts
 * type AppAction = Data.TaggedEnum<{ Search: { action: SearchAction }; Reset: {} }>;
 * const AppAction = Data.taggedEnum<AppAction>();
 *
 * const toSearch = CasePath.tagged<AppAction>()("Search", "action", (action) =>
 *   AppAction.Search({ action })
 * );
 * const searchState = StatePath.field<AppState>()("search");
 * ```
 */

import { Effect, Option } from "effect";
import type {
  CasePath as CasePathType,
  DynamicState,
  FieldPath,
  Send,
  StatePath as StatePathType,
  VariantPath,
} from "./types.js";
import { makeDynamicState, makeSend } from "./access.js";

type Tagged = { readonly _tag: string };
type CaseOf<Root extends Tagged, T extends Root["_tag"]> = Extract<Root, { readonly _tag: T }>;

const hasTag =
  <Root extends Tagged, T extends Root["_tag"]>(tag: T) =>
  (root: Root): root is CaseOf<Root, T> =>
    root._tag === tag;

// ============================================================================
// Case Paths
// ============================================================================

export const CasePath = {
  make: <Root, Value>(options: {
    readonly extract: (root: Root) => Option.Option<Value>;
    readonly embed: (value: Value) => Root;
  }): CasePathType<Root, Value> => ({
    extract: options.extract,
    embed: options.embed,
  }),

  /**
   * Case path to a payload field of one tagged case.
   */
  tagged:
    <Root extends Tagged>() =>
    <T extends Root["_tag"], K extends keyof CaseOf<Root, T>>(
      tag: T,
      key: K,
      embed: (value: CaseOf<Root, T>[K]) => Root
    ): CasePathType<Root, CaseOf<Root, T>[K]> => {
      const is = hasTag<Root, T>(tag);
      return {
        extract: (root) => (is(root) ? Option.some(root[key]) : Option.none()),
        embed,
      };
    },

  /**
   * Case path to a whole tagged case.
   */
  tag:
    <Root extends Tagged>() =>
    <T extends Root["_tag"]>(tag: T): CasePathType<Root, CaseOf<Root, T>> => {
      const is = hasTag<Root, T>(tag);
      return {
        extract: (root) => (is(root) ? Option.some(root) : Option.none()),
        embed: (value) => value,
      };
    },
};

// ============================================================================
// State Paths
// ============================================================================

export const StatePath = {
  field:
    <S extends object>() =>
    <K extends keyof S>(key: K): FieldPath<S, S[K]> => ({
      _tag: "Field",
      get: (parent) => parent[key],
      set: (parent, child) => ({ ...parent, [key]: child }),
    }),

  lens: <S, C>(get: (parent: S) => C, set: (parent: S, child: C) => S): FieldPath<S, C> => ({
    _tag: "Field",
    get,
    set,
  }),

  variant: <S, C>(casePath: CasePathType<S, C>): VariantPath<S, C> => ({
    _tag: "Variant",
    casePath,
  }),
};

// ============================================================================
// Projection
// ============================================================================

/**
 * Read child state through the parent. Reading a variant the parent has
 * left interrupts the reading fiber.
 */
export const projectState = <S, C>(
  parent: DynamicState<S>,
  path: StatePathType<S, C>
): DynamicState<C> => {
  switch (path._tag) {
    case "Field":
      return makeDynamicState(Effect.map(parent.current, path.get));
    case "Variant": {
      const { extract } = path.casePath;
      return makeDynamicState(
        Effect.flatMap(parent.current, (state) =>
          Option.match(extract(state), {
            onNone: () => Effect.interrupt,
            onSome: Effect.succeed,
          })
        )
      );
    }
  }
};

/**
 * Write child state through the parent. A write into a variant the parent
 * has left leaves the parent as it is.
 */
export const projectSend = <S, C>(parent: Send<S>, path: StatePathType<S, C>): Send<C> => {
  switch (path._tag) {
    case "Field": {
      const { get, set } = path;
      return makeSend((f) => parent.update((state) => set(state, f(get(state)))));
    }
    case "Variant": {
      const { extract, embed } = path.casePath;
      return makeSend((f) =>
        parent.update((state) =>
          Option.match(extract(state), {
            onNone: () => state,
            onSome: (child) => embed(f(child)),
          })
        )
      );
    }
  }
};

export type CasePath<Root, Value> = CasePathType<Root, Value>;
export type StatePath<S, C> = StatePathType<S, C>;
