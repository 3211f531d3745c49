/**
 * weft Scoping
 *
 * `when` embeds a child handler into a parent domain. The child only sees
 * its own slice of state and its own actions; everything it emits is lifted
 * back into the parent.
 */

import { Option } from "effect";
import type {
  CasePath,
  Draft,
  Emission,
  FieldPath,
  Handler,
  StatePath,
  VariantPath,
} from "./types.js";
import { mapAction, mapWork, none } from "./emission.js";
import { StatePath as Paths, projectSend, projectState } from "./paths.js";

export interface WhenOptions<S, A, CS, CA> {
  readonly action: CasePath<A, CA>;
  readonly state: StatePath<S, CS>;
}

const lift = <S, A, R, CS, CA>(
  emission: Emission<CS, CA, R>,
  options: WhenOptions<S, A, CS, CA>
): Emission<S, A, R> =>
  mapAction(
    mapWork<CS, CA, R, S, R>(emission, (work) => (state, send) =>
      work(projectState(state, options.state), projectSend(send, options.state))
    ),
    options.action.embed
  );

const runField = <S, CS, CA, R>(
  draft: Draft<S>,
  path: FieldPath<S, CS>,
  child: Handler<CS, CA, R>,
  action: CA
): Emission<CS, CA, R> => {
  const childDraft: Draft<CS> = { current: path.get(draft.current) };
  try {
    return child.handle(childDraft, action);
  } finally {
    draft.current = path.set(draft.current, childDraft.current);
  }
};

const runVariant = <S, CS, CA, R>(
  draft: Draft<S>,
  path: VariantPath<S, CS>,
  child: Handler<CS, CA, R>,
  action: CA
): Emission<CS, CA, R> =>
  Option.match(path.casePath.extract(draft.current), {
    onNone: () => none,
    onSome: (value) => {
      const childDraft: Draft<CS> = { current: value };
      try {
        return child.handle(childDraft, action);
      } finally {
        draft.current = path.casePath.embed(childDraft.current);
      }
    },
  });

/**
 * Scope a child handler to a slice of parent state and a case of parent actions.
 *
 * Actions outside the case, and states outside the variant, yield `none`
 * and leave the parent untouched.
 */
export const when = <S, A, CS, CA, R>(
  options: WhenOptions<S, A, CS, CA>,
  child: Handler<CS, CA, R>
): Handler<S, A, R> => ({
  handle: (draft, action) =>
    Option.match(options.action.extract(action), {
      onNone: () => none,
      onSome: (childAction) => {
        const path = options.state;
        const emission =
          path._tag === "Field"
            ? runField(draft, path, child, childAction)
            : runVariant(draft, path, child, childAction);
        return lift(emission, options);
      },
    }),
});

/**
 * `when` over a struct field.
 *
 * @example
 * ```ts
 * const app = whenField<AppState>()("search", toSearch, searchFeature);
 * ```
 */
export const whenField =
  <S extends object>() =>
  <K extends keyof S, A, CA, R>(
    key: K,
    action: CasePath<A, CA>,
    child: Handler<S[K], CA, R>
  ): Handler<S, A, R> =>
    when({ action, state: Paths.field<S>()(key) }, child);

/**
 * `when` over one variant of a union.
 */
export const whenVariant = <S, CS, A, CA, R>(
  variant: CasePath<S, CS>,
  action: CasePath<A, CA>,
  child: Handler<CS, CA, R>
): Handler<S, A, R> => when({ action, state: Paths.variant(variant) }, child);
