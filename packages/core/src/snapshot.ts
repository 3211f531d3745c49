/**
 * weft Snapshots
 *
 * Committed states are shared with observers, stream subscribers and
 * background readers. Freezing them turns an in-place edit into a
 * `TypeError` at the point of the edit.
 */

const isPlain = (value: object): boolean => {
  if (Array.isArray(value)) return true;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

/**
 * Deep-freeze plain objects and arrays. Class instances (including `Data`
 * values, which cache their hash on themselves) are left alone, and so is
 * everything below them. Frozen subtrees are not walked again.
 */
export const freezeSnapshot = <S>(value: S): S => {
  if (typeof value === "object" && value !== null && isPlain(value) && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      freezeSnapshot(child);
    }
  }
  return value;
};
