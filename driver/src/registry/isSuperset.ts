/**
 * Returns true if `b` is an order-preserving subsequence of `a`.
 *
 * Not set inclusion: ["a", "b"] is not a superset of ["b", "a"].
 */
export const isSuperset = (
  a: readonly string[],
  b: readonly string[],
): boolean => {
  if (a.length < b.length) {
    return false;
  }
  let bi = 0;
  for (const item of a) {
    if (bi === b.length) {
      break;
    }
    if (item === b[bi]) {
      bi++;
    }
  }
  return bi === b.length;
};
