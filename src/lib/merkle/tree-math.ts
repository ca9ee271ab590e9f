/**
 * Tree Index Arithmetic
 * Node positions are 0-based within a level; level 0 holds the leaves.
 * Plain arithmetic is used rather than bit operators so indices above
 * 2^31 stay exact.
 */

/**
 * True if the node at this index is the right child of its parent
 */
export function isRightChild(index: number): boolean {
  return index % 2 === 1;
}

/**
 * Index of the parent one level up
 */
export function parent(index: number): number {
  return Math.floor(index / 2);
}

/**
 * Index of the node covering `index` after climbing `levels` levels
 */
export function ancestor(index: number, levels: number): number {
  return Math.floor(index / 2 ** levels);
}

/**
 * Find largest power of 2 strictly less than n
 * For the RFC 6962 MTH split rule; requires n > 1
 */
export function largestPowerOfTwoLessThan(n: number): number {
  let k = 1;
  while (k * 2 < n) {
    k *= 2;
  }
  return k;
}

/**
 * Number of levels in a tree of `size` leaves
 * 0 for an empty tree, 1 for a single leaf, ceil(log2(size)) + 1 otherwise
 */
export function levelCountFor(size: number): number {
  if (size === 0) {
    return 0;
  }

  let levels = 1;
  let width = size;
  while (width > 1) {
    width = Math.ceil(width / 2);
    levels++;
  }
  return levels;
}

/**
 * Non-negative safe integer, i.e. a usable leaf count or position
 */
export function isCount(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}
