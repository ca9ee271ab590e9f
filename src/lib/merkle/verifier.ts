/**
 * Merkle Proof Verification
 * RFC 6962 / RFC 9162 audit path and consistency proof checks.
 * Leaf positions are 1-based, matching MerkleTree.
 */

import type { TreeHasher } from "../hash/tree-hasher.ts";
import { areEqual } from "../util/bytes.ts";
import { isCount, isRightChild, largestPowerOfTwoLessThan, parent } from "./tree-math.ts";

/**
 * Root pair reconstructed from a consistency proof
 */
export interface ConsistencyRoots {
  oldRoot: Uint8Array;
  newRoot: Uint8Array;
}

/**
 * Replay an audit path from a leaf digest up to the root
 *
 * At each step the path entry is hashed on the left when the current node
 * is a right child, or when it is the last node of its level (a copied-up
 * node, which climbs until it becomes a right child or reaches index 0).
 *
 * @returns The implied root, or undefined if the path has the wrong length
 *          for the tree size or the position is out of range
 */
export function rootFromAuditPath(
  hasher: TreeHasher,
  leaf: number,
  treeSize: number,
  leafHash: Uint8Array,
  path: readonly Uint8Array[]
): Uint8Array | undefined {
  if (!isCount(leaf) || !isCount(treeSize) || leaf === 0 || leaf > treeSize) {
    return undefined;
  }

  let node = leaf - 1;
  let lastNode = treeSize - 1;
  let current = leafHash;

  for (const sibling of path) {
    if (lastNode === 0) {
      // Path too long
      return undefined;
    }

    if (isRightChild(node) || node === lastNode) {
      current = hasher.hashChildren(sibling, current);
      while (!isRightChild(node) && node !== 0) {
        node = parent(node);
        lastNode = parent(lastNode);
      }
    } else {
      current = hasher.hashChildren(current, sibling);
    }

    node = parent(node);
    lastNode = parent(lastNode);
  }

  // Path too short
  if (lastNode !== 0) {
    return undefined;
  }

  return current;
}

/**
 * Verify that `data` is the `leaf`th leaf of the tree of `treeSize`
 * leaves whose root is `root`
 */
export function verifyAuditPath(
  hasher: TreeHasher,
  leaf: number,
  treeSize: number,
  path: readonly Uint8Array[],
  root: Uint8Array,
  data: Uint8Array
): boolean {
  const computed = rootFromAuditPath(hasher, leaf, treeSize, hasher.hashLeaf(data), path);
  return computed !== undefined && areEqual(computed, root);
}

/**
 * Reconstruct both roots from a consistency proof
 *
 * @returns Undefined if the proof is malformed for the given sizes
 */
export function rootsFromConsistencyProof(
  hasher: TreeHasher,
  oldSize: number,
  newSize: number,
  oldRoot: Uint8Array,
  proof: readonly Uint8Array[]
): ConsistencyRoots | undefined {
  if (!isCount(oldSize) || !isCount(newSize) || oldSize === 0 || oldSize > newSize) {
    return undefined;
  }

  if (oldSize === newSize) {
    return proof.length === 0 ? { oldRoot, newRoot: oldRoot } : undefined;
  }

  return runTreeProof(hasher, proof, proof.length, 0, newSize, oldSize, oldRoot);
}

/**
 * Verify that the tree with root `oldRoot` is a prefix of the tree with
 * root `newRoot`
 */
export function verifyConsistency(
  hasher: TreeHasher,
  oldSize: number,
  newSize: number,
  oldRoot: Uint8Array,
  newRoot: Uint8Array,
  proof: readonly Uint8Array[]
): boolean {
  if (oldSize === 0 && isCount(newSize)) {
    // Every tree extends the empty tree
    return proof.length === 0;
  }

  const roots = rootsFromConsistencyProof(hasher, oldSize, newSize, oldRoot, proof);
  if (roots === undefined) {
    return false;
  }

  return areEqual(roots.oldRoot, oldRoot) && areEqual(roots.newRoot, newRoot);
}

/**
 * Recursive consistency replay over the leaf range [lo, hi)
 * `n` is the old tree size; only the first `end` proof entries belong to
 * this subtree. Returns [oldHash, newHash].
 */
function runTreeProof(
  hasher: TreeHasher,
  proof: readonly Uint8Array[],
  end: number,
  lo: number,
  hi: number,
  n: number,
  oldRoot: Uint8Array
): ConsistencyRoots | undefined {
  if (!(lo < n && n <= hi)) {
    return undefined;
  }

  // Reached common ground - both trees are identical up to n
  if (n === hi) {
    if (lo === 0) {
      // Root of the old tree, already known to the verifier
      return end === 0 ? { oldRoot, newRoot: oldRoot } : undefined;
    }
    if (end !== 1) {
      return undefined;
    }
    return { oldRoot: proof[0], newRoot: proof[0] };
  }

  if (end === 0) {
    // Proof too short
    return undefined;
  }

  const last = proof[end - 1];
  const k = largestPowerOfTwoLessThan(hi - lo);

  if (n <= lo + k) {
    // Old tree ends in the left subtree; the new tree adds the right one
    const inner = runTreeProof(hasher, proof, end - 1, lo, lo + k, n, oldRoot);
    if (inner === undefined) {
      return undefined;
    }
    return { oldRoot: inner.oldRoot, newRoot: hasher.hashChildren(inner.newRoot, last) };
  }

  // Old tree spans into the right subtree; both share the left one
  const inner = runTreeProof(hasher, proof, end - 1, lo + k, hi, n, oldRoot);
  if (inner === undefined) {
    return undefined;
  }
  return {
    oldRoot: hasher.hashChildren(last, inner.oldRoot),
    newRoot: hasher.hashChildren(last, inner.newRoot),
  };
}
