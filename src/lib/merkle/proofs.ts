/**
 * Merkle Proof Records
 * Self-describing inclusion and consistency proofs built from a MerkleTree,
 * in the RFC 9162 shape (0-based leaf index, tree sizes as leaf counts)
 */

import type { TreeHasher } from "../hash/tree-hasher.ts";
import { areEqual } from "../util/bytes.ts";
import type { MerkleTree } from "./merkle-tree.ts";
import { isCount } from "./tree-math.ts";
import { rootFromAuditPath, verifyConsistency } from "./verifier.ts";

/**
 * Inclusion proof structure
 * Proves that a leaf is included in a tree of a given size
 */
export interface InclusionProof {
  leafIndex: number; // 0-based position of the leaf
  treeSize: number;
  auditPath: Uint8Array[]; // Hashes from leaf to root
}

/**
 * Consistency proof structure
 * Proves that an older tree is a prefix of a newer tree
 */
export interface ConsistencyProof {
  oldSize: number;
  newSize: number;
  proof: Uint8Array[]; // Hashes proving consistency
}

/**
 * Build an inclusion proof for the leaf at `leafIndex` (0-based)
 *
 * @returns null if the leaf is outside the tree of `treeSize` leaves or
 *          `treeSize` exceeds the tree
 */
export function generateInclusionProof(
  tree: MerkleTree,
  leafIndex: number,
  treeSize: number
): InclusionProof | null {
  if (!isCount(leafIndex) || !isCount(treeSize)) {
    return null;
  }

  if (leafIndex >= treeSize || treeSize > tree.leafCount()) {
    return null;
  }

  return {
    leafIndex,
    treeSize,
    auditPath: tree.pathToRootAtSnapshot(leafIndex + 1, treeSize),
  };
}

/**
 * Build a consistency proof between two tree sizes
 * Equal sizes, or an empty old tree, give an empty proof.
 *
 * @returns null if `oldSize > newSize`, the new tree is empty, or
 *          `newSize` exceeds the tree
 */
export function generateConsistencyProof(
  tree: MerkleTree,
  oldSize: number,
  newSize: number
): ConsistencyProof | null {
  if (!isCount(oldSize) || !isCount(newSize)) {
    return null;
  }

  if (oldSize > newSize || newSize === 0 || newSize > tree.leafCount()) {
    return null;
  }

  return {
    oldSize,
    newSize,
    proof: tree.snapshotConsistency(oldSize, newSize),
  };
}

/**
 * Verify an inclusion proof
 * Note: leaf is the raw leaf data, hashed here as a leaf
 */
export function verifyInclusionProof(
  hasher: TreeHasher,
  leaf: Uint8Array,
  proof: InclusionProof,
  root: Uint8Array
): boolean {
  const computed = rootFromAuditPath(
    hasher,
    proof.leafIndex + 1,
    proof.treeSize,
    hasher.hashLeaf(leaf),
    proof.auditPath
  );
  return computed !== undefined && areEqual(computed, root);
}

/**
 * Verify a consistency proof against the roots of both trees
 */
export function verifyConsistencyProof(
  hasher: TreeHasher,
  proof: ConsistencyProof,
  oldRoot: Uint8Array,
  newRoot: Uint8Array
): boolean {
  return verifyConsistency(hasher, proof.oldSize, proof.newSize, oldRoot, newRoot, proof.proof);
}
