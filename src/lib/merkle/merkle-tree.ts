/**
 * Append-Only Merkle Tree
 * RFC 6962 Merkle Hash Tree with lazy evaluation, historical snapshot
 * roots, audit paths and consistency proofs
 */

import type { TreeHasher } from "../hash/tree-hasher.ts";
import { MerkleTreeError } from "../errors.ts";
import { defaultLogger, type Logger } from "../logging/logger.ts";
import { toHex } from "../util/bytes.ts";
import {
  ancestor,
  isCount,
  isRightChild,
  levelCountFor,
  parent,
} from "./tree-math.ts";

/**
 * Merkle tree options
 */
export interface MerkleTreeOptions {
  logger?: Logger;
}

/**
 * Result of walking the right spine of a past snapshot
 */
interface SnapshotWalk {
  root: Uint8Array;
  node: Uint8Array | undefined; // Rightmost node at the requested level, if any
}

/**
 * Merkle Hash Tree over an append-only sequence of leaves
 *
 * Only leaf digests are kept. Nodes are stored per level, left to right:
 * the hash of `tree[i][j]` and `tree[i][j + 1]` (j even) lives at
 * `tree[i + 1][j / 2]`. When `tree[i][j]` is the last node of its level and
 * has no right sibling, `tree[i + 1][j / 2]` is a copy of it.
 *
 * For example, five leaves a0..a4 are stored top-down as
 *
 *   | root |                     tree[3]
 *   | h20  | a4 |                tree[2]
 *   | h10  | h11 | a4 |          tree[1]
 *   | a0   | a1  | a2 | a3 | a4 | tree[0]
 *
 * Levels above 0 are only brought up to date when a root or proof needs
 * them. At every level all entries except the last are final; the last one
 * is correct only for `leavesProcessed` leaves and is rewritten when the
 * tree is evaluated further.
 *
 * Queries may extend this cache, so a tree must not be used from several
 * workers at once.
 */
export class MerkleTree {
  private readonly treeHasher: TreeHasher;
  private readonly logger: Logger;
  private readonly tree: Uint8Array[][] = [];
  // Number of leaves propagated up to the root
  private leavesProcessed = 0;

  constructor(treeHasher: TreeHasher, options: MerkleTreeOptions = {}) {
    if (!treeHasher) {
      throw new MerkleTreeError("A tree hasher is required");
    }
    this.treeHasher = treeHasher;
    this.logger = (options.logger ?? defaultLogger).child("merkle-tree");
  }

  /**
   * Length of a node (i.e. a digest) in bytes
   */
  nodeSize(): number {
    return this.treeHasher.digestSize();
  }

  /**
   * Number of leaves in the tree
   */
  leafCount(): number {
    return this.tree.length === 0 ? 0 : this.tree[0].length;
  }

  /**
   * Number of levels of the fully evaluated tree
   * 0 when empty, 1 for a single leaf, ceil(log2(n)) + 1 otherwise
   */
  levelCount(): number {
    return levelCountFor(this.leafCount());
  }

  /**
   * The `leaf`th leaf digest, counting from 1; empty if there is none
   */
  leafHash(leaf: number): Uint8Array;
  /**
   * Digest `data` would have as a leaf, without adding it
   */
  leafHash(data: Uint8Array): Uint8Array;
  leafHash(leafOrData: number | Uint8Array): Uint8Array {
    if (typeof leafOrData !== "number") {
      return this.treeHasher.hashLeaf(leafOrData);
    }

    if (!isCount(leafOrData) || leafOrData === 0 || leafOrData > this.leafCount()) {
      return emptyDigest();
    }
    return this.nodeAt(0, leafOrData - 1).slice();
  }

  /**
   * Add a leaf. Only its digest is stored, and the levels above are not
   * touched until a root or proof is requested.
   *
   * @returns Position of the new leaf, counting from 1 (the new leaf count)
   */
  addLeaf(data: Uint8Array): number {
    return this.appendLeafHash(this.treeHasher.hashLeaf(data));
  }

  /**
   * Add a leaf whose digest was computed elsewhere
   *
   * @returns Position of the new leaf, counting from 1
   */
  addLeafHash(leafHash: Uint8Array): number {
    const size = this.nodeSize();
    if (size > 0 && leafHash.length !== size) {
      throw new MerkleTreeError(`Invalid leaf hash size: expected ${size} bytes, got ${leafHash.length}`);
    }
    return this.appendLeafHash(leafHash.slice());
  }

  /**
   * Root of the tree over every leaf added so far
   * The empty-tree digest when there are no leaves
   */
  currentRoot(): Uint8Array {
    return this.rootAtSnapshot(this.leafCount());
  }

  /**
   * Root of the tree as it was after `snapshot` leaves
   *
   * @returns The empty-tree digest for snapshot 0, an empty digest if the
   *          snapshot is in the future
   */
  rootAtSnapshot(snapshot: number): Uint8Array {
    if (!isCount(snapshot) || snapshot > this.leafCount()) {
      return emptyDigest();
    }

    if (snapshot === 0) {
      return this.treeHasher.hashEmpty();
    }

    if (snapshot >= this.leavesProcessed) {
      return this.updateToSnapshot(snapshot).slice();
    }

    return this.recomputePastSnapshot(snapshot).root.slice();
  }

  /**
   * Audit path from the `leaf`th leaf (counting from 1) to the current root
   */
  pathToCurrentRoot(leaf: number): Uint8Array[] {
    return this.pathToRootAtSnapshot(leaf, this.leafCount());
  }

  /**
   * Audit path from a leaf to the root of a past snapshot
   *
   * Ordered from the leaf's sibling up to the node just below the root.
   * Empty if the leaf is 0, the leaf is outside the snapshot, or the
   * snapshot is in the future.
   */
  pathToRootAtSnapshot(leaf: number, snapshot: number): Uint8Array[] {
    if (!isCount(leaf) || !isCount(snapshot)) {
      return [];
    }

    if (leaf === 0 || leaf > snapshot || snapshot > this.leafCount()) {
      return [];
    }

    return this.pathFromNodeToRootAtSnapshot(leaf - 1, 0, snapshot);
  }

  /**
   * Consistency proof between two snapshots
   *
   * Empty if `snapshot1` is 0, `snapshot1 >= snapshot2`, or `snapshot2`
   * is in the future.
   */
  snapshotConsistency(snapshot1: number, snapshot2: number): Uint8Array[] {
    if (!isCount(snapshot1) || !isCount(snapshot2)) {
      return [];
    }

    if (snapshot1 === 0 || snapshot1 >= snapshot2 || snapshot2 > this.leafCount()) {
      return [];
    }

    // Everything left of the old tree's last leaf is shared by both trees.
    // Climb to the largest complete subtree ending at that leaf.
    let level = 0;
    let node = snapshot1 - 1;
    while (isRightChild(node)) {
      node = parent(node);
      level++;
    }

    if (snapshot2 > this.leavesProcessed) {
      this.updateToSnapshot(snapshot2);
    }

    const proof: Uint8Array[] = [];

    // Node 0 is the old root itself, which the verifier already holds
    if (node !== 0) {
      proof.push(this.nodeAt(level, node).slice());
    }

    proof.push(...this.pathFromNodeToRootAtSnapshot(node, level, snapshot2));
    return proof;
  }

  private appendLeafHash(leafHash: Uint8Array): number {
    if (this.tree.length === 0) {
      this.tree.push([]);
    }
    this.tree[0].push(leafHash);
    return this.tree[0].length;
  }

  /**
   * Evaluate the tree forward to `snapshot` leaves and return its root
   * Requires leavesProcessed <= snapshot <= leafCount
   */
  private updateToSnapshot(snapshot: number): Uint8Array {
    if (snapshot === this.leavesProcessed) {
      return this.root();
    }

    const from = this.leavesProcessed;
    let level = 0;
    // First node touched by the new leaves, and last node of the snapshot
    let firstNode = this.leavesProcessed;
    let lastNode = snapshot - 1;

    while (lastNode !== 0) {
      if (this.tree.length <= level + 1) {
        this.tree.push([]);
      } else if (this.tree[level + 1].length === parent(firstNode) + 1) {
        // The leftmost affected parent exists from the previous evaluation
        // and may be a stale copy; recompute it.
        this.tree[level + 1].pop();
      }

      const next = this.tree[level + 1];

      if (next.length !== parent(firstNode)) {
        throw new MerkleTreeError(
          `Frontier level ${level + 1} has ${next.length} nodes, expected ${parent(firstNode)}`
        );
      }

      // Start from a left sibling and hash complete pairs
      for (let j = firstNode - (firstNode % 2); j < lastNode; j += 2) {
        next.push(this.treeHasher.hashChildren(this.nodeAt(level, j), this.nodeAt(level, j + 1)));
      }

      // A last node without a right sibling is copied up unchanged
      if (!isRightChild(lastNode)) {
        next.push(this.nodeAt(level, lastNode));
      }

      firstNode = parent(firstNode);
      lastNode = parent(lastNode);
      level++;
    }

    this.leavesProcessed = snapshot;
    const root = this.nodeAt(level, 0);

    if (this.logger.isEnabled("debug")) {
      this.logger.debug("Evaluated tree", { from, to: snapshot, levels: level + 1, root: toHex(root) });
    }

    return root;
  }

  /**
   * Root of a snapshot no larger than the evaluated tree
   *
   * Cached nodes are trusted only where their whole subtree lies inside the
   * snapshot; the right spine is rehashed. If `nodeLevel` is given, the
   * snapshot's rightmost node at that level is captured on the way.
   */
  private recomputePastSnapshot(snapshot: number, nodeLevel?: number): SnapshotWalk {
    let level = 0;
    let lastNode = snapshot - 1;
    let node: Uint8Array | undefined;

    if (snapshot === this.leavesProcessed) {
      if (nodeLevel !== undefined && nodeLevel < this.tree.length) {
        // Above the leaves, the last node of each level belongs to this snapshot
        node = nodeLevel > 0
          ? this.nodeAt(nodeLevel, this.tree[nodeLevel].length - 1)
          : this.nodeAt(0, lastNode);
      }
      return { root: this.root(), node };
    }

    if (snapshot > this.leavesProcessed) {
      throw new MerkleTreeError(
        `Cannot recompute snapshot ${snapshot} beyond evaluated size ${this.leavesProcessed}`
      );
    }

    // Complete subtrees on the path of the last leaf are unchanged
    while (isRightChild(lastNode)) {
      if (nodeLevel === level) {
        node = this.nodeAt(level, lastNode);
      }
      lastNode = parent(lastNode);
      level++;
    }

    // lastNode is now a left child with no right sibling in the snapshot
    let subtreeRoot = this.nodeAt(level, lastNode);
    if (nodeLevel === level) {
      node = subtreeRoot;
    }

    while (lastNode !== 0) {
      if (isRightChild(lastNode)) {
        subtreeRoot = this.treeHasher.hashChildren(this.nodeAt(level, lastNode - 1), subtreeRoot);
      }
      // Otherwise the parent is a copy of the current node

      lastNode = parent(lastNode);
      level++;
      if (nodeLevel === level) {
        node = subtreeRoot;
      }
    }

    if (this.logger.isEnabled("debug")) {
      this.logger.debug("Recomputed past snapshot", { snapshot, evaluated: this.leavesProcessed });
    }

    return { root: subtreeRoot, node };
  }

  /**
   * Sibling digests from a node up to the root of a snapshot
   * Positions are 0-based; `level` 0 is the leaf level
   */
  private pathFromNodeToRootAtSnapshot(node: number, level: number, snapshot: number): Uint8Array[] {
    const path: Uint8Array[] = [];
    if (snapshot === 0) {
      return path;
    }

    let lastNode = ancestor(snapshot - 1, level);
    if (level >= this.levelCount() || node > lastNode || snapshot > this.leafCount()) {
      return path;
    }

    if (snapshot > this.leavesProcessed) {
      this.updateToSnapshot(snapshot);
    }

    let current = node;
    let currentLevel = level;

    while (lastNode !== 0) {
      const sibling = isRightChild(current) ? current - 1 : current + 1;

      if (sibling < lastNode) {
        // Not the last node of the level, so the cached value is final
        path.push(this.nodeAt(currentLevel, sibling).slice());
      } else if (sibling === lastNode) {
        // The last node of the level may differ between snapshots
        const { node: recomputed } = this.recomputePastSnapshot(snapshot, currentLevel);
        if (recomputed === undefined) {
          throw new MerkleTreeError(`No node recorded at level ${currentLevel} for snapshot ${snapshot}`);
        }
        path.push(recomputed.slice());
      }
      // Else the sibling is outside the snapshot and the parent is a copy

      current = parent(current);
      lastNode = parent(lastNode);
      currentLevel++;
    }

    return path;
  }

  /**
   * Root of the evaluated tree (leavesProcessed > 0)
   */
  private root(): Uint8Array {
    return this.nodeAt(this.tree.length - 1, 0);
  }

  private nodeAt(level: number, index: number): Uint8Array {
    const node = this.tree[level]?.[index];
    if (node === undefined) {
      throw new MerkleTreeError(`Tree has no node at level ${level}, index ${index}`);
    }
    return node;
  }
}

/**
 * Zero-length digest returned where no digest exists
 */
export function emptyDigest(): Uint8Array {
  return new Uint8Array(0);
}

/**
 * True for the zero-length "not found" digest
 */
export function isEmptyDigest(digest: Uint8Array): boolean {
  return digest.length === 0;
}
