/**
 * Tree Hashers
 * RFC 6962 domain separation for leaves and interior nodes
 */

import type { HashAlgorithm } from "../../types/config.ts";
import { MerkleTreeError } from "../errors.ts";
import { NodeSerialHasher, type SerialHasher } from "./serial-hasher.ts";

export const LEAF_PREFIX = 0x00;
export const NODE_PREFIX = 0x01;

/**
 * Tree Hasher Interface
 * The hashing capability a Merkle tree is built on. Leaf and node digests
 * must be domain separated so a leaf can never be mistaken for a node.
 */
export interface TreeHasher {
  /**
   * Root of a tree with no leaves
   */
  hashEmpty(): Uint8Array;

  /**
   * Digest of one leaf's raw data
   */
  hashLeaf(data: Uint8Array): Uint8Array;

  /**
   * Digest of an interior node from its two children
   */
  hashChildren(left: Uint8Array, right: Uint8Array): Uint8Array;

  /**
   * Length of every digest this hasher produces, in bytes
   */
  digestSize(): number;
}

/**
 * RFC 6962 tree hasher
 *
 * MTH({})      = HASH()
 * MTH({d})     = HASH(0x00 || d)
 * node(l, r)   = HASH(0x01 || l || r)
 */
export class Rfc6962TreeHasher implements TreeHasher {
  private readonly hasher: SerialHasher;
  private readonly emptyRoot: Uint8Array;

  constructor(hasher: SerialHasher) {
    if (!hasher) {
      throw new MerkleTreeError("A serial hasher is required");
    }
    this.hasher = hasher;
    this.emptyRoot = this.hasher.digest(new Uint8Array(0));

    if (this.emptyRoot.length !== hasher.digestSize) {
      throw new MerkleTreeError(
        `Hasher ${hasher.algorithm} produced ${this.emptyRoot.length} bytes, declared ${hasher.digestSize}`
      );
    }
  }

  hashEmpty(): Uint8Array {
    return this.emptyRoot.slice();
  }

  hashLeaf(data: Uint8Array): Uint8Array {
    const input = new Uint8Array(1 + data.length);
    input[0] = LEAF_PREFIX;
    input.set(data, 1);
    return this.hasher.digest(input);
  }

  hashChildren(left: Uint8Array, right: Uint8Array): Uint8Array {
    const input = new Uint8Array(1 + left.length + right.length);
    input[0] = NODE_PREFIX;
    input.set(left, 1);
    input.set(right, 1 + left.length);
    return this.hasher.digest(input);
  }

  digestSize(): number {
    return this.hasher.digestSize;
  }
}

/**
 * Create the RFC 6962 tree hasher for a SHA-2 algorithm
 */
export function createTreeHasher(algorithm: HashAlgorithm = "sha256"): TreeHasher {
  return new Rfc6962TreeHasher(new NodeSerialHasher(algorithm));
}
