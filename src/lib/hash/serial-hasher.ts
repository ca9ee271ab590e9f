/**
 * Serial Hashers
 * One-shot message digests backing the tree hasher
 */

import { createHash } from "crypto";
import type { HashAlgorithm } from "../../types/config.ts";

/**
 * Digest sizes in bytes
 */
export const DIGEST_SIZES: Record<HashAlgorithm, number> = {
  sha256: 32,
  sha384: 48,
  sha512: 64,
};

/**
 * Serial Hasher Interface
 * A plain collision-resistant hash function, without domain separation
 */
export interface SerialHasher {
  /**
   * Algorithm name (e.g., "sha256")
   */
  readonly algorithm: string;

  /**
   * Output length in bytes
   */
  readonly digestSize: number;

  /**
   * Hash a complete message
   */
  digest(data: Uint8Array): Uint8Array;
}

/**
 * SHA-2 hasher backed by node:crypto
 */
export class NodeSerialHasher implements SerialHasher {
  readonly algorithm: HashAlgorithm;
  readonly digestSize: number;

  constructor(algorithm: HashAlgorithm = "sha256") {
    this.algorithm = algorithm;
    this.digestSize = DIGEST_SIZES[algorithm];
  }

  digest(data: Uint8Array): Uint8Array {
    return new Uint8Array(createHash(this.algorithm).update(data).digest());
  }
}
