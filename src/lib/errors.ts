/**
 * Merkle Tree Errors
 * Raised only for programming-contract violations; range and snapshot
 * problems in caller input are answered with empty sentinels instead.
 */

/**
 * Merkle Tree Error
 * Base error for tree and hasher contract violations
 */
export class MerkleTreeError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = "MerkleTreeError";
  }
}

/**
 * Invalid Proof Error
 * Thrown when an encoded proof does not have the expected structure
 */
export class InvalidProofError extends MerkleTreeError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = "InvalidProofError";
  }
}
