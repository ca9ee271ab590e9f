/**
 * Tree Construction
 * Builds a MerkleTree, its hasher and its logger from configuration
 */

import type { MerkleTreeConfig } from "../types/config.ts";
import { createLogger, loadConfig, validateConfig } from "./config/config.ts";
import { MerkleTreeError } from "./errors.ts";
import { createTreeHasher } from "./hash/tree-hasher.ts";
import { MerkleTree } from "./merkle/merkle-tree.ts";

/**
 * Create an empty tree
 * Configuration defaults to loadConfig() (defaults, file, environment)
 */
export function createMerkleTree(config: MerkleTreeConfig = loadConfig()): MerkleTree {
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new MerkleTreeError(`Invalid configuration: ${errors.join("; ")}`);
  }

  const logger = createLogger(config);
  logger.debug("Creating Merkle tree", { hashAlgorithm: config.hashAlgorithm });

  return new MerkleTree(createTreeHasher(config.hashAlgorithm), { logger });
}
