/**
 * ct-merkle-tree
 * Append-only RFC 6962 Merkle tree with audit paths and consistency proofs
 */

export type {
  EnvironmentVariables,
  HashAlgorithm,
  LogFormat,
  LogLevel,
  MerkleTreeConfig,
} from "./types/config.ts";

export {
  DEFAULT_CONFIG,
  configFromEnv,
  createLogger,
  loadConfig,
  loadConfigFile,
  mergeConfig,
  validateConfig,
} from "./lib/config/config.ts";
export { InvalidProofError, MerkleTreeError } from "./lib/errors.ts";
export { Logger, type LogContext, type LoggerOptions } from "./lib/logging/logger.ts";

export { DIGEST_SIZES, NodeSerialHasher, type SerialHasher } from "./lib/hash/serial-hasher.ts";
export {
  LEAF_PREFIX,
  NODE_PREFIX,
  Rfc6962TreeHasher,
  createTreeHasher,
  type TreeHasher,
} from "./lib/hash/tree-hasher.ts";

export {
  MerkleTree,
  emptyDigest,
  isEmptyDigest,
  type MerkleTreeOptions,
} from "./lib/merkle/merkle-tree.ts";
export {
  generateConsistencyProof,
  generateInclusionProof,
  verifyConsistencyProof,
  verifyInclusionProof,
  type ConsistencyProof,
  type InclusionProof,
} from "./lib/merkle/proofs.ts";
export {
  rootFromAuditPath,
  rootsFromConsistencyProof,
  verifyAuditPath,
  verifyConsistency,
  type ConsistencyRoots,
} from "./lib/merkle/verifier.ts";
export {
  decodeConsistencyProof,
  decodeInclusionProof,
  encodeConsistencyProof,
  encodeInclusionProof,
} from "./lib/cose/proof-encoding.ts";
export { createMerkleTree } from "./lib/factory.ts";
export { areEqual, toHex } from "./lib/util/bytes.ts";
