/**
 * Configuration Type Definitions
 * Tree hashing and logging settings
 */

/**
 * Hash Algorithm
 * Underlying digest used by the RFC 6962 tree hasher
 */
export type HashAlgorithm = "sha256" | "sha384" | "sha512";

/**
 * Log Level
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Log Format
 */
export type LogFormat = "json" | "pretty";

/**
 * Merkle Tree Configuration
 * Complete configuration for building a tree and its logger
 */
export interface MerkleTreeConfig {
  hashAlgorithm: HashAlgorithm; // Digest behind leaf/node hashing (default: "sha256")
  logLevel: LogLevel;           // Minimum level written (default: "info")
  logFormat: LogFormat;         // Output style (default: "pretty")
}

/**
 * Environment Variables
 * Mapped environment variables
 */
export interface EnvironmentVariables {
  MERKLE_CONFIG_PATH?: string;
  MERKLE_HASH_ALGORITHM?: string;
  // Logging
  LOG_LEVEL?: string;
  LOG_FORMAT?: string;
}
