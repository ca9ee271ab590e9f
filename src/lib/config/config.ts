/**
 * Configuration Utilities
 * Loads tree and logging settings from defaults, an optional JSON file
 * and environment variables (in that order of precedence, lowest first)
 */

import * as fs from "fs";
import type {
  EnvironmentVariables,
  HashAlgorithm,
  LogFormat,
  LogLevel,
  MerkleTreeConfig,
} from "../../types/config.ts";
import { Logger } from "../logging/logger.ts";

export const HASH_ALGORITHMS: readonly HashAlgorithm[] = ["sha256", "sha384", "sha512"];
export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];
export const LOG_FORMATS: readonly LogFormat[] = ["json", "pretty"];

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: MerkleTreeConfig = {
  hashAlgorithm: "sha256",
  logLevel: "info",
  logFormat: "pretty",
};

function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return typeof value === "string" && values.some((candidate) => candidate === value);
}

/**
 * Pick the recognised fields out of an untyped object
 * Unknown keys and values of the wrong type are dropped
 */
export function parseConfigObject(raw: unknown): Partial<MerkleTreeConfig> {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    return {};
  }

  const fields = new Map<string, unknown>(Object.entries(raw));
  const hashAlgorithm = fields.get("hashAlgorithm");
  const logLevel = fields.get("logLevel");
  const logFormat = fields.get("logFormat");
  const parsed: Partial<MerkleTreeConfig> = {};

  if (isOneOf(HASH_ALGORITHMS, hashAlgorithm)) {
    parsed.hashAlgorithm = hashAlgorithm;
  }
  if (isOneOf(LOG_LEVELS, logLevel)) {
    parsed.logLevel = logLevel;
  }
  if (isOneOf(LOG_FORMATS, logFormat)) {
    parsed.logFormat = logFormat;
  }

  return parsed;
}

/**
 * Load configuration from a JSON file
 * Returns an empty override if the file is missing or unreadable
 */
export function loadConfigFile(
  configPath: string,
  logger: Logger = new Logger()
): Partial<MerkleTreeConfig> {
  if (!fs.existsSync(configPath)) {
    logger.warn("Config file not found, using defaults", { path: configPath });
    return {};
  }

  try {
    const content = fs.readFileSync(configPath, "utf-8");
    return parseConfigObject(JSON.parse(content));
  } catch (error) {
    logger.error("Error loading config", {
      path: configPath,
      error: error instanceof Error ? error.message : String(error),
    });
    return {};
  }
}

/**
 * Read overrides from environment variables
 */
export function configFromEnv(env: EnvironmentVariables): Partial<MerkleTreeConfig> {
  const overrides: Partial<MerkleTreeConfig> = {};
  const algorithm = env.MERKLE_HASH_ALGORITHM?.toLowerCase();
  const level = env.LOG_LEVEL?.toLowerCase();
  const format = env.LOG_FORMAT?.toLowerCase();

  if (isOneOf(HASH_ALGORITHMS, algorithm)) {
    overrides.hashAlgorithm = algorithm;
  }
  if (isOneOf(LOG_LEVELS, level)) {
    overrides.logLevel = level;
  }
  if (isOneOf(LOG_FORMATS, format)) {
    overrides.logFormat = format;
  }

  return overrides;
}

/**
 * Load configuration
 * Defaults, then MERKLE_CONFIG_PATH (if set), then environment variables
 */
export function loadConfig(env: EnvironmentVariables = process.env): MerkleTreeConfig {
  const fromEnv = configFromEnv(env);
  // File diagnostics follow the logging settings given in the environment
  const logger = createLogger(mergeConfig(DEFAULT_CONFIG, fromEnv));
  const fromFile = env.MERKLE_CONFIG_PATH ? loadConfigFile(env.MERKLE_CONFIG_PATH, logger) : {};
  return mergeConfig(mergeConfig(DEFAULT_CONFIG, fromFile), fromEnv);
}

/**
 * Merge configuration with overrides
 * Undefined override fields leave the base value in place
 */
export function mergeConfig(
  base: MerkleTreeConfig,
  overrides: Partial<MerkleTreeConfig>
): MerkleTreeConfig {
  return {
    hashAlgorithm: overrides.hashAlgorithm ?? base.hashAlgorithm,
    logLevel: overrides.logLevel ?? base.logLevel,
    logFormat: overrides.logFormat ?? base.logFormat,
  };
}

/**
 * Validate configuration
 * Accepts plain strings so that values assembled outside loadConfig() can be checked
 */
export function validateConfig(config: Record<keyof MerkleTreeConfig, string>): string[] {
  const errors: string[] = [];

  if (!isOneOf(HASH_ALGORITHMS, config.hashAlgorithm)) {
    errors.push(`Invalid hash algorithm: ${config.hashAlgorithm} (must be one of ${HASH_ALGORITHMS.join(", ")})`);
  }

  if (!isOneOf(LOG_LEVELS, config.logLevel)) {
    errors.push(`Invalid log level: ${config.logLevel}`);
  }

  if (!isOneOf(LOG_FORMATS, config.logFormat)) {
    errors.push(`Invalid log format: ${config.logFormat}`);
  }

  return errors;
}

/**
 * Build the logger described by a configuration
 */
export function createLogger(config: MerkleTreeConfig, name?: string): Logger {
  return new Logger({ level: config.logLevel, format: config.logFormat, name });
}
