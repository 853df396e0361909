import fs from "node:fs/promises";
import type { PolicyTable } from "./types/pii.js";
import { ConfigError } from "./errors.js";
import { parsePolicyTable } from "./policyTable.js";

export const DEFAULT_PII_ENTITIES: readonly string[] = Object.freeze([
  "CREDIT_CARD",
  "CRYPTO",
  "DATE_TIME",
  "EMAIL_ADDRESS",
  "IBAN_CODE",
  "IP_ADDRESS",
  "NRP",
  "LOCATION",
  "PERSON",
  "PHONE_NUMBER",
  "MEDICAL_LICENSE",
  "URL",
  "US_BANK_NUMBER",
  "US_DRIVER_LICENSE",
  "US_ITIN",
  "US_PASSPORT",
  "US_SSN"
]);

export interface ServiceConfig {
  port: number;
  host: string;
  presidioUrl: string;
  presidioTimeoutMs: number;
  defaultLanguage: string;
  confidenceThreshold: number;
  defaultEntities: string[];
  maxTextLength: number;
  maxBatchSize: number;
  batchConcurrency: number;
  encryptionKey?: string;
  policyFile?: string;
  corsOrigins: string[];
  rateLimitPerMinute: number;
  nodeEnv: string;
}

type Env = Readonly<Record<string, string | undefined>>;

function readInteger(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min} (got "${raw}")`);
  }
  return value;
}

function readList(env: Env, name: string): string[] {
  const raw = env[name];
  if (!raw) return [];
  return raw.split(",").map((item) => item.trim()).filter((item) => item.length > 0);
}

/**
 * Reads service configuration from environment variables
 *
 * @throws ConfigError for a malformed number, threshold or key
 */
export function loadConfig(env: Env = process.env): ServiceConfig {
  const thresholdRaw = env.CONFIDENCE_THRESHOLD;
  const confidenceThreshold = thresholdRaw ? Number(thresholdRaw) : 0.5;
  if (!Number.isFinite(confidenceThreshold) || confidenceThreshold < 0 || confidenceThreshold > 1) {
    throw new ConfigError(`CONFIDENCE_THRESHOLD must be a number between 0 and 1 (got "${thresholdRaw}")`);
  }

  const encryptionKey = env.ENCRYPTION_KEY || undefined;
  if (encryptionKey !== undefined && ![16, 24, 32].includes(Buffer.byteLength(encryptionKey, "utf8"))) {
    throw new ConfigError("ENCRYPTION_KEY must be 16, 24 or 32 bytes long");
  }

  const defaultEntities = readList(env, "DEFAULT_ENTITIES");

  return {
    port: readInteger(env, "PORT", 5000, 1),
    host: env.HOST || "0.0.0.0",
    presidioUrl: env.PRESIDIO_URL || "http://localhost:5002",
    presidioTimeoutMs: readInteger(env, "PRESIDIO_TIMEOUT_MS", 5000, 1),
    defaultLanguage: env.DEFAULT_LANGUAGE || "en",
    confidenceThreshold,
    defaultEntities: defaultEntities.length > 0 ? defaultEntities : [...DEFAULT_PII_ENTITIES],
    maxTextLength: readInteger(env, "MAX_TEXT_LENGTH", 100_000, 1),
    maxBatchSize: readInteger(env, "MAX_BATCH_SIZE", 100, 1),
    batchConcurrency: readInteger(env, "BATCH_CONCURRENCY", 4, 1),
    encryptionKey,
    policyFile: env.POLICY_FILE || undefined,
    corsOrigins: readList(env, "CORS_ORIGINS"),
    rateLimitPerMinute: readInteger(env, "RATE_LIMIT_PER_MINUTE", 120, 1),
    nodeEnv: env.NODE_ENV || "development"
  };
}

/**
 * Loads a JSON policy table (same shape as the anonymization_config request field)
 *
 * @throws ConfigError when the file cannot be read, is not JSON or fails validation
 */
export async function loadPolicyFile(path: string): Promise<PolicyTable> {
  let content: string;
  try {
    content = await fs.readFile(path, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read policy file ${path}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Policy file ${path} is not valid JSON: ${message}`);
  }

  const { table, errors } = parsePolicyTable(parsed);
  if (errors.length > 0) {
    throw new ConfigError(`Policy file ${path} is invalid: ${errors.join("; ")}`);
  }

  console.log("[Config] Loaded policy file", { path, entries: Object.keys(table.entities).length });
  return table;
}
