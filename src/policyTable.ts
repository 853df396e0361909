import {
  ANONYMIZATION_STRATEGIES,
  HASH_TYPES,
  isAnonymizationStrategy,
  isHashType,
  type OperatorConfig,
  type PolicyTable
} from "./types/pii.js";
import { ConfigError } from "./errors.js";
import { codePointLength } from "./textIndex.js";
import { isRecord } from "./utils/guards.js";

/** Key of the wildcard entry in the JSON wire format */
export const DEFAULT_POLICY_KEY = "DEFAULT";

const MAX_REPLACEMENT_LENGTH = 256;
const VALID_KEY_BYTES = [16, 24, 32];

const DEFAULT_REPLACEMENT_TOKENS: Record<string, string> = {
  PERSON: "[PERSON]",
  EMAIL_ADDRESS: "[EMAIL]",
  PHONE_NUMBER: "[PHONE]",
  CREDIT_CARD: "[CREDIT_CARD]",
  US_SSN: "[SSN]",
  LOCATION: "[LOCATION]",
  DATE_TIME: "[DATE]",
  IP_ADDRESS: "[IP_ADDRESS]",
  URL: "[URL]",
  US_DRIVER_LICENSE: "[DRIVER_LICENSE]",
  US_PASSPORT: "[PASSPORT]",
  MEDICAL_LICENSE: "[MEDICAL_LICENSE]",
  US_BANK_NUMBER: "[BANK_NUMBER]",
  CRYPTO: "[CRYPTO_ADDRESS]",
  IBAN_CODE: "[IBAN]",
  US_ITIN: "[ITIN]",
  NRP: "[NRP]"
};

function replaceWith(newValue: string): OperatorConfig {
  return { strategy: "replace", parameters: { new_value: newValue } };
}

export const DEFAULT_POLICY_TABLE: PolicyTable = Object.freeze({
  default: replaceWith("[REDACTED]"),
  entities: Object.freeze(
    Object.fromEntries(
      Object.entries(DEFAULT_REPLACEMENT_TOKENS).map(([entityType, token]) => [entityType, replaceWith(token)])
    )
  )
});

/**
 * Looks up the operator for an entity type
 *
 * Entity-specific entry first, then the table's default entry.
 *
 * @throws ConfigError when neither exists
 */
export function resolveOperator(entityType: string, table: PolicyTable): OperatorConfig {
  if (Object.hasOwn(table.entities, entityType)) {
    return table.entities[entityType];
  }
  if (table.default) {
    return table.default;
  }
  throw new ConfigError(`No anonymization operator configured for entity type "${entityType}" and no default entry`);
}

/**
 * Merges an override table over a base table
 *
 * Entries replace wholesale (no parameter-level merge). An override default
 * replaces the base default; base entries absent from the override are kept.
 */
export function mergePolicyTables(base: PolicyTable, override: PolicyTable | undefined): PolicyTable {
  if (!override) return base;
  return {
    default: override.default ?? base.default,
    entities: { ...base.entities, ...override.entities }
  };
}

function readOptionalString(raw: Record<string, unknown>, key: string, label: string, errors: string[]): string | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    errors.push(`${label}: ${key} must be a string`);
    return undefined;
  }
  return value;
}

function isValidKey(key: string): boolean {
  return VALID_KEY_BYTES.includes(Buffer.byteLength(key, "utf8"));
}

/**
 * Parses one operator entry of the wire format
 *
 * Wire shape (flat, as clients send it):
 *   { "type": "mask", "masking_char": "#", "chars_to_mask": 4, "from_end": true }
 *
 * @param raw - Untrusted entry
 * @param label - Entry name used in error messages
 * @returns The parsed config, or null with messages pushed onto `errors`
 */
export function parseOperatorConfig(raw: unknown, label: string, errors: string[]): OperatorConfig | null {
  if (!isRecord(raw)) {
    errors.push(`${label}: operator must be an object`);
    return null;
  }

  const strategy = raw.type ?? raw.strategy;
  if (!isAnonymizationStrategy(strategy)) {
    errors.push(`${label}: type must be one of ${ANONYMIZATION_STRATEGIES.join(", ")}`);
    return null;
  }

  const before = errors.length;

  switch (strategy) {
    case "replace": {
      const newValue = raw.new_value;
      if (typeof newValue !== "string") {
        errors.push(`${label}: replace requires a string new_value`);
        return null;
      }
      if (newValue.length > MAX_REPLACEMENT_LENGTH) {
        errors.push(`${label}: new_value is too long (max ${MAX_REPLACEMENT_LENGTH} characters)`);
        return null;
      }
      return replaceWith(newValue);
    }

    case "redact":
      return { strategy: "redact", parameters: {} };

    case "mask": {
      const maskingChar = readOptionalString(raw, "masking_char", label, errors) ?? "*";
      if (codePointLength(maskingChar) !== 1) {
        errors.push(`${label}: masking_char must be a single character`);
      }

      const charsToMask = raw.chars_to_mask ?? -1;
      if (typeof charsToMask !== "number" || !Number.isInteger(charsToMask) || charsToMask < -1) {
        errors.push(`${label}: chars_to_mask must be an integer >= -1 (-1 masks everything)`);
      }

      const fromEnd = raw.from_end ?? false;
      if (typeof fromEnd !== "boolean") {
        errors.push(`${label}: from_end must be a boolean`);
      }

      if (errors.length > before || typeof charsToMask !== "number" || typeof fromEnd !== "boolean") {
        return null;
      }
      return {
        strategy: "mask",
        parameters: { masking_char: maskingChar, chars_to_mask: charsToMask, from_end: fromEnd }
      };
    }

    case "hash": {
      const hashType = raw.hash_type ?? "sha256";
      if (!isHashType(hashType)) {
        errors.push(`${label}: hash_type must be one of ${HASH_TYPES.join(", ")}`);
        return null;
      }
      const salt = readOptionalString(raw, "salt", label, errors);
      if (errors.length > before) return null;
      return salt === undefined
        ? { strategy: "hash", parameters: { hash_type: hashType } }
        : { strategy: "hash", parameters: { hash_type: hashType, salt } };
    }

    case "encrypt": {
      const key = readOptionalString(raw, "key", label, errors);
      if (key !== undefined && !isValidKey(key)) {
        errors.push(`${label}: key must be 16, 24 or 32 bytes long`);
      }
      if (errors.length > before) return null;
      return key === undefined
        ? { strategy: "encrypt", parameters: {} }
        : { strategy: "encrypt", parameters: { key } };
    }

    case "custom": {
      const name = raw.name;
      if (typeof name !== "string" || name.trim() === "") {
        errors.push(`${label}: custom requires a non-empty name`);
        return null;
      }
      return { strategy: "custom", parameters: { name } };
    }
  }
}

/**
 * Parses a policy table from its wire format
 *
 * Input:
 *   {
 *     "PERSON": { "type": "replace", "new_value": "<NAME>" },
 *     "DEFAULT": { "type": "redact" }
 *   }
 *
 * Every problem is reported, not only the first one.
 *
 * @returns The parsed table and all validation errors (table is only usable when errors is empty)
 */
export function parsePolicyTable(raw: unknown): { table: PolicyTable; errors: string[] } {
  const errors: string[] = [];
  const entities = new Map<string, OperatorConfig>();
  let defaultEntry: OperatorConfig | undefined;

  if (!isRecord(raw)) {
    return { table: { entities: {} }, errors: ["anonymization config must be an object"] };
  }

  for (const [entityType, entry] of Object.entries(raw)) {
    const config = parseOperatorConfig(entry, entityType, errors);
    if (!config) continue;

    if (entityType === DEFAULT_POLICY_KEY) {
      defaultEntry = config;
    } else {
      entities.set(entityType, config);
    }
  }

  const table: PolicyTable = { entities: Object.fromEntries(entities) };
  return {
    table: defaultEntry ? { ...table, default: defaultEntry } : table,
    errors
  };
}

function toWireEntry(config: OperatorConfig): Record<string, unknown> {
  if (config.strategy === "encrypt") {
    // Keys never leave the service.
    return { type: "encrypt", key_configured: config.parameters.key !== undefined };
  }
  return { type: config.strategy, ...config.parameters };
}

/** Serializes a table back to the wire format (used by GET /api/config) */
export function toWirePolicy(table: PolicyTable): Record<string, Record<string, unknown>> {
  const wire = new Map<string, Record<string, unknown>>();
  for (const [entityType, config] of Object.entries(table.entities)) {
    wire.set(entityType, toWireEntry(config));
  }
  if (table.default) {
    wire.set(DEFAULT_POLICY_KEY, toWireEntry(table.default));
  }
  return Object.fromEntries(wire);
}
