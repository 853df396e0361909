import { createCipheriv, createDecipheriv, createHash, randomBytes } from "node:crypto";
import type { DetectedSpan, HashType, OperatorConfig } from "./types/pii.js";
import { ConfigError, ValidationError } from "./errors.js";
import { toCodePoints } from "./textIndex.js";

/** Externally supplied substitution for the `custom` strategy */
export type CustomOperator = (original: string, span: DetectedSpan) => string;

export interface OperatorContext {
  /** Used by `encrypt` entries that carry no key of their own */
  encryptionKey?: string;
  customOperators: ReadonlyMap<string, CustomOperator>;
}

const IV_BYTES = 16;

const CIPHER_BY_KEY_BYTES: Record<number, string> = {
  16: "aes-128-cbc",
  24: "aes-192-cbc",
  32: "aes-256-cbc"
};

/**
 * Computes the replacement string for one span
 *
 * @param config - Operator resolved for the span's entity type
 * @param original - Text covered by the span
 * @param span - Span metadata (passed through to custom operators)
 * @throws ConfigError for a missing key or an unknown/failing custom operator
 */
export function applyOperator(
  config: OperatorConfig,
  original: string,
  span: DetectedSpan,
  context: OperatorContext
): string {
  switch (config.strategy) {
    case "replace":
      return config.parameters.new_value;
    case "redact":
      return "";
    case "mask":
      return maskValue(original, config.parameters);
    case "hash":
      return hashValue(original, config.parameters.hash_type, config.parameters.salt);
    case "encrypt": {
      const key = config.parameters.key ?? context.encryptionKey;
      if (!key) {
        throw new ConfigError(`No encryption key configured for entity type "${span.entity_type}"`);
      }
      return encryptValue(original, key);
    }
    case "custom":
      return applyCustomOperator(config.parameters.name, original, span, context);
  }
}

/**
 * Masks up to `chars_to_mask` characters, from the start or from the end
 *
 * Examples (masking_char "*"):
 *   maskValue("4111111111111111", { chars_to_mask: 12, from_end: false }) → "************1111"
 *   maskValue("secret", { chars_to_mask: -1 })                            → "******"
 *   maskValue("abc", { chars_to_mask: 10 })                               → "***"
 */
export function maskValue(
  original: string,
  params: { masking_char: string; chars_to_mask: number; from_end: boolean }
): string {
  const chars = toCodePoints(original);
  const count = params.chars_to_mask < 0 ? chars.length : Math.min(params.chars_to_mask, chars.length);
  const mask = params.masking_char.repeat(count);

  if (params.from_end) {
    return chars.slice(0, chars.length - count).join("") + mask;
  }
  return mask + chars.slice(count).join("");
}

/** Hex digest of `salt + original`; identical input always yields the same token */
export function hashValue(original: string, hashType: HashType, salt = ""): string {
  return createHash(hashType).update(salt + original, "utf8").digest("hex");
}

function cipherFor(key: string): { algorithm: string; keyBuffer: Buffer } {
  const keyBuffer = Buffer.from(key, "utf8");
  const algorithm = CIPHER_BY_KEY_BYTES[keyBuffer.length];
  if (!algorithm) {
    throw new ConfigError("Encryption key must be 16, 24 or 32 bytes long");
  }
  return { algorithm, keyBuffer };
}

/**
 * AES-CBC encryption of one value
 *
 * Output: base64(IV || ciphertext). A fresh IV is drawn per call, so the same
 * value encrypts differently each time; use `hash` for stable pseudonyms.
 */
export function encryptValue(plaintext: string, key: string): string {
  const { algorithm, keyBuffer } = cipherFor(key);
  const iv = randomBytes(IV_BYTES);
  const cipher = createCipheriv(algorithm, keyBuffer, iv);
  const ciphertext = Buffer.concat([cipher.update(plaintext, "utf8"), cipher.final()]);
  return Buffer.concat([iv, ciphertext]).toString("base64");
}

/**
 * Reverses {@link encryptValue}
 *
 * @throws ConfigError for a key of the wrong size
 * @throws ValidationError when the token is not a ciphertext produced with this key
 */
export function decryptValue(token: string, key: string): string {
  const { algorithm, keyBuffer } = cipherFor(key);
  const payload = Buffer.from(token, "base64");

  if (payload.length < IV_BYTES * 2 || payload.length % IV_BYTES !== 0) {
    throw new ValidationError("Encrypted value is malformed");
  }

  try {
    const decipher = createDecipheriv(algorithm, keyBuffer, payload.subarray(0, IV_BYTES));
    return Buffer.concat([decipher.update(payload.subarray(IV_BYTES)), decipher.final()]).toString("utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Encrypted value could not be decrypted: ${reason}`);
  }
}

function applyCustomOperator(name: string, original: string, span: DetectedSpan, context: OperatorContext): string {
  const operator = context.customOperators.get(name);
  if (!operator) {
    throw new ConfigError(`Unknown custom operator "${name}"`);
  }

  let replacement: unknown;
  try {
    replacement = operator(original, span);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Custom operator "${name}" failed: ${reason}`);
  }

  if (typeof replacement !== "string") {
    throw new ConfigError(`Custom operator "${name}" must return a string`);
  }
  return replacement;
}
