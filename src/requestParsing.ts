/**
 * Request body parsing for the HTTP layer
 *
 * Each parser collects every problem it finds and throws a single
 * ValidationError("Validation failed", errors) so clients see all of them
 * at once. Limits come from the server configuration.
 */

import { isAnonymizationStrategy } from "./types/pii.js";
import { ValidationError } from "./errors.js";
import { parsePolicyTable } from "./policyTable.js";
import { codePointLength } from "./textIndex.js";
import { isRecord, isStringArray } from "./utils/guards.js";
import type {
  AnalyzeRequest,
  AnonymizeRequest,
  BatchAnalyzeOptions,
  DeanonymizeRequest
} from "./anonymizationEngine.js";
import type { ReplacementRecord } from "./textTransformer.js";

export interface RequestLimits {
  maxTextLength: number;
  maxBatchSize: number;
}

const MAX_ENTITIES = 50;
const MAX_LANGUAGE_LENGTH = 10;

function requireObject(body: unknown): Record<string, unknown> {
  if (!isRecord(body)) {
    throw new ValidationError("No JSON data provided");
  }
  return body;
}

function throwIfErrors(errors: string[]): void {
  if (errors.length > 0) {
    throw new ValidationError("Validation failed", errors);
  }
}

function readText(body: Record<string, unknown>, limits: RequestLimits, errors: string[]): string {
  const text = body.text;
  if (typeof text !== "string") {
    errors.push("text is required and must be a string");
    return "";
  }
  if (text.trim().length === 0) {
    errors.push("text must not be empty");
  } else if (codePointLength(text) > limits.maxTextLength) {
    errors.push(`text exceeds maximum length of ${limits.maxTextLength} characters`);
  }
  return text;
}

function readSharedOptions(body: Record<string, unknown>, errors: string[]): BatchAnalyzeOptions {
  const options: BatchAnalyzeOptions = {};

  if (body.entities !== undefined && body.entities !== null) {
    if (!isStringArray(body.entities)) {
      errors.push("entities must be an array of strings");
    } else if (body.entities.length > MAX_ENTITIES) {
      errors.push(`entities must contain at most ${MAX_ENTITIES} entries`);
    } else {
      options.entities = body.entities;
    }
  }

  if (body.language !== undefined) {
    if (typeof body.language !== "string" || body.language.length === 0 || body.language.length > MAX_LANGUAGE_LENGTH) {
      errors.push(`language must be a non-empty string of at most ${MAX_LANGUAGE_LENGTH} characters`);
    } else {
      options.language = body.language;
    }
  }

  if (body.score_threshold !== undefined) {
    const threshold = body.score_threshold;
    if (typeof threshold !== "number" || !Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
      errors.push("score_threshold must be a number between 0 and 1");
    } else {
      options.score_threshold = threshold;
    }
  }

  return options;
}

export function parseAnalyzeRequest(body: unknown, limits: RequestLimits): AnalyzeRequest {
  const raw = requireObject(body);
  const errors: string[] = [];
  const text = readText(raw, limits, errors);
  const options = readSharedOptions(raw, errors);
  throwIfErrors(errors);
  return { text, ...options };
}

/**
 * Parses POST /api/anonymize
 *
 * Body:
 *   {
 *     "text": "...",
 *     "spans": [{ "entity_type": "PERSON", "start": 0, "end": 4, "score": 0.9 }],  // optional
 *     "anonymization_config": { "PERSON": { "type": "mask" } },                    // optional
 *     "entities": [...], "language": "en", "score_threshold": 0.5                   // optional
 *   }
 *
 * Individual spans are not checked here; the resolver drops malformed ones.
 */
export function parseAnonymizeRequest(body: unknown, limits: RequestLimits): AnonymizeRequest {
  const raw = requireObject(body);
  const errors: string[] = [];
  const text = readText(raw, limits, errors);
  const options = readSharedOptions(raw, errors);
  const request: AnonymizeRequest = { text, ...options };

  if (raw.spans !== undefined) {
    if (!Array.isArray(raw.spans)) {
      errors.push("spans must be an array");
    } else {
      request.spans = raw.spans;
    }
  }

  const policyRaw = raw.anonymization_config ?? raw.operators;
  if (policyRaw !== undefined && policyRaw !== null) {
    const { table, errors: policyErrors } = parsePolicyTable(policyRaw);
    errors.push(...policyErrors);
    request.policy = table;
  }

  throwIfErrors(errors);
  return request;
}

export function parseBatchRequest(
  body: unknown,
  limits: RequestLimits
): { texts: unknown[]; options: BatchAnalyzeOptions } {
  const raw = requireObject(body);
  const errors: string[] = [];
  const texts = raw.texts;

  if (!Array.isArray(texts) || texts.length === 0) {
    errors.push("texts must be a non-empty list");
  } else if (texts.length > limits.maxBatchSize) {
    errors.push(`texts must contain at most ${limits.maxBatchSize} entries`);
  }

  const options = readSharedOptions(raw, errors);
  throwIfErrors(errors);
  return { texts: Array.isArray(texts) ? texts : [], options };
}

function parseReplacementRecord(value: unknown, index: number, errors: string[]): ReplacementRecord | null {
  const label = `items[${index}]`;
  if (!isRecord(value)) {
    errors.push(`${label} must be an object`);
    return null;
  }

  const { entity_type, original_start, original_end, applied_strategy, replacement_text } = value;
  const before = errors.length;

  if (typeof entity_type !== "string") errors.push(`${label}.entity_type must be a string`);
  if (!Number.isInteger(original_start)) errors.push(`${label}.original_start must be an integer`);
  if (!Number.isInteger(original_end)) errors.push(`${label}.original_end must be an integer`);
  if (!isAnonymizationStrategy(applied_strategy)) errors.push(`${label}.applied_strategy is not a known strategy`);
  if (typeof replacement_text !== "string") errors.push(`${label}.replacement_text must be a string`);

  if (
    errors.length > before ||
    typeof entity_type !== "string" ||
    typeof original_start !== "number" ||
    typeof original_end !== "number" ||
    !isAnonymizationStrategy(applied_strategy) ||
    typeof replacement_text !== "string"
  ) {
    return null;
  }

  return { entity_type, original_start, original_end, applied_strategy, replacement_text };
}

/**
 * Parses POST /api/deanonymize
 *
 * `items` is the audit list returned by /api/anonymize, unchanged.
 */
export function parseDeanonymizeRequest(body: unknown, limits: RequestLimits): DeanonymizeRequest {
  const raw = requireObject(body);
  const errors: string[] = [];
  const text = raw.text;
  const items: ReplacementRecord[] = [];

  if (typeof text !== "string") {
    errors.push("text is required and must be a string");
  } else if (codePointLength(text) > limits.maxTextLength) {
    errors.push(`text exceeds maximum length of ${limits.maxTextLength} characters`);
  }

  if (!Array.isArray(raw.items)) {
    errors.push("items must be an array");
  } else {
    raw.items.forEach((value: unknown, index) => {
      const record = parseReplacementRecord(value, index, errors);
      if (record) items.push(record);
    });
  }

  if (raw.key !== undefined && typeof raw.key !== "string") {
    errors.push("key must be a string");
  }

  throwIfErrors(errors);
  return {
    text: typeof text === "string" ? text : "",
    items,
    ...(typeof raw.key === "string" && { key: raw.key })
  };
}
