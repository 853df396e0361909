import type { DetectedSpan } from "./types/pii.js";
import { sliceCodePoints } from "./textIndex.js";
import { isRecord } from "./utils/guards.js";

/**
 * Builds a frozen DetectedSpan over `codePoints`
 *
 * Offsets are taken as given; range checks belong to the resolver, which
 * drops bad spans instead of failing. Out-of-range offsets simply yield a
 * shorter (or empty) `source_text`.
 */
export function createDetectedSpan(
  codePoints: readonly string[],
  fields: { entity_type: string; start: number; end: number; score: number }
): DetectedSpan {
  return Object.freeze({
    entity_type: fields.entity_type,
    start: fields.start,
    end: fields.end,
    score: fields.score,
    source_text: sliceCodePoints(codePoints, Math.max(0, fields.start), Math.max(0, fields.end))
  });
}

/**
 * Converts an untrusted span-like value into a DetectedSpan
 *
 * Returns null when the value is not span-shaped (missing entity_type,
 * non-numeric offsets or score). Callers count these as invalid drops.
 */
export function toDetectedSpan(codePoints: readonly string[], value: unknown): DetectedSpan | null {
  if (!isRecord(value)) return null;

  const { entity_type, start, end, score } = value;
  if (typeof entity_type !== "string" || entity_type.length === 0) return null;
  if (typeof start !== "number" || typeof end !== "number" || typeof score !== "number") return null;

  return createDetectedSpan(codePoints, { entity_type, start, end, score });
}

export function spanLength(span: Pick<DetectedSpan, "start" | "end">): number {
  return span.end - span.start;
}

/**
 * Overlap check for half-open ranges
 *
 * [a.start, a.end) and [b.start, b.end) overlap if a.start < b.end AND a.end > b.start
 */
export function spansOverlap(
  a: Pick<DetectedSpan, "start" | "end">,
  b: Pick<DetectedSpan, "start" | "end">
): boolean {
  return a.start < b.end && a.end > b.start;
}

/** Offsets and score a span must have to be usable against a text of `textLength` code points */
export function isWellFormedSpan(span: DetectedSpan, textLength: number): boolean {
  return (
    Number.isInteger(span.start) &&
    Number.isInteger(span.end) &&
    span.start >= 0 &&
    span.end <= textLength &&
    span.start < span.end &&
    Number.isFinite(span.score) &&
    span.score >= 0 &&
    span.score <= 1
  );
}
