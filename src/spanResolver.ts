import type { DetectedSpan, DropReport, ResolvedSpanSet } from "./types/pii.js";
import { isWellFormedSpan, spanLength, spansOverlap } from "./spans.js";

export interface ResolveOptions {
  scoreThreshold: number;
  /** When non-empty, spans of any other entity type are dropped */
  allowedEntityTypes?: readonly string[];
}

export interface ResolveReport {
  spans: ResolvedSpanSet;
  dropped: DropReport;
}

function markResolved(spans: DetectedSpan[]): ResolvedSpanSet {
  return Object.freeze(spans) as ResolvedSpanSet;
}

export const EMPTY_SPAN_SET: ResolvedSpanSet = markResolved([]);

/**
 * Filters, sorts and deduplicates raw detections into a ResolvedSpanSet
 *
 * Filtering (drops, never throws):
 * - score below threshold
 * - entity type outside `allowedEntityTypes` (when supplied)
 * - malformed range: non-integer offsets, start < 0, end > textLength, start >= end,
 *   or a score outside [0, 1]
 *
 * Overlap resolution: greedy over the priority order of
 * {@link compareSpanPriority}; a span is accepted only if it overlaps nothing
 * accepted so far. Losers are dropped, not merged. The result is returned in
 * start order.
 *
 * Example:
 *   Input: [
 *     { entity_type: "A", start: 0, end: 10, score: 0.6 },
 *     { entity_type: "B", start: 5, end: 15, score: 0.9 }
 *   ]
 *   Output: [ { entity_type: "B", start: 5, end: 15, score: 0.9 } ]
 *   (Same length, so the higher score wins the overlap.)
 *
 * Resolving an already resolved set with the same options returns it unchanged.
 *
 * @param textLength - Length of the analyzed text in code points
 * @param rawSpans - Detections in any order
 */
export function resolveSpansWithReport(
  textLength: number,
  rawSpans: readonly DetectedSpan[],
  options: ResolveOptions
): ResolveReport {
  const dropped: DropReport = { below_threshold: 0, entity_not_allowed: 0, invalid: 0, overlap: 0 };
  const allowed = options.allowedEntityTypes && options.allowedEntityTypes.length > 0
    ? new Set(options.allowedEntityTypes)
    : null;

  const candidates: DetectedSpan[] = [];
  for (const span of rawSpans) {
    if (!isWellFormedSpan(span, textLength)) {
      dropped.invalid++;
    } else if (span.score < options.scoreThreshold) {
      dropped.below_threshold++;
    } else if (allowed && !allowed.has(span.entity_type)) {
      dropped.entity_not_allowed++;
    } else {
      candidates.push(span);
    }
  }

  const accepted = filterNonOverlappingSpans(sortSpansByPriority(candidates));
  dropped.overlap = candidates.length - accepted.length;

  // Accepted spans are disjoint, so start order alone is total.
  accepted.sort((a, b) => a.start - b.start);

  return { spans: markResolved(accepted), dropped };
}

export function resolveSpans(
  textLength: number,
  rawSpans: readonly DetectedSpan[],
  options: ResolveOptions
): ResolvedSpanSet {
  return resolveSpansWithReport(textLength, rawSpans, options).spans;
}

/**
 * Priority order for overlap resolution
 *
 * 1. Span length - longer match wins
 * 2. Confidence score - higher wins
 * 3. Position (start) - earlier in text wins
 * 4. Entity type - lexicographic, so identical ranges always resolve the same way
 */
export function compareSpanPriority(a: DetectedSpan, b: DetectedSpan): number {
  const lengthDiff = spanLength(b) - spanLength(a);
  if (lengthDiff !== 0) return lengthDiff;

  if (a.score !== b.score) return b.score - a.score;

  if (a.start !== b.start) return a.start - b.start;

  if (a.entity_type < b.entity_type) return -1;
  if (a.entity_type > b.entity_type) return 1;
  return 0;
}

function sortSpansByPriority(spans: readonly DetectedSpan[]): DetectedSpan[] {
  return [...spans].sort(compareSpanPriority);
}

function filterNonOverlappingSpans(sorted: readonly DetectedSpan[]): DetectedSpan[] {
  const accepted: DetectedSpan[] = [];

  for (const span of sorted) {
    if (!accepted.some((existing) => spansOverlap(span, existing))) {
      accepted.push(span);
    }
  }

  return accepted;
}
