import type { AnalysisStatistics, DetectedSpan } from "./types/pii.js";

const HIGH_CONFIDENCE = 0.8;
const MEDIUM_CONFIDENCE = 0.5;

function roundTo3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/**
 * Count and confidence summary over a span sequence
 *
 * Buckets are a fixed reporting convention: high >= 0.8, medium in [0.5, 0.8), low < 0.5.
 * No spans gives all-zero statistics.
 */
export function summarizeSpans(spans: readonly DetectedSpan[]): AnalysisStatistics {
  const entityCounts = new Map<string, number>();
  const buckets = { high: 0, medium: 0, low: 0 };
  let scoreSum = 0;

  for (const span of spans) {
    entityCounts.set(span.entity_type, (entityCounts.get(span.entity_type) ?? 0) + 1);
    scoreSum += span.score;

    if (span.score >= HIGH_CONFIDENCE) buckets.high++;
    else if (span.score >= MEDIUM_CONFIDENCE) buckets.medium++;
    else buckets.low++;
  }

  return {
    total_entities: spans.length,
    entity_counts: Object.fromEntries(entityCounts),
    average_confidence: spans.length > 0 ? roundTo3(scoreSum / spans.length) : 0,
    confidence_buckets: buckets
  };
}
