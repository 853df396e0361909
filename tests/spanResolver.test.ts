import { describe, it, expect } from 'vitest';
import { compareSpanPriority, resolveSpans, resolveSpansWithReport } from '../src/spanResolver.js';
import { createDetectedSpan } from '../src/spans.js';
import { toCodePoints } from '../src/textIndex.js';
import type { DetectedSpan } from '../src/types/pii.js';

/**
 * Unit tests for span filtering and overlap resolution
 * Architecture: Pure function testing with no mocking
 */

const TEXT = 'abcdefghijklmnopqrstuvwxyz0123';
const CODE_POINTS = toCodePoints(TEXT);

function span(entity_type: string, start: number, end: number, score: number): DetectedSpan {
  return createDetectedSpan(CODE_POINTS, { entity_type, start, end, score });
}

function summary(spans: readonly DetectedSpan[]): string[] {
  return spans.map((s) => `${s.entity_type}[${s.start},${s.end})`);
}

describe('resolveSpansWithReport - overlap resolution', () => {
  it('keeps the higher-scoring span of two equally long overlapping spans', () => {
    const a = span('A', 0, 10, 0.6);
    const b = span('B', 5, 15, 0.9);

    const { spans, dropped } = resolveSpansWithReport(TEXT.length, [a, b], { scoreThreshold: 0.5 });

    expect(summary(spans)).toEqual(['B[5,15)']);
    expect(dropped.overlap).toBe(1);
  });

  it('prefers the longer span over a shorter one with a higher score', () => {
    const person = span('PERSON', 0, 10, 0.6);
    const location = span('LOCATION', 2, 5, 0.99);

    const spans = resolveSpans(TEXT.length, [location, person], { scoreThreshold: 0 });

    expect(summary(spans)).toEqual(['PERSON[0,10)']);
  });

  it('treats adjacent half-open ranges as non-overlapping', () => {
    const spans = resolveSpans(TEXT.length, [span('A', 5, 9, 0.8), span('B', 0, 5, 0.8)], { scoreThreshold: 0 });

    expect(summary(spans)).toEqual(['B[0,5)', 'A[5,9)']);
  });

  it('breaks ties on identical ranges and scores by entity type', () => {
    const spans = resolveSpans(TEXT.length, [span('URL', 0, 4, 0.8), span('EMAIL_ADDRESS', 0, 4, 0.8)], {
      scoreThreshold: 0
    });

    expect(summary(spans)).toEqual(['EMAIL_ADDRESS[0,4)']);
  });

  it('returns accepted spans in start order regardless of input order', () => {
    const input = [span('C', 20, 25, 0.7), span('A', 0, 3, 0.9), span('B', 10, 12, 0.6)];

    const spans = resolveSpans(TEXT.length, input, { scoreThreshold: 0 });

    expect(summary(spans)).toEqual(['A[0,3)', 'B[10,12)', 'C[20,25)']);
  });

  it('never returns overlapping spans from a dense input', () => {
    const input = [
      span('A', 0, 8, 0.7),
      span('B', 3, 12, 0.8),
      span('C', 10, 14, 0.9),
      span('D', 13, 20, 0.6),
      span('E', 19, 22, 0.95)
    ];

    const spans = resolveSpans(TEXT.length, input, { scoreThreshold: 0 });

    for (let i = 1; i < spans.length; i++) {
      expect(spans[i - 1].end).toBeLessThanOrEqual(spans[i].start);
    }
  });

  it('is idempotent', () => {
    const input = [span('A', 0, 10, 0.6), span('B', 5, 15, 0.9), span('C', 16, 18, 0.7)];
    const once = resolveSpans(TEXT.length, input, { scoreThreshold: 0.5 });
    const twice = resolveSpans(TEXT.length, once, { scoreThreshold: 0.5 });

    expect(twice).toEqual(once);
  });
});

describe('resolveSpansWithReport - filtering', () => {
  it('drops spans below the threshold and keeps spans exactly at it', () => {
    const { spans, dropped } = resolveSpansWithReport(
      TEXT.length,
      [span('A', 0, 2, 0.49), span('B', 3, 5, 0.5)],
      { scoreThreshold: 0.5 }
    );

    expect(summary(spans)).toEqual(['B[3,5)']);
    expect(dropped.below_threshold).toBe(1);
  });

  it('drops entity types outside a non-empty allow list', () => {
    const { spans, dropped } = resolveSpansWithReport(
      TEXT.length,
      [span('PERSON', 0, 4, 0.9), span('URL', 5, 9, 0.9)],
      { scoreThreshold: 0, allowedEntityTypes: ['PERSON'] }
    );

    expect(summary(spans)).toEqual(['PERSON[0,4)']);
    expect(dropped.entity_not_allowed).toBe(1);
  });

  it('does not filter by type when the allow list is empty', () => {
    const spans = resolveSpans(TEXT.length, [span('PERSON', 0, 4, 0.9), span('URL', 5, 9, 0.9)], {
      scoreThreshold: 0,
      allowedEntityTypes: []
    });

    expect(spans).toHaveLength(2);
  });

  it('drops malformed ranges and scores without throwing', () => {
    const malformed = [
      span('NEGATIVE', -1, 3, 0.9),
      span('PAST_END', 25, 31, 0.9),
      span('EMPTY', 4, 4, 0.9),
      span('REVERSED', 8, 6, 0.9),
      span('FRACTION', 1.5, 3, 0.9),
      span('NAN_SCORE', 0, 3, Number.NaN),
      span('HIGH_SCORE', 0, 3, 1.2)
    ];

    const { spans, dropped } = resolveSpansWithReport(TEXT.length, malformed, { scoreThreshold: 0 });

    expect(spans).toEqual([]);
    expect(dropped).toEqual({ below_threshold: 0, entity_not_allowed: 0, invalid: 7, overlap: 0 });
  });

  it('accepts a span ending exactly at the end of the text', () => {
    const spans = resolveSpans(TEXT.length, [span('TAIL', 26, 30, 0.9)], { scoreThreshold: 0 });

    expect(summary(spans)).toEqual(['TAIL[26,30)']);
  });

  it('returns an empty set for empty input', () => {
    const { spans, dropped } = resolveSpansWithReport(0, [], { scoreThreshold: 0.5 });

    expect(spans).toEqual([]);
    expect(dropped).toEqual({ below_threshold: 0, entity_not_allowed: 0, invalid: 0, overlap: 0 });
  });
});

describe('compareSpanPriority', () => {
  it('orders by length, then score, then start, then entity type', () => {
    const sorted = [
      span('D', 6, 8, 0.9),
      span('C', 4, 6, 0.9),
      span('B', 0, 2, 0.95),
      span('A', 0, 5, 0.1),
      span('E', 4, 6, 0.9)
    ].sort(compareSpanPriority);

    expect(sorted.map((s) => s.entity_type)).toEqual(['A', 'B', 'C', 'E', 'D']);
  });
});
