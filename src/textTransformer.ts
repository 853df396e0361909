import type { AnonymizationItem, AnonymizationStrategy, PolicyTable, ResolvedSpanSet } from "./types/pii.js";
import { ValidationError } from "./errors.js";
import { resolveOperator } from "./policyTable.js";
import { applyOperator, decryptValue, type OperatorContext } from "./operators.js";
import { codePointLength, sliceCodePoints, toCodePoints } from "./textIndex.js";

export interface TransformResult {
  text: string;
  items: AnonymizationItem[];
}

/**
 * Rewrites `text` by splicing one replacement per resolved span
 *
 * Single left-to-right pass: copy the untouched region since the previous
 * span verbatim, append the replacement, move on. Because the spans are
 * sorted and disjoint no index arithmetic on the output is needed, and
 * every audit item keeps the span's offsets in the source text.
 *
 * Example:
 *   text:  "Contact John Smith at 555-123-4567."
 *   spans: PERSON [8, 18), PHONE_NUMBER [22, 34)
 *   →      "Contact [PERSON] at [PHONE]." with two items
 *
 * @throws ConfigError when an entity type has no operator (propagated from the registry)
 * @throws ValidationError when a span does not fit the text
 */
export function transformText(
  text: string,
  spans: ResolvedSpanSet,
  policy: PolicyTable,
  context: OperatorContext
): TransformResult {
  if (text.length === 0 || spans.length === 0) {
    return { text, items: [] };
  }

  const codePoints = toCodePoints(text);
  const parts: string[] = [];
  const items: AnonymizationItem[] = [];
  let cursor = 0;

  for (const span of spans) {
    if (span.start < cursor || span.end > codePoints.length) {
      throw new ValidationError(
        `Span ${span.entity_type} [${span.start}, ${span.end}) does not fit a text of ${codePoints.length} characters`
      );
    }

    const original = sliceCodePoints(codePoints, span.start, span.end);
    const operator = resolveOperator(span.entity_type, policy);
    const replacement = applyOperator(operator, original, span, context);

    parts.push(sliceCodePoints(codePoints, cursor, span.start), replacement);
    items.push({
      entity_type: span.entity_type,
      original_start: span.start,
      original_end: span.end,
      applied_strategy: operator.strategy,
      original_text: original,
      replacement_text: replacement
    });
    cursor = span.end;
  }

  parts.push(sliceCodePoints(codePoints, cursor));
  return { text: parts.join(""), items };
}

/** Audit fields needed to locate a replacement in anonymized text */
export interface ReplacementRecord {
  entity_type: string;
  original_start: number;
  original_end: number;
  applied_strategy: AnonymizationStrategy;
  replacement_text: string;
}

export interface DeanonymizeResult {
  text: string;
  restored_items: number;
}

/**
 * Restores every `encrypt` replacement in anonymized text
 *
 * Replacements are located from their source offsets plus the running
 * length difference of the replacements before them, so `items` must be
 * the audit list of the transform that produced `anonymizedText`, in order.
 * Items of other strategies are skipped; their originals are not recoverable.
 *
 * @throws ValidationError when items are out of order or do not match the text
 */
export function deanonymizeText(
  anonymizedText: string,
  items: readonly ReplacementRecord[],
  key: string
): DeanonymizeResult {
  const codePoints = toCodePoints(anonymizedText);
  const parts: string[] = [];
  let cursor = 0;
  let shift = 0;
  let previousEnd = 0;
  let restored = 0;

  items.forEach((item, index) => {
    if (item.original_start < previousEnd || item.original_end < item.original_start) {
      throw new ValidationError(`Item ${index} is out of order or overlaps the previous item`);
    }

    const replacementLength = codePointLength(item.replacement_text);
    const outputStart = item.original_start + shift;
    const outputEnd = outputStart + replacementLength;

    if (sliceCodePoints(codePoints, outputStart, outputEnd) !== item.replacement_text) {
      throw new ValidationError(`Item ${index} does not match the anonymized text at position ${outputStart}`);
    }

    if (item.applied_strategy === "encrypt") {
      parts.push(sliceCodePoints(codePoints, cursor, outputStart), decryptValue(item.replacement_text, key));
      cursor = outputEnd;
      restored++;
    }

    shift += replacementLength - (item.original_end - item.original_start);
    previousEnd = item.original_end;
  });

  parts.push(sliceCodePoints(codePoints, cursor));
  return { text: parts.join(""), restored_items: restored };
}
