/**
 * Type Definitions for the PII Anonymization Engine
 *
 * Architecture:
 * - One canonical span record (DetectedSpan) used from recognizer to audit trail
 * - Branded ResolvedSpanSet (only the resolver can hand one out)
 * - Discriminated unions for operator configs and pipeline outcomes
 * - Type guards for runtime narrowing of outcomes
 *
 * All offsets are Unicode code-point offsets into the original text.
 *
 * @see src/spanResolver.ts for how a ResolvedSpanSet is built
 */

/**
 * Branded Type helper
 *
 * Brand is erased at runtime; it only stops a plain array from being passed
 * where a resolved (sorted, non-overlapping) sequence is required.
 */
type Brand<T, B> = T & { readonly __brand: B };

/**
 * Detected entity span
 *
 * Half-open range [start, end) tagged with an entity type and a confidence
 * score. `source_text` is the substring the range covers.
 */
export interface DetectedSpan {
  readonly entity_type: string;
  readonly start: number;
  readonly end: number;
  readonly score: number;
  readonly source_text: string;
}

/**
 * Ordered, non-overlapping span sequence
 *
 * Invariant: spans[i].end <= spans[i + 1].start for every adjacent pair.
 */
export type ResolvedSpanSet = Brand<readonly DetectedSpan[], "ResolvedSpanSet">;

/** Why the resolver left a span out */
export interface DropReport {
  below_threshold: number;
  entity_not_allowed: number;
  invalid: number;
  overlap: number;
}

export const ANONYMIZATION_STRATEGIES = ["replace", "redact", "mask", "hash", "encrypt", "custom"] as const;

export type AnonymizationStrategy = typeof ANONYMIZATION_STRATEGIES[number];

export const HASH_TYPES = ["sha256", "sha512"] as const;

export type HashType = typeof HASH_TYPES[number];

/**
 * Operator configuration, discriminated on `strategy`
 *
 * ```typescript
 * switch (config.strategy) {
 *   case "replace": return config.parameters.new_value; // known to exist
 *   case "mask": return config.parameters.masking_char;
 * }
 * ```
 */
export type OperatorConfig =
  | { strategy: "replace"; parameters: { new_value: string } }
  | { strategy: "redact"; parameters: Record<string, never> }
  | {
      strategy: "mask";
      parameters: {
        masking_char: string;
        chars_to_mask: number; // -1 masks the whole span
        from_end: boolean;
      };
    }
  | { strategy: "hash"; parameters: { hash_type: HashType; salt?: string } }
  | { strategy: "encrypt"; parameters: { key?: string } }
  | { strategy: "custom"; parameters: { name: string } };

/**
 * Entity type → operator mapping
 *
 * `default` is the wildcard entry used when an entity type has no entry of its own.
 */
export interface PolicyTable {
  readonly default?: OperatorConfig;
  readonly entities: Readonly<Record<string, OperatorConfig>>;
}

/**
 * Audit record of one applied rewrite
 *
 * Offsets point into the source text and are never renumbered for the output.
 */
export interface AnonymizationItem {
  readonly entity_type: string;
  readonly original_start: number;
  readonly original_end: number;
  readonly applied_strategy: AnonymizationStrategy;
  readonly original_text: string;
  readonly replacement_text: string;
}

export interface ConfidenceBuckets {
  high: number;   // score >= 0.8
  medium: number; // 0.5 <= score < 0.8
  low: number;    // score < 0.5
}

export interface AnalysisStatistics {
  total_entities: number;
  entity_counts: Record<string, number>;
  average_confidence: number;
  confidence_buckets: ConfidenceBuckets;
}

/** Serializable form of a failure, used in results and batch records */
export interface ErrorRecord {
  code: string;
  message: string;
  details?: string[];
}

export interface AnalysisMetadata {
  text_length: number;
  entities_requested: string[];
  language: string;
  score_threshold: number;
}

/**
 * Analysis outcome
 *
 * "Nothing found" is a completed outcome with an empty span set; a recognizer
 * failure is a failed outcome. The two are never conflated.
 */
export type AnalysisOutcome =
  | {
      status: "completed";
      entities: ResolvedSpanSet;
      statistics: AnalysisStatistics;
      metadata: AnalysisMetadata;
      dropped: DropReport;
      warnings: string[];
    }
  | {
      status: "failed";
      error: ErrorRecord;
      metadata: AnalysisMetadata;
      warnings: string[];
    };

export type AnonymizationStep =
  | { status: "completed"; text: string; items: AnonymizationItem[] }
  | { status: "failed"; error: ErrorRecord };

export type AnonymizeOutcome =
  | Extract<AnalysisOutcome, { status: "failed" }>
  | (Extract<AnalysisOutcome, { status: "completed" }> & { anonymization: AnonymizationStep });

export function isCompletedAnalysis<T extends { status: string }>(
  outcome: T
): outcome is Extract<T, { status: "completed" }> {
  return outcome.status === "completed";
}

export function isFailedAnalysis<T extends { status: string }>(
  outcome: T
): outcome is Extract<T, { status: "failed" }> {
  return outcome.status === "failed";
}

export function isAnonymizationStrategy(value: unknown): value is AnonymizationStrategy {
  return typeof value === "string" && (ANONYMIZATION_STRATEGIES as readonly string[]).includes(value);
}

export function isHashType(value: unknown): value is HashType {
  return typeof value === "string" && (HASH_TYPES as readonly string[]).includes(value);
}
