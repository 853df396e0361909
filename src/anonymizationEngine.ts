import {
  ANONYMIZATION_STRATEGIES,
  HASH_TYPES,
  type AnalysisMetadata,
  type AnalysisOutcome,
  type AnalysisStatistics,
  type AnonymizationStep,
  type AnonymizeOutcome,
  type DetectedSpan,
  type DropReport,
  type PolicyTable,
  type ResolvedSpanSet
} from "./types/pii.js";
import { ValidationError, toErrorRecord } from "./errors.js";
import type { EntityRecognizer } from "./recognizer.js";
import { resolveSpansWithReport } from "./spanResolver.js";
import { toDetectedSpan } from "./spans.js";
import { summarizeSpans } from "./statistics.js";
import { DEFAULT_POLICY_TABLE, mergePolicyTables, toWirePolicy } from "./policyTable.js";
import type { CustomOperator, OperatorContext } from "./operators.js";
import { deanonymizeText, transformText, type DeanonymizeResult, type ReplacementRecord } from "./textTransformer.js";
import { runBatch, summarizeBatch, type BatchItemResult, type BatchSummary } from "./batch.js";
import { codePointLength, previewText, toCodePoints } from "./textIndex.js";

const TEXT_PREVIEW_LENGTH = 100;

export interface AnonymizationEngineOptions {
  recognizer: EntityRecognizer;
  defaultLanguage: string;
  defaultScoreThreshold: number;
  defaultEntities: readonly string[];
  /** Merged over the built-in table */
  policyTable?: PolicyTable;
  customOperators?: Readonly<Record<string, CustomOperator>>;
  encryptionKey?: string;
  batchConcurrency: number;
  /** Per-item text limit in batch mode (code points) */
  maxTextLength?: number;
}

export interface AnalyzeRequest {
  text: string;
  entities?: readonly string[];
  language?: string;
  score_threshold?: number;
}

export interface AnonymizeRequest extends AnalyzeRequest {
  /** Pre-detected spans; when present the recognizer is not called */
  spans?: readonly unknown[];
  /** Per-request entries merged over the engine's table */
  policy?: PolicyTable;
}

export interface BatchAnalyzeOptions {
  entities?: readonly string[];
  language?: string;
  score_threshold?: number;
}

export interface BatchItemAnalysis {
  text_preview: string;
  entities: ResolvedSpanSet;
  statistics: AnalysisStatistics;
}

export interface BatchAnalyzeResult {
  results: BatchItemResult<BatchItemAnalysis>[];
  summary: BatchSummary;
  metadata: Omit<AnalysisMetadata, "text_length">;
  warnings: string[];
}

export interface DeanonymizeRequest {
  text: string;
  items: readonly ReplacementRecord[];
  key?: string;
}

export interface EntityValidation {
  entities: string[];
  warnings: string[];
}

interface Resolution {
  entities: ResolvedSpanSet;
  statistics: AnalysisStatistics;
  dropped: DropReport;
}

/**
 * PII analysis and anonymization pipeline
 *
 * Flow per text:
 * 1. Validate requested entity types against what the recognizer supports
 * 2. Detect (or take caller-supplied spans)
 * 3. Resolve: filter, dedupe overlaps, order
 * 4. Transform: one replacement per resolved span, via the policy table
 *
 * The engine holds only immutable configuration; every call builds its own
 * spans and statistics, so concurrent calls never share state.
 */
export class AnonymizationEngine {
  private readonly recognizer: EntityRecognizer;
  private readonly defaultLanguage: string;
  private readonly defaultScoreThreshold: number;
  private readonly defaultEntities: readonly string[];
  private readonly policyTable: PolicyTable;
  private readonly operatorContext: OperatorContext;
  private readonly batchConcurrency: number;
  private readonly maxTextLength?: number;

  constructor(options: AnonymizationEngineOptions) {
    this.recognizer = options.recognizer;
    this.defaultLanguage = options.defaultLanguage;
    this.defaultScoreThreshold = options.defaultScoreThreshold;
    this.defaultEntities = Object.freeze([...options.defaultEntities]);
    this.policyTable = mergePolicyTables(DEFAULT_POLICY_TABLE, options.policyTable);
    this.operatorContext = {
      encryptionKey: options.encryptionKey,
      customOperators: new Map(Object.entries(options.customOperators ?? {}))
    };
    this.batchConcurrency = options.batchConcurrency;
    this.maxTextLength = options.maxTextLength;
  }

  get defaultEntityTypes(): readonly string[] {
    return this.defaultEntities;
  }

  /**
   * Checks requested entity types against the recognizer's supported set
   *
   * - Nothing requested: the default set, no warnings
   * - Unknown types are dropped with a warning
   * - Nothing valid left: the default set, with a warning
   * - Supported set unavailable: checked against the default set instead
   */
  async validateEntities(requested: readonly string[] | undefined, language: string): Promise<EntityValidation> {
    if (!requested || requested.length === 0) {
      return { entities: [...this.defaultEntities], warnings: [] };
    }

    const warnings: string[] = [];
    let supported: ReadonlySet<string>;

    try {
      supported = await this.recognizer.supportedEntityTypes(language);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      warnings.push(`Supported entity types unavailable (${message}); validated against the default set`);
      supported = new Set(this.defaultEntities);
    }

    const entities: string[] = [];
    for (const entityType of requested) {
      if (entities.includes(entityType)) continue;
      if (supported.has(entityType)) {
        entities.push(entityType);
      } else {
        warnings.push(`Unknown entity type "${entityType}" ignored`);
      }
    }

    if (entities.length === 0) {
      warnings.push("No valid entity types requested; using the default set");
      entities.push(...this.defaultEntities);
    }

    if (warnings.length > 0) {
      console.warn("[Anonymizer] Entity type validation warnings:", { language, warnings });
    }

    return { entities, warnings };
  }

  /**
   * Detects and resolves PII spans in one text
   *
   * A recognizer failure yields a `failed` outcome; finding nothing yields a
   * `completed` outcome with an empty entity list.
   */
  async analyze(request: AnalyzeRequest): Promise<AnalysisOutcome> {
    const language = request.language ?? this.defaultLanguage;
    const scoreThreshold = request.score_threshold ?? this.defaultScoreThreshold;
    const { entities, warnings } = await this.validateEntities(request.entities, language);
    const metadata: AnalysisMetadata = {
      text_length: codePointLength(request.text),
      entities_requested: entities,
      language,
      score_threshold: scoreThreshold
    };

    try {
      const resolution = await this.detectAndResolve(request.text, entities, language, scoreThreshold);
      console.log("[Anonymizer] Analysis completed", {
        text_length: metadata.text_length,
        entities_found: resolution.entities.length,
        dropped: resolution.dropped
      });
      return { status: "completed", ...resolution, metadata, warnings };
    } catch (error) {
      const record = toErrorRecord(error);
      console.error("[Anonymizer] Analysis failed:", record.message, {
        error_code: record.code,
        text_length: metadata.text_length
      });
      return { status: "failed", error: record, metadata, warnings };
    }
  }

  /**
   * Anonymizes one text
   *
   * With `spans` the recognizer is skipped and the supplied spans are
   * resolved directly (an empty list means "nothing to anonymize").
   * A policy problem fails only the anonymization step; the detected
   * entities and statistics are still returned.
   */
  async anonymize(request: AnonymizeRequest): Promise<AnonymizeOutcome> {
    const analysis = request.spans === undefined
      ? await this.analyze(request)
      : this.resolveSuppliedSpans(request, request.spans);

    if (analysis.status === "failed") {
      return analysis;
    }

    const policy = mergePolicyTables(this.policyTable, request.policy);
    let anonymization: AnonymizationStep;

    try {
      const { text, items } = transformText(request.text, analysis.entities, policy, this.operatorContext);
      anonymization = { status: "completed", text, items };
      console.log("[Anonymizer] Anonymization completed", {
        items: items.length,
        strategies: [...new Set(items.map((item) => item.applied_strategy))]
      });
    } catch (error) {
      const record = toErrorRecord(error);
      console.error("[Anonymizer] Anonymization failed:", record.message, { error_code: record.code });
      anonymization = { status: "failed", error: record };
    }

    return { ...analysis, anonymization };
  }

  /**
   * Analyzes many texts with bounded concurrency
   *
   * Entity types are validated once for the whole batch. Each item fails on
   * its own (not a string, too long, recognizer failure) without affecting
   * the others, and results keep the input order.
   */
  async batchAnalyze(texts: readonly unknown[], shared: BatchAnalyzeOptions = {}): Promise<BatchAnalyzeResult> {
    const language = shared.language ?? this.defaultLanguage;
    const scoreThreshold = shared.score_threshold ?? this.defaultScoreThreshold;
    const { entities, warnings } = await this.validateEntities(shared.entities, language);

    const results = await runBatch(
      texts,
      async (text): Promise<BatchItemAnalysis> => {
        if (typeof text !== "string") {
          throw new ValidationError("Text must be a string");
        }
        if (this.maxTextLength !== undefined && codePointLength(text) > this.maxTextLength) {
          throw new ValidationError(`Text exceeds maximum length of ${this.maxTextLength} characters`);
        }

        const { entities: spans, statistics } = await this.detectAndResolve(text, entities, language, scoreThreshold);
        return { text_preview: previewText(text, TEXT_PREVIEW_LENGTH), entities: spans, statistics };
      },
      { concurrency: this.batchConcurrency }
    );

    const summary = summarizeBatch<BatchItemAnalysis>(results, (result) =>
      result.status === "completed" ? result.entities.length : 0
    );

    console.log("[Batch] Batch analysis completed", summary);

    return {
      results,
      summary,
      metadata: { entities_requested: entities, language, score_threshold: scoreThreshold },
      warnings
    };
  }

  /**
   * Restores `encrypt` replacements using the audit items of an earlier anonymization
   *
   * The caller must supply the key. The configured ENCRYPTION_KEY is never used
   * here, so reaching the API is not enough to reverse encrypted values.
   *
   * @throws ValidationError when no key is given or the items do not match the text
   */
  deanonymize(request: DeanonymizeRequest): DeanonymizeResult {
    const key = request.key;
    if (!key) {
      throw new ValidationError("An encryption key is required to deanonymize");
    }
    const result = deanonymizeText(request.text, request.items, key);
    console.log("[Anonymizer] Deanonymization completed", { restored_items: result.restored_items });
    return result;
  }

  async supportedEntities(language?: string): Promise<string[]> {
    const supported = await this.recognizer.supportedEntityTypes(language ?? this.defaultLanguage);
    return [...supported].sort();
  }

  /** Public view of the engine configuration (keys are never included) */
  describeConfig(): Record<string, unknown> {
    return {
      default_language: this.defaultLanguage,
      confidence_threshold: this.defaultScoreThreshold,
      default_entities: [...this.defaultEntities],
      supported_strategies: [...ANONYMIZATION_STRATEGIES],
      hash_types: [...HASH_TYPES],
      custom_operators: [...this.operatorContext.customOperators.keys()],
      encryption_key_configured: this.operatorContext.encryptionKey !== undefined,
      anonymization_config: toWirePolicy(this.policyTable)
    };
  }

  private async detectAndResolve(
    text: string,
    entities: readonly string[],
    language: string,
    scoreThreshold: number
  ): Promise<Resolution> {
    const textLength = codePointLength(text);
    const raw: DetectedSpan[] = textLength === 0
      ? []
      : await this.recognizer.detect({ text, entityTypes: entities, language, scoreThreshold });

    const { spans, dropped } = resolveSpansWithReport(textLength, raw, {
      scoreThreshold,
      allowedEntityTypes: entities
    });
    return { entities: spans, statistics: summarizeSpans(spans), dropped };
  }

  private resolveSuppliedSpans(request: AnonymizeRequest, supplied: readonly unknown[]): AnalysisOutcome {
    const codePoints = toCodePoints(request.text);
    const scoreThreshold = request.score_threshold ?? 0;
    const spans: DetectedSpan[] = [];
    let notSpanShaped = 0;

    for (const value of supplied) {
      const span = toDetectedSpan(codePoints, value);
      if (span) {
        spans.push(span);
      } else {
        notSpanShaped++;
      }
    }

    const { spans: resolved, dropped } = resolveSpansWithReport(codePoints.length, spans, {
      scoreThreshold,
      allowedEntityTypes: request.entities
    });
    dropped.invalid += notSpanShaped;

    return {
      status: "completed",
      entities: resolved,
      statistics: summarizeSpans(resolved),
      dropped,
      metadata: {
        text_length: codePoints.length,
        entities_requested: request.entities ? [...request.entities] : [],
        language: request.language ?? this.defaultLanguage,
        score_threshold: scoreThreshold
      },
      warnings: []
    };
  }
}
