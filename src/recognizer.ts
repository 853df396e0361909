import type { DetectedSpan } from "./types/pii.js";
import { UpstreamError } from "./errors.js";
import { toDetectedSpan } from "./spans.js";
import { toCodePoints } from "./textIndex.js";
import { isStringArray } from "./utils/guards.js";

export interface DetectionRequest {
  text: string;
  entityTypes: readonly string[];
  language: string;
  scoreThreshold: number;
}

/**
 * Entity-recognition collaborator
 *
 * `detect` may return spans in any order and may include overlaps; the
 * resolver cleans them up. Offsets must be code-point offsets into `text`.
 */
export interface EntityRecognizer {
  detect(request: DetectionRequest): Promise<DetectedSpan[]>;
  supportedEntityTypes(language: string): Promise<ReadonlySet<string>>;
}

export interface PresidioRecognizerOptions {
  baseUrl: string;
  timeoutMs: number;
}

/** Presidio scores are reported with three decimals */
function roundScore(score: number): number {
  return Math.round(score * 1000) / 1000;
}

/**
 * HTTP client for a Presidio analyzer service
 *
 * Endpoints:
 * - POST /analyze            → [{ entity_type, start, end, score, ... }]
 * - GET  /supportedentities  → ["PERSON", "EMAIL_ADDRESS", ...]
 *
 * Each call carries its own timeout (AbortSignal). Every failure mode is
 * reported as an UpstreamError with an errorType of TIMEOUT, HTTP, NETWORK
 * or INVALID_RESPONSE, so batch callers can record it per item.
 */
export class PresidioRecognizer implements EntityRecognizer {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: PresidioRecognizerOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs;
  }

  async detect(request: DetectionRequest): Promise<DetectedSpan[]> {
    const data = await this.requestJson("/analyze", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        text: request.text,
        language: request.language,
        entities: request.entityTypes,
        score_threshold: request.scoreThreshold
      })
    });

    if (!Array.isArray(data)) {
      throw new UpstreamError("Presidio analyze returned a non-array response", "INVALID_RESPONSE");
    }

    const codePoints = toCodePoints(request.text);
    const spans: DetectedSpan[] = [];
    let malformed = 0;

    for (const result of data) {
      const span = toDetectedSpan(codePoints, result);
      if (span) {
        spans.push({ ...span, score: roundScore(span.score) });
      } else {
        malformed++;
      }
    }

    if (malformed > 0) {
      console.warn(`[Presidio] Ignored ${malformed} malformed analyzer result(s)`);
    }

    return spans;
  }

  async supportedEntityTypes(language: string): Promise<ReadonlySet<string>> {
    const data = await this.requestJson(`/supportedentities?language=${encodeURIComponent(language)}`, {
      method: "GET"
    });

    if (!isStringArray(data)) {
      throw new UpstreamError("Presidio supportedentities returned an unexpected payload", "INVALID_RESPONSE");
    }
    return new Set(data);
  }

  private async requestJson(path: string, init: RequestInit): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    let response: Response;

    try {
      response = await fetch(url, { ...init, signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (error) {
      const name = error instanceof Error ? error.name : "";
      const message = error instanceof Error ? error.message : String(error);
      const errorType = name === "TimeoutError" || name === "AbortError" ? "TIMEOUT" : "NETWORK";

      console.error(`[Presidio] Request ${errorType}:`, message, {
        error_id: "PRESIDIO_REQUEST_FAILED",
        url,
        error_type: errorType
      });

      throw new UpstreamError(
        errorType === "TIMEOUT"
          ? `Presidio request timed out after ${this.timeoutMs}ms`
          : `Cannot reach Presidio at ${this.baseUrl}: ${message}`,
        errorType
      );
    }

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      console.error(`[Presidio] ${path} failed: HTTP ${response.status}`);
      throw new UpstreamError(
        `Presidio request failed: HTTP ${response.status}${body ? ` - ${body.slice(0, 200)}` : ""}`,
        "HTTP",
        response.status
      );
    }

    try {
      return await response.json();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new UpstreamError(`Presidio returned invalid JSON: ${message}`, "INVALID_RESPONSE");
    }
  }
}
