/**
 * Error taxonomy
 *
 * - ValidationError: malformed request shape (aborts one request or batch item)
 * - ConfigError: unresolvable operator, missing or bad key (aborts the anonymization step)
 * - UpstreamError: recognizer collaborator failed or timed out
 *
 * Every error carries a stable `code` and the HTTP status the API layer answers with.
 */

import type { ErrorRecord } from "./types/pii.js";

export type ErrorCode = "VALIDATION" | "CONFIG" | "UPSTREAM";

export type UpstreamErrorType = "TIMEOUT" | "HTTP" | "NETWORK" | "INVALID_RESPONSE";

export abstract class AnonymizerError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly status: number;

  toRecord(): ErrorRecord {
    return { code: this.code, message: this.message };
  }
}

export class ValidationError extends AnonymizerError {
  readonly code = "VALIDATION";
  readonly status = 400;
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(message);
    this.name = "ValidationError";
    this.details = details;
  }

  override toRecord(): ErrorRecord {
    return this.details.length > 0
      ? { code: this.code, message: this.message, details: this.details }
      : { code: this.code, message: this.message };
  }
}

export class ConfigError extends AnonymizerError {
  readonly code = "CONFIG";
  readonly status = 422;

  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class UpstreamError extends AnonymizerError {
  readonly code = "UPSTREAM";
  readonly status = 502;
  readonly errorType: UpstreamErrorType;
  readonly httpStatus?: number;

  constructor(message: string, errorType: UpstreamErrorType, httpStatus?: number) {
    super(message);
    this.name = "UpstreamError";
    this.errorType = errorType;
    this.httpStatus = httpStatus;
  }
}

/** Converts anything thrown into a serializable record (unknown errors become INTERNAL) */
export function toErrorRecord(error: unknown): ErrorRecord {
  if (error instanceof AnonymizerError) {
    return error.toRecord();
  }
  const message = error instanceof Error ? error.message : String(error);
  return { code: "INTERNAL", message };
}
