/**
 * Anonymizer Routes - analysis, anonymization and batch endpoints
 *
 * Every response carries the envelope { success, ..., timestamp }.
 * Handlers throw on bad input; the global error handler turns the error into JSON.
 */

import { Router, Request, Response } from 'express';
import rateLimit from 'express-rate-limit';
import type { AnonymizationEngine } from '../anonymizationEngine.js';
import { toErrorRecord } from '../errors.js';
import {
  parseAnalyzeRequest,
  parseAnonymizeRequest,
  parseBatchRequest,
  parseDeanonymizeRequest,
  type RequestLimits
} from '../requestParsing.js';
import { asyncHandler } from '../utils/asyncHandler.js';

export interface AnonymizerRouteOptions extends RequestLimits {
  rateLimitPerMinute: number;
  version: string;
}

type Handler = (req: Request, res: Response) => Promise<void>;

export interface AnonymizerHandlers {
  health: Handler;
  entities: Handler;
  config: Handler;
  analyze: Handler;
  anonymize: Handler;
  batchAnalyze: Handler;
  deanonymize: Handler;
}

function timestamp(): string {
  return new Date().toISOString();
}

function statusForErrorCode(code: string): number {
  if (code === 'VALIDATION') return 400;
  if (code === 'CONFIG') return 422;
  if (code === 'UPSTREAM') return 502;
  return 500;
}

function queryLanguage(req: Request): string | undefined {
  const language = req.query.language;
  return typeof language === 'string' && language.length > 0 ? language : undefined;
}

export function createAnonymizerHandlers(
  engine: AnonymizationEngine,
  options: RequestLimits & { version: string }
): AnonymizerHandlers {
  const limits: RequestLimits = { maxTextLength: options.maxTextLength, maxBatchSize: options.maxBatchSize };

  return {
    /**
     * GET /api/health
     * Service health; 503 when the recognizer cannot be reached
     */
    async health(req, res) {
      try {
        const supported = await engine.supportedEntities();
        res.json({
          success: true,
          status: 'healthy',
          version: options.version,
          recognizer: 'online',
          supported_entities: supported,
          timestamp: timestamp()
        });
      } catch (error) {
        const record = toErrorRecord(error);
        console.warn('[Anonymizer] Health check: recognizer unavailable', { error_code: record.code });
        res.status(503).json({
          success: false,
          status: 'degraded',
          version: options.version,
          recognizer: 'offline',
          error: record.message,
          error_code: record.code,
          timestamp: timestamp()
        });
      }
    },

    /**
     * GET /api/entities?language=en
     * Entity types the recognizer supports, plus the default set.
     * Answers with the default set and a warning when the recognizer is unreachable.
     */
    async entities(req, res) {
      const language = queryLanguage(req);
      const defaults = [...engine.defaultEntityTypes];

      try {
        const supported = await engine.supportedEntities(language);
        res.json({
          success: true,
          supported_entities: supported,
          default_entities: defaults,
          timestamp: timestamp()
        });
      } catch (error) {
        const record = toErrorRecord(error);
        console.warn('[Anonymizer] Supported entity lookup failed; returning the default set', {
          error_code: record.code
        });
        res.json({
          success: true,
          supported_entities: defaults,
          default_entities: defaults,
          warnings: [`Supported entity types unavailable (${record.message}); returned the default set`],
          timestamp: timestamp()
        });
      }
    },

    /**
     * GET /api/config
     * Thresholds, strategies and the active anonymization table (keys redacted)
     */
    async config(req, res) {
      res.json({
        success: true,
        config: engine.describeConfig(),
        limits: {
          max_text_length: limits.maxTextLength,
          max_batch_size: limits.maxBatchSize
        },
        timestamp: timestamp()
      });
    },

    /**
     * POST /api/analyze
     * Detect PII in one text
     */
    async analyze(req, res) {
      const request = parseAnalyzeRequest(req.body, limits);
      const outcome = await engine.analyze(request);

      if (outcome.status === 'failed') {
        res.status(statusForErrorCode(outcome.error.code)).json({
          success: false,
          error: outcome.error.message,
          error_code: outcome.error.code,
          metadata: outcome.metadata,
          ...(outcome.warnings.length > 0 && { warnings: outcome.warnings }),
          timestamp: timestamp()
        });
        return;
      }

      res.json({
        success: true,
        results: outcome.entities,
        statistics: outcome.statistics,
        metadata: outcome.metadata,
        dropped: outcome.dropped,
        ...(outcome.warnings.length > 0 && { warnings: outcome.warnings }),
        timestamp: timestamp()
      });
    },

    /**
     * POST /api/anonymize
     * Detect (or take supplied spans) and rewrite one text
     */
    async anonymize(req, res) {
      const request = parseAnonymizeRequest(req.body, limits);
      const outcome = await engine.anonymize(request);

      if (outcome.status === 'failed') {
        res.status(statusForErrorCode(outcome.error.code)).json({
          success: false,
          error: outcome.error.message,
          error_code: outcome.error.code,
          metadata: outcome.metadata,
          timestamp: timestamp()
        });
        return;
      }

      const detection = {
        detected_entities: outcome.entities,
        statistics: outcome.statistics,
        metadata: outcome.metadata,
        ...(outcome.warnings.length > 0 && { warnings: outcome.warnings })
      };

      if (outcome.anonymization.status === 'failed') {
        const { error } = outcome.anonymization;
        res.status(statusForErrorCode(error.code)).json({
          success: false,
          error: error.message,
          error_code: error.code,
          ...detection,
          timestamp: timestamp()
        });
        return;
      }

      res.json({
        success: true,
        anonymized_text: outcome.anonymization.text,
        anonymization_items: outcome.anonymization.items,
        ...detection,
        timestamp: timestamp()
      });
    },

    /**
     * POST /api/batch-analyze
     * Analyze many texts; items fail independently
     */
    async batchAnalyze(req, res) {
      const { texts, options: shared } = parseBatchRequest(req.body, limits);
      const batch = await engine.batchAnalyze(texts, shared);

      res.json({
        success: true,
        batch_results: batch.results,
        batch_statistics: {
          total_texts: batch.summary.total_items,
          total_entities_found: batch.summary.total_entities,
          successful_analyses: batch.summary.successful,
          failed_analyses: batch.summary.failed
        },
        metadata: batch.metadata,
        ...(batch.warnings.length > 0 && { warnings: batch.warnings }),
        timestamp: timestamp()
      });
    },

    /**
     * POST /api/deanonymize
     * Restore encrypt-strategy replacements from an anonymization audit list.
     * The request must carry the encryption key; the server's key is not applied.
     */
    async deanonymize(req, res) {
      const request = parseDeanonymizeRequest(req.body, limits);
      const result = engine.deanonymize(request);
      res.json({
        success: true,
        text: result.text,
        restored_items: result.restored_items,
        timestamp: timestamp()
      });
    }
  };
}

export function createAnonymizerRoutes(engine: AnonymizationEngine, options: AnonymizerRouteOptions): Router {
  const router = Router();
  const handlers = createAnonymizerHandlers(engine, options);

  // Analysis endpoints call the recognizer, so they share one per-IP budget
  const anonymizerLimiter = rateLimit({
    windowMs: 60 * 1000, // 1 minute
    limit: options.rateLimitPerMinute,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req, res) => {
      console.warn(`[Rate Limit] Anonymizer endpoint limit reached for IP: ${req.ip}`);
      res.status(429).json({
        success: false,
        error: 'Too many requests, please slow down',
        timestamp: timestamp()
      });
    }
  });

  router.get('/health', asyncHandler(handlers.health));
  router.get('/entities', asyncHandler(handlers.entities));
  router.get('/config', asyncHandler(handlers.config));

  router.post('/analyze', anonymizerLimiter, asyncHandler(handlers.analyze));
  router.post('/anonymize', anonymizerLimiter, asyncHandler(handlers.anonymize));
  router.post('/batch-analyze', anonymizerLimiter, asyncHandler(handlers.batchAnalyze));
  router.post('/deanonymize', anonymizerLimiter, asyncHandler(handlers.deanonymize));

  return router;
}
