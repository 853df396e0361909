import express from "express";
import cors from "cors";
import type { AnonymizationEngine } from "./anonymizationEngine.js";
import type { ServiceConfig } from "./config.js";
import { createAnonymizerRoutes } from "./routes/anonymizerRoutes.js";
import { createGlobalErrorHandler, notFoundHandler } from "./utils/asyncHandler.js";

export const SERVICE_VERSION = "1.0.0";

const LOCALHOST_ORIGIN = /^https?:\/\/localhost(:\d+)?$/;

export interface AppDependencies {
  engine: AnonymizationEngine;
  config: ServiceConfig;
}

/**
 * Builds the Express application (does not listen)
 *
 * CORS: origins from CORS_ORIGINS when set, otherwise localhost on any port.
 * Requests without an Origin header (curl, same-origin) are always allowed.
 */
export function createApp({ engine, config }: AppDependencies): express.Express {
  const app = express();

  // Trust first proxy for correct client IP detection (rate limiting)
  app.set("trust proxy", 1);

  const allowedOrigins = new Set(config.corsOrigins);
  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin) {
          return callback(null, true);
        }

        const isAllowed = allowedOrigins.size > 0 ? allowedOrigins.has(origin) : LOCALHOST_ORIGIN.test(origin);
        if (isAllowed) {
          callback(null, true);
        } else {
          console.warn(`[CORS] Rejected origin: ${origin}`);
          callback(null, false);
        }
      }
    })
  );
  app.use(express.json({ limit: "10mb" }));

  // Liveness only; /api/health also checks the recognizer
  app.get("/health", (req, res) => {
    res.json({ status: "ok" });
  });

  app.use(
    "/api",
    createAnonymizerRoutes(engine, {
      maxTextLength: config.maxTextLength,
      maxBatchSize: config.maxBatchSize,
      rateLimitPerMinute: config.rateLimitPerMinute,
      version: SERVICE_VERSION
    })
  );

  app.use(notFoundHandler);

  // Global error handler - must be last middleware
  app.use(createGlobalErrorHandler({ nodeEnv: config.nodeEnv }));

  return app;
}
