/**
 * Express Application Factory
 * Layer: Interfaces (HTTP)
 * Pattern: Factory Function
 *
 * Assembles a fresh Express app per call: each cluster worker builds its own,
 * and integration tests get one without state shared between suites.
 *
 * Middleware ordering matters:
 *   1. requestTimer  — Records req.requestStartTime (the access log's startedAt).
 *   2. accessLogger  — Renders one access line per request after it finishes.
 *                      Ahead of compression so {size} counts the bytes sent,
 *                      ahead of express.json() so rejected bodies are logged.
 *   3. helmet()      — Security headers.
 *   4. cors()        — Cross-origin requests.
 *   5. compression() — Gzips larger response bodies.
 *   6. express.json()— Parses JSON request bodies into req.body.
 *   7. Routes
 *   8. errorHandler  — MUST be last.
 *
 * Importing the container bootstraps every DI registration before anything
 * is resolved from it. AccessLogService is resolved first thing in createApp(),
 * so a bad access-log configuration surfaces there as a ConfigurationError.
 */
import type { AccessLogService } from '@application/services/AccessLogService';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import { accessLogger } from '@interfaces/http/middleware/accessLogger';
import { errorHandler } from '@interfaces/http/middleware/errorHandler';
import { requestTimer } from '@interfaces/http/middleware/requestTimer';
import { healthRoutes } from '@interfaces/http/routes/healthRoutes';
import { createTemplateRoutes } from '@interfaces/http/routes/templateRoutes';
import compression from 'compression';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';

export function createApp(): express.Express {
  const accessLog = container.resolve<AccessLogService>(TOKENS.AccessLogService);
  const app = express();

  // Request timing (must be first)
  app.use(requestTimer);

  // Access log
  app.use(accessLogger(accessLog));

  // Security & compression
  app.use(helmet());
  app.use(cors());
  app.use(compression());

  // Body parsing
  app.use(express.json());

  // Routes
  app.use('/api/v1', healthRoutes);
  app.use('/api/v1', createTemplateRoutes(accessLog));

  // Global error handler (must be registered last)
  app.use(errorHandler);

  return app;
}
