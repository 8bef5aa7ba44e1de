/// <reference path="../../../shared/express.d.ts" />
/**
 * Request Timer Middleware
 * Layer: Interfaces (HTTP)
 *
 * Records the wall-clock timestamp at the moment a request enters the pipeline.
 * The access logger uses it (via req.requestStartTime) as `startedAt` for the
 * `{latency}` and `{latency-ms}` fields.
 *
 * MUST be registered as the first middleware in the stack so the measurement
 * starts as early as possible (before body parsing, compression, etc.).
 */
import type { NextFunction, Request, Response } from 'express';

export function requestTimer(req: Request, _res: Response, next: NextFunction): void {
  req.requestStartTime = Date.now();
  next();
}
