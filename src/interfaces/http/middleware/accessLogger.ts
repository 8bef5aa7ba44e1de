/// <reference path="../../../shared/express.d.ts" />
/**
 * Access Logger Middleware
 * Layer: Interfaces (HTTP)
 *
 * The per-request half of the access log. For every request it:
 *
 *   1. wraps req/res in an ExpressRenderContext;
 *   2. asks the service's skip predicate whether to log at all;
 *   3. takes the start time from requestTimer (or now, if the timer isn't
 *      mounted);
 *   4. counts the response body bytes passing through res.write/res.end;
 *   5. renders once the response has finished, or once the connection
 *      closes if the client went away first.
 *
 * Mount it ahead of compression and the body parsers: compression then writes
 * its encoded output through the counting wrappers, and a request the body
 * parser rejects still reaches the point where the line is rendered.
 *
 * A sink that throws is reported through the application logger; it never
 * reaches the event emitter, where it would take the worker down.
 */
import type { AccessLogService } from '@application/services/AccessLogService';
import { logger } from '@core/logger';
import { ExpressRenderContext } from '@infrastructure/context/ExpressRenderContext';
import type { NextFunction, Request, RequestHandler, Response } from 'express';

function chunkLength(chunk: unknown, encoding: unknown): number {
  if (typeof chunk === 'string') {
    const charset = typeof encoding === 'string' && Buffer.isEncoding(encoding) ? encoding : 'utf8';
    return Buffer.byteLength(chunk, charset);
  }
  if (chunk instanceof Uint8Array) return chunk.byteLength;
  return 0;
}

function countBodyBytes(res: Response, ctx: ExpressRenderContext): void {
  const write = res.write;
  const end = res.end;

  res.write = function (this: Response, chunk: unknown, ...rest: unknown[]): boolean {
    ctx.addBodyBytes(chunkLength(chunk, rest[0]));
    return Reflect.apply(write, this, [chunk, ...rest]);
  };

  res.end = function (this: Response, ...args: unknown[]): Response {
    ctx.addBodyBytes(chunkLength(args[0], args[1]));
    return Reflect.apply(end, this, args);
  };
}

export function accessLogger(service: AccessLogService): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const ctx = new ExpressRenderContext(req, res);
    if (service.shouldSkip(ctx)) {
      next();
      return;
    }

    const startedAt = req.requestStartTime ?? Date.now();
    countBodyBytes(res, ctx);

    let recorded = false;
    const record = (): void => {
      if (recorded) return;
      recorded = true;
      try {
        service.record(ctx, startedAt);
      } catch (err) {
        logger.error({ err }, 'Access log sink failed');
      }
    };

    res.once('finish', record);
    res.once('close', record);
    next();
  };
}
