/**
 * Access Log Service — Compile Once, Render Per Request
 * Layer: Application
 *
 * Owns the one CompiledTemplate a process uses. The format string is parsed
 * in the constructor; after that every request only renders.
 *
 *   shouldSkip(ctx) — the optional skip predicate (default: never skip).
 *   record(ctx, t)  — render the line and hand it to `onLog`.
 *
 * Setup is the only place this can fail: an empty format or a missing `onLog`
 * throws ConfigurationError, which aborts container resolution and therefore
 * startup. Nothing in record() throws for request data.
 *
 * Registered as a singleton in the container (TOKENS.AccessLogService) so
 * the template is shared by every request in the worker.
 */
import { render } from '@application/template/renderer';
import { parse } from '@application/template/tagParser';
import { TOKENS } from '@core/types';
import type { CompiledTemplate } from '@domain/entities/Segment';
import type { IRenderContext } from '@domain/interfaces/IRenderContext';
import { ConfigurationError } from '@shared/errors/AppError';
import type { Timestamp } from '@shared/types';
import { inject, injectable } from 'tsyringe';

/** Receives every rendered line together with the context it came from. */
export type OnLog = (line: string, ctx: IRenderContext) => void;

/** Returns true when a request should not be logged at all. */
export type Skipper = (ctx: IRenderContext) => boolean;

export interface AccessLogOptions {
  format: string;
  onLog: OnLog;
  skipper?: Skipper;
}

export const neverSkip: Skipper = () => false;

/** Skips requests whose path is exactly one of `paths`. */
export function createPathSkipper(paths: readonly string[]): Skipper {
  if (paths.length === 0) return neverSkip;
  const skipped = new Set(paths);
  return (ctx) => skipped.has(ctx.path || '/');
}

@injectable()
export class AccessLogService {
  private readonly template: CompiledTemplate;
  private readonly onLog: OnLog;
  private readonly skipper: Skipper;

  constructor(@inject(TOKENS.AccessLogOptions) options: AccessLogOptions) {
    if (!options.format) {
      throw new ConfigurationError('Access logger requires a format');
    }
    if (typeof options.onLog !== 'function') {
      throw new ConfigurationError('Access logger requires an onLog function');
    }
    this.template = parse(options.format);
    this.onLog = options.onLog;
    this.skipper = options.skipper ?? neverSkip;
  }

  get compiled(): CompiledTemplate {
    return this.template;
  }

  shouldSkip(ctx: IRenderContext): boolean {
    return this.skipper(ctx);
  }

  record(ctx: IRenderContext, startedAt: Timestamp): string {
    const line = render(this.template, ctx, startedAt);
    this.onLog(line, ctx);
    return line;
  }
}
