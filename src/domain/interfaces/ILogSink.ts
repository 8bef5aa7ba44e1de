import type { IRenderContext } from '@domain/interfaces/IRenderContext';

/**
 * Log Sink Interface
 * Layer: Domain
 *
 * Where a rendered access line goes once it exists. The sink owns delivery
 * (or discarding) entirely; the renderer hands it the line plus the context
 * it was rendered from and forgets about it.
 */
export interface ILogSink {
  write(line: string, ctx: IRenderContext): void;
}
