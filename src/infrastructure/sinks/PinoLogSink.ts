/**
 * Pino Log Sink
 * Layer: Infrastructure
 *
 * Writes each access line as the message of an `info` record on the shared
 * pino logger, so it inherits the app's transport (pretty in development,
 * JSON lines in production) and level filtering.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { ILogSink } from '@domain/interfaces/ILogSink';
import type { IRenderContext } from '@domain/interfaces/IRenderContext';
import { inject, injectable } from 'tsyringe';

@injectable()
export class PinoLogSink implements ILogSink {
  constructor(@inject(TOKENS.Logger) private readonly logger: Logger) {}

  write(line: string, _ctx: IRenderContext): void {
    this.logger.info(line);
  }
}
