/**
 * Stdout Log Sink
 * Layer: Infrastructure
 *
 * Raw lines on stdout, one per request, nothing added. Meant for setups where
 * a collector tails the process output and expects the access format as-is.
 */
import type { ILogSink } from '@domain/interfaces/ILogSink';
import type { IRenderContext } from '@domain/interfaces/IRenderContext';

export class StdoutLogSink implements ILogSink {
  constructor(private readonly stream: NodeJS.WritableStream = process.stdout) {}

  write(line: string, _ctx: IRenderContext): void {
    this.stream.write(`${line}\n`);
  }
}
