/**
 * Dependency Injection Container — The Central "Phone Book"
 * Layer: Core
 *
 * The single place where every dependency is wired. Each token in
 * `./types` maps to a concrete implementation; consumers resolve tokens and
 * never construct collaborators by hand.
 *
 *   Logger            — the shared pino instance (useValue).
 *   AccessLogSink     — PinoLogSink or StdoutLogSink, picked from config.
 *   AccessLogOptions  — format + onLog + skipper assembled from config and
 *                       the sink above.
 *   AccessLogService  — singleton, so the format is compiled exactly once per
 *                       worker and the template is shared by every request.
 *
 * `reflect-metadata` must be imported first: tsyringe reads the constructor
 * metadata that @injectable/@inject store through it.
 *
 * Tests override AccessLogOptions with their own `onLog` before the service
 * is first resolved; the singleton then picks the override up.
 */
import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';

import { config } from './config';
import { logger } from './logger';
import { TOKENS } from './types';

import { AccessLogService, createPathSkipper } from '@application/services/AccessLogService';
import type { AccessLogOptions } from '@application/services/AccessLogService';
import type { ILogSink } from '@domain/interfaces/ILogSink';
import { PinoLogSink } from '@infrastructure/sinks/PinoLogSink';
import { StdoutLogSink } from '@infrastructure/sinks/StdoutLogSink';

container.register(TOKENS.Logger, { useValue: logger });

container.register<ILogSink>(TOKENS.AccessLogSink, {
  useFactory: instanceCachingFactory<ILogSink>((c) =>
    config.accessLog.sink === 'stdout' ? new StdoutLogSink() : c.resolve(PinoLogSink),
  ),
});

container.register<AccessLogOptions>(TOKENS.AccessLogOptions, {
  useFactory: instanceCachingFactory<AccessLogOptions>((c) => {
    const sink = c.resolve<ILogSink>(TOKENS.AccessLogSink);
    return {
      format: config.accessLog.format,
      onLog: (line, ctx) => sink.write(line, ctx),
      skipper: createPathSkipper(config.accessLog.skipPaths),
    };
  }),
});

container.registerSingleton(TOKENS.AccessLogService, AccessLogService);

export { container };
