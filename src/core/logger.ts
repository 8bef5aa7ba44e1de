/**
 * Application Logger (Pino)
 * Layer: Core
 *
 * One pino instance for the whole process: startup and shutdown messages,
 * error-handler output, and (with ACCESS_LOG_SINK=logger) the rendered access
 * lines themselves, each as the `msg` of an info record.
 *
 * In development the output is piped through `pino-pretty` for colours and
 * readable timestamps; elsewhere it is one JSON object per line.
 *
 * The exported `Logger` type lets other modules ask for "a logger" without
 * depending on the concrete instance, which keeps them easy to test.
 */
import pino from 'pino';
import { config } from './config';

export const logger = pino({
  level: config.log.level,
  transport: config.isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

export type Logger = pino.Logger;
