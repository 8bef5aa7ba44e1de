/**
 * Server Entry Point — Clustering & Graceful Shutdown
 * Layer: Entry Point (top of the dependency tree)
 *
 * The PRIMARY process forks WEB_CONCURRENCY workers (one per CPU when 0) and
 * replaces any that die. Each WORKER builds its own Express app, and with it
 * its own AccessLogService: the access-log format is compiled once per worker
 * at startup and shared by every request that worker serves.
 *
 * A ConfigurationError thrown while building the app is logged as fatal and
 * the worker exits with EX_CONFIG (78), which the primary does not restart.
 *
 * Graceful shutdown on SIGTERM/SIGINT: stop accepting connections, let
 * in-flight requests finish (their access lines are written on 'finish'),
 * then exit.
 */
import cluster from 'node:cluster';
import os from 'node:os';

import { config } from '@core/config';
import { logger } from '@core/logger';
import { createApp } from '@interfaces/http/app';
import { ConfigurationError } from '@shared/errors/AppError';

const numWorkers = config.cluster.workers || os.cpus().length;

/** sysexits EX_CONFIG */
const CONFIG_EXIT_CODE = 78;

if (cluster.isPrimary) {
  logger.info(
    { pid: process.pid, workers: numWorkers, format: config.accessLog.format },
    `Primary process starting >> forking ${numWorkers} workers`,
  );

  for (let i = 0; i < numWorkers; i++) {
    cluster.fork();
  }

  cluster.on('exit', (worker, code, signal) => {
    if (code === CONFIG_EXIT_CODE) {
      logger.fatal({ pid: worker.process.pid, code }, 'Worker failed to start — not restarting');
      return;
    }
    logger.warn({ pid: worker.process.pid, code, signal }, 'Worker died — restarting');
    cluster.fork();
  });
} else {
  let app: ReturnType<typeof createApp>;
  try {
    app = createApp();
  } catch (err) {
    if (err instanceof ConfigurationError) {
      logger.fatal({ err }, 'Invalid access log configuration');
      process.exit(CONFIG_EXIT_CODE);
    }
    throw err;
  }

  const server = app.listen(config.port, () => {
    logger.info({ pid: process.pid, port: config.port }, `Worker listening on :${config.port}`);
  });

  const shutdown = (signal: string) => {
    logger.info({ pid: process.pid, signal }, 'Graceful shutdown initiated');
    server.close(() => {
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}
