/**
 * Server Entry Point — Clustering & Graceful Shutdown
 * Layer: Entry Point (top of the dependency tree)
 *
 * The primary process serves nothing itself: it forks WEB_CONCURRENCY workers
 * (one per CPU core when 0) and replaces any that die. Each worker builds its
 * own app and its own connection pools, since sockets cannot cross process
 * boundaries, and the OS balances incoming connections across them.
 *
 * A worker opens DB_POOL_MIN connections per target before it listens. If
 * that fails the database is unreachable or the credentials are wrong, and
 * the worker exits rather than serve requests it cannot answer.
 *
 * Graceful shutdown (SIGTERM/SIGINT):
 *   1. Stop accepting new connections (server.close()).
 *   2. Let in-flight requests finish and release their connections.
 *   3. Destroy the pools.
 *   4. Exit with code 0.
 */
import cluster from 'node:cluster';
import os from 'node:os';

import { config } from '@core/config';
import { logger } from '@core/logger';
import { destroyDatabasePools, getDatabasePools } from '@infrastructure/database/connection';
import { createApp } from '@interfaces/http/app';

const numWorkers = config.cluster.workers || os.cpus().length;

async function startWorker(): Promise<void> {
  await getDatabasePools().warmUp();

  const app = createApp();
  const server = app.listen(config.port, () => {
    logger.info({ pid: process.pid, port: config.port }, `Worker listening on :${config.port}`);
  });

  const shutdown = (signal: string) => {
    logger.info({ pid: process.pid, signal }, 'Graceful shutdown initiated');
    server.close(() => {
      destroyDatabasePools()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, 'Failed to destroy database pools');
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

if (cluster.isPrimary) {
  logger.info(
    { pid: process.pid, workers: numWorkers },
    `Primary process starting >> forking ${numWorkers} workers`,
  );

  for (let i = 0; i < numWorkers; i++) {
    cluster.fork();
  }

  cluster.on('exit', (worker, code, signal) => {
    logger.warn({ pid: worker.process.pid, code, signal }, 'Worker died — restarting');
    cluster.fork();
  });
} else {
  startWorker().catch((err: unknown) => {
    logger.fatal({ err, pid: process.pid }, 'Worker failed to start');
    process.exit(1);
  });
}
