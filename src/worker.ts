#!/usr/bin/env node
/**
 * Long-running scheduler process
 */

import { config } from 'dotenv';
import { ConfigManager } from './config.js';
import { openDatabase } from './database.js';
import { isEntryPoint } from './entry-point.js';
import { logger } from './logger.js';
import { createRetrievalEngine } from './retrieval/index.js';

config();

export async function main(): Promise<void> {
  const manager = new ConfigManager(process.env.RETRIEVAL_CONFIG ?? './config.yaml');
  const { valid, errors } = manager.validate();
  if (!valid) {
    for (const problem of errors) {
      logger.error(`Invalid configuration: ${problem}`, undefined, 'Worker');
    }
    process.exit(1);
  }

  const settings = manager.getAll();
  logger.setMinLevel(settings.logLevel);

  const db = openDatabase(settings.database.path);
  const engine = createRetrievalEngine(db, settings);

  if (!settings.scheduler.enabled) {
    logger.warn('Scheduler disabled by configuration; nothing to do', undefined, 'Worker');
    db.close();
    return;
  }

  engine.scheduler.start();

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info(`Received ${signal}, waiting for in-flight executions`, undefined, 'Worker');
    await engine.scheduler.stop();
    db.close();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error('Shutdown failed', error instanceof Error ? error : undefined, 'Worker');
        process.exit(1);
      });
    });
  }
}

if (isEntryPoint(import.meta.url)) {
  main().catch((error: unknown) => {
    logger.error('Worker failed to start', error instanceof Error ? error : undefined, 'Worker');
    process.exit(1);
  });
}
