/**
 * News Ingest Service
 *
 * Crawls the configured listing pages, extracts full articles and stores
 * them in PostgreSQL.
 *
 * Usage:
 *   node dist/src/index.js --service       - Run one job now, then every N hours
 *   node dist/src/index.js --run           - Run one job and exit
 *   node dist/src/index.js --run --days 7  - Run one job over the last 7 days
 *   node dist/src/index.js                 - Default: service mode
 */

import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import { initDatabase, closeDatabase, getPool } from './db/index.js';
import { PgArticleRepository } from './db/articles.js';
import { IngestStore } from './db/ingest-store.js';
import { ScrapeOrchestrator } from './pipeline.js';
import type { RunOverride } from './pipeline.js';
import { Scheduler } from './scheduler.js';
import { ArticleParser, BrowserSession, ListingParser } from './scraper/index.js';

interface CliOptions {
  runOnce: boolean;
  override?: RunOverride;
}

export function parseArgs(args: string[]): CliOptions {
  const runOnce = args.includes('--run') && !args.includes('--service');
  const daysIndex = args.indexOf('--days');

  if (daysIndex === -1) {
    return { runOnce };
  }

  const daysBack = Number.parseInt(args[daysIndex + 1] ?? '', 10);
  if (Number.isNaN(daysBack) || daysBack <= 0) {
    throw new Error('--days expects a positive number of days');
  }

  return { runOnce, override: { daysBack } };
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));

  logger.info(
    { env: config.app.env, version: config.app.version, mode: options.runOnce ? 'run-once' : 'service' },
    'Starting news ingest'
  );

  // Initialize database
  try {
    await initDatabase();
  } catch (error) {
    logger.fatal({ error }, 'Failed to initialize database');
    process.exit(1);
  }

  const repository = new PgArticleRepository(getPool());
  logger.info({ totalArticles: await repository.count() }, 'Database ready');

  const orchestrator = new ScrapeOrchestrator({
    store: new IngestStore(repository),
    launchSession: () => BrowserSession.launch(),
    listingParser: new ListingParser({ baseUrl: config.site.baseUrl }),
    articleParser: new ArticleParser({ baseUrl: config.site.baseUrl, titleSuffix: config.site.titleSuffix }),
  });

  if (options.runOnce) {
    const stats = await orchestrator.runJob(options.override);
    await closeDatabase();
    process.exit(stats?.status === 'completed' ? 0 : 1);
  }

  const scheduler = new Scheduler(orchestrator);

  // Graceful shutdown handler
  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    logger.info({ signal }, 'Shutting down...');
    scheduler.stop();
    await orchestrator.drain();
    await closeDatabase();
    process.exit(0);
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).catch((error: unknown) => {
      logger.fatal({ error }, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));

  await scheduler.start({ runImmediately: true });
  logger.info('Scheduler running. Press Ctrl+C to stop.');
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.fatal({ error }, 'Application failed');
    process.exit(1);
  });
}
