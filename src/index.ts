import { getConfig, getResendKey } from './config';
import { SqliteStorage } from './db/database';
import { StorageCredentialCheck } from './db/storage';
import { RunCoordinator } from './engine/run-coordinator';
import { SearchEngine } from './engine/search-engine';
import { createLogger } from './logger';
import { ResendMailSender } from './notify/mailer';
import { JobRegistry } from './schedule/job-registry';
import { RunPool } from './schedule/run-pool';
import { CronTriggerDriver } from './schedule/trigger-driver';
import { GoogleSearchProvider } from './search/google-search';
import { LiveSearch } from './search/live-search';
import { SyntheticFallback } from './search/synthetic-fallback';

const log = createLogger('Main');

async function main(): Promise<void> {
  log.info('Job search scheduler starting...');

  const config = getConfig();
  const storage = new SqliteStorage(config.database.path);
  const mailer = new ResendMailSender(getResendKey());
  const fromAddress = config.mail.fromAddress ?? null;

  const coordinator = new RunCoordinator({
    storage,
    credentials: new StorageCredentialCheck(storage),
    sources: [
      new LiveSearch(
        new GoogleSearchProvider({
          resultsPerQuery: config.search.resultsPerQuery,
          timeoutMs: config.search.requestTimeoutMs,
        }),
      ),
      new SyntheticFallback(),
    ],
    mailer,
    defaultSites: config.search.defaultJobSites,
    fromAddress,
  });

  const registry = new JobRegistry(new CronTriggerDriver(), new RunPool(config.scheduler.maxConcurrentRuns));
  const engine = new SearchEngine({ storage, registry, coordinator, mailer, fromAddress });

  await engine.startup();

  const shutdown = () => {
    log.info('Shutting down...');
    engine.shutdown();
    storage.close();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch(err => {
  log.error('Fatal error', err);
  process.exit(1);
});
