import type { CredentialCheck, Storage } from '../db/storage';
import { createLogger } from '../logger';
import { compose, shouldSend } from '../notify/composer';
import type { MailSender } from '../notify/mailer';
import { buildQuery } from '../search/query-builder';
import type { ResultSource, SearchCredentials } from '../search/result-source';
import { DEFAULT_JOB_SITES } from '../search/sites';
import type { JobPosting, RunOutcome, SearchConfig, SearchDraft, UserCredentialView } from '../types';

const log = createLogger('RunCoordinator');

export interface RunCoordinatorDeps {
  storage: Storage;
  credentials: CredentialCheck;
  /** Tried in order until one finds postings; the last should always succeed. */
  sources: ResultSource[];
  mailer: MailSender;
  defaultSites?: readonly string[];
  /** Sender address; the user's own address when unset. */
  fromAddress?: string | null;
  clock?: () => Date;
}

interface SearchResult {
  postings: JobPosting[];
  isRealSearch: boolean;
}

function skipped(): RunOutcome {
  return { status: 'skipped', postingsPersisted: 0, notified: false, isRealSearch: false, postings: [] };
}

export class RunCoordinator {
  private readonly defaultSites: readonly string[];
  private readonly clock: () => Date;

  constructor(private readonly deps: RunCoordinatorDeps) {
    this.defaultSites = deps.defaultSites ?? DEFAULT_JOB_SITES;
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * One scheduled cycle. The config is re-read so that a trigger firing after the
   * config was paused or deleted does nothing. Never rejects.
   */
  async runCycle(configId: number): Promise<RunOutcome> {
    const startTime = Date.now();
    try {
      const config = await this.deps.storage.loadConfig(configId);
      if (!config || !config.isActive) {
        log.info(`Config ${configId} is ${config ? 'inactive' : 'gone'}, skipping run`);
        return skipped();
      }

      const user = await this.deps.storage.loadUser(config.userId);
      if (!user) {
        log.warn(`Owner ${config.userId} of config ${configId} not found, skipping run`);
        return skipped();
      }

      log.info(`=== Run started for config ${configId} (${config.name}) ===`);
      const { postings, isRealSearch } = await this.search(config, user);

      let persisted: number;
      try {
        persisted = await this.deps.storage.recordRun(user.id, config.id, postings, this.clock());
      } catch (err) {
        log.error(`Run for config ${configId} was not persisted`, err);
        return { status: 'failed', postingsPersisted: 0, notified: false, isRealSearch, postings };
      }

      const notified = await this.notify(user, config, postings);
      log.info(
        `=== Run for config ${configId} complete in ${((Date.now() - startTime) / 1000).toFixed(1)}s: ` +
          `${persisted} postings, ${isRealSearch ? 'live' : 'sample'} data, notified: ${notified} ===`,
      );
      return { status: 'completed', postingsPersisted: persisted, notified, isRealSearch, postings };
    } catch (err) {
      log.error(`Run for config ${configId} failed`, err);
      return { status: 'failed', postingsPersisted: 0, notified: false, isRealSearch: false, postings: [] };
    }
  }

  /**
   * Ad-hoc run for an unsaved draft. Replaces the user's previous test postings and
   * never sends mail or touches `lastRun`.
   */
  async runTest(userId: number, draft: SearchDraft): Promise<RunOutcome> {
    try {
      const user = await this.deps.storage.loadUser(userId);
      if (!user) {
        log.warn(`Test search requested for unknown user ${userId}`);
        return skipped();
      }

      const { postings, isRealSearch } = await this.search(draft, user);

      let persisted: number;
      try {
        persisted = await this.deps.storage.replaceTestPostings(user.id, postings);
      } catch (err) {
        log.error(`Test results for user ${userId} were not persisted`, err);
        return { status: 'failed', postingsPersisted: 0, notified: false, isRealSearch, postings };
      }

      log.info(`Test search for user ${userId}: ${persisted} postings using ${isRealSearch ? 'live search' : 'sample data'}`);
      return { status: 'completed', postingsPersisted: persisted, notified: false, isRealSearch, postings };
    } catch (err) {
      log.error(`Test search for user ${userId} failed`, err);
      return { status: 'failed', postingsPersisted: 0, notified: false, isRealSearch: false, postings: [] };
    }
  }

  private async search(draft: SearchDraft, user: UserCredentialView): Promise<SearchResult> {
    const built = buildQuery(draft, this.defaultSites);
    const credentials = await this.searchCredentials(user);
    const now = this.clock();

    for (const source of this.deps.sources) {
      const outcome = await source.search({ draft, built, credentials, now });
      if (outcome.kind === 'found') {
        return { postings: outcome.postings, isRealSearch: source.name === 'live' };
      }
      log.info(`${source.name} source unavailable (${outcome.reason}), falling back`);
    }
    return { postings: [], isRealSearch: false };
  }

  private async searchCredentials(user: UserCredentialView): Promise<SearchCredentials | null> {
    if (!user.searchApiKey || !user.searchEngineId) return null;
    if (!(await this.deps.credentials.hasSearchCredential(user.id))) return null;
    return { apiKey: user.searchApiKey, engineId: user.searchEngineId };
  }

  private async notify(user: UserCredentialView, config: SearchConfig, postings: JobPosting[]): Promise<boolean> {
    if (!shouldSend(postings)) return false;

    try {
      if (!(await this.deps.credentials.hasMailCredential(user.id))) {
        log.info(`User ${user.id} has no mail credential, not notifying`);
        return false;
      }

      const { subject, body } = compose(postings, config.name);
      const to = user.notificationEmail ?? user.email;
      await this.deps.mailer.send(this.deps.fromAddress ?? user.email, to, subject, body);
      return true;
    } catch (err) {
      log.error(`Notification for config ${config.id} failed`, err);
      return false;
    }
  }
}
