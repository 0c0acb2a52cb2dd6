import type { Storage } from '../db/storage';
import { errorMessage, SendError } from '../errors';
import { createLogger } from '../logger';
import { composeTestEmail } from '../notify/composer';
import type { MailSender } from '../notify/mailer';
import type { JobRegistry } from '../schedule/job-registry';
import { compileCadence } from '../schedule/trigger-compiler';
import type { RunOutcome, SearchConfig, SearchDraft } from '../types';
import type { RunCoordinator } from './run-coordinator';

const log = createLogger('Engine');

export interface SearchEngineDeps {
  storage: Storage;
  registry: JobRegistry;
  coordinator: RunCoordinator;
  mailer: MailSender;
  fromAddress?: string | null;
  clock?: () => Date;
}

export interface StartupReport {
  registered: number;
  rejected: number;
}

/** Entry points the rest of the application uses to drive scheduled searches. */
export class SearchEngine {
  private readonly clock: () => Date;

  constructor(private readonly deps: SearchEngineDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  /** Throws `InvalidCadenceError` before anything is registered. */
  onConfigCreatedOrActivated(config: SearchConfig): void {
    this.schedule(config);
  }

  onConfigUpdated(config: SearchConfig): void {
    this.schedule(config);
  }

  onConfigDeactivatedOrDeleted(configId: number): void {
    this.deps.registry.unregister(configId);
  }

  runNow(configId: number): Promise<RunOutcome> {
    return this.deps.coordinator.runCycle(configId);
  }

  runTest(userId: number, draft: SearchDraft): Promise<RunOutcome> {
    return this.deps.coordinator.runTest(userId, draft);
  }

  async sendTestEmail(userId: number): Promise<void> {
    const user = await this.deps.storage.loadUser(userId);
    if (!user) {
      throw new SendError(`User ${userId} not found`);
    }
    if (!user.mailAuthorized) {
      throw new SendError('Mail is not configured for this user');
    }

    const recipient = user.notificationEmail ?? user.email;
    const { subject, body } = composeTestEmail(recipient, this.clock());
    await this.deps.mailer.send(this.deps.fromAddress ?? user.email, recipient, subject, body);
  }

  /** Registers a trigger for every active config in storage. */
  async startup(): Promise<StartupReport> {
    const configs = await this.deps.storage.loadActiveConfigs();
    const report: StartupReport = { registered: 0, rejected: 0 };

    for (const config of configs) {
      try {
        this.schedule(config);
        report.registered++;
      } catch (err) {
        report.rejected++;
        log.error(`Not scheduling config ${config.id}: ${errorMessage(err)}`);
      }
    }

    log.info(`Startup: ${report.registered} searches scheduled, ${report.rejected} rejected`);
    return report;
  }

  shutdown(): void {
    this.deps.registry.clear();
  }

  private schedule(config: SearchConfig): void {
    // Saved cadences are checked even when the config is paused.
    const spec = compileCadence(config.cadence, this.clock());
    if (!config.isActive) {
      this.deps.registry.unregister(config.id);
      return;
    }

    const { coordinator } = this.deps;
    this.deps.registry.register(config.id, spec, () => coordinator.runCycle(config.id));
  }
}
