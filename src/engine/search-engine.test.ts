import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SqliteStorage } from '../db/database';
import { StorageCredentialCheck } from '../db/storage';
import { InvalidCadenceError, SendError } from '../errors';
import { JobRegistry } from '../schedule/job-registry';
import { RunPool } from '../schedule/run-pool';
import { SyntheticFallback } from '../search/synthetic-fallback';
import { createSearchConfig, createSearchDraft, type SearchConfigInput } from '../search-config';
import { FakeMailer, FakeTriggerDriver, seededRandom } from '../testing/fakes';
import { RunCoordinator } from './run-coordinator';
import { SearchEngine } from './search-engine';

const NOW = new Date('2026-10-19T09:00:00.000Z');

describe('SearchEngine', () => {
  let storage: SqliteStorage;
  let driver: FakeTriggerDriver;
  let registry: JobRegistry;
  let mailer: FakeMailer;
  let engine: SearchEngine;
  let userId: number;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    storage = new SqliteStorage(':memory:');
    driver = new FakeTriggerDriver();
    registry = new JobRegistry(driver, new RunPool(2));
    mailer = new FakeMailer();
    const coordinator = new RunCoordinator({
      storage,
      credentials: new StorageCredentialCheck(storage),
      sources: [new SyntheticFallback(seededRandom(11))],
      mailer,
      clock: () => NOW,
    });
    engine = new SearchEngine({ storage, registry, coordinator, mailer, clock: () => NOW });
    userId = storage.createUser({ email: 'dev@example.com', mailCredentials: 'test-token' }).id;
  });

  afterEach(() => {
    engine.shutdown();
    storage.close();
    vi.restoreAllMocks();
  });

  function addConfig(overrides: Partial<SearchConfigInput> = {}) {
    return storage.createConfig(createSearchConfig({ userId, name: 'Python roles', keywords: ['python'], ...overrides }));
  }

  it('registers a trigger whose firing runs and persists the search', async () => {
    const config = addConfig();
    engine.onConfigCreatedOrActivated(config);

    expect(registry.listActive()).toEqual([config.id]);
    expect(driver.live()[0].spec).toMatchObject({ kind: 'calendar', expression: '0 9 * * *' });

    driver.live()[0].fire();
    await vi.waitFor(() => {
      expect(storage.listPostings(userId)).toHaveLength(6);
    });
    await vi.waitFor(() => {
      expect(mailer.sent).toHaveLength(1);
    });
  });

  it('replaces the trigger on update', () => {
    const config = addConfig();
    engine.onConfigCreatedOrActivated(config);
    engine.onConfigUpdated({ ...config, cadence: { type: 'weekly', day: 'monday', time: '07:15' } });

    expect(driver.live()).toHaveLength(1);
    expect(driver.live()[0].spec).toMatchObject({ kind: 'calendar', expression: '15 7 * * 1' });
  });

  it('rejects an invalid cadence without registering anything', () => {
    const config = addConfig();

    expect(() => engine.onConfigCreatedOrActivated({ ...config, cadence: { type: 'daily', time: '25:00' } })).toThrow(
      InvalidCadenceError,
    );
    expect(registry.listActive()).toEqual([]);
  });

  it('keeps the previous trigger when an update has an invalid cadence', () => {
    const config = addConfig();
    engine.onConfigCreatedOrActivated(config);

    expect(() => engine.onConfigUpdated({ ...config, cadence: { type: 'hourly', minute: 75 } })).toThrow(
      InvalidCadenceError,
    );
    expect(driver.live()).toHaveLength(1);
    expect(driver.live()[0].spec).toMatchObject({ expression: '0 9 * * *' });
  });

  it('rejects an invalid cadence on an inactive config', () => {
    const config = addConfig({ isActive: false });

    expect(() => engine.onConfigUpdated({ ...config, cadence: { type: 'weekdays', time: '7pm' } })).toThrow(
      InvalidCadenceError,
    );
    expect(registry.listActive()).toEqual([]);
  });

  it('unregisters a config updated to inactive', () => {
    const config = addConfig();
    engine.onConfigCreatedOrActivated(config);
    engine.onConfigUpdated({ ...config, isActive: false });

    expect(registry.has(config.id)).toBe(false);
    expect(driver.live()).toEqual([]);
  });

  it('treats deleting a never-registered config as a no-op', () => {
    engine.onConfigDeactivatedOrDeleted(404);
    expect(registry.listActive()).toEqual([]);
  });

  it('schedules every valid active config on startup', async () => {
    const first = addConfig();
    const second = addConfig({ name: 'Data', keywords: ['data'], cadence: { type: 'hourly', minute: 15 } });
    addConfig({ name: 'Broken', cadence: { type: 'daily', time: '99:99' } });
    addConfig({ name: 'Paused', isActive: false });

    expect(await engine.startup()).toEqual({ registered: 2, rejected: 1 });
    expect(registry.listActive().sort((a, b) => a - b)).toEqual([first.id, second.id]);
  });

  it('runs a config on demand', async () => {
    const config = addConfig();

    const outcome = await engine.runNow(config.id);

    expect(outcome.status).toBe('completed');
    expect(outcome.postingsPersisted).toBe(6);
    expect((await storage.loadConfig(config.id))?.lastRun).toEqual(NOW);
  });

  it('runs an unsaved draft as a test search', async () => {
    const outcome = await engine.runTest(userId, createSearchDraft({ keywords: ['analyst'] }));

    expect(outcome.postingsPersisted).toBe(4);
    expect(storage.listPostings(userId).every(p => p.isTest)).toBe(true);
    expect(mailer.sent).toEqual([]);
  });

  describe('sendTestEmail', () => {
    it('mails the notification address', async () => {
      const user = storage.createUser({
        email: 'owner@example.com',
        notificationEmail: 'alerts@example.com',
        mailCredentials: 'test-token',
      });

      await engine.sendTestEmail(user.id);

      expect(mailer.sent).toHaveLength(1);
      expect(mailer.sent[0]).toMatchObject({
        from: 'owner@example.com',
        to: 'alerts@example.com',
        subject: 'Daily Job Search - Test Email',
      });
      expect(mailer.sent[0].html).toContain('<p><strong>Sent at:</strong> 2026-10-19T09:00:00.000Z</p>');
    });

    it('refuses users without mail set up', async () => {
      const user = storage.createUser({ email: 'nomail@example.com' });

      await expect(engine.sendTestEmail(user.id)).rejects.toThrow(SendError);
      await expect(engine.sendTestEmail(9999)).rejects.toThrow('User 9999 not found');
      expect(mailer.sent).toEqual([]);
    });

    it('surfaces delivery failures', async () => {
      mailer.failWith = new SendError('rejected');
      await expect(engine.sendTestEmail(userId)).rejects.toThrow('rejected');
    });
  });

  it('stops every trigger on shutdown', () => {
    engine.onConfigCreatedOrActivated(addConfig());
    engine.onConfigCreatedOrActivated(addConfig({ name: 'Second' }));

    engine.shutdown();

    expect(registry.listActive()).toEqual([]);
    expect(driver.live()).toEqual([]);
  });
});
