import { createLogger } from '../logger';
import type { RunPool } from './run-pool';
import { describeTrigger, nextFireAfter, type TriggerSpec } from './trigger-compiler';
import type { TriggerDriver, TriggerHandle } from './trigger-driver';

const log = createLogger('Registry');

interface Entry {
  spec: TriggerSpec;
  handle: TriggerHandle;
}

/**
 * One live trigger per search config. Fires are handed to the run pool, so
 * registering or removing a trigger never waits on a run in progress.
 */
export class JobRegistry {
  private readonly entries = new Map<number, Entry>();

  constructor(
    private readonly driver: TriggerDriver,
    private readonly pool: RunPool,
  ) {}

  register(configId: number, spec: TriggerSpec, callback: () => Promise<unknown>): void {
    // Both steps run in the same tick, so the old trigger cannot fire in between.
    // A driver that rejects the spec leaves the old trigger in place.
    const handle = this.driver.start(spec, () => this.fire(configId, callback));
    const previous = this.entries.get(configId);
    previous?.handle.stop();
    this.entries.set(configId, { spec, handle });
    log.info(`${previous ? 'Replaced' : 'Registered'} trigger for config ${configId}: ${describeTrigger(spec)}`);
  }

  unregister(configId: number): boolean {
    const entry = this.entries.get(configId);
    if (!entry) return false;

    entry.handle.stop();
    this.entries.delete(configId);
    log.info(`Removed trigger for config ${configId}`);
    return true;
  }

  has(configId: number): boolean {
    return this.entries.has(configId);
  }

  listActive(): number[] {
    return [...this.entries.keys()];
  }

  nextFire(configId: number, after: Date = new Date()): Date | null {
    const entry = this.entries.get(configId);
    return entry ? nextFireAfter(entry.spec, after) : null;
  }

  clear(): void {
    for (const entry of this.entries.values()) {
      entry.handle.stop();
    }
    const count = this.entries.size;
    this.entries.clear();
    log.info(`Stopped ${count} triggers`);
  }

  private fire(configId: number, callback: () => Promise<unknown>): void {
    log.debug(`Trigger fired for config ${configId}`);
    this.pool.submit(callback).catch(err => {
      log.error(`Scheduled run for config ${configId} failed`, err);
    });
  }
}
