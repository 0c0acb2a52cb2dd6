import cron from 'node-cron';
import { InvalidCadenceError } from '../errors';
import { nextFireAfter, type TriggerSpec } from './trigger-compiler';

/** Longest delay `setTimeout` honours; larger values fire after 1 ms. */
const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

let taskSequence = 0;

export interface TriggerHandle {
  stop(): void;
}

/** Turns a trigger spec into something that actually fires. */
export interface TriggerDriver {
  start(spec: TriggerSpec, onFire: () => void): TriggerHandle;
}

/**
 * Calendar triggers go to node-cron. Interval triggers re-arm a timer for each fire,
 * computing the next slot from the spec so the cadence never drifts.
 */
export class CronTriggerDriver implements TriggerDriver {
  constructor(private readonly clock: () => Date = () => new Date()) {}

  start(spec: TriggerSpec, onFire: () => void): TriggerHandle {
    if (spec.kind === 'calendar') {
      if (!cron.validate(spec.expression)) {
        throw new InvalidCadenceError(`cron expression "${spec.expression}" rejected`);
      }
      // node-cron keeps every task in a global map keyed by name until it is deleted.
      const name = `trigger-${++taskSequence}`;
      const task = cron.schedule(spec.expression, () => onFire(), { name });
      return {
        stop: () => {
          task.stop();
          cron.getTasks().delete(name);
        },
      };
    }

    let timer: NodeJS.Timeout | null = null;
    let stopped = false;
    // Last slot handed out; a timer that wakes a little early must not repeat it.
    let cursor = this.clock();

    const waitFor = (next: Date) => {
      const delay = next.getTime() - this.clock().getTime();
      timer = setTimeout(() => {
        if (stopped) return;
        if (this.clock() < next) {
          waitFor(next);
          return;
        }
        onFire();
        arm();
      }, Math.min(Math.max(0, delay), MAX_TIMER_DELAY_MS));
    };

    const arm = () => {
      const now = this.clock();
      const next = nextFireAfter(spec, now > cursor ? now : cursor);
      cursor = next;
      waitFor(next);
    };
    arm();

    return {
      stop: () => {
        stopped = true;
        if (timer) clearTimeout(timer);
        timer = null;
      },
    };
  }
}
