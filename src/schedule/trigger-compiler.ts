import { InvalidCadenceError } from '../errors';
import type { Cadence, DayOfWeek, TimeOfDay } from '../types';

/**
 * A compiled cadence.
 *
 * `calendar` triggers fire at a fixed minute on selected hours and weekdays and carry
 * the equivalent five-field cron expression. `interval` triggers fire every
 * `intervalMs` starting at `startAt`.
 */
export type TriggerSpec =
  | {
      kind: 'calendar';
      expression: string;
      minute: number;
      /** `null` means every hour. */
      hours: number[] | null;
      /** `Date#getDay()` numbers (Sunday = 0); `null` means every day. */
      weekdays: number[] | null;
    }
  | {
      kind: 'interval';
      startAt: Date;
      intervalMs: number;
    };

export interface ClockTime {
  hour: number;
  minute: number;
}

const HOUR_MS = 60 * 60 * 1000;
const ALL_HOURS = Array.from({ length: 24 }, (_, h) => h);
const WORKING_DAYS = [1, 2, 3, 4, 5];

const DAY_NUMBERS: Record<DayOfWeek, number> = {
  sunday: 0,
  monday: 1,
  tuesday: 2,
  wednesday: 3,
  thursday: 4,
  friday: 5,
  saturday: 6,
};

export function parseTimeOfDay(time: TimeOfDay): ClockTime {
  const match = /^(\d{1,2}):(\d{2})$/.exec(time.trim());
  if (!match) {
    throw new InvalidCadenceError(`time "${time}" is not in HH:MM form`);
  }
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) {
    throw new InvalidCadenceError(`time "${time}" is out of range`);
  }
  return { hour, minute };
}

function dayNumber(day: DayOfWeek): number {
  const n = DAY_NUMBERS[day];
  if (n === undefined) {
    throw new InvalidCadenceError(`unknown day "${day}"`);
  }
  return n;
}

function calendar(minute: number, hours: number[] | null, weekdays: number[] | null): TriggerSpec {
  const sortedDays = weekdays ? [...new Set(weekdays)].sort((a, b) => a - b) : null;
  const expression = [
    String(minute),
    hours ? hours.join(',') : '*',
    '*',
    '*',
    sortedDays ? sortedDays.join(',') : '*',
  ].join(' ');
  return { kind: 'calendar', expression, minute, hours, weekdays: sortedDays };
}

function atTime(time: TimeOfDay, weekdays: number[] | null): TriggerSpec {
  const { hour, minute } = parseTimeOfDay(time);
  return calendar(minute, [hour], weekdays);
}

/**
 * Turns a cadence into a trigger. `now` only matters for `everyNHours`, whose first
 * fire is today's anchor when that is still ahead and otherwise one interval later.
 */
export function compileCadence(cadence: Cadence, now: Date = new Date()): TriggerSpec {
  switch (cadence.type) {
    case 'daily':
      return atTime(cadence.time, null);

    case 'hourly': {
      const { minute } = cadence;
      if (!Number.isInteger(minute) || minute < 0 || minute > 59) {
        throw new InvalidCadenceError(`minute ${minute} is out of range`);
      }
      return calendar(minute, null, null);
    }

    case 'everyNHours': {
      if (!Number.isInteger(cadence.hours) || cadence.hours < 1) {
        throw new InvalidCadenceError(`interval of ${cadence.hours} hours`);
      }
      const { hour, minute } = parseTimeOfDay(cadence.anchor);
      const anchor = new Date(now.getFullYear(), now.getMonth(), now.getDate(), hour, minute);
      const intervalMs = cadence.hours * HOUR_MS;
      const startAt = anchor.getTime() > now.getTime() ? anchor : new Date(anchor.getTime() + intervalMs);
      return { kind: 'interval', startAt, intervalMs };
    }

    case 'weekdays':
      return atTime(cadence.time, WORKING_DAYS);

    case 'weekly':
      return atTime(cadence.time, [dayNumber(cadence.day)]);

    case 'twiceWeekly':
      return atTime(cadence.time, cadence.days.map(dayNumber));

    case 'custom': {
      if (!Number.isInteger(cadence.intervalWeeks) || cadence.intervalWeeks < 1) {
        throw new InvalidCadenceError(`interval of ${cadence.intervalWeeks} weeks`);
      }
      // intervalWeeks is stored but not applied: every listed day fires every week.
      if (cadence.days.length === 0) {
        return atTime(cadence.time, null);
      }
      return atTime(cadence.time, cadence.days.map(dayNumber));
    }
  }
}

/** The first fire instant strictly after `after`. */
export function nextFireAfter(spec: TriggerSpec, after: Date): Date {
  if (spec.kind === 'interval') {
    const start = spec.startAt.getTime();
    if (after.getTime() < start) return new Date(start);
    const steps = Math.floor((after.getTime() - start) / spec.intervalMs) + 1;
    return new Date(start + steps * spec.intervalMs);
  }

  const hours = spec.hours ?? ALL_HOURS;
  for (let offset = 0; offset <= 7; offset++) {
    const day = new Date(after.getFullYear(), after.getMonth(), after.getDate() + offset);
    if (spec.weekdays && !spec.weekdays.includes(day.getDay())) continue;

    for (const hour of hours) {
      const candidate = new Date(day.getFullYear(), day.getMonth(), day.getDate(), hour, spec.minute);
      if (candidate.getTime() > after.getTime()) return candidate;
    }
  }
  throw new Error(`Trigger "${spec.expression}" has no upcoming fire time`);
}

export function upcomingFires(spec: TriggerSpec, from: Date, count: number): Date[] {
  const fires: Date[] = [];
  let cursor = from;
  for (let i = 0; i < count; i++) {
    cursor = nextFireAfter(spec, cursor);
    fires.push(cursor);
  }
  return fires;
}

export function describeTrigger(spec: TriggerSpec): string {
  if (spec.kind === 'calendar') return `cron "${spec.expression}"`;
  return `every ${spec.intervalMs / HOUR_MS}h from ${spec.startAt.toISOString()}`;
}
