import { z } from 'zod';
import { InvalidCadenceError } from '../errors';
import { DAYS_OF_WEEK, type Cadence, type DayOfWeek } from '../types';
import { parseTimeOfDay } from './trigger-compiler';

export const dayOfWeekSchema = z.enum([
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
  'sunday',
]);

export const cadenceSchema: z.ZodType<Cadence> = z.discriminatedUnion('type', [
  z.object({ type: z.literal('daily'), time: z.string() }),
  z.object({ type: z.literal('hourly'), minute: z.number().int() }),
  z.object({ type: z.literal('everyNHours'), hours: z.number().int(), anchor: z.string() }),
  z.object({ type: z.literal('weekdays'), time: z.string() }),
  z.object({ type: z.literal('weekly'), day: dayOfWeekSchema, time: z.string() }),
  z.object({
    type: z.literal('twiceWeekly'),
    days: z.tuple([dayOfWeekSchema, dayOfWeekSchema]),
    time: z.string(),
  }),
  z.object({
    type: z.literal('custom'),
    days: z.array(dayOfWeekSchema),
    intervalWeeks: z.number().int(),
    time: z.string(),
  }),
]);

export interface CustomFrequency {
  days?: string[];
  interval?: number;
}

const DAY_ALIASES: Record<string, DayOfWeek> = {
  mon: 'monday',
  tue: 'tuesday',
  wed: 'wednesday',
  thu: 'thursday',
  fri: 'friday',
  sat: 'saturday',
  sun: 'sunday',
};

function toDay(raw: string): DayOfWeek {
  const key = raw.trim().toLowerCase();
  const full = DAYS_OF_WEEK.find(day => day === key);
  const day = full ?? DAY_ALIASES[key];
  if (!day) {
    throw new InvalidCadenceError(`unknown day "${raw}"`);
  }
  return day;
}

/**
 * Maps the form-style schedule (frequency name, `HH:MM` search time and the custom
 * frequency object) onto a cadence. Fixed-day frequencies run on Monday, or on Monday
 * and Thursday for `twice_weekly`.
 */
export function cadenceFromFrequency(
  frequency: string,
  searchTime: string,
  customFrequency: CustomFrequency = {},
): Cadence {
  switch (frequency) {
    case 'daily':
      return { type: 'daily', time: searchTime };
    case 'hourly':
      return { type: 'hourly', minute: parseTimeOfDay(searchTime).minute };
    case '2hourly':
      return { type: 'everyNHours', hours: 2, anchor: searchTime };
    case '3hourly':
      return { type: 'everyNHours', hours: 3, anchor: searchTime };
    case 'weekdays':
      return { type: 'weekdays', time: searchTime };
    case 'weekly':
      return { type: 'weekly', day: 'monday', time: searchTime };
    case 'twice_weekly':
      return { type: 'twiceWeekly', days: ['monday', 'thursday'], time: searchTime };
    case 'custom':
      return {
        type: 'custom',
        days: (customFrequency.days ?? []).map(toDay),
        intervalWeeks: customFrequency.interval ?? 1,
        time: searchTime,
      };
    default:
      throw new InvalidCadenceError(`unknown frequency "${frequency}"`);
  }
}
