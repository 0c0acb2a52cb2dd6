export type DayOfWeek =
  | 'monday'
  | 'tuesday'
  | 'wednesday'
  | 'thursday'
  | 'friday'
  | 'saturday'
  | 'sunday';

export const DAYS_OF_WEEK: readonly DayOfWeek[] = [
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
  'sunday',
];

/** Time of day as written by users, `HH:MM` in 24h form. */
export type TimeOfDay = string;

export type Cadence =
  | { type: 'daily'; time: TimeOfDay }
  | { type: 'hourly'; minute: number }
  | { type: 'everyNHours'; hours: number; anchor: TimeOfDay }
  | { type: 'weekdays'; time: TimeOfDay }
  | { type: 'weekly'; day: DayOfWeek; time: TimeOfDay }
  | { type: 'twiceWeekly'; days: [DayOfWeek, DayOfWeek]; time: TimeOfDay }
  | { type: 'custom'; days: DayOfWeek[]; intervalWeeks: number; time: TimeOfDay };

export type SearchLogic = 'AND' | 'OR' | 'CUSTOM';

export type DateBucket = 'hour' | 'day' | 'week' | 'month';

export interface SearchConfig {
  id: number;
  userId: number;
  name: string;
  keywords: string[];
  searchLogic: SearchLogic;
  customLogic: string;
  jobSites: string[];
  locationFilter: string;
  /** Hours; 0 disables the age restriction. */
  maxJobAge: number;
  cadence: Cadence;
  isActive: boolean;
  lastRun: Date | null;
}

/** The search-relevant part of a config, as submitted for an ad-hoc test run. */
export type SearchDraft = Pick<
  SearchConfig,
  'keywords' | 'searchLogic' | 'customLogic' | 'jobSites' | 'locationFilter' | 'maxJobAge'
>;

export interface JobPosting {
  title: string;
  link: string;
  snippet: string;
  site: string;
  keyword: string;
  company: string | null;
  foundAt: Date;
}

export interface UserCredentialView {
  id: number;
  email: string;
  notificationEmail: string | null;
  searchApiKey: string | null;
  searchEngineId: string | null;
  mailAuthorized: boolean;
}

export type RunStatus = 'completed' | 'skipped' | 'failed';

export interface RunOutcome {
  status: RunStatus;
  postingsPersisted: number;
  notified: boolean;
  isRealSearch: boolean;
  postings: JobPosting[];
}
