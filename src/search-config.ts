import { z } from 'zod';
import { cadenceSchema } from './schedule/cadence';
import type { SearchConfig, SearchDraft } from './types';

export const DEFAULT_LOCATION_FILTER = 'remote OR "United States"';
export const DEFAULT_MAX_JOB_AGE = 24;

export const searchLogicSchema = z.enum(['AND', 'OR', 'CUSTOM']);

const keywordsSchema = z.array(z.string().trim().min(1)).min(1, 'At least one keyword is required');

export const searchDraftSchema = z.object({
  keywords: keywordsSchema,
  searchLogic: searchLogicSchema.default('AND'),
  customLogic: z.string().default(''),
  jobSites: z.array(z.string().trim().min(1)).default([]),
  locationFilter: z.string().default(DEFAULT_LOCATION_FILTER),
  maxJobAge: z.number().int().min(0).default(DEFAULT_MAX_JOB_AGE),
});

export const searchConfigInputSchema = searchDraftSchema.extend({
  userId: z.number().int().positive(),
  name: z.string().trim().min(1),
  cadence: cadenceSchema.default({ type: 'daily', time: '09:00' }),
  isActive: z.boolean().default(true),
});

export type SearchDraftInput = z.input<typeof searchDraftSchema>;
export type SearchConfigInput = z.input<typeof searchConfigInputSchema>;
export type NewSearchConfig = Omit<SearchConfig, 'id' | 'lastRun'>;

/** Resolves every optional field to its default. */
export function createSearchDraft(input: SearchDraftInput): SearchDraft {
  return searchDraftSchema.parse(input);
}

export function createSearchConfig(input: SearchConfigInput): NewSearchConfig {
  return searchConfigInputSchema.parse(input);
}
