import type { DateBucket, SearchDraft } from '../types';
import { DEFAULT_JOB_SITES } from './sites';

export interface BuiltQuery {
  query: string;
  dateBucket: DateBucket | null;
  /** Config keywords in order; the first one tags single-keyword results. */
  keywords: string[];
  sites: string[];
}

export function resolveSites(jobSites: readonly string[], defaults: readonly string[] = DEFAULT_JOB_SITES): string[] {
  return jobSites.length > 0 ? [...jobSites] : [...defaults];
}

export function buildKeywordClause(config: Pick<SearchDraft, 'keywords' | 'searchLogic' | 'customLogic'>): string {
  const anyOf = config.keywords.join(' OR ');
  switch (config.searchLogic) {
    case 'OR':
      return anyOf;
    case 'CUSTOM':
      return config.customLogic.trim() ? config.customLogic : anyOf;
    case 'AND':
      return `"${config.keywords.join(' ')}"`;
  }
}

export function dateBucketFor(maxJobAge: number): DateBucket | null {
  if (maxJobAge <= 0) return null;
  if (maxJobAge <= 1) return 'hour';
  if (maxJobAge <= 24) return 'day';
  if (maxJobAge <= 168) return 'week';
  if (maxJobAge <= 720) return 'month';
  return null;
}

export function buildQuery(config: SearchDraft, defaultSites: readonly string[] = DEFAULT_JOB_SITES): BuiltQuery {
  const sites = resolveSites(config.jobSites, defaultSites);
  const siteClause = sites.map(site => `site:${site}`).join(' OR ');
  const keywordClause = buildKeywordClause(config);

  return {
    query: `(${siteClause}) (${keywordClause}) ("${config.locationFilter}")`,
    dateBucket: dateBucketFor(config.maxJobAge),
    keywords: [...config.keywords],
    sites,
  };
}
