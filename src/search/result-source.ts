import type { DateBucket, JobPosting, SearchDraft } from '../types';
import type { BuiltQuery } from './query-builder';

export interface SearchCredentials {
  apiKey: string;
  engineId: string;
}

export interface SearchRequest {
  draft: SearchDraft;
  built: BuiltQuery;
  credentials: SearchCredentials | null;
  now: Date;
}

export type SearchOutcome =
  | { kind: 'found'; postings: JobPosting[] }
  | { kind: 'unavailable'; reason: string };

export interface ResultSource {
  readonly name: 'live' | 'synthetic';
  search(request: SearchRequest): Promise<SearchOutcome>;
}

export interface RawResult {
  title: string;
  link: string;
  snippet: string;
}

export interface SearchProvider {
  /** Rejects with `ProviderUnavailableError` on any failure. */
  search(query: string, dateBucket: DateBucket | null, apiKey: string, engineId: string): Promise<RawResult[]>;
}
