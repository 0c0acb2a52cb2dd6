import axios from 'axios';
import { z } from 'zod';
import { ProviderUnavailableError } from '../errors';
import { createLogger } from '../logger';
import type { DateBucket } from '../types';
import type { RawResult, SearchProvider } from './result-source';

const log = createLogger('GoogleSearch');

const API_URL = 'https://www.googleapis.com/customsearch/v1';

const DATE_RESTRICT: Record<DateBucket, string> = {
  hour: 'h1',
  day: 'd1',
  week: 'w1',
  month: 'm1',
};

const responseSchema = z.object({
  items: z
    .array(
      z.object({
        title: z.string().default(''),
        link: z.string().default(''),
        snippet: z.string().default(''),
      }),
    )
    .default([]),
});

export interface GoogleSearchOptions {
  resultsPerQuery?: number;
  timeoutMs?: number;
}

export class GoogleSearchProvider implements SearchProvider {
  private readonly resultsPerQuery: number;
  private readonly timeoutMs: number;

  constructor(options: GoogleSearchOptions = {}) {
    this.resultsPerQuery = options.resultsPerQuery ?? 10;
    this.timeoutMs = options.timeoutMs ?? 15000;
  }

  async search(query: string, dateBucket: DateBucket | null, apiKey: string, engineId: string): Promise<RawResult[]> {
    const params: Record<string, string | number> = {
      key: apiKey,
      cx: engineId,
      q: query,
      num: this.resultsPerQuery,
    };
    if (dateBucket) {
      params.dateRestrict = DATE_RESTRICT[dateBucket];
    }

    let data: unknown;
    try {
      const response = await axios.get<unknown>(API_URL, {
        params,
        timeout: this.timeoutMs,
        headers: { 'User-Agent': 'job-search-scheduler/1.0' },
      });
      data = response.data;
    } catch (err) {
      const status = axios.isAxiosError(err) ? err.response?.status : undefined;
      const detail = err instanceof Error ? err.message : String(err);
      throw new ProviderUnavailableError(
        `Custom Search request failed${status ? ` (HTTP ${status})` : ''}: ${detail}`,
        err,
      );
    }

    const parsed = responseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProviderUnavailableError('Custom Search returned an unexpected response body');
    }

    log.debug(`Query returned ${parsed.data.items.length} items`);
    return parsed.data.items;
  }
}
