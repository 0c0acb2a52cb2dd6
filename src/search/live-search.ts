import { ProviderUnavailableError } from '../errors';
import { createLogger } from '../logger';
import type { JobPosting } from '../types';
import type { RawResult, ResultSource, SearchOutcome, SearchProvider, SearchRequest } from './result-source';
import { extractJobSite } from './sites';

const log = createLogger('LiveSearch');

export class LiveSearch implements ResultSource {
  readonly name = 'live';

  constructor(private readonly provider: SearchProvider) {}

  async search(request: SearchRequest): Promise<SearchOutcome> {
    const { built, credentials, now } = request;
    if (!credentials) {
      return { kind: 'unavailable', reason: 'no search credentials configured' };
    }

    log.info(`Search query: ${built.query}`);

    let items: RawResult[];
    try {
      items = await this.provider.search(built.query, built.dateBucket, credentials.apiKey, credentials.engineId);
    } catch (err) {
      if (err instanceof ProviderUnavailableError) {
        log.warn(`Provider unavailable: ${err.message}`);
        return { kind: 'unavailable', reason: err.message };
      }
      throw err;
    }

    if (items.length === 0) {
      return { kind: 'unavailable', reason: 'provider returned no results' };
    }

    const keyword = built.keywords[0] ?? '';
    const postings: JobPosting[] = items.map(item => ({
      title: item.title,
      link: item.link,
      snippet: item.snippet,
      site: extractJobSite(item.link, built.sites),
      keyword,
      company: null,
      foundAt: now,
    }));

    log.info(`Found ${postings.length} postings`);
    return { kind: 'found', postings };
  }
}
