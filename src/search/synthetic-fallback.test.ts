import { describe, expect, it } from 'vitest';
import { seededRandom } from '../testing/fakes';
import type { SearchDraft } from '../types';
import { buildQuery } from './query-builder';
import type { SearchRequest } from './result-source';
import { SyntheticFallback, volumeForKeyword } from './synthetic-fallback';

const HOUR_MS = 3600_000;
const now = new Date(2026, 9, 19, 9, 0);

function request(overrides: Partial<SearchDraft> = {}): SearchRequest {
  const draft: SearchDraft = {
    keywords: ['python'],
    searchLogic: 'AND',
    customLogic: '',
    jobSites: [],
    locationFilter: 'remote',
    maxJobAge: 24,
    ...overrides,
  };
  return { draft, built: buildQuery(draft), credentials: null, now };
}

describe('volumeForKeyword', () => {
  it('uses the first matching table entry', () => {
    expect(volumeForKeyword('python')).toBe(6);
    expect(volumeForKeyword('Senior Python Dev')).toBe(6);
    expect(volumeForKeyword('Data Engineer')).toBe(5);
    expect(volumeForKeyword('Full Stack Developer')).toBe(5);
    expect(volumeForKeyword('data')).toBe(4);
  });

  it('defaults to 3', () => {
    expect(volumeForKeyword('Sales')).toBe(3);
  });
});

describe('SyntheticFallback', () => {
  it('always reports postings', async () => {
    const outcome = await new SyntheticFallback(seededRandom(1)).search(request());
    expect(outcome.kind).toBe('found');
  });

  it('sizes AND results from the keyword table and tags the first keyword', () => {
    const postings = new SyntheticFallback(seededRandom(7)).generate(request({ keywords: ['python', 'aws'] }));
    expect(postings).toHaveLength(6);
    expect(postings.every(p => p.keyword === 'python')).toBe(true);
    expect(postings.map(p => p.link)).toEqual([1, 2, 3, 4, 5, 6].map(n => `https://example.com/job${n}`));
    expect(new Set(postings.map(p => p.snippet)).size).toBe(6);
  });

  it('returns the default volume for unknown keywords', () => {
    expect(new SyntheticFallback(seededRandom(3)).generate(request({ keywords: ['Sales'] }))).toHaveLength(3);
  });

  it('treats CUSTOM logic like AND', () => {
    const postings = new SyntheticFallback(seededRandom(3)).generate(
      request({ keywords: ['Data Engineer', 'python'], searchLogic: 'CUSTOM', customLogic: 'x' }),
    );
    expect(postings).toHaveLength(5);
    expect(postings.every(p => p.keyword === 'Data Engineer')).toBe(true);
  });

  it('caps OR results at eight, each tagged with its own keyword', () => {
    const keywords = ['python', 'go', 'rust'];
    const postings = new SyntheticFallback(seededRandom(11)).generate(request({ keywords, searchLogic: 'OR' }));
    expect(postings).toHaveLength(8);
    for (const posting of postings) {
      expect(keywords).toContain(posting.keyword);
      expect(posting.title).toContain(posting.keyword);
    }
    expect(new Set(postings.map(p => `${p.keyword}|${p.snippet}`)).size).toBe(8);
  });

  it('caps OR results at the template pool size', () => {
    const postings = new SyntheticFallback(seededRandom(5)).generate(request({ keywords: ['java'], searchLogic: 'OR' }));
    expect(postings).toHaveLength(4);
  });

  it('uses "Business" when there are no keywords', () => {
    const postings = new SyntheticFallback(seededRandom(5)).generate(request({ keywords: [] }));
    expect(postings).toHaveLength(3);
    expect(postings.every(p => p.keyword === 'Business')).toBe(true);
  });

  it('keeps timestamps within the maximum job age', () => {
    for (let seed = 1; seed <= 20; seed++) {
      const postings = new SyntheticFallback(seededRandom(seed)).generate(request({ maxJobAge: 24 }));
      for (const posting of postings) {
        expect(posting.foundAt.getTime()).toBeLessThanOrEqual(now.getTime());
        expect(posting.foundAt.getTime()).toBeGreaterThanOrEqual(now.getTime() - 24 * HOUR_MS);
      }
    }
  });

  it('spreads timestamps over a week when age is unrestricted', () => {
    const postings = new SyntheticFallback(seededRandom(9)).generate(request({ maxJobAge: 0, searchLogic: 'OR' }));
    for (const posting of postings) {
      expect(posting.foundAt.getTime()).toBeLessThanOrEqual(now.getTime());
      expect(posting.foundAt.getTime()).toBeGreaterThanOrEqual(now.getTime() - 168 * HOUR_MS);
    }
  });

  it('builds titles from the keyword templates plus an optional suffix', () => {
    const bases = [
      'Senior python Manager',
      'python Analyst',
      'Lead python Specialist',
      'python Developer',
      'python Consultant',
      'python Engineer',
      'python Coordinator',
    ];
    const postings = new SyntheticFallback(seededRandom(2)).generate(request());
    for (const posting of postings) {
      const base = posting.title.replace(/ - (Remote|Full Time|Contract|Part Time)$/, '');
      expect(bases).toContain(base);
      expect(posting.company).not.toBeNull();
    }
  });
});
