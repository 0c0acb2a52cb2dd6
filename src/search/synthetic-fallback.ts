import { createLogger } from '../logger';
import type { JobPosting } from '../types';
import type { ResultSource, SearchOutcome, SearchRequest } from './result-source';

const log = createLogger('SyntheticFallback');

const HOUR_MS = 60 * 60 * 1000;
const UNRESTRICTED_AGE_HOURS = 168;
const OR_LOGIC_LIMIT = 8;
const DEFAULT_VOLUME = 3;

/** Keyword substring → result volume for AND/CUSTOM logic; first match wins. */
const KEYWORD_VOLUME: ReadonlyArray<[string, number]> = [
  ['python', 6],
  ['developer', 5],
  ['engineer', 5],
  ['analyst', 4],
  ['manager', 4],
  ['business', 3],
  ['data', 4],
  ['software', 5],
  ['web', 4],
  ['full', 3],
];

const TITLE_SUFFIXES = ['', ' - Remote', ' - Full Time', ' - Contract', ' - Part Time'];

interface Template {
  title: string;
  company: string;
  site: string;
  snippet: string;
  keyword: string;
}

function perKeywordTemplates(keyword: string, n: number): Template[] {
  return [
    {
      title: `Senior ${keyword} Manager`,
      company: `TechCorp ${n} Inc.`,
      site: 'greenhouse.io',
      snippet: `We are looking for a Senior ${keyword} Manager to join our remote team. Experience with ${keyword} required.`,
      keyword,
    },
    {
      title: `${keyword} Developer`,
      company: `CodeCraft ${n} Solutions`,
      site: 'smartrecruiters.com',
      snippet: `We need a ${keyword} Developer to join our growing team. Remote-first company with great benefits.`,
      keyword,
    },
    {
      title: `${keyword} Engineer`,
      company: `BuildTech ${n}`,
      site: 'jobvite.com',
      snippet: `Looking for a ${keyword} Engineer with strong technical skills. Remote work available.`,
      keyword,
    },
    {
      title: `${keyword} Analyst`,
      company: `DataFlow ${n} Systems`,
      site: 'lever.co',
      snippet: `Join our team as a ${keyword} Analyst. Remote work available. Strong analytical skills required.`,
      keyword,
    },
  ];
}

function singleKeywordTemplates(keyword: string): Template[] {
  return [
    {
      title: `Senior ${keyword} Manager`,
      company: 'TechCorp Inc.',
      site: 'greenhouse.io',
      snippet: `We are looking for a Senior ${keyword} Manager to join our remote team. Experience with ${keyword} required.`,
      keyword,
    },
    {
      title: `${keyword} Analyst`,
      company: 'DataFlow Systems',
      site: 'lever.co',
      snippet: `Join our team as a ${keyword} Analyst. Remote work available. Strong analytical skills required.`,
      keyword,
    },
    {
      title: `Lead ${keyword} Specialist`,
      company: 'InnovateLabs',
      site: 'workday.com',
      snippet: `Lead ${keyword} Specialist position. Remote work. 5+ years experience in ${keyword} field.`,
      keyword,
    },
    {
      title: `${keyword} Developer`,
      company: 'CodeCraft Solutions',
      site: 'smartrecruiters.com',
      snippet: `We need a ${keyword} Developer to join our growing team. Remote-first company with great benefits.`,
      keyword,
    },
    {
      title: `${keyword} Consultant`,
      company: 'Strategic Partners',
      site: 'icims.com',
      snippet: `Independent ${keyword} Consultant needed for exciting projects. Flexible schedule and remote work.`,
      keyword,
    },
    {
      title: `${keyword} Engineer`,
      company: 'BuildTech',
      site: 'jobvite.com',
      snippet: `Looking for a ${keyword} Engineer with strong technical skills. Remote work available.`,
      keyword,
    },
    {
      title: `${keyword} Coordinator`,
      company: 'ProjectFlow',
      site: 'bamboohr.com',
      snippet: `${keyword} Coordinator position available. Great opportunity for career growth in ${keyword} field.`,
      keyword,
    },
  ];
}

export function volumeForKeyword(keyword: string): number {
  const lower = keyword.toLowerCase();
  const match = KEYWORD_VOLUME.find(([fragment]) => lower.includes(fragment));
  return match ? match[1] : DEFAULT_VOLUME;
}

/** Picks `count` distinct items in random order. */
function sample<T>(items: readonly T[], count: number, random: () => number): T[] {
  const pool = [...items];
  const picked: T[] = [];
  while (picked.length < count && pool.length > 0) {
    const index = Math.floor(random() * pool.length);
    picked.push(...pool.splice(index, 1));
  }
  return picked;
}

export class SyntheticFallback implements ResultSource {
  readonly name = 'synthetic';

  constructor(private readonly random: () => number = Math.random) {}

  async search(request: SearchRequest): Promise<SearchOutcome> {
    return { kind: 'found', postings: this.generate(request) };
  }

  generate({ draft, now }: SearchRequest): JobPosting[] {
    const keywords = draft.keywords.length > 0 ? draft.keywords : ['Business'];

    let templates: Template[];
    let volume: number;
    if (draft.searchLogic === 'OR') {
      templates = keywords.flatMap((keyword, i) => perKeywordTemplates(keyword, i + 1));
      volume = OR_LOGIC_LIMIT;
    } else {
      templates = singleKeywordTemplates(keywords[0]);
      volume = volumeForKeyword(keywords[0]);
    }

    const maxAgeHours = draft.maxJobAge > 0 ? draft.maxJobAge : UNRESTRICTED_AGE_HOURS;
    const picked = sample(templates, Math.min(volume, templates.length), this.random);

    const postings = picked.map((template, i): JobPosting => {
      const suffix = TITLE_SUFFIXES[Math.floor(this.random() * TITLE_SUFFIXES.length)];
      const ageMs = this.random() * maxAgeHours * HOUR_MS;
      return {
        title: `${template.title}${suffix}`,
        link: `https://example.com/job${i + 1}`,
        snippet: template.snippet,
        site: template.site,
        keyword: template.keyword,
        company: template.company,
        foundAt: new Date(now.getTime() - ageMs),
      };
    });

    log.info(`Generated ${postings.length} sample postings (${draft.searchLogic}, max age ${maxAgeHours}h)`);
    return postings;
  }
}
