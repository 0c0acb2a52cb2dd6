/** Applicant-tracking systems searched when a config names no sites of its own. */
export const DEFAULT_JOB_SITES: readonly string[] = [
  'myworkdayjobs.com',
  'greenhouse.io',
  'icims.com',
  'taleo.net',
  'lever.co',
  'smartrecruiters.com',
  'jobvite.com',
  'workforcenow.adp.com',
  'successfactors.com',
  'brassring.com',
  'jazzhr.com',
  'breezy.hr',
  'jobdiva.com',
  'bullhorn.com',
  'bamboohr.com',
];

export function extractJobSite(url: string, sites: readonly string[] = DEFAULT_JOB_SITES): string {
  return sites.find(site => url.includes(site)) ?? 'Unknown';
}
