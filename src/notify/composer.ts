import type { JobPosting } from '../types';

export interface Notification {
  subject: string;
  body: string;
}

export const NO_JOBS_BODY = 'No new jobs found today.';
const SNIPPET_LIMIT = 200;

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export function truncateSnippet(snippet: string, limit = SNIPPET_LIMIT): string {
  return snippet.length > limit ? `${snippet.slice(0, limit)}...` : snippet;
}

/** Groups postings by matched keyword, keeping the order keywords first appear in. */
export function groupByKeyword(postings: JobPosting[]): Map<string, JobPosting[]> {
  const groups = new Map<string, JobPosting[]>();
  for (const posting of postings) {
    const group = groups.get(posting.keyword);
    if (group) {
      group.push(posting);
    } else {
      groups.set(posting.keyword, [posting]);
    }
  }
  return groups;
}

/** Empty result sets are never mailed. */
export function shouldSend(postings: JobPosting[]): boolean {
  return postings.length > 0;
}

function renderItem(posting: JobPosting): string {
  return [
    '<li>',
    `<strong><a href="${escapeHtml(posting.link)}" target="_blank">${escapeHtml(posting.title)}</a></strong><br>`,
    `<em>Site: ${escapeHtml(posting.site)}</em><br>`,
    `<small>${escapeHtml(truncateSnippet(posting.snippet))}</small>`,
    '</li>',
  ].join('\n');
}

export function compose(postings: JobPosting[], configName: string): Notification {
  const subject = `Daily Job Search Results - ${postings.length} new jobs found`;
  if (postings.length === 0) {
    return { subject, body: NO_JOBS_BODY };
  }

  const sections: string[] = [];
  for (const [keyword, group] of groupByKeyword(postings)) {
    sections.push(
      [
        `<h3>Keyword: ${escapeHtml(keyword)} (${group.length} jobs)</h3>`,
        '<ul>',
        ...group.map(renderItem),
        '</ul>',
      ].join('\n'),
    );
  }

  const body = [
    `<h2>Daily Job Search Results - ${escapeHtml(configName)}</h2>`,
    `<p>Found ${postings.length} new job postings today!</p>`,
    ...sections,
    '<hr>',
    '<p><small>This email was generated automatically by the Daily Job Search Bot.</small></p>',
  ].join('\n');

  return { subject, body };
}

export function composeTestEmail(recipient: string, sentAt: Date): Notification {
  return {
    subject: 'Daily Job Search - Test Email',
    body: [
      '<h2>Test Email from Daily Job Search</h2>',
      '<p>This is a test email to verify that your mail configuration is working correctly.</p>',
      `<p><strong>Recipient:</strong> ${escapeHtml(recipient)}</p>`,
      `<p><strong>Sent at:</strong> ${sentAt.toISOString()}</p>`,
      '<hr>',
      '<p><small>If you received this email, your mail setup is working correctly!</small></p>',
    ].join('\n'),
  };
}
