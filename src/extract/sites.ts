import type { JobField, KnownJobBoard } from '../types.js';
import { bareHost } from '../utils/url.js';

export interface SiteProfile {
  id: KnownJobBoard;
  hosts: readonly string[];
  /** Selector candidates per field, most preferred first. */
  selectors: Readonly<Record<JobField, readonly string[]>>;
  /** Captures a company slug from the posting URL or page markup. */
  companySlug?: RegExp;
}

export const SITE_PROFILES: readonly SiteProfile[] = [
  {
    id: 'linkedin.com',
    hosts: ['linkedin.com'],
    selectors: {
      description: [
        '.description__text',
        '.jobs-description__content',
        '[data-test-id="job-description"]',
        '.job-details-jobs-unified-description__content',
      ],
      title: ['.job-details-jobs-unified-top-card__job-title', 'h1', '.topcard__title'],
      company: ['.job-details-jobs-unified-top-card__company-name', '.topcard__org-name-link'],
    },
  },
  {
    id: 'indeed.com',
    hosts: ['indeed.com'],
    selectors: {
      description: [
        '#jobDescriptionText',
        '.jobsearch-jobDescriptionText',
        '[data-testid="jobDescriptionText"]',
      ],
      title: [
        '.jobsearch-JobInfoHeader-title',
        'h1',
        '[data-testid="jobsearch-JobInfoHeader-title"]',
      ],
      company: [
        '.jobsearch-JobInfoHeader-companyName',
        '[data-testid="jobsearch-JobInfoHeader-companyName"]',
        '[data-testid="inlineHeader-companyName"]',
      ],
    },
  },
  {
    id: 'greenhouse.io',
    hosts: ['greenhouse.io'],
    selectors: {
      description: ['.job-description', '#content', '.app-body', '.job__description'],
      title: ['.app-title', 'h1', '.job-title'],
      company: ['.company-name', '.header-company-name'],
    },
    companySlug: /(?:job-)?boards\.greenhouse\.io\/([^/?#"'\s]+)/i,
  },
  {
    id: 'lever.co',
    hosts: ['lever.co'],
    selectors: {
      description: ['.job-description', '.posting-description', '[data-qa="job-description"]'],
      title: ['.posting-headline', 'h2', '.job-title'],
      company: ['.main-header-title'],
    },
    companySlug: /jobs\.lever\.co\/([^/?#"'\s]+)/i,
  },
  {
    id: 'workday.com',
    hosts: ['workday.com', 'myworkdayjobs.com'],
    selectors: {
      description: [
        '.job-description',
        '[data-automation-id="jobDescription"]',
        '.wd-JobDescription',
        '[data-automation-id="jobPostingDescription"]',
      ],
      title: ['h1', '[data-automation-id="jobPostingHeader"]'],
      company: ['.company-name'],
    },
  },
  {
    id: 'ashbyhq.com',
    hosts: ['ashbyhq.com'],
    selectors: {
      description: ['.job-description', '[data-testid="job-description"]', '.description'],
      title: ['h1', '.job-title'],
      company: ['.company-name'],
    },
    companySlug: /jobs\.ashbyhq\.com\/([^/?#"'\s]+)/i,
  },
];

function hostMatches(host: string, known: string): boolean {
  return host === known || host.endsWith(`.${known}`);
}

/** Maps a URL to a known job-board id, or to its host without `www.`. */
export function classifyDomain(url: string, profiles: readonly SiteProfile[] = SITE_PROFILES): string {
  const host = bareHost(url);
  if (!host) {
    return '';
  }
  for (const profile of profiles) {
    if (profile.hosts.some((known) => hostMatches(host, known))) {
      return profile.id;
    }
  }
  return host;
}

export function findSiteProfile(
  domain: string,
  profiles: readonly SiteProfile[] = SITE_PROFILES,
): SiteProfile | undefined {
  return profiles.find((profile) => profile.id === domain);
}
