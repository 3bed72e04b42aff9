import type { CheerioAPI } from 'cheerio';
import type { Candidate } from './fallback.js';
import { blockText, blockTextOf, metaContent } from './dom.js';
import type { SiteProfile } from './sites.js';
import { normalizeWhitespace, slugToName, titleCase } from '../utils/text.js';

export const DESCRIPTION_CONTAINERS: readonly string[] = [
  'article',
  'main',
  '[role="main"]',
  '.content',
  '#content',
  '.main-content',
  '.job-details',
  '.position-details',
  '[data-testid*="description"]',
  '[data-testid*="job"]',
];

/** Shorter container text is usually navigation rather than a posting. */
export const MIN_CONTAINER_LENGTH = 500;

export const PAGE_CHROME = 'header, footer, nav, aside, script, style';

export const COMPANY_TEXT_PATTERNS: readonly RegExp[] = [
  /\bat[ \t]+([A-Z][A-Za-z0-9&' \t]*?)[ \t]*(?:\||[ \t][-–—][ \t]|$)/m,
  /\bJoin[ \t]+([A-Z][A-Za-z0-9&' \t]*?)[ \t]*(?:[|!.,:]|[ \t][-–—][ \t]|$)/m,
  /\bAbout[ \t]+([A-Z][A-Za-z0-9&' \t]*?)[ \t]*(?:[|!.,:]|[ \t][-–—][ \t]|$)/m,
];

const GENERIC_COMPANY_WORDS = /^(?:our|us|you|your|this|the|a|an|role|job|position|team|company)\b/i;
const MAX_COMPANY_LENGTH = 80;
const SLUG_STOPWORDS = new Set(['embed', 'jobs', 'job', 'v1']);

const TITLE_SEPARATOR = /\s*\|\s*|\s+[-–—]\s+/g;

export function stripSiteSuffix(value: string): string {
  const title = normalizeWhitespace(value);
  let cut = -1;
  for (const match of title.matchAll(TITLE_SEPARATOR)) {
    cut = match.index ?? cut;
  }
  const stripped = cut > 0 ? title.slice(0, cut).trim() : title;
  return stripped || title;
}

export function isPlausibleCompany(value: string): boolean {
  return value.length > 0 && value.length <= MAX_COMPANY_LENGTH && !GENERIC_COMPANY_WORDS.test(value);
}

export function domainLabelName(domain: string): string {
  const label = domain.split('.')[0] ?? '';
  return titleCase(label.replace(/-/g, ' ')).trim();
}

export function selectorCandidates(
  $: CheerioAPI,
  field: string,
  selectors: readonly string[],
  read: ($: CheerioAPI, selector: string) => string,
): Candidate<string>[] {
  return selectors.map((selector) => ({
    label: `${field} selector "${selector}"`,
    run: () => read($, selector),
  }));
}

export function genericDescriptionCandidates(
  $: CheerioAPI,
  containers: readonly string[],
  minLength: number,
): Candidate<string>[] {
  const containerCandidates = containers.map<Candidate<string>>((selector) => ({
    label: `description container "${selector}"`,
    run: () => {
      const first = $(selector).first().toArray();
      const text = blockText(first);
      return text.length > minLength ? text : undefined;
    },
  }));

  return [
    ...containerCandidates,
    {
      label: 'description body',
      run: () => {
        const body = $('body').first().clone();
        if (body.length === 0) {
          return undefined;
        }
        body.find(PAGE_CHROME).remove();
        return blockText(body.toArray());
      },
    },
    {
      label: 'description document',
      run: () => ($('body').length > 0 ? undefined : blockText($.root().toArray())),
    },
  ];
}

export function genericTitleCandidates($: CheerioAPI): Candidate<string>[] {
  return [
    { label: 'title h1', run: () => normalizeWhitespace($('h1').first().text()) },
    { label: 'title og:title', run: () => metaContent($, 'meta[property="og:title"]') },
    { label: 'title tag', run: () => stripSiteSuffix($('title').first().text()) },
  ];
}

export function genericCompanyCandidates(
  $: CheerioAPI,
  url: string,
  domain: string,
  profile: SiteProfile | undefined,
  patterns: readonly RegExp[],
): Candidate<string>[] {
  const candidates: Candidate<string>[] = [
    { label: 'company employer meta', run: () => metaContent($, 'meta[name="employer"]') },
  ];

  const slugPattern = profile?.companySlug;
  if (slugPattern) {
    const fromSlug = (source: string): string | undefined => {
      const slug = source.match(slugPattern)?.[1];
      if (!slug || SLUG_STOPWORDS.has(slug.toLowerCase())) {
        return undefined;
      }
      return slugToName(slug);
    };
    candidates.push(
      { label: 'company url slug', run: () => fromSlug(url) },
      { label: 'company markup slug', run: () => fromSlug($.html()) },
    );
  }

  let pageText: string | undefined;
  const readPageText = (): string => {
    if (pageText === undefined) {
      pageText = blockTextOf($, 'body') || blockText($.root().toArray());
    }
    return pageText;
  };

  patterns.forEach((pattern, index) => {
    candidates.push({
      label: `company text pattern #${index + 1}`,
      run: () => {
        const name = normalizeWhitespace(readPageText().match(pattern)?.[1] ?? '');
        return isPlausibleCompany(name) ? name : undefined;
      },
    });
  });

  candidates.push({ label: 'company domain label', run: () => domainLabelName(domain) });
  return candidates;
}
