import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import type { ExtractedJob, JobField } from '../types.js';
import { UNKNOWN_COMPANY, UNKNOWN_TITLE } from '../types.js';
import { blockTextOf, inlineTextOf } from './dom.js';
import type { Candidate } from './fallback.js';
import { firstAccepted, isNonEmpty } from './fallback.js';
import {
  COMPANY_TEXT_PATTERNS,
  DESCRIPTION_CONTAINERS,
  MIN_CONTAINER_LENGTH,
  genericCompanyCandidates,
  genericDescriptionCandidates,
  genericTitleCandidates,
  selectorCandidates,
} from './generic.js';
import type { SiteProfile } from './sites.js';
import { SITE_PROFILES, classifyDomain, findSiteProfile } from './sites.js';

export interface ExtractionTables {
  sites: readonly SiteProfile[];
  descriptionContainers: readonly string[];
  minContainerLength: number;
  companyPatterns: readonly RegExp[];
}

export const DEFAULT_EXTRACTION_TABLES: ExtractionTables = {
  sites: SITE_PROFILES,
  descriptionContainers: DESCRIPTION_CONTAINERS,
  minContainerLength: MIN_CONTAINER_LENGTH,
  companyPatterns: COMPANY_TEXT_PATTERNS,
};

/**
 * Locates title, company and description in a rendered job page.
 *
 * Board-specific selectors are tried before the generic strategies. Every
 * strategy is isolated, so a broken selector or a missing element only moves
 * extraction on to the next candidate; unresolved fields come back as
 * sentinels and never as errors.
 */
export class JobExtractor {
  constructor(private readonly tables: ExtractionTables = DEFAULT_EXTRACTION_TABLES) {}

  extract(url: string, html: string): ExtractedJob {
    const notes: string[] = [];
    const domain = classifyDomain(url, this.tables.sites);
    const profile = findSiteProfile(domain, this.tables.sites);
    const $ = cheerio.load(html);

    const description = firstAccepted(
      [
        ...this.siteCandidates($, profile, 'description', blockTextOf),
        ...genericDescriptionCandidates(
          $,
          this.tables.descriptionContainers,
          this.tables.minContainerLength,
        ),
      ],
      isNonEmpty,
      notes,
    );

    const title = firstAccepted(
      [...this.siteCandidates($, profile, 'title', inlineTextOf), ...genericTitleCandidates($)],
      isNonEmpty,
      notes,
    );

    const company = firstAccepted(
      [
        ...this.siteCandidates($, profile, 'company', inlineTextOf),
        ...genericCompanyCandidates($, url, domain, profile, this.tables.companyPatterns),
      ],
      isNonEmpty,
      notes,
    );

    return {
      url,
      domain,
      title: title ?? UNKNOWN_TITLE,
      company: company ?? UNKNOWN_COMPANY,
      description: description ?? '',
      notes,
    };
  }

  private siteCandidates(
    $: CheerioAPI,
    profile: SiteProfile | undefined,
    field: JobField,
    read: ($: CheerioAPI, selector: string) => string,
  ): Candidate<string>[] {
    if (!profile) {
      return [];
    }
    return selectorCandidates($, `${profile.id} ${field}`, profile.selectors[field], read);
  }
}
