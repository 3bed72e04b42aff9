import { ContentCleaner, scoreQuality } from '../clean/cleaner.js';
import { JobExtractor } from '../extract/extractor.js';
import { classifyDomain } from '../extract/sites.js';
import type { PageFetcher } from '../fetch/browserFetcher.js';
import type { BatchStatistics, FailedUrl, JobBatch, JobPosting, QualityScore } from '../types.js';
import { UNKNOWN_COMPANY, UNKNOWN_TITLE } from '../types.js';
import { sleep } from '../utils/concurrency.js';
import type { RunLogger } from '../utils/logger.js';

export const BATCH_VERSION = '2.0';

/** Descriptions at or below this length usually mean extraction missed the posting. */
export const MIN_DESCRIPTION_LENGTH = 100;

export interface AggregatorDeps {
  fetcher: PageFetcher;
  extractor?: JobExtractor;
  cleaner?: ContentCleaner;
  logger?: RunLogger;
  delayMs?: number;
}

export interface ScrapeOptions {
  cleaning?: boolean;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function failedPosting(url: string, error: unknown): JobPosting {
  const message = errorMessage(error);
  return {
    url,
    domain: classifyDomain(url),
    title: UNKNOWN_TITLE,
    company: UNKNOWN_COMPANY,
    description: `Failed to scrape: ${message}`,
    sections: {},
    quality_score: 'poor',
    error: message,
  };
}

export function emptyQualityHistogram(): Record<QualityScore, number> {
  return { excellent: 0, good: 0, fair: 0, poor: 0 };
}

export function isSuccessful(job: JobPosting): boolean {
  return job.error === undefined && job.description.length > MIN_DESCRIPTION_LENGTH;
}

export function computeStatistics(jobs: readonly JobPosting[]): BatchStatistics {
  const stats: BatchStatistics = {
    total: jobs.length,
    successful: 0,
    failed: 0,
    short_descriptions: 0,
    by_quality: emptyQualityHistogram(),
  };

  for (const job of jobs) {
    if (job.error !== undefined) {
      stats.failed += 1;
    } else if (isSuccessful(job)) {
      stats.successful += 1;
      stats.by_quality[job.quality_score] += 1;
    } else {
      stats.short_descriptions += 1;
    }
  }

  return stats;
}

export function collectFailures(jobs: readonly JobPosting[]): FailedUrl[] {
  return jobs.flatMap((job) => (job.error !== undefined ? [{ url: job.url, error: job.error }] : []));
}

export function buildBatch(jobs: JobPosting[], cleaningEnabled: boolean): JobBatch {
  return {
    version: BATCH_VERSION,
    generated_at: new Date().toISOString(),
    scraping_config: {
      cleaning_enabled: cleaningEnabled,
      total_urls: jobs.length,
    },
    statistics: computeStatistics(jobs),
    failures: collectFailures(jobs),
    jobs,
  };
}

/**
 * Drives fetch, extraction and cleaning over a list of URLs, one at a time.
 * A failure on one URL is recorded on that URL's posting and never stops the
 * rest of the batch.
 */
export class JobBatchAggregator {
  private readonly fetcher: PageFetcher;
  private readonly extractor: JobExtractor;
  private readonly cleaner: ContentCleaner;
  private readonly logger?: RunLogger;
  private readonly delayMs: number;

  constructor(deps: AggregatorDeps) {
    this.fetcher = deps.fetcher;
    this.extractor = deps.extractor ?? new JobExtractor();
    this.cleaner = deps.cleaner ?? new ContentCleaner();
    this.logger = deps.logger;
    this.delayMs = deps.delayMs ?? 0;
  }

  async scrapeOne(url: string, cleaning = true): Promise<JobPosting> {
    const html = await this.fetcher.fetch(url);
    const extracted = this.extractor.extract(url, html);
    for (const note of extracted.notes) {
      await this.logger?.warn(`${url}: ${note}`);
    }

    const posting: JobPosting = {
      url,
      domain: extracted.domain,
      title: extracted.title,
      company: extracted.company,
      description: extracted.description,
      sections: {},
      quality_score: scoreQuality(extracted.description, {}),
    };

    if (!cleaning || !extracted.description) {
      return posting;
    }

    const result = this.cleaner.clean(extracted.description);
    return {
      ...posting,
      description: result.cleaned_text,
      sections: result.sections,
      quality_score: result.quality_score,
      cleaning: {
        original_length: result.original_length,
        cleaned_length: result.cleaned_length,
        reduction_percent: result.reduction_percent,
      },
    };
  }

  async scrapeAll(urls: readonly string[], options: ScrapeOptions = {}): Promise<JobBatch> {
    const cleaning = options.cleaning ?? true;
    const jobs: JobPosting[] = [];

    await this.logger?.info(`Processing ${urls.length} job URL(s), cleaning=${String(cleaning)}`);

    for (const [index, url] of urls.entries()) {
      if (index > 0) {
        await sleep(this.delayMs);
      }
      await this.logger?.info(`[${index + 1}/${urls.length}] Scraping ${url}`);

      let job: JobPosting;
      try {
        job = await this.scrapeOne(url, cleaning);
      } catch (error) {
        job = failedPosting(url, error);
        await this.logger?.error(`[${index + 1}/${urls.length}] Failed ${url}: ${job.error ?? ''}`);
      }
      jobs.push(job);

      if (job.error === undefined) {
        const status = isSuccessful(job) ? 'ok' : 'short description';
        await this.logger?.info(
          `[${index + 1}/${urls.length}] ${status}: ${job.title} @ ${job.company} (${job.description.length} chars, quality=${job.quality_score})`,
        );
      }
    }

    const batch = buildBatch(jobs, cleaning);
    await this.logSummary(batch);
    return batch;
  }

  private async logSummary(batch: JobBatch): Promise<void> {
    if (!this.logger) {
      return;
    }
    const { statistics } = batch;
    await this.logger.info(
      `total=${statistics.total} successful=${statistics.successful} failed=${statistics.failed} short_descriptions=${statistics.short_descriptions}`,
    );
    if (batch.scraping_config.cleaning_enabled) {
      const histogram = Object.entries(statistics.by_quality)
        .map(([quality, count]) => `${quality}=${count}`)
        .join(' ');
      await this.logger.info(`quality ${histogram}`);
    }
    for (const failure of batch.failures) {
      await this.logger.warn(`retry ${failure.url}: ${failure.error}`);
    }
  }
}
