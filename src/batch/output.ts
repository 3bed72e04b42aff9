import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { ContentCleaner } from '../clean/cleaner.js';
import type { JobBatch, JobPosting } from '../types.js';
import { collectFailures, computeStatistics } from './aggregator.js';

const qualitySchema = z.enum(['poor', 'fair', 'good', 'excellent']);

const sectionsSchema = z
  .object({
    role_overview: z.string().optional(),
    responsibilities: z.string().optional(),
    requirements: z.string().optional(),
    benefits: z.string().optional(),
    company_info: z.string().optional(),
  })
  .strip();

const jobPostingSchema = z.object({
  url: z.string(),
  domain: z.string().default(''),
  title: z.string(),
  company: z.string(),
  description: z.string(),
  sections: sectionsSchema.default({}),
  quality_score: qualitySchema.default('poor'),
  cleaning: z
    .object({
      original_length: z.number(),
      cleaned_length: z.number(),
      reduction_percent: z.number(),
    })
    .optional(),
  error: z.string().optional(),
});

const batchSchema = z.object({
  version: z.string().default('2.0'),
  generated_at: z.string().default(''),
  scraping_config: z
    .object({
      cleaning_enabled: z.boolean(),
      total_urls: z.number(),
    })
    .optional(),
  jobs: z.array(jobPostingSchema),
  cleaning_applied: z.boolean().optional(),
});

export async function writeBatchFile(filePath: string, batch: JobBatch): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, `${JSON.stringify(batch, null, 2)}\n`, 'utf8');
}

export function parseBatch(raw: unknown): JobBatch {
  const parsed = batchSchema.parse(raw);
  return {
    version: parsed.version,
    generated_at: parsed.generated_at,
    scraping_config: parsed.scraping_config ?? {
      cleaning_enabled: false,
      total_urls: parsed.jobs.length,
    },
    statistics: computeStatistics(parsed.jobs),
    failures: collectFailures(parsed.jobs),
    jobs: parsed.jobs,
    ...(parsed.cleaning_applied === undefined ? {} : { cleaning_applied: parsed.cleaning_applied }),
  };
}

export async function readBatchFile(filePath: string): Promise<JobBatch> {
  const content = await readFile(filePath, 'utf8');
  try {
    return parseBatch(JSON.parse(content));
  } catch (error) {
    throw new Error(`Invalid job batch file ${filePath}: ${String(error)}`);
  }
}

export function defaultCleanedPath(inputPath: string): string {
  return inputPath.endsWith('.json')
    ? `${inputPath.slice(0, -'.json'.length)}_cleaned.json`
    : `${inputPath}_cleaned.json`;
}

function needsCleaning(job: JobPosting): boolean {
  return Boolean(job.description) && job.error === undefined && job.cleaning === undefined;
}

const CLEANED_SUFFIX = ' (cleaned)';

function cleanedVersion(version: string): string {
  return version.endsWith(CLEANED_SUFFIX) ? version : `${version}${CLEANED_SUFFIX}`;
}

/** Cleans jobs of an existing batch that were scraped with cleaning disabled. */
export function recleanBatch(
  batch: JobBatch,
  cleaner: ContentCleaner,
): { batch: JobBatch; cleanedCount: number } {
  let cleanedCount = 0;
  const jobs = batch.jobs.map((job): JobPosting => {
    if (!needsCleaning(job)) {
      return job;
    }
    cleanedCount += 1;
    const result = cleaner.clean(job.description);
    return {
      ...job,
      description: result.cleaned_text,
      sections: result.sections,
      quality_score: result.quality_score,
      cleaning: {
        original_length: result.original_length,
        cleaned_length: result.cleaned_length,
        reduction_percent: result.reduction_percent,
      },
    };
  });

  return {
    batch: {
      ...batch,
      version: cleanedVersion(batch.version),
      statistics: computeStatistics(jobs),
      failures: collectFailures(jobs),
      jobs,
      cleaning_applied: true,
    },
    cleanedCount,
  };
}
