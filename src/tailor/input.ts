import { MIN_DESCRIPTION_LENGTH } from '../batch/aggregator.js';
import type { JobBatch, JobPosting, JobSections } from '../types.js';
import { looksLikeUrl } from '../utils/text.js';

export interface TailoringInput {
  title: string;
  company: string;
  description: string;
  sections: JobSections;
}

export class TailoringInputError extends Error {
  constructor(
    message: string,
    readonly url: string,
  ) {
    super(message);
    this.name = 'TailoringInputError';
  }
}

/** Rejects postings whose description is still a URL or too short to tailor against. */
export function toTailoringInput(job: JobPosting): TailoringInput {
  if (job.error !== undefined) {
    throw new TailoringInputError(`Posting ${job.url} failed to scrape: ${job.error}`, job.url);
  }

  const description = job.description.trim();
  if (looksLikeUrl(description) || description.length < MIN_DESCRIPTION_LENGTH) {
    throw new TailoringInputError(
      `Description for '${job.title}' at ${job.company} appears to be a URL or is too short (${description.length} chars)`,
      job.url,
    );
  }

  return {
    title: job.title,
    company: job.company,
    description,
    sections: job.sections,
  };
}

export function selectTailorableJobs(batch: JobBatch): {
  accepted: TailoringInput[];
  rejected: Array<{ url: string; reason: string }>;
} {
  const accepted: TailoringInput[] = [];
  const rejected: Array<{ url: string; reason: string }> = [];

  for (const job of batch.jobs) {
    try {
      accepted.push(toTailoringInput(job));
    } catch (error) {
      if (!(error instanceof TailoringInputError)) {
        throw error;
      }
      rejected.push({ url: error.url, reason: error.message });
    }
  }

  return { accepted, rejected };
}
