export type KnownJobBoard =
  | 'linkedin.com'
  | 'indeed.com'
  | 'greenhouse.io'
  | 'lever.co'
  | 'workday.com'
  | 'ashbyhq.com';

export type JobField = 'title' | 'company' | 'description';

export type SectionName =
  | 'role_overview'
  | 'responsibilities'
  | 'requirements'
  | 'benefits'
  | 'company_info';

export type JobSections = Partial<Record<SectionName, string>>;

export type QualityScore = 'poor' | 'fair' | 'good' | 'excellent';

export const UNKNOWN_TITLE = 'Unknown Position';
export const UNKNOWN_COMPANY = 'Unknown Company';

export interface ExtractedJob {
  url: string;
  domain: string;
  title: string;
  company: string;
  description: string;
  notes: string[];
}

export interface CleaningResult {
  cleaned_text: string;
  original_length: number;
  cleaned_length: number;
  reduction_percent: number;
  sections: JobSections;
  quality_score: QualityScore;
}

export interface CleaningMetadata {
  original_length: number;
  cleaned_length: number;
  reduction_percent: number;
}

export interface JobPosting {
  url: string;
  domain: string;
  title: string;
  company: string;
  description: string;
  sections: JobSections;
  quality_score: QualityScore;
  cleaning?: CleaningMetadata;
  error?: string;
}

export interface BatchStatistics {
  total: number;
  successful: number;
  failed: number;
  short_descriptions: number;
  by_quality: Record<QualityScore, number>;
}

export interface FailedUrl {
  url: string;
  error: string;
}

export interface JobBatch {
  version: string;
  generated_at: string;
  scraping_config: {
    cleaning_enabled: boolean;
    total_urls: number;
  };
  statistics: BatchStatistics;
  failures: FailedUrl[];
  jobs: JobPosting[];
  cleaning_applied?: boolean;
}
