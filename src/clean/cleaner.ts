import type { CleaningResult, JobSections, QualityScore, SectionName } from '../types.js';
import { roundOneDecimal } from '../utils/text.js';
import type { CleaningTables } from './patterns.js';
import { DEFAULT_CLEANING_TABLES } from './patterns.js';

export function emptyCleaningResult(): CleaningResult {
  return {
    cleaned_text: '',
    original_length: 0,
    cleaned_length: 0,
    reduction_percent: 0,
    sections: {},
    quality_score: 'poor',
  };
}

export function scoreQuality(text: string, sections: JobSections): QualityScore {
  let score = 0;

  if (text.length > 1000) {
    score += 2;
  } else if (text.length > 500) {
    score += 1;
  }

  const found = Object.keys(sections);
  score += found.length;

  if (sections.requirements !== undefined || sections.responsibilities !== undefined) {
    score += 2;
  }

  if (score >= 5) {
    return 'excellent';
  }
  if (score >= 3) {
    return 'good';
  }
  if (score >= 1) {
    return 'fair';
  }
  return 'poor';
}

export function reductionPercent(originalLength: number, cleanedLength: number): number {
  if (originalLength <= 0) {
    return 0;
  }
  return roundOneDecimal(((originalLength - cleanedLength) / originalLength) * 100);
}

/**
 * Strips page chrome from a scraped description and splits what is left into
 * sections. Holds only its pattern tables, so one instance can serve any
 * number of callers.
 */
export class ContentCleaner {
  constructor(private readonly tables: CleaningTables = DEFAULT_CLEANING_TABLES) {}

  clean(text: string): CleaningResult {
    if (!text) {
      return emptyCleaningResult();
    }

    const withoutNoise = this.removeNoise(text);
    const normalized = withoutNoise.replace(/\n\s*\n\s*\n+/g, '\n\n').replace(/[ \t\u00a0]+/g, ' ');
    const lines = this.filterLines(normalized);
    const cleaned = lines.join('\n');
    const sections = this.extractSections(lines);

    return {
      cleaned_text: cleaned,
      original_length: text.length,
      cleaned_length: cleaned.length,
      reduction_percent: reductionPercent(text.length, cleaned.length),
      sections,
      quality_score: scoreQuality(cleaned, sections),
    };
  }

  private removeNoise(text: string): string {
    let output = text;
    for (const pattern of this.tables.noisePatterns) {
      output = output.replace(pattern, '');
    }
    return output;
  }

  private filterLines(text: string): string[] {
    const kept: string[] = [];
    for (const raw of text.split(/\r?\n/)) {
      const line = raw.trim();
      if (!line || line.length < this.tables.minLineLength) {
        continue;
      }
      if (this.tables.uiLabels.has(line.toLowerCase())) {
        continue;
      }
      kept.push(line);
    }
    return kept;
  }

  private matchHeader(line: string): SectionName | undefined {
    if (line.length > this.tables.maxHeaderLength || line.endsWith('.')) {
      return undefined;
    }
    const match = this.tables.sectionHeaders.find((header) => header.pattern.test(line));
    return match?.section;
  }

  private extractSections(lines: readonly string[]): JobSections {
    const sections: JobSections = {};
    let current: SectionName | undefined;
    let body: string[] = [];

    const close = (): void => {
      if (!current) {
        return;
      }
      const content = body.join('\n').trim();
      // A repeated header only replaces an earlier section when it has content.
      if (content || sections[current] === undefined) {
        sections[current] = content;
      }
    };

    for (const line of lines) {
      const header = this.matchHeader(line);
      if (header) {
        close();
        current = header;
        body = [];
        continue;
      }
      if (current) {
        body.push(line);
      }
    }
    close();

    return sections;
  }
}
