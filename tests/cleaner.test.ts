import { describe, expect, it } from 'vitest';
import { ContentCleaner, reductionPercent, scoreQuality } from '../src/clean/cleaner.js';
import { DEFAULT_CLEANING_TABLES } from '../src/clean/patterns.js';
import type { JobSections, QualityScore } from '../src/types.js';

const cleaner = new ContentCleaner();

const TIERS: QualityScore[] = ['poor', 'fair', 'good', 'excellent'];

describe('ContentCleaner', () => {
  it('returns an empty result for empty input', () => {
    expect(cleaner.clean('')).toEqual({
      cleaned_text: '',
      original_length: 0,
      cleaned_length: 0,
      reduction_percent: 0,
      sections: {},
      quality_score: 'poor',
    });
  });

  it('strips apply prompts and experience boilerplate and keeps an emptied section', () => {
    const raw =
      'Apply Now\n\nResponsibilities\nBuild things\nShip things\n\nRequirements\n3+ years experience\n';
    const result = cleaner.clean(raw);

    expect(result.cleaned_text).toBe('Responsibilities\nBuild things\nShip things\nRequirements');
    expect(result.sections).toEqual({
      responsibilities: 'Build things\nShip things',
      requirements: '',
    });
    expect(result.original_length).toBe(87);
    expect(result.cleaned_length).toBe(54);
    expect(result.reduction_percent).toBe(37.9);
    expect(result.quality_score).toBe('good');
  });

  it('drops UI labels and lines shorter than three characters', () => {
    const result = cleaner.clean('Search\nOK\nWe build delightful tools.\nShare\n');
    expect(result.cleaned_text).toBe('We build delightful tools.');
    expect(result.sections).toEqual({});
    expect(result.quality_score).toBe('poor');
  });

  it('removes posting age, applicant counts, save prompts, labels and pay ranges', () => {
    const raw = [
      'Posted 3 days ago',
      'Over 200 applicants',
      'Senior Engineer role building data platforms.',
      'Save job',
      'Full-time · Remote',
      '$120,000 - $150,000 a year',
    ].join('\n');

    expect(cleaner.clean(raw).cleaned_text).toBe('Senior Engineer role building data platforms.');
  });

  it('removes job alert blurbs that span several lines', () => {
    const raw = [
      'We ship developer tools used by thousands of teams.',
      'By creating an email alert, you agree to our Terms.',
      'You can change your consent settings at any time by reading our Privacy Policy.',
    ].join('\n');

    expect(cleaner.clean(raw).cleaned_text).toBe('We ship developer tools used by thousands of teams.');
  });

  it('collapses runs of spaces and tabs inside lines', () => {
    expect(cleaner.clean('Work   with\tthe    platform team').cleaned_text).toBe(
      'Work with the platform team',
    );
  });

  it('assigns body lines to the section opened by the nearest header', () => {
    const raw = [
      'About the Role',
      'You will lead our data platform team.',
      'Key Responsibilities:',
      'Design pipelines',
      'Mentor engineers',
      'What We Offer',
      'Health insurance',
      'Requirements',
    ].join('\n');

    const result = cleaner.clean(raw);
    expect(result.sections).toEqual({
      role_overview: 'You will lead our data platform team.',
      responsibilities: 'Design pipelines\nMentor engineers',
      benefits: 'Health insurance',
      requirements: '',
    });
    expect(result.quality_score).toBe('excellent');
  });

  it('recognises headers led by a common word', () => {
    const result = cleaner.clean(
      'Your Responsibilities\nBuild APIs\nJob Requirements\nGo skills\nOur Benefits\nGym plan',
    );
    expect(result.sections).toEqual({
      responsibilities: 'Build APIs',
      requirements: 'Go skills',
      benefits: 'Gym plan',
    });
    expect(result.quality_score).toBe('excellent');

    expect(
      cleaner.clean('The Role\nLead the platform team\nDesired Skills & Experience\nKubernetes operations')
        .sections,
    ).toEqual({
      role_overview: 'Lead the platform team',
      requirements: 'Kubernetes operations',
    });
  });

  it('keeps a body line that only starts with a lead word', () => {
    expect(cleaner.clean('Benefits\nOur team builds payment rails').sections).toEqual({
      benefits: 'Our team builds payment rails',
    });
  });

  it('does not retain lines that appear before the first header', () => {
    const result = cleaner.clean('Initech is hiring.\nBenefits\nRemote stipend');
    expect(result.sections).toEqual({ benefits: 'Remote stipend' });
    expect(result.cleaned_text).toBe('Initech is hiring.\nBenefits\nRemote stipend');
  });

  it('never places a header line inside a section body', () => {
    const result = cleaner.clean('Requirements\nRust experience\nBenefits\nLearning budget');
    expect(result.sections).toEqual({ requirements: 'Rust experience', benefits: 'Learning budget' });
    for (const body of Object.values(result.sections)) {
      const lines = (body ?? '').split('\n');
      expect(lines).not.toContain('Requirements');
      expect(lines).not.toContain('Benefits');
    }
  });

  it('treats long lines and sentences as body text, not headers', () => {
    const line =
      'Requirements include a solid background in distributed systems and cloud infrastructure';
    const result = cleaner.clean(`Responsibilities\n${line}\nBenefits are reviewed every year.`);
    expect(result.sections).toEqual({
      responsibilities: `${line}\nBenefits are reviewed every year.`,
    });
  });

  it('keeps earlier content when a header repeats without content', () => {
    const result = cleaner.clean('Requirements\nGo and Rust\nBenefits\nRequirements');
    expect(result.sections).toEqual({ requirements: 'Go and Rust', benefits: '' });
  });

  it('is deterministic for the same input', () => {
    const raw = 'Apply Now\nResponsibilities\nBuild services\nPosted 2 days ago\nBenefits\nGood coffee';
    expect(cleaner.clean(raw)).toEqual(cleaner.clean(raw));
  });

  it('never grows the text', () => {
    const samples = [
      '   ',
      '\n\n\n\n',
      'a',
      'Requirements\n\n\n\nTypeScript\t\t\tNode',
      'Apply Now Apply Now Apply Now',
      'Plain sentence without any noise at all.',
    ];
    for (const sample of samples) {
      const result = cleaner.clean(sample);
      expect(result.cleaned_length).toBeLessThanOrEqual(sample.length);
      expect(result.cleaned_length).toBe(result.cleaned_text.length);
    }
  });

  it('uses the tables it was constructed with', () => {
    const custom = new ContentCleaner({
      ...DEFAULT_CLEANING_TABLES,
      noisePatterns: [/confidential/gi],
    });
    expect(custom.clean('Confidential role on the payments team').cleaned_text).toBe(
      'role on the payments team',
    );
  });
});

describe('scoreQuality', () => {
  it('applies the length thresholds exclusively', () => {
    expect(scoreQuality('x'.repeat(500), {})).toBe('poor');
    expect(scoreQuality('x'.repeat(501), {})).toBe('fair');
    expect(scoreQuality('x'.repeat(1000), {})).toBe('fair');
    expect(scoreQuality('x'.repeat(1001), {})).toBe('fair');
    expect(scoreQuality('x'.repeat(1001), { benefits: 'Gym' })).toBe('good');
  });

  it('adds a bonus for requirements or responsibilities', () => {
    expect(scoreQuality('short', { benefits: 'Gym' })).toBe('fair');
    expect(scoreQuality('short', { requirements: '' })).toBe('good');
    expect(scoreQuality('short', { requirements: 'Go', responsibilities: 'Ship' })).toBe('good');
    expect(
      scoreQuality('short', { requirements: 'Go', responsibilities: 'Ship', benefits: 'Gym' }),
    ).toBe('excellent');
  });

  it('never lowers the tier as the text grows', () => {
    const sectionSets: JobSections[] = [{}, { benefits: 'Gym' }, { requirements: 'Go' }];
    for (const sections of sectionSets) {
      const tiers = [0, 500, 501, 1000, 1001, 2000].map((length) =>
        TIERS.indexOf(scoreQuality('x'.repeat(length), sections)),
      );
      for (let i = 1; i < tiers.length; i += 1) {
        expect(tiers[i]).toBeGreaterThanOrEqual(tiers[i - 1]);
      }
    }
  });
});

describe('reductionPercent', () => {
  it('is zero for an empty original', () => {
    expect(reductionPercent(0, 0)).toBe(0);
  });

  it('rounds to one decimal', () => {
    expect(reductionPercent(3, 1)).toBe(66.7);
    expect(reductionPercent(200, 50)).toBe(75);
  });
});
