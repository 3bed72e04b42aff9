import { readFile } from 'node:fs/promises';
import { describe, expect, it } from 'vitest';
import { DEFAULT_EXTRACTION_TABLES, JobExtractor } from '../src/extract/extractor.js';
import { stripSiteSuffix } from '../src/extract/generic.js';
import { SITE_PROFILES, classifyDomain } from '../src/extract/sites.js';

const extractor = new JobExtractor();

function fixture(name: string): Promise<string> {
  return readFile(new URL(`./fixtures/${name}`, import.meta.url), 'utf8');
}

function page(body: string, head = ''): string {
  return `<!DOCTYPE html><html><head>${head}</head><body>${body}</body></html>`;
}

describe('classifyDomain', () => {
  it('maps known job-board hosts and their subdomains', () => {
    expect(classifyDomain('https://www.linkedin.com/jobs/view/123')).toBe('linkedin.com');
    expect(classifyDomain('https://boards.greenhouse.io/acme/jobs/1')).toBe('greenhouse.io');
    expect(classifyDomain('https://acme.wd5.myworkdayjobs.com/en-US/careers/job/1')).toBe('workday.com');
    expect(classifyDomain('https://jobs.ashbyhq.com/acme/123')).toBe('ashbyhq.com');
  });

  it('falls back to the bare host', () => {
    expect(classifyDomain('https://www.example.com/careers')).toBe('example.com');
    expect(classifyDomain('https://notlever.co/jobs/1')).toBe('notlever.co');
  });

  it('returns an empty domain for unparsable input', () => {
    expect(classifyDomain('')).toBe('');
    expect(classifyDomain('not a url')).toBe('');
  });
});

describe('stripSiteSuffix', () => {
  it('removes the text after the last separator', () => {
    expect(stripSiteSuffix('Senior Engineer - Acme Corp')).toBe('Senior Engineer');
    expect(stripSiteSuffix('Staff Engineer | Platform | Initech')).toBe('Staff Engineer | Platform');
    expect(stripSiteSuffix('Data Analyst — Globex')).toBe('Data Analyst');
  });

  it('keeps hyphenated words and separator-only titles', () => {
    expect(stripSiteSuffix('Front-End Developer')).toBe('Front-End Developer');
    expect(stripSiteSuffix('| Careers')).toBe('| Careers');
  });
});

describe('JobExtractor', () => {
  it('prefers board selectors over generic containers', async () => {
    const job = extractor.extract(
      'https://boards.greenhouse.io/acme-robotics/jobs/4012345',
      await fixture('greenhouse-posting.html'),
    );

    expect(job).toEqual({
      url: 'https://boards.greenhouse.io/acme-robotics/jobs/4012345',
      domain: 'greenhouse.io',
      title: 'Robotics Engineer',
      company: 'Acme Robotics',
      description: 'We are hiring a robotics engineer.\nBuild control software\nTune motion planners',
      notes: [],
    });
  });

  it('reads the company from a board URL slug', () => {
    const job = extractor.extract(
      'https://jobs.lever.co/north-star-labs/abc-123',
      page('<div class="job-description"><p>Help us map the night sky.</p></div>'),
    );
    expect(job.company).toBe('North Star Labs');
    expect(job.title).toBe('Unknown Position');
    expect(job.description).toBe('Help us map the night sky.');
  });

  it('strips the site suffix from the title tag of an unknown site', () => {
    const job = extractor.extract(
      'https://careers.example.org/jobs/42',
      page('<p>Short body</p>', '<title>Senior Engineer - Acme Corp</title>'),
    );
    expect(job.domain).toBe('careers.example.org');
    expect(job.title).toBe('Senior Engineer');
    expect(job.description).toBe('Short body');
    expect(job.company).toBe('Careers');
  });

  it('uses og:title before the title tag', () => {
    const job = extractor.extract(
      'https://example.com/jobs/1',
      page(
        '<p>Body</p>',
        '<meta property="og:title" content="Data Analyst"><title>Other | Example</title>',
      ),
    );
    expect(job.title).toBe('Data Analyst');
  });

  it('drops page chrome when falling back to the body', async () => {
    const job = extractor.extract(
      'https://careers.initech.example/jobs/7',
      await fixture('generic-posting.html'),
    );
    expect(job.description).toBe('Line A text\nLine B text');
    expect(job.title).toBe('Platform Engineer');
  });

  it('returns an empty description when the body holds only page chrome', () => {
    const job = extractor.extract(
      'https://careers.acme.example/jobs/1',
      page(
        '<header><a href="/">Acme Careers</a><nav>Home Jobs Teams Locations</nav></header><footer>Copyright Acme</footer>',
        '<title>Blocked</title>',
      ),
    );
    expect(job.description).toBe('');
    expect(job.title).toBe('Blocked');
  });

  it('skips content containers that are too short to be a posting', () => {
    const long = 'We design resilient systems. '.repeat(25);
    const job = extractor.extract(
      'https://example.com/jobs/2',
      page(`<article><p>Related articles</p></article><main><p>${long}</p></main>`),
    );
    expect(job.description).toBe(long.trim());
  });

  it('finds the company from the employer meta tag', () => {
    const job = extractor.extract(
      'https://example.com/jobs/3',
      page('<p>Body</p>', '<meta name="employer" content="Globex">'),
    );
    expect(job.company).toBe('Globex');
  });

  it('finds the company from page text', () => {
    const job = extractor.extract(
      'https://example.com/jobs/4',
      page('<p>Come build payment rails at Acme Payments</p>'),
    );
    expect(job.company).toBe('Acme Payments');
  });

  it('ignores generic phrases when looking for the company in page text', () => {
    const job = extractor.extract(
      'https://hiring.example.com/jobs/5',
      page('<p>Join Our Team!</p><p>About Globex Industries</p>'),
    );
    expect(job.company).toBe('Globex Industries');
  });

  it('records a failing selector and moves on to the next one', () => {
    const custom = new JobExtractor({
      ...DEFAULT_EXTRACTION_TABLES,
      sites: SITE_PROFILES.map((profile) =>
        profile.id === 'greenhouse.io'
          ? { ...profile, selectors: { ...profile.selectors, description: [':bogus-pseudo', '.desc'] } }
          : profile,
      ),
    });

    const job = custom.extract(
      'https://boards.greenhouse.io/acme/jobs/1',
      page('<div class="desc"><p>Real description</p></div>'),
    );
    expect(job.description).toBe('Real description');
    expect(job.notes).toHaveLength(1);
    expect(job.notes[0]).toMatch(/^greenhouse\.io description selector ":bogus-pseudo" failed: /);
  });

  it('falls back to sentinels for empty or malformed input', () => {
    const job = extractor.extract('not a url', '<div><p');
    expect(job).toEqual({
      url: 'not a url',
      domain: '',
      title: 'Unknown Position',
      company: 'Unknown Company',
      description: '',
      notes: [],
    });
  });
});
