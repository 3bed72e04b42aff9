export interface ScraperConfig {
  timeoutMs: number;
  settleMs: number;
  delayMs: number;
  userAgent: string;
  logDir: string;
  outputFile: string;
}

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const DEFAULT_CONFIG: ScraperConfig = {
  timeoutMs: 30000,
  settleMs: 3000,
  delayMs: 1000,
  userAgent: DEFAULT_USER_AGENT,
  logDir: 'logs',
  outputFile: 'jobs_scraped.json',
};

export function parseNonNegativeInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0) {
    return fallback;
  }
  return Math.floor(parsed);
}

function nonEmpty(raw: string | undefined, fallback: string): string {
  const value = raw?.trim();
  return value ? value : fallback;
}

export function loadScraperConfig(env: NodeJS.ProcessEnv = process.env): ScraperConfig {
  return {
    timeoutMs: parseNonNegativeInt(env.SCRAPER_TIMEOUT_MS, DEFAULT_CONFIG.timeoutMs),
    settleMs: parseNonNegativeInt(env.SCRAPER_SETTLE_MS, DEFAULT_CONFIG.settleMs),
    delayMs: parseNonNegativeInt(env.SCRAPER_DELAY_MS, DEFAULT_CONFIG.delayMs),
    userAgent: nonEmpty(env.SCRAPER_USER_AGENT, DEFAULT_CONFIG.userAgent),
    logDir: nonEmpty(env.SCRAPER_LOG_DIR, DEFAULT_CONFIG.logDir),
    outputFile: nonEmpty(env.SCRAPER_OUTPUT, DEFAULT_CONFIG.outputFile),
  };
}
