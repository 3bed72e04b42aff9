import { chromium } from 'playwright';
import type { ScraperConfig } from '../config.js';
import { DEFAULT_CONFIG } from '../config.js';

export interface PageFetcher {
  /** Resolves with the fully rendered HTML of `url`; rejects on navigation failure. */
  fetch(url: string): Promise<string>;
}

export interface RenderPage {
  goto(
    url: string,
    options: { waitUntil: 'load' | 'domcontentloaded' | 'networkidle'; timeout: number },
  ): Promise<unknown>;
  waitForTimeout(timeout: number): Promise<void>;
  content(): Promise<string>;
}

export interface RenderContext {
  newPage(): Promise<RenderPage>;
}

export interface RenderBrowser {
  newContext(options: { userAgent: string }): Promise<RenderContext>;
  close(): Promise<void>;
}

export type LaunchBrowser = () => Promise<RenderBrowser>;

export const launchHeadlessChromium: LaunchBrowser = () => chromium.launch({ headless: true });

export type BrowserFetchOptions = Pick<ScraperConfig, 'timeoutMs' | 'settleMs' | 'userAgent'>;

/**
 * Renders each URL in its own browser. Nothing is shared between fetches, so
 * a page left in a bad state cannot leak into the next one.
 */
export class BrowserPageFetcher implements PageFetcher {
  private readonly options: BrowserFetchOptions;

  constructor(
    options: Partial<BrowserFetchOptions> = {},
    private readonly launch: LaunchBrowser = launchHeadlessChromium,
  ) {
    this.options = {
      timeoutMs: options.timeoutMs ?? DEFAULT_CONFIG.timeoutMs,
      settleMs: options.settleMs ?? DEFAULT_CONFIG.settleMs,
      userAgent: options.userAgent ?? DEFAULT_CONFIG.userAgent,
    };
  }

  async fetch(url: string): Promise<string> {
    const browser = await this.launch();
    try {
      const context = await browser.newContext({ userAgent: this.options.userAgent });
      const page = await context.newPage();
      await page.goto(url, { waitUntil: 'networkidle', timeout: this.options.timeoutMs });
      if (this.options.settleMs > 0) {
        await page.waitForTimeout(this.options.settleMs);
      }
      return await page.content();
    } finally {
      await browser.close();
    }
  }
}
