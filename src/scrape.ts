import { join } from 'node:path';
import { JobBatchAggregator } from './batch/aggregator.js';
import { defaultCleanedPath, readBatchFile, recleanBatch, writeBatchFile } from './batch/output.js';
import { ContentCleaner } from './clean/cleaner.js';
import type { CliCommand } from './cli/args.js';
import { USAGE, parseArgs, readUrlFile } from './cli/args.js';
import type { ScraperConfig } from './config.js';
import { loadScraperConfig } from './config.js';
import { BrowserPageFetcher } from './fetch/browserFetcher.js';
import { RunLogger } from './utils/logger.js';

function dateStamp(date = new Date()): string {
  return date.toISOString().slice(0, 10);
}

async function runScrape(
  command: Extract<CliCommand, { kind: 'scrape' }>,
  config: ScraperConfig,
  logger: RunLogger,
): Promise<void> {
  const urls = [...command.urls];
  if (command.urlFile) {
    const fromFile = await readUrlFile(command.urlFile);
    if (fromFile.length === 0) {
      throw new Error(`No URLs found in ${command.urlFile}`);
    }
    urls.push(...fromFile);
  }

  const outputFile = command.output ?? config.outputFile;
  const aggregator = new JobBatchAggregator({
    fetcher: new BrowserPageFetcher(config),
    logger,
    delayMs: command.delayMs ?? config.delayMs,
  });

  const batch = await aggregator.scrapeAll(urls, { cleaning: command.cleaning });
  await writeBatchFile(outputFile, batch);
  await logger.info(`Results saved to ${outputFile}`);
}

async function runCleanOnly(
  command: Extract<CliCommand, { kind: 'clean-only' }>,
  logger: RunLogger,
): Promise<void> {
  const outputFile = command.output ?? defaultCleanedPath(command.input);
  const source = await readBatchFile(command.input);
  const { batch, cleanedCount } = recleanBatch(source, new ContentCleaner());
  await writeBatchFile(outputFile, batch);
  await logger.info(`Cleaned ${cleanedCount} job(s) from ${command.input}, saved to ${outputFile}`);
}

async function run(): Promise<void> {
  const command = parseArgs(process.argv.slice(2));
  if (command.kind === 'usage') {
    if (command.message) {
      console.error(command.message);
    }
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  const config = loadScraperConfig();
  const logger = new RunLogger(join(config.logDir, `scrape_run_${dateStamp()}.log`), {
    runLabel: command.kind === 'clean-only' ? 'Clean-only run' : 'Scrape run',
    echo: true,
  });
  await logger.init();

  try {
    if (command.kind === 'clean-only') {
      await runCleanOnly(command, logger);
    } else {
      await runScrape(command, config, logger);
    }
  } catch (error) {
    await logger.error(String(error));
    throw error;
  } finally {
    await logger.close();
  }
}

run().catch((error) => {
  console.error(`Scrape failed: ${String(error)}`);
  process.exitCode = 1;
});
