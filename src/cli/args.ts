import { readFile } from 'node:fs/promises';
import { parseNonNegativeInt } from '../config.js';

export type CliCommand =
  | {
      kind: 'scrape';
      urls: string[];
      urlFile?: string;
      output?: string;
      cleaning: boolean;
      delayMs?: number;
    }
  | {
      kind: 'clean-only';
      input: string;
      output?: string;
    }
  | {
      kind: 'usage';
      message?: string;
    };

export const USAGE = [
  'Usage:',
  '  scrape <url1> [url2 ...] [output.json]',
  '  scrape --file urls.txt [output.json]',
  '  scrape --clean-only jobs_scraped.json [output.json]',
  '',
  'Options:',
  '  --file <path>      read URLs from a file, one per line',
  '  --output <path>    write the batch JSON to <path>',
  '  --no-clean         keep raw descriptions',
  '  --delay-ms <n>     pause between URLs',
].join('\n');

export function parseArgs(argv: string[]): CliCommand {
  const positionals: string[] = [];
  let urlFile: string | undefined;
  let output: string | undefined;
  let cleanOnly: string | undefined;
  let cleaning = true;
  let delayMs: number | undefined;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === '--help' || arg === '-h') {
      return { kind: 'usage' };
    }
    if (arg === '--no-clean') {
      cleaning = false;
      continue;
    }
    if (arg === '--file' || arg === '--output' || arg === '--clean-only' || arg === '--delay-ms') {
      const value = argv[i + 1];
      if (value === undefined) {
        return { kind: 'usage', message: `Missing value for ${arg}` };
      }
      i += 1;
      if (arg === '--file') {
        urlFile = value;
      } else if (arg === '--output') {
        output = value;
      } else if (arg === '--clean-only') {
        cleanOnly = value;
      } else {
        delayMs = parseNonNegativeInt(value, 0);
      }
      continue;
    }
    positionals.push(arg);
  }

  if (cleanOnly) {
    return { kind: 'clean-only', input: cleanOnly, output: output ?? positionals[0] };
  }

  const last = positionals[positionals.length - 1];
  const hasSources = urlFile !== undefined || positionals.length > 1;
  if (!output && last?.endsWith('.json') && hasSources) {
    output = last;
    positionals.pop();
  }

  if (!urlFile && positionals.length === 0) {
    return { kind: 'usage', message: 'No job URLs given' };
  }

  return { kind: 'scrape', urls: positionals, urlFile, output, cleaning, delayMs };
}

export function parseUrlList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

export async function readUrlFile(filePath: string): Promise<string[]> {
  return parseUrlList(await readFile(filePath, 'utf8'));
}
