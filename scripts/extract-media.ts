#!/usr/bin/env tsx
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import pLimit from 'p-limit';
import YAML from 'yaml';
import {
  createContext,
  describeError,
  extractFromUrl,
  findExtractor,
  getSupportedExtractorKeys,
  loadConfig
} from '../lib/europa';
import type { ExtractorContext, Logger, MediaRecord } from '../lib/europa';

interface CliOptions {
  urls: string[];
  seedsPath: string | null;
  outputPath: string | null;
  configPath: string | null;
  concurrency: number;
  helpRequested: boolean;
}

export interface HarvestFailure {
  url: string;
  message: string;
}

export interface HarvestResult {
  records: MediaRecord[];
  failures: HarvestFailure[];
  skipped: string[];
}

export function parseArgs(argv: string[]): CliOptions {
  const urls: string[] = [];
  let seedsPath: string | null = null;
  let outputPath: string | null = null;
  let configPath: string | null = null;
  let concurrency = 2;
  let helpRequested = false;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case '--seeds':
        seedsPath = resolvePath(requireValue(argv, ++i, '--seeds'));
        break;
      case '--out':
        outputPath = resolvePath(requireValue(argv, ++i, '--out'));
        break;
      case '--config':
        configPath = resolvePath(requireValue(argv, ++i, '--config'));
        break;
      case '--concurrency':
        concurrency = Number(requireValue(argv, ++i, '--concurrency'));
        if (!Number.isInteger(concurrency) || concurrency <= 0) {
          throw new Error('Concurrency must be a positive integer');
        }
        break;
      case '--help':
      case '-h':
        helpRequested = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new Error(`Unknown argument: ${arg}`);
        }
        urls.push(arg);
    }
  }

  return { urls, seedsPath, outputPath, configPath, concurrency, helpRequested };
}

function requireValue(argv: string[], index: number, flag: string) {
  const value = argv[index];
  if (!value) {
    throw new Error(`${flag} flag requires a value`);
  }
  return value;
}

function resolvePath(candidate: string) {
  return path.isAbsolute(candidate) ? candidate : path.join(process.cwd(), candidate);
}

function printHelp() {
  console.log(`Usage: npm run extract -- [urls...] [options]

Supported sites: ${getSupportedExtractorKeys().join(', ')}

Options:
  --seeds <file>       Text (one URL per line) or YAML list of URLs
  --out <file>         Write JSON Lines here instead of stdout
  --config <file>      JSON config file (see README for keys)
  --concurrency <n>    Number of URLs processed at once (default: 2)
  -h, --help           Show this message
`);
}

export function loadSeeds(filePath: string): string[] {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Seeds file not found: ${filePath}`);
  }
  const raw = fs.readFileSync(filePath, 'utf-8');
  if (/\.ya?ml$/i.test(filePath)) {
    const data: unknown = YAML.parse(raw);
    const list: unknown[] | null = Array.isArray(data) ? data : isUrlDocument(data) ? data.urls : null;
    if (!list) {
      throw new Error('Seed file must be a list or an object with a urls list.');
    }
    return list.map((entry) => String(entry).trim()).filter((entry) => entry.length > 0);
  }
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

function isUrlDocument(value: unknown): value is { urls: unknown[] } {
  return typeof value === 'object' && value !== null && 'urls' in value && Array.isArray(value.urls);
}

export async function harvest(urls: string[], ctx: ExtractorContext, concurrency = 2): Promise<HarvestResult> {
  const limit = pLimit(concurrency);
  const recordsByIndex: (MediaRecord | null)[] = Array(urls.length).fill(null);
  const failures: HarvestFailure[] = [];
  const skipped: string[] = [];

  const tasks = urls.map((url, index) =>
    limit(async () => {
      if (!findExtractor(url)) {
        ctx.logger.warn({ status: 'skipped', url, message: 'No extractor supports this URL' });
        skipped.push(url);
        return;
      }
      try {
        const record = await extractFromUrl(url, ctx);
        recordsByIndex[index] = record;
        ctx.logger.log({ status: 'ok', id: record.id, title: record.title, url });
      } catch (error) {
        const message = describeError(error);
        ctx.logger.warn({ status: 'error', url, message });
        failures.push({ url, message });
      }
    })
  );
  await Promise.all(tasks);

  const records: MediaRecord[] = [];
  const recordIds = new Set<string>();
  for (const record of recordsByIndex) {
    if (!record || recordIds.has(record.id)) continue;
    records.push(record);
    recordIds.add(record.id);
  }

  return { records, failures, skipped };
}

export function toJsonLines(records: MediaRecord[]): string {
  return records.map((record) => `${JSON.stringify(record)}\n`).join('');
}

export async function main(argv = process.argv.slice(2), env = process.env) {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    console.error(describeError(error));
    printHelp();
    process.exitCode = 1;
    return;
  }

  if (options.helpRequested) {
    printHelp();
    return;
  }

  try {
    const urls = [...options.urls, ...(options.seedsPath ? loadSeeds(options.seedsPath) : [])];
    if (urls.length === 0) {
      console.error('No URLs given.');
      printHelp();
      process.exitCode = 1;
      return;
    }

    const config = loadConfig({ env, configPath: options.configPath });
    // records go to stdout unless --out is given, so progress goes to stderr
    const logger: Logger = options.outputPath ? console : { log: console.error, warn: console.warn };
    const ctx = createContext(config, { logger });
    const { records, failures, skipped } = await harvest(urls, ctx, options.concurrency);

    const lines = toJsonLines(records);
    if (options.outputPath) {
      fs.mkdirSync(path.dirname(options.outputPath), { recursive: true });
      fs.writeFileSync(options.outputPath, lines, 'utf-8');
      console.log(`Wrote ${records.length} record${records.length === 1 ? '' : 's'} to ${options.outputPath}`);
    } else {
      process.stdout.write(lines);
    }

    if (skipped.length > 0) {
      console.warn(`${skipped.length} URL${skipped.length === 1 ? '' : 's'} not supported.`);
    }
    if (failures.length > 0) {
      console.warn(`${failures.length} URL${failures.length === 1 ? '' : 's'} failed. See logs above.`);
      process.exitCode = 1;
    }
  } catch (error) {
    console.error(describeError(error));
    process.exitCode = 1;
  }
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  main().catch((error) => {
    console.error(error);
    process.exit(1);
  });
}
