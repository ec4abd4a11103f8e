#!/usr/bin/env node
/**
 * CLI Entry Point
 * Run one extraction and print or write the module catalog
 */

import * as fs from 'fs';
import * as path from 'path';
import { env } from './config/env';
import { runExtraction, toCatalogPayload } from './modules/extraction/extraction.service';

export interface CliOptions {
  urls: string[];
  maxPages: number;
  maxDepth: number;
  timeoutSeconds: number;
  output?: string;
  useCache: boolean;
  help: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

const DEFAULT_OPTIONS: CliOptions = {
  urls: [],
  maxPages: env.CRAWL_MAX_PAGES,
  maxDepth: env.CRAWL_MAX_DEPTH,
  timeoutSeconds: env.CRAWL_TIMEOUT_SECONDS,
  useCache: true,
  help: false,
};

function parseInteger(flag: string, raw: string | undefined, min: number): number {
  if (raw === undefined || !/^\d+$/.test(raw)) {
    throw new CliUsageError(`${flag} expects an integer, got ${raw ?? 'nothing'}`);
  }
  const value = Number.parseInt(raw, 10);
  if (value < min) {
    throw new CliUsageError(`${flag} must be at least ${min}, got ${value}`);
  }
  return value;
}

/**
 * --urls takes every following argument up to the next flag.
 * Flags also accept the --flag=value form.
 */
export function parseCliArgs(args: string[]): CliOptions {
  const opts: CliOptions = { ...DEFAULT_OPTIONS, urls: [] };
  let index = 0;

  const takeValue = (flag: string, valueFromEq: string | undefined): string => {
    if (valueFromEq !== undefined) {
      return valueFromEq;
    }
    const next = args[index + 1];
    if (next === undefined || next.startsWith('--')) {
      throw new CliUsageError(`${flag} requires a value`);
    }
    index++;
    return next;
  };

  for (; index < args.length; index++) {
    const arg = args[index];
    const eq = arg.indexOf('=');
    const flag = eq >= 0 ? arg.slice(0, eq) : arg;
    const valueFromEq = eq >= 0 ? arg.slice(eq + 1) : undefined;

    switch (flag) {
      case '--urls':
        if (valueFromEq !== undefined) {
          opts.urls.push(valueFromEq);
        }
        while (index + 1 < args.length && !args[index + 1].startsWith('--')) {
          opts.urls.push(args[++index]);
        }
        break;
      case '--max-pages':
        opts.maxPages = parseInteger(flag, takeValue(flag, valueFromEq), 1);
        break;
      case '--max-depth':
        opts.maxDepth = parseInteger(flag, takeValue(flag, valueFromEq), 0);
        break;
      case '--timeout':
        opts.timeoutSeconds = parseInteger(flag, takeValue(flag, valueFromEq), 1);
        break;
      case '--output':
        opts.output = takeValue(flag, valueFromEq);
        break;
      case '--no-cache':
        opts.useCache = false;
        break;
      case '--help':
      case '-h':
        opts.help = true;
        break;
      default:
        throw new CliUsageError(`Unknown argument: ${arg}`);
    }
  }

  if (!opts.help && opts.urls.length === 0) {
    throw new CliUsageError('Provide at least one URL with --urls');
  }

  return opts;
}

function printHelp(): void {
  const lines = [
    'Usage: doc-modules --urls <url...> [options]',
    '',
    'Options:',
    '  --urls <url...>     One or more documentation URLs',
    `  --max-pages <n>     Maximum pages to crawl (default ${DEFAULT_OPTIONS.maxPages})`,
    `  --max-depth <n>     Maximum link depth from each root (default ${DEFAULT_OPTIONS.maxDepth})`,
    `  --timeout <s>       Per-request timeout in seconds (default ${DEFAULT_OPTIONS.timeoutSeconds})`,
    '  --output <file>     Write the JSON catalog to a file instead of stdout',
    '  --no-cache          Do not read or write the fetch cache',
    '  --help              Show this help',
  ];
  console.error(lines.join('\n'));
}

export async function main(args: string[] = process.argv.slice(2)): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(args);
  } catch (error) {
    if (error instanceof CliUsageError) {
      printHelp();
      console.error(`\nError: ${error.message}`);
      return 1;
    }
    throw error;
  }

  if (options.help) {
    printHelp();
    return 0;
  }

  const result = await runExtraction(options.urls, {
    maxPages: options.maxPages,
    maxDepth: options.maxDepth,
    timeoutSeconds: options.timeoutSeconds,
    useCache: options.useCache,
  });
  const json = JSON.stringify(toCatalogPayload(result.modules), null, 2);

  if (options.output) {
    const target = path.resolve(options.output);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, `${json}\n`, 'utf8');
    console.error(`CLI: Wrote ${result.modules.length} module(s) to ${target}`);
  } else {
    process.stdout.write(`${json}\n`);
  }

  if (result.report.failed.length > 0 || result.report.skipped.length > 0) {
    console.error(
      `CLI: ${result.report.skipped.length} skipped, ${result.report.failed.length} failed URL(s)`
    );
  }
  return 0;
}

if (require.main === module) {
  // Progress logs go to stderr so stdout carries only the catalog
  console.log = console.error.bind(console);

  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('CLI: Extraction failed:', error instanceof Error ? error.message : error);
      process.exitCode = 1;
    });
}
