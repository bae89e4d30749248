#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { pathToFileURL } from 'node:url';
import { parseArgs } from 'node:util';
import { loadConfig, type AppConfig } from './config.js';
import { errorMessage } from './errors.js';
import { writeJobExports } from './lib/export.js';
import { newJobId } from './lib/ids.js';
import { createLogger, type Logger } from './lib/logger.js';
import { normalizeIdentifiers } from './lib/normalize.js';
import { createExtractionRepository, type ExtractionRepository } from './repositories/index.js';
import { createCarrierDataSourceFactory, type CarrierDataSourceFactory } from './sources/index.js';
import { ExtractionOrchestrator } from './worker/orchestrator.js';
import type { Sleep } from './worker/sleep.js';

const USAGE = 'Usage: carrier-extract <input-file> [--output <dir>]';

export interface CliDeps {
  config?: AppConfig;
  repo?: ExtractionRepository;
  createDataSource?: CarrierDataSourceFactory;
  logger?: Logger;
  sleep?: Sleep;
  print?: (line: string) => void;
}

/** Runs one job to completion in-process. Resolves to the exit code. */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const print = deps.print ?? ((line: string) => console.log(line));

  let args: ReturnType<typeof parseCliArgs>;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    print(errorMessage(error));
    print(USAGE);
    return 1;
  }

  const inputFile = args.positionals[0];
  if (!inputFile) {
    print(USAGE);
    return 1;
  }

  const config = deps.config ?? loadConfig();
  const logger = deps.logger ?? createLogger(config.logLevel);
  const outputDir = args.values.output ?? config.outputDir;

  let text: string;
  try {
    text = await readFile(inputFile, 'utf8');
  } catch (error) {
    logger.error({ inputFile, err: error }, 'Could not read input file');
    print(`Cannot read ${inputFile}: ${errorMessage(error)}`);
    return 1;
  }

  const identifiers = normalizeIdentifiers(text, logger);
  if (identifiers.length === 0) {
    print('No valid MC numbers found in input');
    return 1;
  }

  const repo = deps.repo ?? createExtractionRepository(config.repo);
  const orchestrator = new ExtractionOrchestrator({
    repo,
    createDataSource: deps.createDataSource ?? createCarrierDataSourceFactory(config.source),
    config: config.extraction,
    logger,
    sleep: deps.sleep,
  });

  const jobId = newJobId();
  const job = await orchestrator.run(jobId, identifiers);
  const written = await writeJobExports(repo, jobId, outputDir);

  print(`Job ${job.id}: ${job.status}`);
  print(`Total: ${job.total}  Extracted: ${job.processedCount}  Failed: ${job.failedCount}`);
  for (const file of [written.resultsCsv, written.resultsJson, written.failuresCsv]) {
    if (file) print(`Wrote ${file}`);
  }

  if (job.status !== 'completed') {
    if (job.errorMessage) print(`Error: ${job.errorMessage}`);
    return 1;
  }
  return 0;
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      output: { type: 'string', short: 'o' },
    },
  });
}

/** True when `scriptPath` (argv[1], possibly an npm bin symlink) resolves to `moduleUrl`. */
export function isEntryPoint(moduleUrl: string, scriptPath: string | undefined): boolean {
  if (scriptPath === undefined) return false;
  return moduleUrl === pathToFileURL(realpathSync(scriptPath)).href;
}

if (isEntryPoint(import.meta.url, process.argv[1])) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error('Extraction failed:', error);
      process.exit(1);
    });
}
