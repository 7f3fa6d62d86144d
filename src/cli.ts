#!/usr/bin/env node

import 'dotenv/config';
import { AnthropicConfig } from './config/anthropic.js';
import { PipelineConfig, parseIntegerSetting, type PipelineOverrides } from './config/pipeline.js';
import { ClaudeConcurrentClient } from './concurrent/ClaudeConcurrentClient.js';
import { ConcurrentRunner } from './concurrent/ConcurrentRunner.js';
import { listJobs, loadJobConfig } from './jobs/index.js';
import type { JobConfig } from './jobs/JobConfig.js';
import { loadSummaryDocument, renderSummaryReport } from './pipeline/report.js';
import { ConfigError, PipelineError, isRunAbortingError } from './utils/errors.js';
import { logger } from './utils/logger.js';

/**
 * CLI for Survey Response Classification
 *
 * Usage:
 *   npm run dev classify <job> --in <path> --out <path>   - Classify a response file
 *   npm run dev report <summary.json>                     - Print the ranked category report
 *   npm run dev jobs                                      - List job definitions
 *   npm run dev check-config                              - Validate Anthropic configuration
 */

const COMMANDS = ['classify', 'report', 'jobs', 'check-config', 'help'];

/**
 * Flags that take a value; everything else starting with -- is a switch
 */
const VALUE_FLAGS = new Set([
  '--in',
  '--out',
  '--input-column',
  '--model',
  '--api-key',
  '--concurrency',
  '--max-retries',
  '--delay-ms',
]);

interface ParsedArgs {
  positionals: string[];
  values: Map<string, string>;
  switches: Set<string>;
}

function parseArgs(args: readonly string[]): ParsedArgs {
  const parsed: ParsedArgs = { positionals: [], values: new Map(), switches: new Set() };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith('--')) {
      parsed.positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg : arg.slice(0, eq);
    if (!VALUE_FLAGS.has(name)) {
      parsed.switches.add(name);
      continue;
    }

    const value = eq === -1 ? args[++i] : arg.slice(eq + 1);
    if (value === undefined) {
      throw new ConfigError(`Flag ${name} requires a value`);
    }
    parsed.values.set(name, value);
  }

  return parsed;
}

function requireJob(jobId: string | undefined, usage: string): JobConfig {
  if (!jobId) {
    throw new ConfigError(`Job id is required\nUsage: ${usage}`);
  }
  const job = loadJobConfig(jobId);
  if (!job) {
    throw new ConfigError(
      `Unknown job: ${jobId}. Available jobs: ${listJobs().map((j) => j.id).join(', ')}`
    );
  }
  return job;
}

function readOverrides(values: Map<string, string>): PipelineOverrides {
  const overrides: PipelineOverrides = {};
  const concurrency = values.get('--concurrency');
  const maxRetries = values.get('--max-retries');
  const delayMs = values.get('--delay-ms');

  if (concurrency !== undefined) {
    overrides.concurrencyLimit = parseIntegerSetting('--concurrency', concurrency, 1);
  }
  if (maxRetries !== undefined) {
    overrides.maxRetries = parseIntegerSetting('--max-retries', maxRetries, 1);
  }
  if (delayMs !== undefined) {
    overrides.requestDelayMs = parseIntegerSetting('--delay-ms', delayMs, 0);
  }

  return overrides;
}

/**
 * Classify every response in a file and write the job's output
 */
async function classify(args: ParsedArgs): Promise<void> {
  const usage = 'npm run dev classify <job> --in <path> --out <path>';
  const job = requireJob(args.positionals[1], usage);
  const inputPath = args.values.get('--in');
  const outputPath = args.values.get('--out');

  if (!inputPath || !outputPath) {
    throw new ConfigError(`Both --in and --out are required\nUsage: ${usage}`);
  }

  const settings = PipelineConfig.resolve(job, readOverrides(args.values));
  const anthropicOverrides = {
    apiKey: args.values.get('--api-key'),
    model: args.values.get('--model'),
    fallbackModel: job.model,
  };

  // Fails before any record is read when no credential is available
  const { model } = AnthropicConfig.getConfig(anthropicOverrides);
  const client = new ClaudeConcurrentClient(job.id, AnthropicConfig.getClient(anthropicOverrides));

  logger.info(`Running job: ${job.id}`, { model, ...settings });

  const runner = new ConcurrentRunner({ job, client, model, settings });
  const { summary, fallbackCount } = await runner.run({
    inputPath,
    outputPath,
    inputColumn: args.values.get('--input-column'),
    headerless: args.switches.has('--headerless') ? true : undefined,
  });

  console.log('\n✅ Classification completed!\n');
  console.log(`Job: ${job.id}`);
  console.log(`Model: ${model}`);
  console.log(`Total inputs: ${summary.totalInputs}`);
  console.log(`Fallback records: ${fallbackCount}`);
  console.log(`Output: ${outputPath}`);
  console.log('');
}

/**
 * Print the ranked text report for a summary file
 */
async function report(args: ParsedArgs): Promise<void> {
  const inputPath = args.positionals[1] ?? args.values.get('--in');
  if (!inputPath) {
    throw new ConfigError('Summary file is required\nUsage: npm run dev report <summary.json>');
  }

  const summary = await loadSummaryDocument(inputPath);
  console.log(renderSummaryReport(summary));
}

/**
 * List registered jobs
 */
function printJobs(): void {
  console.log('\n📋 Jobs:\n');

  for (const job of listJobs()) {
    console.log(`• ${job.id}`);
    console.log(`   ${job.description}`);
    console.log(`   Categories: ${job.categories.length}`);
    console.log(`   Input: ${job.inputMode === 'headerless' ? 'headerless CSV' : `column '${job.defaultInputColumn}'`}`);
    console.log(`   Output: ${job.outputMode}`);
    console.log(`   Default model: ${job.model}`);
    console.log('');
  }
}

/**
 * Validate Anthropic configuration without calling the API
 */
function checkConfig(args: ParsedArgs): void {
  console.log('\n🧪 Checking configuration...\n');

  const ok = AnthropicConfig.validate({ apiKey: args.values.get('--api-key') });
  if (!ok) {
    console.log('❌ Set ANTHROPIC_API_KEY in your .env file or pass --api-key.');
    process.exitCode = 1;
    return;
  }

  console.log(`   Model: ${AnthropicConfig.getModel({ apiKey: args.values.get('--api-key') })}`);
}

/**
 * Print help message
 */
function printHelp(): void {
  console.log(`
Survey Response Classification

Labels free-text survey responses about AI in education with Claude and
aggregates the category distribution.

USAGE:
  npm run dev <command> [options]

COMMANDS:
  classify <job> --in <path> --out <path>   Classify every response in a CSV/JSON file
    --input-column <name>                   Column holding the text (selects column mode)
    --headerless                            Read the first field of a header-less CSV
    --model <id>                            Model override (else ANTHROPIC_MODEL, else job default)
    --api-key <key>                         Credential override (else ANTHROPIC_API_KEY)
    --concurrency <n>                       Requests in flight (default 1)
    --max-retries <n>                       Attempts per record (default 5)
    --delay-ms <n>                          Pause after each call
  report <summary.json>                     Print the ranked category report
  jobs                                      List job definitions
  check-config                              Validate Anthropic configuration
  help                                      Show this help message

EXAMPLES:
  npm run dev classify classify-responses --in data/responses.csv --out out/classified.csv
  npm run dev classify summarize-responses --in data/responses.csv --out out/summary.json
  npm run dev report out/summary.json

ENVIRONMENT:
  Configuration is loaded from .env file
    - ANTHROPIC_API_KEY (required), ANTHROPIC_MODEL
    - CLASSIFY_CONCURRENCY, CLASSIFY_MAX_RETRIES, CLASSIFY_REQUEST_DELAY_MS, CLASSIFY_BACKOFF_UNIT_MS
    - LOG_LEVEL, LOG_DIR, LOG_TO_FILE, LOG_SILENT
`);
}

/**
 * Main CLI entry point
 */
async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const command = args.positionals[0];

  if (!command || command === 'help' || args.switches.has('--help')) {
    printHelp();
    return;
  }

  switch (command) {
    case 'classify':
      await classify(args);
      break;

    case 'report':
      await report(args);
      break;

    case 'jobs':
      printJobs();
      break;

    case 'check-config':
      checkConfig(args);
      break;

    default:
      console.error(`Unknown command: ${command}`);
      console.error(`Valid commands: ${COMMANDS.join(', ')}`);
      printHelp();
      process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  if (isRunAbortingError(error)) {
    logger.error('Run aborted', { code: error.code, error: error.message, details: error.details });
  } else if (error instanceof PipelineError) {
    logger.error('Command failed', { code: error.code, error: error.message, details: error.details });
  } else {
    logger.error('Command failed', error);
  }
  console.error('\n❌ Command failed:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
