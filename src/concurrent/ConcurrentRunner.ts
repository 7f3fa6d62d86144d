import pLimit from 'p-limit';
import type { PipelineSettings } from '../config/pipeline.js';
import type { JobConfig } from '../jobs/JobConfig.js';
import { buildSummary, type SummaryStatistics } from '../pipeline/aggregate.js';
import { CategorySet } from '../pipeline/categories.js';
import { ResponseClassifier, defaultSleep, type Sleep } from '../pipeline/ResponseClassifier.js';
import { ConfigError } from '../utils/errors.js';
import { JobLogger } from '../utils/logger.js';
import { loadRecords, type ColumnSelector, type InputRecord } from '../utils/recordLoader.js';
import type { TextGenerationClient } from './ClaudeConcurrentClient.js';
import { ConcurrentProcessor, type ClassifiedRecord } from './ConcurrentProcessor.js';

/**
 * Concurrent Runner Options
 */
export interface RunOptions {
  inputPath: string;
  outputPath: string;
  /**
   * Column (CSV header / JSON key) holding the text. Selects column mode
   * even for jobs that read headerless input by default.
   */
  inputColumn?: string;
  /** Read the first field of a header-less CSV instead of a named column */
  headerless?: boolean;
}

export interface RunResult {
  results: ClassifiedRecord[];
  summary: SummaryStatistics;
  fallbackCount: number;
}

export interface ConcurrentRunnerDeps {
  job: JobConfig;
  client: TextGenerationClient;
  model: string;
  settings: PipelineSettings;
  sleep?: Sleep;
}

/**
 * Concurrent Runner
 *
 * Orchestrates one classification run: load → classify (p-limit pool) →
 * aggregate → single write. Results keep input order regardless of
 * completion order.
 */
export class ConcurrentRunner {
  private job: JobConfig;
  private settings: PipelineSettings;
  private sleep: Sleep;
  private categories: CategorySet;
  private classifier: ResponseClassifier;
  private logger: JobLogger;

  constructor(deps: ConcurrentRunnerDeps) {
    this.job = deps.job;
    this.settings = deps.settings;
    this.sleep = deps.sleep ?? defaultSleep;
    this.categories = new CategorySet(deps.job.categories);
    this.classifier = new ResponseClassifier({
      job: deps.job,
      categories: this.categories,
      client: deps.client,
      model: deps.model,
      retry: {
        maxRetries: deps.settings.maxRetries,
        backoffUnitMs: deps.settings.backoffUnitMs,
      },
      sleep: this.sleep,
    });
    this.logger = new JobLogger(`ConcurrentRunner:${deps.job.id}`);
  }

  /**
   * Run concurrent processing
   *
   * 1. Validates the output path
   * 2. Loads records from the input file
   * 3. Classifies every record concurrently
   * 4. Aggregates and writes the output
   */
  async run(options: RunOptions): Promise<RunResult> {
    this.logger.started();

    try {
      const selector = this.resolveSelector(options);
      const inputColumn = selector.mode === 'column' ? selector.column : 'text';
      ConcurrentProcessor.validateOutputPath(this.job.outputMode, options.outputPath);
      const processor = new ConcurrentProcessor(this.job, inputColumn);

      // Step 1: Load records
      this.logger.info('Step 1: Loading records', { inputPath: options.inputPath, mode: selector.mode });
      const records = await loadRecords(options.inputPath, selector);

      // Step 2: Classify
      this.logger.info(`Step 2: Classifying ${records.length} records`, {
        concurrencyLimit: this.settings.concurrencyLimit,
        maxRetries: this.settings.maxRetries,
      });
      const results = await this.executeConcurrent(records);

      // Step 3: Aggregate and write
      this.logger.info('Step 3: Aggregating and writing output');
      const summary = buildSummary(
        results.map(({ result }) => result.category),
        this.categories
      );
      await processor.write(options.outputPath, results, summary);

      const fallbackCount = results.filter(({ result }) => result.fallback).length;
      if (fallbackCount > 0) {
        this.logger.warn(`${fallbackCount} records fell back to the default category`);
      }

      this.logger.completed({
        totalInputs: summary.totalInputs,
        fallbackCount,
        outputPath: options.outputPath,
      });

      return { results, summary, fallbackCount };
    } catch (error) {
      this.logger.failed(error);
      throw error;
    }
  }

  private resolveSelector(options: RunOptions): ColumnSelector {
    if (options.headerless && options.inputColumn !== undefined) {
      throw new ConfigError('Choose either a headerless input or an input column, not both', {
        inputColumn: options.inputColumn,
      });
    }

    const headerless =
      options.headerless ?? (options.inputColumn === undefined && this.job.inputMode === 'headerless');
    if (headerless) {
      return { mode: 'headerless' };
    }
    return { mode: 'column', column: options.inputColumn ?? this.job.defaultInputColumn };
  }

  /**
   * Classify every record with at most `concurrencyLimit` in flight.
   * Logs progress every 10 completions.
   */
  private async executeConcurrent(records: readonly InputRecord[]): Promise<ClassifiedRecord[]> {
    const limit = pLimit(this.settings.concurrencyLimit);
    const totalCount = records.length;
    let completedCount = 0;

    const tasks = records.map((record) =>
      limit(async (): Promise<ClassifiedRecord> => {
        const result = await this.classifier.classify(record.text);

        // Fixed courtesy pause after each call
        if (this.settings.requestDelayMs > 0) {
          await this.sleep(this.settings.requestDelayMs);
        }

        completedCount++;
        if (completedCount % 10 === 0 || completedCount === totalCount) {
          this.logger.info(`Progress: ${completedCount}/${totalCount} processed`);
        }

        return { record, result };
      })
    );

    return Promise.all(tasks);
  }
}
