import fs from 'fs/promises';
import path from 'path';
import type { JobConfig, OutputMode } from '../jobs/JobConfig.js';
import { toSummaryBlock, type SummaryBlock, type SummaryStatistics } from '../pipeline/aggregate.js';
import type { ClassificationResult } from '../pipeline/ResponseClassifier.js';
import { ConfigError } from '../utils/errors.js';
import { JobLogger } from '../utils/logger.js';
import type { InputRecord } from '../utils/recordLoader.js';

/**
 * One input record paired with its result, in input order
 */
export interface ClassifiedRecord {
  record: InputRecord;
  result: ClassificationResult;
}

/**
 * Entry of the `data` list in summary mode
 */
export interface SummaryDataEntry {
  input: string;
  /** Raw model text, or the diagnostic for fallback records */
  output: string;
  category: string;
}

export interface SummaryDocument {
  summary: SummaryBlock;
  data: SummaryDataEntry[];
}

export type OutputRow = Record<string, unknown>;

/**
 * Output extensions accepted per mode
 */
const OUTPUT_EXTENSIONS: Record<OutputMode, readonly string[]> = {
  summary: ['.json'],
  records: ['.json', '.csv'],
};

/**
 * Quote a CSV field when it contains a delimiter, quote or line break
 */
export function escapeCsvField(value: unknown): string {
  let text: string;
  if (value === undefined || value === null) {
    text = '';
  } else if (typeof value === 'string') {
    text = value;
  } else if (typeof value === 'object') {
    text = JSON.stringify(value);
  } else {
    text = String(value);
  }

  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/**
 * Serialize rows with a header taken from the first row's keys
 * (or `emptyHeader` when there are no rows)
 */
export function toCsv(rows: readonly OutputRow[], emptyHeader: readonly string[]): string {
  const header = rows.length > 0 ? Object.keys(rows[0]) : [...emptyHeader];
  const lines = [header.map(escapeCsvField).join(',')];

  for (const row of rows) {
    lines.push(header.map((key) => escapeCsvField(row[key])).join(','));
  }

  return `${lines.join('\n')}\n`;
}

/**
 * Concurrent Processor
 *
 * Assembles the final document from ordered results and writes it once.
 *
 * 1. summary mode (.json):
 *    { summary: { total_inputs, category_counts, category_percents }, data }
 *
 * 2. records mode (.json / .csv):
 *    original row fields + category + reason
 *
 * The file is written to `<path>.tmp` and renamed into place.
 */
export class ConcurrentProcessor {
  private job: Pick<JobConfig, 'id' | 'outputMode'>;
  private inputColumn: string;
  private logger: JobLogger;

  constructor(job: Pick<JobConfig, 'id' | 'outputMode'>, inputColumn: string) {
    this.job = job;
    this.inputColumn = inputColumn;
    this.logger = new JobLogger(`ConcurrentProcessor:${job.id}`);
  }

  /**
   * Fail fast on an output path the mode cannot write
   */
  static validateOutputPath(mode: OutputMode, outputPath: string): void {
    const ext = path.extname(outputPath).toLowerCase();
    const allowed = OUTPUT_EXTENSIONS[mode];
    if (!allowed.includes(ext)) {
      throw new ConfigError(`Output file must be ${allowed.join(' or ')} (got '${ext || outputPath}')`, {
        outputPath,
        mode,
      });
    }
  }

  buildSummaryDocument(results: readonly ClassifiedRecord[], summary: SummaryStatistics): SummaryDocument {
    return {
      summary: toSummaryBlock(summary),
      data: results.map(({ record, result }) => ({
        input: record.text,
        output: result.fallback ? result.rationale : result.rawOutput,
        category: result.category,
      })),
    };
  }

  buildOutputRows(results: readonly ClassifiedRecord[]): OutputRow[] {
    return results.map(({ record, result }) => ({
      ...record.row,
      category: result.category,
      reason: result.rationale,
    }));
  }

  /**
   * Render the file contents for the given output path
   */
  render(outputPath: string, results: readonly ClassifiedRecord[], summary: SummaryStatistics): string {
    ConcurrentProcessor.validateOutputPath(this.job.outputMode, outputPath);

    if (this.job.outputMode === 'summary') {
      return `${JSON.stringify(this.buildSummaryDocument(results, summary), null, 2)}\n`;
    }

    const rows = this.buildOutputRows(results);
    if (path.extname(outputPath).toLowerCase() === '.csv') {
      return toCsv(rows, [this.inputColumn, 'category', 'reason']);
    }
    return `${JSON.stringify(rows, null, 2)}\n`;
  }

  /**
   * Write the complete output in one step
   */
  async write(outputPath: string, results: readonly ClassifiedRecord[], summary: SummaryStatistics): Promise<void> {
    const content = this.render(outputPath, results, summary);
    const tempPath = `${outputPath}.tmp`;

    await fs.mkdir(path.dirname(path.resolve(outputPath)), { recursive: true });
    try {
      await fs.writeFile(tempPath, content, 'utf-8');
      await fs.rename(tempPath, outputPath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }

    this.logger.info('Output written', {
      outputPath,
      mode: this.job.outputMode,
      records: results.length,
    });
  }
}
