import fs from 'fs/promises';
import { FormatError } from '../utils/errors.js';
import { validator } from '../utils/validators.js';
import type { SummaryBlock } from './aggregate.js';

export interface RankedCategory {
  label: string;
  count: number;
  percent: number;
}

export interface ReportOptions {
  /** Width of the longest bar, in characters */
  barWidth?: number;
}

const DEFAULT_BAR_WIDTH = 40;

const isSummaryBlock = validator.compile<SummaryBlock>({
  type: 'object',
  required: ['total_inputs', 'category_counts', 'category_percents'],
  properties: {
    total_inputs: { type: 'integer', minimum: 0 },
    category_counts: {
      type: 'object',
      additionalProperties: { type: 'integer', minimum: 0 },
    },
    category_percents: {
      type: 'object',
      additionalProperties: { type: 'number' },
    },
  },
});

/**
 * Read the `summary` block of a summary-mode output file
 */
export async function loadSummaryDocument(filePath: string): Promise<SummaryBlock> {
  const content = await fs.readFile(filePath, 'utf-8');

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new FormatError(
      `Invalid JSON in ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { filePath }
    );
  }

  if (typeof data !== 'object' || data === null || Array.isArray(data) || !('summary' in data)) {
    throw new FormatError("Input JSON missing 'summary' block", { filePath });
  }

  const summary: unknown = data.summary;
  if (!isSummaryBlock(summary)) {
    throw new FormatError(
      `Malformed 'summary' block: ${validator.formatErrors(isSummaryBlock.errors)}`,
      { filePath }
    );
  }

  return summary;
}

/**
 * Count descending, then label ascending (case-insensitive)
 */
export function rankCategories(summary: SummaryBlock): RankedCategory[] {
  return Object.entries(summary.category_counts)
    .map(([label, count]) => ({
      label,
      count,
      percent: summary.category_percents[label] ?? 0,
    }))
    .sort((a, b) => {
      if (a.count !== b.count) {
        return b.count - a.count;
      }
      const left = a.label.toLowerCase();
      const right = b.label.toLowerCase();
      return left < right ? -1 : left > right ? 1 : 0;
    });
}

/**
 * Plain-text rendering of a summary block:
 *
 *   Category Counts (n=4)
 *   Cheating Concerns | 3 ##############################
 *   Other             | 1 ##########
 *
 *   Category Percents
 *   Cheating Concerns |  75.00%
 *   Other             |  25.00%
 */
export function renderSummaryReport(summary: SummaryBlock, options: ReportOptions = {}): string {
  const barWidth = options.barWidth ?? DEFAULT_BAR_WIDTH;
  const ranked = rankCategories(summary);
  const lines = [`Category Counts (n=${summary.total_inputs})`];

  if (ranked.length === 0) {
    lines.push('No data to display');
    return `${lines.join('\n')}\n`;
  }

  const labelWidth = Math.max(...ranked.map((entry) => entry.label.length));
  const countWidth = Math.max(...ranked.map((entry) => String(entry.count).length));
  const maxCount = Math.max(...ranked.map((entry) => entry.count));

  for (const entry of ranked) {
    const barLength = maxCount === 0 ? 0 : Math.round((entry.count / maxCount) * barWidth);
    lines.push(
      `${entry.label.padEnd(labelWidth)} | ${String(entry.count).padStart(countWidth)} ${'#'.repeat(barLength)}`.trimEnd()
    );
  }

  lines.push('', 'Category Percents');
  for (const entry of ranked) {
    lines.push(`${entry.label.padEnd(labelWidth)} | ${entry.percent.toFixed(2).padStart(6)}%`);
  }

  return `${lines.join('\n')}\n`;
}
