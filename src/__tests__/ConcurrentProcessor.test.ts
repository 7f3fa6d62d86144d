import fs from 'fs/promises';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  ConcurrentProcessor,
  escapeCsvField,
  toCsv,
  type ClassifiedRecord,
} from '../concurrent/ConcurrentProcessor.js';
import { buildSummary } from '../pipeline/aggregate.js';
import { CategorySet } from '../pipeline/categories.js';
import { ConfigError } from '../utils/errors.js';
import { TEST_CATEGORIES, makeTempDir } from './helpers.js';

const categories = new CategorySet(TEST_CATEGORIES);

function classified(
  index: number,
  row: Record<string, unknown>,
  text: string,
  category: string,
  rationale: string,
  rawOutput: string,
  fallback = false
): ClassifiedRecord {
  return {
    record: { index, row, text },
    result: { category, rationale, rawOutput, fallback },
  };
}

describe('escapeCsvField', () => {
  it('leaves plain values alone', () => {
    expect(escapeCsvField('plain')).toBe('plain');
    expect(escapeCsvField(3)).toBe('3');
    expect(escapeCsvField(null)).toBe('');
    expect(escapeCsvField(undefined)).toBe('');
  });

  it('quotes delimiters, quotes and line breaks', () => {
    expect(escapeCsvField('a,b')).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField('line\nbreak')).toBe('"line\nbreak"');
    expect(escapeCsvField('carriage\rreturn')).toBe('"carriage\rreturn"');
  });

  it('writes objects as JSON', () => {
    expect(escapeCsvField({ a: 1 })).toBe('"{""a"":1}"');
  });
});

describe('toCsv', () => {
  it('writes only the fallback header when there are no rows', () => {
    expect(toCsv([], ['Response', 'category', 'reason'])).toBe('Response,category,reason\n');
  });

  it('takes the header from the first row', () => {
    const rows = [
      { id: '1', Response: 'yes', category: 'A', reason: 'r' },
      { id: '2', Response: 'no, never', category: 'B', reason: '' },
    ];

    expect(toCsv(rows, [])).toBe('id,Response,category,reason\n1,yes,A,r\n2,"no, never",B,\n');
  });
});

describe('ConcurrentProcessor', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('validateOutputPath', () => {
    it('accepts JSON for summaries and JSON or CSV for records', () => {
      expect(() => ConcurrentProcessor.validateOutputPath('summary', 'out/summary.json')).not.toThrow();
      expect(() => ConcurrentProcessor.validateOutputPath('records', 'out/rows.CSV')).not.toThrow();
      expect(() => ConcurrentProcessor.validateOutputPath('records', 'out/rows.json')).not.toThrow();
    });

    it('rejects anything else with ConfigError', () => {
      expect(() => ConcurrentProcessor.validateOutputPath('summary', 'out/summary.csv')).toThrow(ConfigError);
      expect(() => ConcurrentProcessor.validateOutputPath('records', 'out/rows.txt')).toThrow(
        "Output file must be .json or .csv (got '.txt')"
      );
    });
  });

  it('writes records as CSV with the original columns first', async () => {
    const processor = new ConcurrentProcessor({ id: 'test-job', outputMode: 'records' }, 'Response');
    const results = [
      classified(0, { id: '1', Response: 'Hi, there' }, 'Hi, there', 'A', 'says "hi"', '{}'),
      classified(1, { id: '2', Response: 'meh' }, 'meh', 'Other', 'API error (429): slow down', '', true),
    ];
    const outputPath = path.join(dir, 'nested', 'out.csv');

    await processor.write(outputPath, results, buildSummary(['A', 'Other'], categories));

    await expect(fs.readFile(outputPath, 'utf-8')).resolves.toBe(
      'id,Response,category,reason\n' +
        '1,"Hi, there",A,"says ""hi"""\n' +
        '2,meh,Other,API error (429): slow down\n'
    );
    await expect(fs.access(`${outputPath}.tmp`)).rejects.toThrow();
  });

  it('removes the temp file when the output cannot be replaced', async () => {
    const processor = new ConcurrentProcessor({ id: 'test-job', outputMode: 'records' }, 'Response');
    const outputPath = path.join(dir, 'taken.json');
    await fs.mkdir(outputPath);

    await expect(processor.write(outputPath, [], buildSummary([], categories))).rejects.toThrow();

    await expect(fs.access(`${outputPath}.tmp`)).rejects.toThrow();
    expect((await fs.stat(outputPath)).isDirectory()).toBe(true);
  });

  it('writes a header-only CSV when there are no records', async () => {
    const processor = new ConcurrentProcessor({ id: 'test-job', outputMode: 'records' }, 'Response');
    const outputPath = path.join(dir, 'empty.csv');

    await processor.write(outputPath, [], buildSummary([], categories));

    await expect(fs.readFile(outputPath, 'utf-8')).resolves.toBe('Response,category,reason\n');
  });

  it('writes records as indented JSON', async () => {
    const processor = new ConcurrentProcessor({ id: 'test-job', outputMode: 'records' }, 'Response');
    const results = [classified(0, { Response: 'yes', id: 7 }, 'yes', 'B', 'fits B', '{}')];
    const outputPath = path.join(dir, 'rows.json');

    await processor.write(outputPath, results, buildSummary(['B'], categories));

    const content = await fs.readFile(outputPath, 'utf-8');
    expect(content).toBe(
      JSON.stringify([{ Response: 'yes', id: 7, category: 'B', reason: 'fits B' }], null, 2) + '\n'
    );
  });

  it('writes the summary document with raw output or diagnostics', async () => {
    const processor = new ConcurrentProcessor({ id: 'test-job', outputMode: 'summary' }, 'text');
    const raw = '{"category": "A", "reason": "r"}';
    const results = [
      classified(0, { text: 'first' }, 'first', 'A', 'r', raw),
      classified(1, { text: 'second' }, 'second', 'Other', 'API error (429): slow down', '', true),
    ];
    const outputPath = path.join(dir, 'summary.json');

    await processor.write(outputPath, results, buildSummary(['A', 'Other'], categories));

    const content = await fs.readFile(outputPath, 'utf-8');
    expect(content.endsWith('}\n')).toBe(true);
    expect(content.startsWith('{\n  "summary": {\n    "total_inputs": 2,')).toBe(true);
    expect(JSON.parse(content)).toEqual({
      summary: {
        total_inputs: 2,
        category_counts: { A: 1, B: 0, Other: 1 },
        category_percents: { A: 50, B: 0, Other: 50 },
      },
      data: [
        { input: 'first', output: raw, category: 'A' },
        { input: 'second', output: 'API error (429): slow down', category: 'Other' },
      ],
    });
  });
});
