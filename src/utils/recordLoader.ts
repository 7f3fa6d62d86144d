import fs from 'fs';
import fsp from 'fs/promises';
import path from 'path';
import csv from 'csv-parser';
import { FormatError, SchemaError } from './errors.js';
import { createLogger } from './logger.js';

const logger = createLogger('RecordLoader');

/**
 * One row of input with its extracted free text
 */
export interface InputRecord {
  /** Position among the loaded (non-empty) records */
  index: number;
  /** Original row; never mutated */
  row: Readonly<Record<string, unknown>>;
  /** Trimmed text sent for classification */
  text: string;
}

export type ColumnSelector =
  | { mode: 'column'; column: string }
  | { mode: 'headerless' };

export const SUPPORTED_EXTENSIONS = ['.csv', '.json'] as const;

const BOM = /^\uFEFF/;

/**
 * Load free-text records from a CSV or JSON file.
 *
 * - column mode: header row (CSV) or object keys (JSON) must contain the
 *   column, otherwise SchemaError
 * - headerless mode: CSV only, first field of each row
 *
 * Text is trimmed; rows whose text is empty are skipped. Order is preserved.
 */
export async function loadRecords(filePath: string, selector: ColumnSelector): Promise<InputRecord[]> {
  const ext = path.extname(filePath).toLowerCase();

  let entries: Array<{ row: Record<string, unknown>; text: string }>;

  if (ext === '.csv') {
    entries =
      selector.mode === 'column'
        ? await readCsvWithHeader(filePath, selector.column)
        : await readCsvHeaderless(filePath);
  } else if (ext === '.json') {
    if (selector.mode === 'headerless') {
      throw new FormatError('Headerless input must be a .csv file', { filePath });
    }
    entries = await readJsonArray(filePath, selector.column);
  } else {
    throw new FormatError(
      `Unsupported input file format: ${ext || '(none)'}. Use ${SUPPORTED_EXTENSIONS.join(' or ')}`,
      { filePath }
    );
  }

  const records: InputRecord[] = [];
  for (const entry of entries) {
    const text = entry.text.trim();
    if (!text) {
      continue;
    }
    records.push({ index: records.length, row: Object.freeze({ ...entry.row }), text });
  }

  logger.info(`Loaded ${records.length} records`, {
    filePath,
    skipped: entries.length - records.length,
    mode: selector.mode,
  });

  return records;
}

function textOf(value: unknown): string {
  if (value === undefined || value === null) {
    return '';
  }
  return typeof value === 'string' ? value : String(value);
}

async function readCsvWithHeader(
  filePath: string,
  column: string
): Promise<Array<{ row: Record<string, unknown>; text: string }>> {
  const rows: Array<Record<string, string>> = [];

  const headers = await new Promise<string[] | null>((resolve, reject) => {
    let detectedHeaders: string[] | null = null;

    const source = fs.createReadStream(filePath).on('error', reject);
    const stream = source.pipe(
      csv({
        mapHeaders: ({ header }) => header.replace(BOM, ''),
        strict: false,
      })
    );

    stream.on('headers', (detected: string[]) => {
      detectedHeaders = detected;
      if (!detected.includes(column)) {
        source.destroy();
        stream.destroy(
          new SchemaError(`Column '${column}' not found in CSV headers: ${JSON.stringify(detected)}`, {
            column,
            headers: detected,
          })
        );
      }
    });
    stream.on('data', (row: Record<string, string>) => rows.push(row));
    stream.on('error', reject);
    stream.on('end', () => resolve(detectedHeaders));
  });

  // Empty file: no header row at all
  if (!headers) {
    return [];
  }

  return rows.map((row) => ({ row, text: textOf(row[column]) }));
}

async function readCsvHeaderless(
  filePath: string
): Promise<Array<{ row: Record<string, unknown>; text: string }>> {
  const rows: Array<Record<string, string>> = [];

  await new Promise<void>((resolve, reject) => {
    fs.createReadStream(filePath)
      .on('error', reject)
      .pipe(csv({ headers: false, strict: false }))
      .on('data', (row: Record<string, string>) => rows.push(row))
      .on('error', reject)
      .on('end', () => resolve());
  });

  return rows.map((row, i) => {
    const first = textOf(row['0']);
    const text = i === 0 ? first.replace(BOM, '') : first;
    return { row: { text: text.trim() }, text };
  });
}

async function readJsonArray(
  filePath: string,
  column: string
): Promise<Array<{ row: Record<string, unknown>; text: string }>> {
  const content = await fsp.readFile(filePath, 'utf-8');

  let data: unknown;
  try {
    data = JSON.parse(content.replace(BOM, ''));
  } catch (error) {
    throw new FormatError(
      `Invalid JSON in ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { filePath }
    );
  }

  if (!Array.isArray(data)) {
    throw new FormatError('JSON must be a list of objects.', { filePath });
  }
  if (data.length === 0) {
    return [];
  }

  const rows: Array<Record<string, unknown>> = [];
  for (const [index, item] of data.entries()) {
    if (!isPlainObject(item)) {
      throw new FormatError(`JSON entry at index ${index} is not an object.`, { filePath, index });
    }
    rows.push(item);
  }

  const keys = Object.keys(rows[0]);
  if (!keys.includes(column)) {
    throw new SchemaError(`Key '${column}' not found in JSON objects: ${JSON.stringify(keys)}`, {
      column,
      headers: keys,
    });
  }

  return rows.map((row) => ({ row, text: textOf(row[column]) }));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
