import Papa from 'papaparse';
import * as XLSX from 'xlsx';
import type { RawTable } from '../types/schema';
import { IngestError } from '../utils/errors';

export type IngestedTable = {
  name: string;
  source: 'csv' | 'excel' | 'json';
  table: RawTable;
};

const stripExt = (name: string) => name.replace(/\.(csv|tsv|txt|xlsx|xls|json)$/i, '');

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Records keyed by column name -> header + positional rows, columns in first-seen order. */
export const recordsToTable = (records: unknown[]): RawTable => {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const record of records) {
    if (!isRecord(record)) continue;
    for (const key of Object.keys(record)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }
  const rows = records.map(record => columns.map(c => (isRecord(record) ? record[c] : null)));
  return { columns, rows };
};

const parseDelimited = (text: string, filename: string): RawTable => {
  const parsed = Papa.parse<string[]>(text.replace(/^\uFEFF/, ''), {
    header: false,
    skipEmptyLines: true,
    dynamicTyping: false
  });

  // an undetectable delimiter (single-column file) falls back to commas and is not fatal
  const fatal = parsed.errors.find(e => e.type === 'Quotes');
  if (fatal) {
    throw new IngestError(`CSV parse error in ${filename}: ${fatal.message}`, { file: filename, row: fatal.row });
  }

  const [header = [], ...rows] = parsed.data;
  return { columns: header, rows };
};

const parseWorkbook = (buffer: Buffer): RawTable => {
  const workbook = XLSX.read(buffer, { type: 'buffer', cellDates: true });
  const sheetName = workbook.SheetNames[0];
  const worksheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!worksheet) return { columns: [], rows: [] };
  const grid = XLSX.utils.sheet_to_json<unknown[]>(worksheet, { header: 1, defval: null, blankrows: false });
  const [header = [], ...rows] = grid;
  return { columns: header.map(h => (h === null || h === undefined ? '' : String(h))), rows };
};

const parseJson = (text: string, filename: string): RawTable => {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new IngestError(`Invalid JSON in ${filename}`, { file: filename }, { cause: err });
  }

  if (Array.isArray(data)) return recordsToTable(data);
  if (isRecord(data) && Array.isArray(data.columns) && Array.isArray(data.rows)) {
    return {
      columns: data.columns.map(c => String(c)),
      rows: data.rows.map(r => (Array.isArray(r) ? r : []))
    };
  }
  throw new IngestError(`${filename} must hold an array of records or { columns, rows }`, { file: filename });
};

/**
 * Turns an uploaded CSV / Excel / JSON file into a raw table for the engine.
 */
export const ingestFileBuffer = (buffer: Buffer, filename: string): IngestedTable => {
  const lower = filename.toLowerCase();
  const name = stripExt(filename);

  if (lower.endsWith('.xlsx') || lower.endsWith('.xls')) {
    return { name, source: 'excel', table: parseWorkbook(buffer) };
  }
  if (lower.endsWith('.json')) {
    return { name, source: 'json', table: parseJson(buffer.toString('utf-8'), filename) };
  }
  if (lower.endsWith('.csv') || lower.endsWith('.tsv') || lower.endsWith('.txt')) {
    return { name, source: 'csv', table: parseDelimited(buffer.toString('utf-8'), filename) };
  }
  throw new IngestError(`Unsupported file type: ${filename}`, { file: filename });
};
