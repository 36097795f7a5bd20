import type { EngineConfig } from '../config';
import type { CellValue, CleaningReport, Dataset, RawTable, StorageType } from '../types/schema';
import { ShapeError } from '../utils/errors';
import { emptyRecord, isMissingToken, isScalar, parseBoolean, parseDate, parseNumeric, rowKey, tidyText } from '../utils/values';

type CellState = { value: CellValue; trimmed: boolean; malformed: boolean };

type ColumnDecision = {
  type: StorageType;
  values: CellValue[];
  coerced: boolean;
  ambiguous: boolean;
  failedDates: number;
};

const normalizeColumnNames = (name: string, columns: unknown) => {
  if (!Array.isArray(columns) || columns.length === 0) {
    throw new ShapeError(`Dataset "${name}" has no columns`, { dataset: name });
  }

  const names = columns.map((c, i) => {
    const label = tidyText(c === null || c === undefined ? '' : String(c));
    return label || `column_${i + 1}`;
  });

  const seen = new Set<string>();
  const duplicates = names.filter(n => (seen.has(n) ? true : (seen.add(n), false)));
  if (duplicates.length) {
    throw new ShapeError(`Dataset "${name}" has duplicate column names: ${[...new Set(duplicates)].join(', ')}`, {
      dataset: name,
      duplicates
    });
  }
  return names;
};

const normalizeCell = (raw: unknown, missing: ReadonlySet<string>): CellState => {
  if (raw === null || raw === undefined) return { value: null, trimmed: false, malformed: false };

  if (typeof raw === 'string') {
    const text = tidyText(raw);
    const trimmed = text !== raw;
    return { value: isMissingToken(text, missing) ? null : text, trimmed, malformed: false };
  }

  if (typeof raw === 'number') {
    return Number.isFinite(raw)
      ? { value: raw, trimmed: false, malformed: false }
      : { value: null, trimmed: false, malformed: true };
  }

  if (typeof raw === 'boolean') return { value: raw, trimmed: false, malformed: false };

  if (raw instanceof Date) {
    return Number.isNaN(raw.valueOf())
      ? { value: null, trimmed: false, malformed: true }
      : { value: raw.toISOString(), trimmed: false, malformed: false };
  }

  return { value: null, trimmed: false, malformed: true };
};

const textOf = (value: string | number | boolean) => (typeof value === 'string' ? value : String(value));

const decideColumn = (cells: CellValue[], config: EngineConfig): ColumnDecision => {
  const present = cells.filter(isScalar);
  const asText = (): ColumnDecision => ({
    type: 'text',
    values: cells.map(v => (v === null ? null : textOf(v))),
    coerced: false,
    ambiguous: false,
    failedDates: 0
  });

  if (!present.length) return asText();

  const booleans = present.map(v => (typeof v === 'boolean' ? v : typeof v === 'string' ? parseBoolean(v) : null));
  if (booleans.every(v => v !== null)) {
    return {
      type: 'boolean',
      values: cells.map(v => (v === null ? null : typeof v === 'boolean' ? v : parseBoolean(textOf(v)))),
      coerced: present.some(v => typeof v === 'string'),
      ambiguous: false,
      failedDates: 0
    };
  }

  const numbers = present.map(v => (typeof v === 'number' ? v : typeof v === 'string' ? parseNumeric(v) : null));
  const numericHits = numbers.filter(v => v !== null).length;
  if (numericHits === present.length) {
    return {
      type: 'numeric',
      values: cells.map(v => (v === null ? null : typeof v === 'number' ? v : parseNumeric(textOf(v)))),
      coerced: present.some(v => typeof v === 'string'),
      ambiguous: false,
      failedDates: 0
    };
  }

  const dates = cells.map(v => (v === null ? null : parseDate(textOf(v))));
  const dateHits = dates.filter(v => v !== null).length;
  if (dateHits / present.length >= config.cleaning.dateParseThreshold) {
    return { type: 'date', values: dates, coerced: false, ambiguous: false, failedDates: present.length - dateHits };
  }

  return { ...asText(), ambiguous: numericHits > 0 };
};

/**
 * Produces the canonical form of a raw table: trimmed text, missing tokens as null,
 * numeric / boolean / date columns coerced when the whole column agrees, duplicate rows dropped.
 * The input is never mutated.
 */
export const cleanDataset = (name: string, raw: RawTable, config: EngineConfig): Dataset => {
  const columns = normalizeColumnNames(name, raw?.columns);
  if (!Array.isArray(raw.rows)) {
    throw new ShapeError(`Dataset "${name}" rows must be a list`, { dataset: name });
  }

  const missing = new Set(config.cleaning.missingTokens.map(t => t.toLowerCase()));
  const width = columns.length;
  let trimmedCells = 0;
  let malformedCells = 0;
  let raggedRows = 0;

  const grid: CellValue[][] = raw.rows.map((row, index) => {
    if (!Array.isArray(row)) {
      throw new ShapeError(`Dataset "${name}" row ${index + 1} is not a list of cells`, { dataset: name, row: index + 1 });
    }
    if (row.length !== width) raggedRows++;

    const out: CellValue[] = [];
    for (let i = 0; i < width; i++) {
      const cell = normalizeCell(row[i], missing);
      if (cell.trimmed) trimmedCells++;
      if (cell.malformed) malformedCells++;
      out.push(cell.value);
    }
    return out;
  });

  const types = emptyRecord<StorageType>();
  const coercedColumns: string[] = [];
  const dateColumns: string[] = [];
  const ambiguousColumns: string[] = [];

  columns.forEach((column, c) => {
    const decision = decideColumn(grid.map(row => row[c]), config);
    types[column] = decision.type;
    malformedCells += decision.failedDates;
    if (decision.coerced) coercedColumns.push(column);
    if (decision.type === 'date') dateColumns.push(column);
    if (decision.ambiguous) ambiguousColumns.push(column);
    decision.values.forEach((value, r) => {
      grid[r][c] = value;
    });
  });

  const seen = new Set<string>();
  const rows = grid.filter(row => {
    const key = rowKey(row);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });

  const report: CleaningReport = {
    inputRows: grid.length,
    outputRows: rows.length,
    duplicateRowsRemoved: grid.length - rows.length,
    trimmedCells,
    malformedCells,
    raggedRows,
    coercedColumns,
    dateColumns,
    ambiguousColumns
  };

  return { name, columns, types, rows, report };
};

/** Re-wraps a canonical dataset as raw input, e.g. for a second cleaning pass. */
export const toRawTable = (dataset: Dataset): RawTable => ({
  columns: [...dataset.columns],
  rows: dataset.rows.map(row => [...row])
});
