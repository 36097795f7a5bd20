import { describe, it, expect } from 'vitest';
import { cleanDataset, toRawTable } from '../clean/normalize';
import { DEFAULT_ENGINE_CONFIG } from '../config';
import type { RawTable } from '../types/schema';
import { ShapeError } from '../utils/errors';

const config = DEFAULT_ENGINE_CONFIG;

const messy = (): RawTable => ({
  columns: [' id ', 'price', 'joined', 'active', 'note'],
  rows: [
    [' 1 ', '$1,200.50', '2024-01-05', 'TRUE', '  hello\nworld '],
    ['2', '15%', '01/02/2024', 'false', 'NA'],
    ['2', '15%', '01/02/2024', 'false', 'NA'],
    ['3', '7', '2024-03-10T08:30:00Z', 'true', 'x1']
  ]
});

describe('cleanDataset', () => {
  it('trims, coerces and de-duplicates', () => {
    const dataset = cleanDataset('messy', messy(), config);

    expect(dataset.columns).toEqual(['id', 'price', 'joined', 'active', 'note']);
    expect(dataset.types).toEqual({ id: 'numeric', price: 'numeric', joined: 'date', active: 'boolean', note: 'text' });
    expect(dataset.rows).toEqual([
      [1, 1200.5, '2024-01-05', true, 'hello world'],
      [2, 15, '2024-01-02', false, null],
      [3, 7, '2024-03-10T08:30:00.000Z', true, 'x1']
    ]);
    expect(dataset.report).toEqual({
      inputRows: 4,
      outputRows: 3,
      duplicateRowsRemoved: 1,
      trimmedCells: 2,
      malformedCells: 0,
      raggedRows: 0,
      coercedColumns: ['id', 'price', 'active'],
      dateColumns: ['joined'],
      ambiguousColumns: []
    });
  });

  it('does not mutate its input', () => {
    const raw = messy();
    const before = JSON.stringify(raw);
    cleanDataset('messy', raw, config);
    expect(JSON.stringify(raw)).toBe(before);
  });

  it('is idempotent on canonical data', () => {
    const once = cleanDataset('messy', messy(), config);
    const twice = cleanDataset('messy', toRawTable(once), config);

    expect(twice.rows).toEqual(once.rows);
    expect(twice.types).toEqual(once.types);
    expect(twice.columns).toEqual(once.columns);
    expect(twice.report.duplicateRowsRemoved).toBe(0);
    expect(twice.report.coercedColumns).toEqual([]);
  });

  it('leaves a partly numeric column as text and flags it', () => {
    const dataset = cleanDataset('qty', { columns: ['qty'], rows: [['5'], ['seven'], ['12']] }, config);
    expect(dataset.types.qty).toBe('text');
    expect(dataset.rows).toEqual([['5'], ['seven'], ['12']]);
    expect(dataset.report.ambiguousColumns).toEqual(['qty']);
  });

  it('keeps integers too long for a double as distinct text', () => {
    const raw: RawTable = {
      columns: ['account', 'label'],
      rows: [
        ['9007199254740993', 'a'],
        ['9007199254740992', 'a'],
        ['9007199254740995', 'a']
      ]
    };
    const dataset = cleanDataset('accounts', raw, config);

    expect(dataset.types.account).toBe('text');
    expect(dataset.rows).toEqual([
      ['9007199254740993', 'a'],
      ['9007199254740992', 'a'],
      ['9007199254740995', 'a']
    ]);
    expect(dataset.report.duplicateRowsRemoved).toBe(0);
    expect(dataset.report.coercedColumns).toEqual([]);
  });

  it('reads timestamps without an offset as UTC', () => {
    const dataset = cleanDataset(
      'events',
      { columns: ['at'], rows: [['2024-03-10 08:30'], ['2024-03-10T09:15:00+02:00']] },
      config
    );
    expect(dataset.rows).toEqual([['2024-03-10T08:30:00.000Z'], ['2024-03-10T07:15:00.000Z']]);
  });

  it('types a column named after an object prototype key', () => {
    const dataset = cleanDataset('odd', { columns: ['__proto__'], rows: [['1'], ['2']] }, config);
    expect(Object.keys(dataset.types)).toEqual(['__proto__']);
    expect(dataset.types['__proto__']).toBe('numeric');
  });

  it('keeps codes with leading zeros as text', () => {
    const dataset = cleanDataset('zip', { columns: ['zip'], rows: [['01234'], ['98765']] }, config);
    expect(dataset.types.zip).toBe('text');
    expect(dataset.rows).toEqual([['01234'], ['98765']]);
  });

  it('tags a mostly-date column and turns failed parses into missing', () => {
    const rows = Array.from({ length: 9 }, (_, i) => [`2024-04-0${i + 1}`]);
    rows.push(['someday']);
    const dataset = cleanDataset('events', { columns: ['when'], rows }, config);

    expect(dataset.types.when).toBe('date');
    expect(dataset.rows[9]).toEqual([null]);
    expect(dataset.report.malformedCells).toBe(1);
  });

  it('does not tag a column below the date threshold', () => {
    const rows = [['2024-01-01'], ['2024-01-02'], ['later']];
    const dataset = cleanDataset('events', { columns: ['when'], rows }, config);
    expect(dataset.types.when).toBe('text');
    expect(dataset.rows[2]).toEqual(['later']);
  });

  it('coerces malformed cells to missing and pads ragged rows', () => {
    const dataset = cleanDataset(
      'odd',
      { columns: ['a', 'b'], rows: [[{ nested: true }, Number.NaN], [1], [2, 3, 4]] },
      config
    );
    expect(dataset.rows).toEqual([
      [null, null],
      [1, null],
      [2, 3]
    ]);
    expect(dataset.report.malformedCells).toBe(2);
    expect(dataset.report.raggedRows).toBe(2);
  });

  it('treats configured tokens as missing', () => {
    const dataset = cleanDataset('t', { columns: ['v'], rows: [['N/A'], ['null'], ['-'], ['ok']] }, config);
    expect(dataset.rows).toEqual([[null], ['-'], ['ok']]);
  });

  it('rejects a dataset without columns', () => {
    expect(() => cleanDataset('empty', { columns: [], rows: [] }, config)).toThrow(ShapeError);
  });

  it('rejects duplicate column names after trimming', () => {
    expect(() => cleanDataset('dup', { columns: ['a', ' a'], rows: [] }, config)).toThrow(/duplicate column names: a/);
  });
});
