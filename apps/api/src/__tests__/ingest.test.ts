import { describe, it, expect } from 'vitest';
import * as XLSX from 'xlsx';
import { ingestFileBuffer, recordsToTable } from '../ingest/csv';
import { IngestError } from '../utils/errors';

const makeWorkbookBuffer = () => {
  const data = [
    ['id', 'name'],
    [1, 'Alice'],
    [2, 'Bob']
  ];
  const sheet = XLSX.utils.aoa_to_sheet(data);
  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, sheet, 'Sheet1');
  return XLSX.write(wb, { type: 'buffer', bookType: 'xlsx' });
};

describe('ingestFileBuffer', () => {
  it('parses CSV into a header and text rows', () => {
    const csv = 'id,name\n1,Alice\n2,Bob';
    const ingested = ingestFileBuffer(Buffer.from(csv), 'people.csv');
    expect(ingested.name).toBe('people');
    expect(ingested.source).toBe('csv');
    expect(ingested.table).toEqual({
      columns: ['id', 'name'],
      rows: [
        ['1', 'Alice'],
        ['2', 'Bob']
      ]
    });
  });

  it('strips a byte order mark and honours quotes', () => {
    const csv = '\uFEFFcode,label\n"A,1",x\n';
    const ingested = ingestFileBuffer(Buffer.from(csv), 'codes.csv');
    expect(ingested.table).toEqual({ columns: ['code', 'label'], rows: [['A,1', 'x']] });
  });

  it('reads a single-column file', () => {
    const ingested = ingestFileBuffer(Buffer.from('id\n1\n2'), 'ids.txt');
    expect(ingested.table).toEqual({ columns: ['id'], rows: [['1'], ['2']] });
  });

  it('parses XLSX', () => {
    const buffer = makeWorkbookBuffer();
    const ingested = ingestFileBuffer(Buffer.from(buffer), 'employees.xlsx');
    expect(ingested.name).toBe('employees');
    expect(ingested.source).toBe('excel');
    expect(ingested.table).toEqual({
      columns: ['id', 'name'],
      rows: [
        [1, 'Alice'],
        [2, 'Bob']
      ]
    });
  });

  it('parses JSON records and { columns, rows } tables', () => {
    const records = ingestFileBuffer(Buffer.from(JSON.stringify([{ id: 1 }, { id: 2, flag: true }])), 'items.json');
    expect(records.source).toBe('json');
    expect(records.table.columns).toEqual(['id', 'flag']);
    expect(records.table.rows).toEqual([
      [1, undefined],
      [2, true]
    ]);

    const grid = ingestFileBuffer(Buffer.from(JSON.stringify({ columns: ['a'], rows: [[1], [2]] })), 'grid.json');
    expect(grid.table).toEqual({ columns: ['a'], rows: [[1], [2]] });
  });

  it('rejects unreadable JSON and unsupported files', () => {
    expect(() => ingestFileBuffer(Buffer.from('{oops'), 'bad.json')).toThrow(IngestError);
    expect(() => ingestFileBuffer(Buffer.from('42'), 'number.json')).toThrow(/array of records/);
    expect(() => ingestFileBuffer(Buffer.from('x'), 'notes.pdf')).toThrow('Unsupported file type: notes.pdf');
  });
});

describe('recordsToTable', () => {
  it('orders columns by first appearance', () => {
    expect(recordsToTable([{ b: 1 }, { a: 2, b: 3 }])).toEqual({
      columns: ['b', 'a'],
      rows: [
        [1, undefined],
        [3, 2]
      ]
    });
  });
});
