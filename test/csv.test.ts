import { describe, it } from 'node:test';
import assert from 'node:assert';
import { parseCsv, parseRecords } from '../src/csv.js';

describe('csv', () => {
  it('should parse a header and rows', () => {
    const table = parseCsv('settlement_id,name,calc_density\nGH-001,Old Fadama,12.5\nGH-002,Agbogbloshie,8\n');
    assert.deepStrictEqual(table.columns, ['settlement_id', 'name', 'calc_density']);
    assert.deepStrictEqual(table.rows, [
      { settlement_id: 'GH-001', name: 'Old Fadama', calc_density: '12.5' },
      { settlement_id: 'GH-002', name: 'Agbogbloshie', calc_density: '8' },
    ]);
  });

  it('should handle quoted fields with delimiters, quotes and newlines', () => {
    const records = parseRecords('a,b\n"x, y","say ""hi"""\n"multi\nline",z');
    assert.deepStrictEqual(records, [
      ['a', 'b'],
      ['x, y', 'say "hi"'],
      ['multi\nline', 'z'],
    ]);
  });

  it('should handle CRLF, a BOM and blank lines', () => {
    const table = parseCsv('\uFEFFid,tenure\r\n1,owner\r\n\r\n2,tenant\r\n');
    assert.deepStrictEqual(table.columns, ['id', 'tenure']);
    assert.deepStrictEqual(table.rows.map(r => r.tenure), ['owner', 'tenant']);
  });

  it('should keep empty fields', () => {
    assert.deepStrictEqual(parseRecords('a,,c\n,,\n'), [['a', '', 'c'], ['', '', '']]);
  });

  it('should return an empty table for empty input', () => {
    assert.deepStrictEqual(parseCsv(''), { columns: [], rows: [] });
  });

  it('should reject rows with the wrong number of fields', () => {
    assert.throws(() => parseCsv('a,b\n1,2,3\n'), /CSV row 2 has 3 fields, expected 2/);
  });

  it('should reject duplicate columns', () => {
    assert.throws(() => parseCsv('id,id\n1,2\n'), /Duplicate CSV column: id/);
  });

  it('should reject an unterminated quote', () => {
    assert.throws(() => parseRecords('a\n"open'), /Unterminated quoted field/);
  });
});
