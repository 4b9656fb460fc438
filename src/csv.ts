/**
 * Minimal CSV reader (RFC 4180): quoted fields, doubled quotes, CRLF or LF,
 * leading BOM. Enough for survey table exports.
 */

export interface CsvTable {
  columns: string[];
  rows: Array<Record<string, string>>;
}

/**
 * Split CSV text into records of raw field strings.
 */
export function parseRecords(text: string, delimiter = ','): string[][] {
  const input = text.replace(/^\uFEFF/, '');
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let quoted = false;
  let i = 0;

  while (i < input.length) {
    const ch = input[i];

    if (quoted) {
      if (ch === '"') {
        if (input[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        quoted = false;
        i++;
        continue;
      }
      field += ch;
      i++;
      continue;
    }

    if (ch === '"' && field === '') {
      quoted = true;
      i++;
    } else if (ch === delimiter) {
      record.push(field);
      field = '';
      i++;
    } else if (ch === '\r' || ch === '\n') {
      record.push(field);
      records.push(record);
      record = [];
      field = '';
      i += ch === '\r' && input[i + 1] === '\n' ? 2 : 1;
    } else {
      field += ch;
      i++;
    }
  }

  if (quoted) throw new Error('Unterminated quoted field');

  // last line without trailing newline
  if (field !== '' || record.length > 0) {
    record.push(field);
    records.push(record);
  }

  // blank lines carry no record
  return records.filter(r => !(r.length === 1 && r[0] === ''));
}

/**
 * Parse CSV text with a header row into keyed rows.
 */
export function parseCsv(text: string, delimiter = ','): CsvTable {
  const [header, ...body] = parseRecords(text, delimiter);
  if (!header) return { columns: [], rows: [] };

  const columns = header.map(c => c.trim());
  const dupes = columns.filter((c, i) => columns.indexOf(c) !== i);
  if (dupes.length > 0) throw new Error(`Duplicate CSV column: ${dupes[0]}`);

  const rows = body.map((fields, n) => {
    if (fields.length !== columns.length) {
      throw new Error(`CSV row ${n + 2} has ${fields.length} fields, expected ${columns.length}`);
    }
    const row: Record<string, string> = {};
    columns.forEach((c, i) => { row[c] = fields[i]; });
    return row;
  });

  return { columns, rows };
}
