export interface DbfField {
  name: string;
  type: 'C' | 'N';
  length: number;
  decimals?: number;
}

/**
 * Build a dBase III table: 32-byte header, one 32-byte descriptor per field,
 * 0x0d terminator, fixed-width records, 0x1a end marker. Text is written in
 * latin1 unless another encoding is given.
 */
export function buildDbf(
  fields: DbfField[],
  rows: Array<Array<string | number | null>>,
  encoding: 'latin1' | 'utf8' = 'latin1',
): Buffer {
  const headerLength = 32 + fields.length * 32 + 1;
  const recordLength = 1 + fields.reduce((sum, f) => sum + f.length, 0);
  const buf = Buffer.alloc(headerLength + rows.length * recordLength + 1, 0);

  buf[0] = 0x03;
  buf[1] = 126;
  buf[2] = 1;
  buf[3] = 1;
  buf.writeUInt32LE(rows.length, 4);
  buf.writeUInt16LE(headerLength, 8);
  buf.writeUInt16LE(recordLength, 10);

  fields.forEach((f, i) => {
    const offset = 32 + i * 32;
    buf.write(f.name, offset, 10, 'latin1');
    buf.write(f.type, offset + 11, 1, 'latin1');
    buf[offset + 16] = f.length;
    buf[offset + 17] = f.decimals ?? 0;
  });
  buf[headerLength - 1] = 0x0d;

  rows.forEach((row, r) => {
    let offset = headerLength + r * recordLength;
    buf[offset++] = 0x20;
    fields.forEach((f, i) => {
      const value = row[i];
      const text = value === null ? '' : String(value);
      const bytes = Buffer.from(text, encoding).subarray(0, f.length);
      const cell = Buffer.alloc(f.length, 0x20);
      bytes.copy(cell, f.type === 'N' ? f.length - bytes.length : 0);
      cell.copy(buf, offset);
      offset += f.length;
    });
  });
  buf[buf.length - 1] = 0x1a;

  return buf;
}

/** The attribute table layout the settlement downloader writes. */
export const SETTLEMENT_FIELDS: DbfField[] = [
  { name: 'Id', type: 'N', length: 6 },
  { name: 'Country', type: 'C', length: 20 },
  { name: 'City', type: 'C', length: 20 },
  { name: 'Settlement', type: 'C', length: 30 },
  { name: 'kyc_pop', type: 'N', length: 12 },
];
