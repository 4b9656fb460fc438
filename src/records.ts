import shapefile from 'shapefile';
import { parseCsv, type CsvTable } from './csv.js';
import type { ArchiveConfig } from './config.js';
import type { ZipEntry } from './zip.js';

export type CellValue = string | number | boolean | Date | null;

export type TableFormat = 'csv' | 'dbf';

/**
 * A settlement table found inside an archive.
 */
export interface SettlementTable {
  /** Entry path within the archive */
  path: string;
  format: TableFormat;
  columns: string[];
  rows: Array<Record<string, CellValue>>;
}

export interface TableSummary {
  path: string;
  rowCount: number;
  /** Column the settlement identifiers were read from, if any matched */
  idColumn: string | null;
  /** Distinct identifiers, sorted */
  settlementIds: string[];
  duplicateIds: string[];
  /** Rows with an empty or NA identifier */
  missingIds: number;
  populationColumn: string | null;
  populationTotal: number | null;
  derivedColumns: string[];
  /** Levels of low-cardinality, non-numeric columns */
  categoricalLevels: Record<string, string[]>;
}

const MISSING = new Set(['', 'na', 'n/a', 'nan', 'null']);

/** Code page dBase readers assume when no .cpg file names one. */
export const DEFAULT_DBF_ENCODING = 'windows-1252';

export function tableFormat(path: string): TableFormat | null {
  const lower = path.toLowerCase();
  if (lower.endsWith('.csv')) return 'csv';
  if (lower.endsWith('.dbf')) return 'dbf';
  return null;
}

/**
 * Parse every CSV and DBF entry into a table, in path order. A DBF is decoded
 * in the code page its sibling .cpg entry names.
 */
export async function readTables(entries: ZipEntry[]): Promise<SettlementTable[]> {
  const tables: SettlementTable[] = [];
  const sorted = [...entries].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  const byName = new Map(entries.map(e => [e.name.toLowerCase(), e]));

  for (const entry of sorted) {
    const format = tableFormat(entry.name);
    if (format === 'csv') {
      let parsed: CsvTable;
      try {
        parsed = parseCsv(entry.data.toString('utf8'));
      } catch (err) {
        throw new Error(`Cannot read ${entry.name}: ${err instanceof Error ? err.message : String(err)}`);
      }
      tables.push({ path: entry.name, format, columns: parsed.columns, rows: parsed.rows });
    } else if (format === 'dbf') {
      const cpg = byName.get(`${entry.name.slice(0, -'.dbf'.length)}.cpg`.toLowerCase());
      const { columns, rows } = await readDbf(entry.data, dbfEncoding(cpg?.data, entry.name));
      tables.push({ path: entry.name, format, columns, rows });
    }
  }

  return tables;
}

/**
 * Field names from a dBase header: 32-byte descriptors after the 32-byte
 * file header, terminated by 0x0d.
 */
export function dbfFieldNames(data: Buffer): string[] {
  if (data.length < 33) throw new Error('DBF header truncated');
  const headerLength = data.readUInt16LE(8);
  const names: string[] = [];
  for (let offset = 32; offset + 32 <= headerLength && data[offset] !== 0x0d; offset += 32) {
    const raw = data.subarray(offset, offset + 11);
    const end = raw.indexOf(0);
    names.push(raw.subarray(0, end === -1 ? 11 : end).toString('latin1'));
  }
  return names;
}

/**
 * Text encoding for a DBF from the contents of its .cpg file, e.g. "UTF-8",
 * "1252" or "ISO-8859-1".
 */
export function dbfEncoding(cpg: Buffer | undefined, table = 'table'): string {
  const label = cpg ? cpg.toString('latin1').trim() : '';
  if (!label) return DEFAULT_DBF_ENCODING;

  let encoding = label;
  if (label === '65001') encoding = 'utf-8';
  else if (/^\d+$/.test(label)) encoding = `windows-${label}`;
  try {
    return new TextDecoder(encoding).encoding;
  } catch {
    throw new Error(`Unsupported code page "${label}" for ${table}`);
  }
}

async function readDbf(
  data: Buffer,
  encoding: string,
): Promise<{ columns: string[]; rows: Array<Record<string, CellValue>> }> {
  const columns = dbfFieldNames(data);
  const source = await shapefile.openDbf(Uint8Array.from(data), { encoding });
  const rows: Array<Record<string, CellValue>> = [];

  while (true) {
    const result = await source.read();
    if (result.done) break;
    const row: Record<string, CellValue> = {};
    for (const column of columns) {
      row[column] = toCell(result.value?.[column]);
    }
    rows.push(row);
  }

  return { columns, rows };
}

function toCell(value: unknown): CellValue {
  if (value === undefined || value === null) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value;
  return String(value);
}

/**
 * Numeric reading of a cell; blanks and NA markers are null.
 */
export function parseNumber(value: CellValue): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;
  const text = value.trim();
  if (MISSING.has(text.toLowerCase())) return null;
  const n = Number(text);
  return Number.isFinite(n) ? n : null;
}

function cellText(value: CellValue | undefined): string | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value.toISOString().slice(0, 10);
  const text = String(value).trim();
  return text === '' ? null : text;
}

export function summarizeTable(table: SettlementTable, config: ArchiveConfig): TableSummary {
  const idColumn = config.idColumns.find(c => table.columns.includes(c)) ?? null;
  const populationColumn = config.populationColumns.find(c => table.columns.includes(c)) ?? null;

  const ids = new Set<string>();
  const dupes = new Set<string>();
  let missingIds = 0;
  if (idColumn) {
    for (const row of table.rows) {
      const id = cellText(row[idColumn]);
      if (id === null || MISSING.has(id.toLowerCase())) {
        missingIds++;
      } else if (ids.has(id)) {
        dupes.add(id);
      } else {
        ids.add(id);
      }
    }
  }

  let populationTotal: number | null = null;
  if (populationColumn) {
    populationTotal = 0;
    for (const row of table.rows) {
      populationTotal += parseNumber(row[populationColumn]) ?? 0;
    }
  }

  const categoricalLevels: Record<string, string[]> = {};
  for (const column of table.columns) {
    if (column === idColumn) continue;
    const levels = categoricalLevelsOf(table, column, config.maxLevels);
    if (levels) categoricalLevels[column] = levels;
  }

  return {
    path: table.path,
    rowCount: table.rows.length,
    idColumn,
    settlementIds: [...ids].sort(),
    duplicateIds: [...dupes].sort(),
    missingIds,
    populationColumn,
    populationTotal,
    derivedColumns: table.columns.filter(c => c.startsWith(config.derivedPrefix)),
    categoricalLevels,
  };
}

function categoricalLevelsOf(table: SettlementTable, column: string, maxLevels: number): string[] | null {
  const levels = new Set<string>();
  let numeric = true;
  for (const row of table.rows) {
    const value = row[column];
    if (value instanceof Date) return null;
    const text = cellText(value);
    if (text === null || MISSING.has(text.toLowerCase())) continue;
    if (parseNumber(value) === null) numeric = false;
    levels.add(text);
    if (levels.size > maxLevels) return null;
  }
  if (numeric || levels.size === 0) return null;
  return [...levels].sort();
}

export interface DerivedColumnReport {
  table: string;
  derived: string[];
  /** Columns absent from the raw tables that lack the derived prefix */
  violations: string[];
}

/**
 * Every cleaned column not present in the raw tables must carry the derived
 * prefix. Without raw tables nothing can be called computed, so only the
 * prefixed columns are listed.
 */
export function checkDerivedColumns(
  cleaned: SettlementTable[],
  raw: SettlementTable[] | null,
  prefix: string,
): DerivedColumnReport[] {
  const rawColumns = new Set(raw ? raw.flatMap(t => t.columns) : []);

  return cleaned.map(table => ({
    table: table.path,
    derived: table.columns.filter(c => c.startsWith(prefix)),
    violations: raw
      ? table.columns.filter(c => !rawColumns.has(c) && !c.startsWith(prefix))
      : [],
  }));
}
