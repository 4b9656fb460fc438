import { readFile, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import { formatIssues } from './config.js';
import type { TableSummary } from './records.js';

/**
 * Figures recorded when an archive was last checked by hand.
 */
export const QaNoteSchema = z.object({
  archive: z.string().min(1),
  sha256: z.string().regex(/^[0-9a-f]{64}$/),
  validatedAt: z.string().datetime({ offset: true }),
  validatedBy: z.string().min(1).optional(),
  /** Table entry the figures refer to; the first table when absent */
  table: z.string().min(1).optional(),
  rowCount: z.number().int().nonnegative(),
  settlementIds: z.array(z.string()),
  populationTotal: z.number().nonnegative().optional(),
});

export type QaNote = z.infer<typeof QaNoteSchema>;

export async function readQaNote(notePath: string): Promise<QaNote> {
  const content = await readFile(notePath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new Error(`Invalid JSON in ${notePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = QaNoteSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid QA note ${notePath}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function createQaNote(opts: {
  archive: string;
  sha256: string;
  summary: TableSummary;
  validatedBy?: string;
  now?: Date;
}): QaNote {
  const { archive, sha256, summary, validatedBy, now = new Date() } = opts;
  const note: QaNote = {
    archive,
    sha256,
    validatedAt: now.toISOString(),
    table: summary.path,
    rowCount: summary.rowCount,
    settlementIds: summary.settlementIds,
  };
  if (validatedBy) note.validatedBy = validatedBy;
  if (summary.populationTotal !== null) note.populationTotal = summary.populationTotal;
  return note;
}

/** Writes a new note; an existing note is never replaced. */
export async function writeQaNote(notePath: string, note: QaNote): Promise<void> {
  await writeFile(notePath, JSON.stringify(note, null, 2) + '\n', { flag: 'wx' });
}

export type Discrepancy =
  | { field: 'sha256'; expected: string; actual: string }
  | { field: 'rowCount'; expected: number; actual: number }
  | { field: 'settlementIds'; missing: string[]; unexpected: string[] }
  | { field: 'populationTotal'; expected: number; actual: number | null };

/**
 * Differences between an archive's current figures and its QA note.
 * An empty list means the figures match; judging them is still the operator's job.
 */
export function compareWithQaNote(summary: TableSummary, sha256: string, note: QaNote): Discrepancy[] {
  const found: Discrepancy[] = [];

  if (sha256 !== note.sha256) {
    found.push({ field: 'sha256', expected: note.sha256, actual: sha256 });
  }
  if (summary.rowCount !== note.rowCount) {
    found.push({ field: 'rowCount', expected: note.rowCount, actual: summary.rowCount });
  }

  const current = new Set(summary.settlementIds);
  const recorded = new Set(note.settlementIds);
  const missing = [...recorded].filter(id => !current.has(id)).sort();
  const unexpected = [...current].filter(id => !recorded.has(id)).sort();
  if (missing.length > 0 || unexpected.length > 0) {
    found.push({ field: 'settlementIds', missing, unexpected });
  }

  if (note.populationTotal !== undefined && summary.populationTotal !== note.populationTotal) {
    found.push({ field: 'populationTotal', expected: note.populationTotal, actual: summary.populationTotal });
  }

  return found;
}

export function describeDiscrepancy(d: Discrepancy): string {
  switch (d.field) {
    case 'sha256':
      return `digest changed: expected ${d.expected.slice(0, 16)}..., got ${d.actual.slice(0, 16)}...`;
    case 'rowCount':
      return `row count: expected ${d.expected}, got ${d.actual}`;
    case 'settlementIds': {
      const parts: string[] = [];
      if (d.missing.length > 0) parts.push(`missing ${d.missing.join(', ')}`);
      if (d.unexpected.length > 0) parts.push(`unexpected ${d.unexpected.join(', ')}`);
      return `settlement ids: ${parts.join('; ')}`;
    }
    case 'populationTotal':
      return `population total: expected ${d.expected}, got ${d.actual ?? 'none'}`;
  }
}
