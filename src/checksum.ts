import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { readFile, stat } from 'node:fs/promises';
import { basename, dirname, isAbsolute, join } from 'node:path';
import { z } from 'zod';

/**
 * Compute SHA-256 hex digest of a file, streaming it from disk.
 */
export async function sha256File(filePath: string): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

/**
 * Compute SHA-256 hex digest of a buffer.
 */
export function sha256(data: Buffer | string): string {
  return createHash('sha256').update(data).digest('hex');
}

/**
 * Checksum over an archive's contents rather than its bytes.
 * Sorts by path, concatenates checksums, hashes the result, so re-zipping the
 * same files with different compressor metadata gives the same value.
 */
export function contentChecksum(files: Array<{ path: string; sha256: string }>): string {
  const sorted = [...files].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  const concat = sorted.map(f => f.sha256).join('');
  return sha256(concat);
}

export interface ArchiveDigest {
  path: string;
  sha256: string;
  size: number;
}

export async function digestArchives(paths: string[]): Promise<ArchiveDigest[]> {
  const digests: ArchiveDigest[] = [];
  for (const path of paths) {
    const s = await stat(path);
    if (!s.isFile()) throw new Error(`Not a file: ${path}`);
    digests.push({ path, sha256: await sha256File(path), size: s.size });
  }
  return digests;
}

// ── sha256sum line format ───────────────────────────────────────────────

const HEX_DIGEST = z.string().regex(/^[0-9a-f]{64}$/, 'expected a 64-character lowercase hex digest');

export const ChecksumLineSchema = z.object({
  sha256: HEX_DIGEST,
  fileName: z.string().min(1),
});

export type ChecksumLine = z.infer<typeof ChecksumLineSchema>;

/** `<hex>  <file>`, the text-mode line `sha256sum` prints. */
export function formatChecksumLine(line: ChecksumLine): string {
  return `${line.sha256}  ${line.fileName}`;
}

/**
 * Parse a checksum list. Accepts text (`  `) and binary (` *`) separators,
 * uppercase digests, blank lines and `#` comments.
 */
export function parseChecksumList(text: string): ChecksumLine[] {
  const lines: ChecksumLine[] = [];
  const rows = text.replace(/^\uFEFF/, '').split(/\r?\n/);
  rows.forEach((raw, i) => {
    const row = raw.trim();
    if (!row || row.startsWith('#')) return;
    const m = row.match(/^([0-9a-fA-F]+) [ *](.+)$/);
    const parsed = ChecksumLineSchema.safeParse(m ? { sha256: m[1].toLowerCase(), fileName: m[2] } : {});
    if (!parsed.success) {
      throw new Error(`Malformed checksum line ${i + 1}: ${row}`);
    }
    lines.push(parsed.data);
  });
  return lines;
}

export type ChecksumStatus = 'ok' | 'mismatch' | 'missing';

export interface ChecksumResult {
  fileName: string;
  expected: string;
  actual: string | null;
  status: ChecksumStatus;
}

/**
 * Re-hash every file a checksum list names, relative to the list's directory.
 */
export async function verifyChecksumList(listPath: string): Promise<ChecksumResult[]> {
  const lines = parseChecksumList(await readFile(listPath, 'utf8'));
  const base = dirname(listPath);
  const results: ChecksumResult[] = [];

  for (const line of lines) {
    const filePath = isAbsolute(line.fileName) ? line.fileName : join(base, line.fileName);
    let actual: string | null;
    try {
      actual = await sha256File(filePath);
    } catch (err) {
      if (isMissingFile(err)) {
        results.push({ fileName: line.fileName, expected: line.sha256, actual: null, status: 'missing' });
        continue;
      }
      throw err;
    }
    results.push({
      fileName: line.fileName,
      expected: line.sha256,
      actual,
      status: actual === line.sha256 ? 'ok' : 'mismatch',
    });
  }

  return results;
}

/** Render digests as a checksum list, using base names like `sha256sum kyc_*zip`. */
export function renderChecksumList(digests: ArchiveDigest[]): string {
  return digests.map(d => formatChecksumLine({ sha256: d.sha256, fileName: basename(d.path) })).join('\n') + '\n';
}

export function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
