/**
 * Zip read/write on top of adm-zip.
 * Regular files only; directory entries are dropped on read and never written.
 */

import AdmZip from 'adm-zip';

export interface ZipEntry {
  name: string;
  data: Buffer;
}

/**
 * Timestamp stamped on every packed entry (DOS epoch), so the same files
 * always pack to the same bytes.
 */
export const FIXED_MTIME = new Date(1980, 0, 1, 0, 0, 0);

/**
 * Reject names that would escape the extraction directory.
 */
export function assertSafeEntryName(name: string): void {
  const normalized = name.replace(/\\/g, '/');
  if (!normalized || normalized.startsWith('/') || /^[A-Za-z]:/.test(normalized)) {
    throw new Error(`Unsafe entry path in archive: ${name}`);
  }
  if (normalized.split('/').some(part => part === '..')) {
    throw new Error(`Unsafe entry path in archive: ${name}`);
  }
}

/**
 * Pack entries into a zip buffer. adm-zip orders the entries itself when it
 * writes them (by name, ignoring case), whatever order they are added in.
 */
export function pack(entries: ZipEntry[]): Buffer {
  const zip = new AdmZip();
  const sorted = [...entries].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const seen = new Set<string>();
  for (const entry of sorted) {
    assertSafeEntryName(entry.name);
    if (seen.has(entry.name)) throw new Error(`Duplicate entry: ${entry.name}`);
    seen.add(entry.name);

    zip.addFile(entry.name, entry.data);
    const added = zip.getEntry(entry.name);
    if (!added) throw new Error(`Failed to add entry: ${entry.name}`);
    added.header.time = FIXED_MTIME;
  }

  return zip.toBuffer();
}

/**
 * Extract regular file entries from a zip buffer. adm-zip checks each entry's
 * CRC as it inflates; any structural or CRC failure throws "Corrupt archive".
 */
export function extract(buffer: Buffer): ZipEntry[] {
  let zip: AdmZip;
  try {
    zip = new AdmZip(buffer);
  } catch (err) {
    throw new Error(`Corrupt archive: ${describe(err)}`);
  }

  const entries: ZipEntry[] = [];
  for (const entry of zip.getEntries()) {
    if (entry.isDirectory) continue;
    assertSafeEntryName(entry.entryName);

    let data: Buffer;
    try {
      data = entry.getData();
    } catch (err) {
      throw new Error(`Corrupt archive: ${entry.entryName}: ${describe(err)}`);
    }
    if (data.length !== entry.header.size) {
      throw new Error(`Corrupt archive: ${entry.entryName}: expected ${entry.header.size} bytes, got ${data.length}`);
    }
    entries.push({ name: entry.entryName, data });
  }

  return entries;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
