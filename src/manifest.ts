import type { ArchiveName } from './naming.js';

/**
 * What the tool knows about one archive on disk.
 */
export interface ArchiveManifest {
  /** Base file name */
  fileName: string;
  /** Parsed name, or null if the file name breaks the convention */
  name: ArchiveName | null;
  /** SHA-256 hex digest of the archive bytes */
  sha256: string;
  /** Archive size in bytes */
  size: number;
  /** SHA-256 of all entry checksums in path order (stable across re-zipping) */
  contentChecksum: string;
  /** Entries with their checksums, in path order */
  entries: FileEntry[];
}

export interface FileEntry {
  /** Relative path within the archive */
  path: string;
  /** SHA-256 hex digest of the entry contents */
  sha256: string;
  /** Uncompressed size in bytes */
  size: number;
}
