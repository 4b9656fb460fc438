import { readFile, writeFile, mkdir, readdir, stat } from 'node:fs/promises';
import { join, dirname, basename, relative, sep } from 'node:path';
import { pack, extract, type ZipEntry } from './zip.js';
import { sha256, contentChecksum, isMissingFile } from './checksum.js';
import { defaultConfig, excludeSet, type ArchiveConfig } from './config.js';
import { formatArchiveName, nextVersion, parseArchiveName, type ArchiveName } from './naming.js';
import type { ArchiveManifest, FileEntry } from './manifest.js';

export interface LoadedArchive {
  manifest: ArchiveManifest;
  entries: ZipEntry[];
}

function buildManifest(fileName: string, bytes: Buffer, entries: ZipEntry[]): ArchiveManifest {
  const files: FileEntry[] = entries
    .map(e => ({ path: e.name, sha256: sha256(e.data), size: e.data.length }))
    .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));

  return {
    fileName,
    name: parseArchiveName(fileName),
    sha256: sha256(bytes),
    size: bytes.length,
    contentChecksum: contentChecksum(files),
    entries: files,
  };
}

/**
 * Read an archive into memory and check every entry. Throws on corruption.
 */
export async function readArchive(archivePath: string): Promise<LoadedArchive> {
  const bytes = await readFile(archivePath);
  const entries = extract(bytes);
  return { manifest: buildManifest(basename(archivePath), bytes, entries), entries };
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (err) {
    if (isMissingFile(err)) return false;
    throw err;
  }
}

/**
 * Extract an archive into a directory that must not exist yet.
 * Every entry is read and CRC-checked before anything is written.
 */
export async function extractArchive(opts: {
  archivePath: string;
  outputPath: string;
  overwrite?: boolean;
  dryRun?: boolean;
}): Promise<ArchiveManifest> {
  const { archivePath, outputPath, overwrite, dryRun } = opts;

  const { manifest, entries } = await readArchive(archivePath);

  if (!dryRun) {
    if (!overwrite && await exists(outputPath)) {
      throw new Error(`Destination already exists: ${outputPath} (use --overwrite to accept)`);
    }
    await mkdir(outputPath, { recursive: true });
    for (const entry of entries) {
      const filePath = join(outputPath, ...entry.name.split('/'));
      await mkdir(dirname(filePath), { recursive: true });
      await writeFile(filePath, entry.data, { flag: overwrite ? 'w' : 'wx' });
    }
  }

  return manifest;
}

async function walkDir(dirPath: string, exclude: Set<string>): Promise<string[]> {
  const results: string[] = [];
  const entries = await readdir(dirPath, { withFileTypes: true });
  for (const entry of entries) {
    if (exclude.has(entry.name)) continue;
    const full = join(dirPath, entry.name);
    if (entry.isDirectory()) {
      results.push(...await walkDir(full, exclude));
    } else if (entry.isFile()) {
      results.push(full);
    }
  }
  return results;
}

/**
 * Collect a directory's files as archive entries (posix paths, sorted).
 */
export async function collectEntries(sourceDir: string, config: ArchiveConfig = defaultConfig()): Promise<ZipEntry[]> {
  const files = await walkDir(sourceDir, excludeSet(config));
  const entries: ZipEntry[] = [];
  for (const full of files.sort()) {
    entries.push({
      name: relative(sourceDir, full).split(sep).join('/'),
      data: await readFile(full),
    });
  }
  return entries;
}

export interface RepackageResult {
  outputPath: string;
  manifest: ArchiveManifest;
  /** Archive this one supersedes, when given */
  previous: string | null;
}

async function nextFreeName(start: ArchiveName, dirs: string[]): Promise<ArchiveName> {
  let candidate = start;
  for (;;) {
    const fileName = formatArchiveName(candidate);
    let taken = false;
    for (const dir of dirs) {
      if (await exists(join(dir, fileName))) taken = true;
    }
    if (!taken) return candidate;
    candidate = nextVersion(candidate);
  }
}

/**
 * Pack a directory into a new archive. Never overwrites an existing archive:
 * a correction always lands under a new name or version.
 */
export async function repackageArchive(opts: {
  sourceDir: string;
  outputDir: string;
  name?: ArchiveName;
  supersedes?: string;
  config?: ArchiveConfig;
}): Promise<RepackageResult> {
  const { sourceDir, outputDir, supersedes, config = defaultConfig() } = opts;

  let target: ArchiveName;
  if (supersedes) {
    const previousName = parseArchiveName(basename(supersedes));
    if (!previousName) {
      throw new Error(`Cannot supersede ${basename(supersedes)}: name does not follow the archive convention`);
    }
    if (!await exists(supersedes)) {
      throw new Error(`Archive to supersede not found: ${supersedes}`);
    }
    target = await nextFreeName(nextVersion(previousName), [outputDir, dirname(supersedes)]);
  } else if (opts.name) {
    target = opts.name;
  } else {
    throw new Error('Either a target archive name or an archive to supersede is required');
  }

  const fileName = formatArchiveName(target);
  const outputPath = join(outputDir, fileName);
  if (await exists(outputPath)) {
    throw new Error(`Refusing to overwrite existing archive: ${outputPath}`);
  }

  const entries = await collectEntries(sourceDir, config);
  if (entries.length === 0) {
    throw new Error(`No files found in ${sourceDir}`);
  }

  const bytes = pack(entries);
  await mkdir(outputDir, { recursive: true });
  await writeFile(outputPath, bytes, { flag: 'wx' });

  return {
    outputPath,
    manifest: buildManifest(fileName, bytes, entries),
    previous: supersedes ?? null,
  };
}

export interface ArchiveComparison {
  a: ArchiveManifest;
  b: ArchiveManifest;
  /** Byte-for-byte the same file */
  identical: boolean;
  /** Same entries with the same contents, whatever the zip metadata */
  sameContent: boolean;
  /** In b, not in a */
  added: string[];
  /** In a, not in b */
  removed: string[];
  changed: string[];
}

export async function compareArchives(aPath: string, bPath: string): Promise<ArchiveComparison> {
  const { manifest: a } = await readArchive(aPath);
  const { manifest: b } = await readArchive(bPath);

  const aFiles = new Map(a.entries.map(e => [e.path, e.sha256]));
  const bFiles = new Map(b.entries.map(e => [e.path, e.sha256]));

  const added = [...bFiles.keys()].filter(p => !aFiles.has(p));
  const removed = [...aFiles.keys()].filter(p => !bFiles.has(p));
  const changed = [...aFiles.keys()].filter(p => bFiles.has(p) && bFiles.get(p) !== aFiles.get(p));

  return {
    a,
    b,
    identical: a.sha256 === b.sha256,
    sameContent: a.contentChecksum === b.contentChecksum,
    added,
    removed,
    changed,
  };
}
