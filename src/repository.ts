import { readdir, stat } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { isMissingFile } from './checksum.js';
import { CONFIG_FILE, DEFAULT_EXCLUDE } from './config.js';
import { cityKey, counterpart, formatArchiveName, parseArchiveName, type ArchiveName } from './naming.js';

/**
 * Files a data root may hold besides archives.
 */
export const KNOWN_FILES = new Set(['README.md', 'SHA256SUMS', CONFIG_FILE]);

export interface ArchiveFile {
  fileName: string;
  name: ArchiveName;
  size: number;
}

export interface CityPair {
  city: string;
  country: string;
  /** Latest version of each side, or null if missing */
  original: ArchiveFile | null;
  cleaned: ArchiveFile | null;
}

export interface RepositoryScan {
  root: string;
  archives: ArchiveFile[];
  /** Zip files whose names break the convention */
  nonConforming: string[];
  /** Anything else that is not an archive or a known file */
  stray: string[];
  /** Nested directories; the layout is meant to be flat */
  directories: string[];
  cities: CityPair[];
}

/**
 * List a flat data root and pair raw and cleaned archives per city.
 * QA notes (`*.qa.json`) sit beside their archives and are not stray.
 */
export async function scanRepository(root: string): Promise<RepositoryScan> {
  const entries = await readdir(root, { withFileTypes: true });
  const ignored = new Set<string>(DEFAULT_EXCLUDE);

  const archives: ArchiveFile[] = [];
  const nonConforming: string[] = [];
  const stray: string[] = [];
  const directories: string[] = [];

  for (const entry of [...entries].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))) {
    if (ignored.has(entry.name)) continue;
    if (entry.isDirectory()) {
      directories.push(entry.name);
      continue;
    }
    if (!entry.isFile()) continue;

    const name = parseArchiveName(entry.name);
    if (name) {
      const s = await stat(join(root, entry.name));
      archives.push({ fileName: entry.name, name, size: s.size });
    } else if (entry.name.toLowerCase().endsWith('.zip')) {
      nonConforming.push(entry.name);
    } else if (!KNOWN_FILES.has(entry.name) && !entry.name.endsWith('.qa.json')) {
      stray.push(entry.name);
    }
  }

  return { root, archives, nonConforming, stray, directories, cities: pairCities(archives) };
}

export function pairCities(archives: ArchiveFile[]): CityPair[] {
  const pairs = new Map<string, CityPair>();

  for (const archive of archives) {
    const name = archive.name;
    if (name.kind === 'population') continue;

    const key = cityKey(name);
    let pair = pairs.get(key);
    if (!pair) {
      pair = { city: name.city, country: name.country, original: null, cleaned: null };
      pairs.set(key, pair);
    }
    const current = pair[name.kind];
    if (!current || current.name.version < name.version) {
      pair[name.kind] = archive;
    }
  }

  return [...pairs.values()].sort((a, b) => {
    const ka = `${a.country}/${a.city}`;
    const kb = `${b.country}/${b.city}`;
    return ka < kb ? -1 : ka > kb ? 1 : 0;
  });
}

/** Latest population reference archive, if any. */
export function latestPopulationArchive(archives: ArchiveFile[]): ArchiveFile | null {
  let latest: ArchiveFile | null = null;
  for (const archive of archives) {
    if (archive.name.kind !== 'population') continue;
    if (!latest || archive.name.version > latest.name.version) latest = archive;
  }
  return latest;
}

/**
 * The raw archive beside a cleaned one, or the reverse: same version first,
 * then version 1.
 */
export async function findCounterpart(archivePath: string): Promise<string | null> {
  const name = parseArchiveName(basename(archivePath));
  if (!name || name.kind === 'population') return null;

  const other = counterpart(name);
  for (const candidate of [other, { ...other, version: 1 }]) {
    const path = join(dirname(archivePath), formatArchiveName(candidate));
    try {
      if ((await stat(path)).isFile()) return path;
    } catch (err) {
      if (!isMissingFile(err)) throw err;
    }
  }
  return null;
}
