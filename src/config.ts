import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { isMissingFile } from './checksum.js';

export const CONFIG_FILE = 'KYC_ARCHIVE.json';

/**
 * Names never packed into an archive and ignored when scanning a data root.
 */
export const DEFAULT_EXCLUDE = [
  '.git',
  '.DS_Store',
  '__MACOSX',
  'Thumbs.db',
  'node_modules',
] as const;

/**
 * Optional KYC_ARCHIVE.json, merged over the defaults below.
 */
export const ArchiveConfigSchema = z.object({
  /** Prefix every computed column name must carry */
  derivedPrefix: z.string().min(1).default('calc_'),
  /** Candidate settlement identifier columns, first match wins */
  idColumns: z.array(z.string().min(1)).nonempty().default(['settlement_id', 'Id', 'ID', 'id']),
  /** Candidate population columns, first match wins */
  populationColumns: z.array(z.string().min(1)).nonempty().default(['kyc_pop', 'population', 'calc_population']),
  /** Columns with more distinct values than this are not reported as categorical */
  maxLevels: z.number().int().positive().default(25),
  /** Extra file or directory names to skip when packing */
  exclude: z.array(z.string().min(1)).default([]),
}).strict();

export type ArchiveConfig = z.infer<typeof ArchiveConfigSchema>;

export function defaultConfig(): ArchiveConfig {
  return ArchiveConfigSchema.parse({});
}

/**
 * Read KYC_ARCHIVE.json from a directory.
 * Missing file means defaults; an invalid file throws.
 */
export async function loadConfig(dir: string): Promise<ArchiveConfig> {
  const configPath = join(dir, CONFIG_FILE);
  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) return defaultConfig();
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new Error(`Invalid JSON in ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const parsed = ArchiveConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid ${CONFIG_FILE}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function excludeSet(config: ArchiveConfig): Set<string> {
  return new Set<string>([...DEFAULT_EXCLUDE, ...config.exclude]);
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
