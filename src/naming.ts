/**
 * Archive file naming convention.
 *
 *   kyc_ori_data_<City>_<Country>[_v<N>].zip
 *   kyc_cln_data_<City>_<Country>[_v<N>].zip
 *   kyc_settlement_population_extract_v<N>.zip
 *
 * City and country are single tokens (letters, digits, hyphens). An unsuffixed
 * city archive is version 1.
 */

export type SurveyKind = 'original' | 'cleaned';

export interface SurveyArchiveName {
  kind: SurveyKind;
  city: string;
  country: string;
  version: number;
}

export interface PopulationArchiveName {
  kind: 'population';
  version: number;
}

export type ArchiveName = SurveyArchiveName | PopulationArchiveName;

const KIND_CODES: Record<SurveyKind, string> = {
  original: 'ori',
  cleaned: 'cln',
};

const SURVEY_RE = /^kyc_(ori|cln)_data_([\p{L}\p{N}-]+)_([\p{L}\p{N}-]+?)(?:_v([1-9]\d*))?\.zip$/u;
const POPULATION_RE = /^kyc_settlement_population_extract_v([1-9]\d*)\.zip$/;
const TOKEN_RE = /^[\p{L}\p{N}-]+$/u;

/**
 * Map a short kind code (`ori`, `cln`) or a full kind name to a SurveyKind.
 */
export function parseKind(code: string): SurveyKind | null {
  if (code === 'ori' || code === 'original') return 'original';
  if (code === 'cln' || code === 'cleaned') return 'cleaned';
  return null;
}

/**
 * Parse an archive file name. Returns null if it does not follow the convention.
 */
export function parseArchiveName(fileName: string): ArchiveName | null {
  const pop = fileName.match(POPULATION_RE);
  if (pop) {
    return { kind: 'population', version: parseInt(pop[1], 10) };
  }

  const m = fileName.match(SURVEY_RE);
  if (!m) return null;

  const kind = parseKind(m[1]);
  if (!kind) return null;
  const version = m[4] === undefined ? 1 : parseInt(m[4], 10);
  // _v1 is spelled without a suffix
  if (m[4] !== undefined && version < 2) return null;

  return { kind, city: m[2], country: m[3], version };
}

export function formatArchiveName(name: ArchiveName): string {
  if (!Number.isInteger(name.version) || name.version < 1) {
    throw new Error(`Invalid archive version: ${name.version}`);
  }
  if (name.kind === 'population') {
    return `kyc_settlement_population_extract_v${name.version}.zip`;
  }
  for (const token of [name.city, name.country]) {
    if (!TOKEN_RE.test(token)) {
      throw new Error(`Invalid name token "${token}": use letters, digits and hyphens only`);
    }
  }
  const suffix = name.version > 1 ? `_v${name.version}` : '';
  return `kyc_${KIND_CODES[name.kind]}_data_${name.city}_${name.country}${suffix}.zip`;
}

export function nextVersion<T extends ArchiveName>(name: T): T {
  return { ...name, version: name.version + 1 };
}

/**
 * The raw archive for a cleaned one, and the other way round (same version).
 */
export function counterpart(name: SurveyArchiveName): SurveyArchiveName {
  return { ...name, kind: name.kind === 'original' ? 'cleaned' : 'original' };
}

/** Key grouping the raw and cleaned archives of one city. */
export function cityKey(name: SurveyArchiveName): string {
  return `${name.city}_${name.country}`;
}

export function describeArchiveName(name: ArchiveName): string {
  if (name.kind === 'population') return `population reference v${name.version}`;
  return `${name.kind} ${name.city}, ${name.country} v${name.version}`;
}
