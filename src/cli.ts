#!/usr/bin/env node
/**
 * kyca: care of Know Your City settlement survey archives.
 *
 *   kyca list <root>
 *   kyca extract <archive.zip> <dest-dir> [--overwrite] [--dry-run]
 *   kyca hash <archive.zip...> [--write <SHA256SUMS>]
 *   kyca check <SHA256SUMS>
 *   kyca compare <a.zip> <b.zip>
 *   kyca inspect <archive.zip>
 *   kyca summarize <archive.zip>
 *   kyca lint <cleaned.zip> [--raw <original.zip>]
 *   kyca repackage <dir> <output-dir> (--supersedes <previous.zip> | --kind <ori|cln> --city <City> --country <Country> [--version <n>])
 *   kyca qa <archive.zip> <note.json>
 *   kyca note <archive.zip> <note.json> [--by <name>] [--table <entry>]
 */

import { writeFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { compareArchives, extractArchive, readArchive, repackageArchive } from './archive.js';
import { digestArchives, formatChecksumLine, renderChecksumList, verifyChecksumList } from './checksum.js';
import { loadConfig, type ArchiveConfig } from './config.js';
import { describeArchiveName, parseArchiveName, parseKind, type ArchiveName } from './naming.js';
import { checkDerivedColumns, readTables, summarizeTable, type SettlementTable, type TableSummary } from './records.js';
import { compareWithQaNote, createQaNote, describeDiscrepancy, readQaNote, writeQaNote } from './qa.js';
import { findCounterpart, latestPopulationArchive, scanRepository } from './repository.js';

const VALUE_FLAGS = new Set(['--write', '--raw', '--supersedes', '--kind', '--city', '--country', '--version', '--by', '--table']);

function getFlag(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  return idx >= 0 ? args[idx + 1] : undefined;
}

/** Arguments that are neither flags nor flag values. */
function positionals(args: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (VALUE_FLAGS.has(args[i])) {
      i++;
    } else if (!args[i].startsWith('--')) {
      out.push(args[i]);
    }
  }
  return out;
}

function usage(line: string): never {
  console.error(`Usage: kyca ${line}`);
  process.exit(1);
}

function kb(bytes: number): string {
  return (bytes / 1024).toFixed(1);
}

async function tablesOf(archivePath: string): Promise<{ sha256: string; fileName: string; tables: SettlementTable[] }> {
  const { manifest, entries } = await readArchive(archivePath);
  return { sha256: manifest.sha256, fileName: manifest.fileName, tables: await readTables(entries) };
}

function pickTable(tables: SettlementTable[], wanted: string | undefined, archivePath: string): SettlementTable {
  if (tables.length === 0) throw new Error(`No CSV or DBF tables in ${archivePath}`);
  if (!wanted) return tables[0];
  const table = tables.find(t => t.path === wanted);
  if (!table) throw new Error(`No table ${wanted} in ${archivePath}`);
  return table;
}

function printSummary(s: TableSummary): void {
  console.log(`  ${s.path}`);
  console.log(`    Rows: ${s.rowCount}`);
  if (s.idColumn) {
    console.log(`    Settlements: ${s.settlementIds.length} (column ${s.idColumn})`);
    if (s.duplicateIds.length > 0) console.log(`    ⚠ Duplicate ids: ${s.duplicateIds.join(', ')}`);
    if (s.missingIds > 0) console.log(`    ⚠ Rows without id: ${s.missingIds}`);
  } else {
    console.log(`    Settlements: no id column found`);
  }
  if (s.populationColumn) {
    console.log(`    Population: ${s.populationTotal} (column ${s.populationColumn})`);
  }
  if (s.derivedColumns.length > 0) {
    console.log(`    Derived: ${s.derivedColumns.join(', ')}`);
  }
  for (const [column, levels] of Object.entries(s.categoricalLevels)) {
    console.log(`    ${column}: ${levels.join(' | ')}`);
  }
}

// ── Commands ────────────────────────────────────────────────────────────

async function list(args: string[]): Promise<void> {
  const [root] = positionals(args);
  if (!root) usage('list <root>');

  const scan = await scanRepository(root);
  console.log(`${scan.root}: ${scan.archives.length} archive(s)\n`);
  for (const a of scan.archives) {
    console.log(`  ${a.fileName.padEnd(52)} ${kb(a.size).padStart(10)} KB  ${describeArchiveName(a.name)}`);
  }

  const population = latestPopulationArchive(scan.archives);
  console.log(`\nPopulation reference: ${population ? population.fileName : 'none'}`);

  const unpaired = scan.cities.filter(c => !c.original || !c.cleaned);
  for (const c of unpaired) {
    console.warn(`⚠ ${c.city}, ${c.country}: ${c.original ? 'no cleaned extract' : 'no original extract'}`);
  }
  for (const f of scan.nonConforming) console.warn(`⚠ Non-conforming archive name: ${f}`);
  for (const f of scan.stray) console.warn(`⚠ Unexpected file: ${f}`);
  for (const d of scan.directories) console.warn(`⚠ Nested directory (root should be flat): ${d}/`);
}

async function extract(args: string[]): Promise<void> {
  const [archivePath, dest] = positionals(args);
  const overwrite = args.includes('--overwrite');
  const dryRun = args.includes('--dry-run');
  if (!archivePath || !dest) usage('extract <archive.zip> <dest-dir> [--overwrite] [--dry-run]');

  console.log(`${dryRun ? 'Dry run: ' : ''}Extracting ${archivePath} to ${dest}...`);
  const manifest = await extractArchive({ archivePath, outputPath: dest, overwrite, dryRun });
  console.log(`✓ ${dryRun ? 'Archive is readable' : 'Extracted'}: ${manifest.entries.length} file(s)`);
  console.log(`  SHA-256: ${manifest.sha256}`);
}

async function hash(args: string[]): Promise<void> {
  const paths = positionals(args);
  const writeTo = getFlag(args, '--write');
  if (paths.length === 0) usage('hash <archive.zip...> [--write <SHA256SUMS>]');

  const digests = await digestArchives(paths);
  for (const d of digests) {
    console.log(formatChecksumLine({ sha256: d.sha256, fileName: d.path }));
  }
  if (writeTo) {
    await writeFile(writeTo, renderChecksumList(digests));
    console.log(`✓ Wrote ${digests.length} checksum(s) to ${writeTo}`);
  }
}

async function check(args: string[]): Promise<void> {
  const [listPath] = positionals(args);
  if (!listPath) usage('check <SHA256SUMS>');

  const results = await verifyChecksumList(listPath);
  let failed = 0;
  for (const r of results) {
    if (r.status === 'ok') {
      console.log(`${r.fileName}: OK`);
    } else {
      failed++;
      console.error(`${r.fileName}: ${r.status === 'missing' ? 'MISSING' : 'FAILED'}`);
    }
  }
  if (failed > 0) {
    console.error(`✗ ${failed} of ${results.length} checksum(s) did not match`);
    process.exit(1);
  }
  console.log(`✓ ${results.length} checksum(s) verified`);
}

async function compare(args: string[]): Promise<void> {
  const [a, b] = positionals(args);
  if (!a || !b) usage('compare <a.zip> <b.zip>');

  const result = await compareArchives(a, b);
  console.log(`  ${result.a.sha256}  ${a}`);
  console.log(`  ${result.b.sha256}  ${b}`);
  if (result.identical) {
    console.log('✓ Byte-identical');
    return;
  }
  if (result.sameContent) {
    console.log('⚠ Bytes differ but contents match (zip metadata only)');
    return;
  }
  console.error('✗ Archives differ');
  for (const p of result.added) console.error(`  + ${p}`);
  for (const p of result.removed) console.error(`  - ${p}`);
  for (const p of result.changed) console.error(`  ~ ${p}`);
  process.exit(1);
}

async function inspect(args: string[]): Promise<void> {
  const [archivePath] = positionals(args);
  if (!archivePath) usage('inspect <archive.zip>');

  const { manifest } = await readArchive(archivePath);
  console.log(`Archive: ${manifest.fileName}`);
  console.log(`Name: ${manifest.name ? describeArchiveName(manifest.name) : '⚠ does not follow the naming convention'}`);
  console.log(`Size: ${kb(manifest.size)} KB`);
  console.log(`SHA-256: ${manifest.sha256}`);
  console.log(`Content checksum: ${manifest.contentChecksum}`);
  console.log(`\nFiles:`);
  for (const f of manifest.entries) {
    console.log(`  ${f.path.padEnd(40)} ${kb(f.size).padStart(8)} KB  ${f.sha256.slice(0, 12)}...`);
  }
}

async function summarize(args: string[], config: ArchiveConfig): Promise<void> {
  const [archivePath] = positionals(args);
  if (!archivePath) usage('summarize <archive.zip>');

  const { fileName, tables } = await tablesOf(archivePath);
  console.log(`${fileName}: ${tables.length} table(s)`);
  for (const table of tables) printSummary(summarizeTable(table, config));
}

async function lint(args: string[], config: ArchiveConfig): Promise<void> {
  const [cleanedPath] = positionals(args);
  if (!cleanedPath) usage('lint <cleaned.zip> [--raw <original.zip>]');
  const rawPath = getFlag(args, '--raw') ?? await findCounterpart(cleanedPath);

  const { fileName, tables } = await tablesOf(cleanedPath);
  if (rawPath) console.log(`Comparing columns with ${rawPath}`);
  const raw = rawPath ? (await tablesOf(rawPath)).tables : null;

  let problems = 0;
  if (!parseArchiveName(fileName)) {
    problems++;
    console.error(`  ✗ ${fileName}: name does not follow the archive convention`);
  }

  for (const report of checkDerivedColumns(tables, raw, config.derivedPrefix)) {
    console.log(`  ${report.table}: ${report.derived.length} derived column(s)`);
    for (const column of report.violations) {
      problems++;
      console.error(`  ✗ ${column}: not in the original extract and missing the ${config.derivedPrefix} prefix`);
    }
  }
  if (!raw) console.log(`  (no original extract found: derived columns listed, not checked)`);

  if (problems > 0) {
    console.error(`✗ ${problems} problem(s) in ${fileName}`);
    process.exit(1);
  }
  console.log(`✓ ${fileName} follows the conventions`);
}

async function repackage(args: string[], config: ArchiveConfig): Promise<void> {
  const [sourceDir, outputDir] = positionals(args);
  const supersedes = getFlag(args, '--supersedes');
  const kindFlag = getFlag(args, '--kind');
  const city = getFlag(args, '--city');
  const country = getFlag(args, '--country');
  const versionFlag = getFlag(args, '--version');

  const line = 'repackage <dir> <output-dir> (--supersedes <previous.zip> | --kind <ori|cln> --city <City> --country <Country> [--version <n>])';
  if (!sourceDir || !outputDir) usage(line);

  let name: ArchiveName | undefined;
  if (!supersedes) {
    const kind = kindFlag ? parseKind(kindFlag) : null;
    if (!kind || !city || !country) usage(line);
    const version = versionFlag ? parseInt(versionFlag, 10) : 1;
    if (!Number.isInteger(version) || version < 1) usage(line);
    name = { kind, city, country, version };
  }

  console.log(`Packing ${sourceDir}...`);
  const result = await repackageArchive({ sourceDir, outputDir, name, supersedes, config });
  console.log(`✓ Archive written: ${result.outputPath}`);
  console.log(`  Files: ${result.manifest.entries.length}`);
  console.log(`  SHA-256: ${result.manifest.sha256}`);
  console.log(formatChecksumLine({ sha256: result.manifest.sha256, fileName: basename(result.outputPath) }));

  if (result.previous) {
    console.log(`\nPrevious: ${result.previous}`);
    for (const table of (await tablesOf(result.previous)).tables) printSummary(summarizeTable(table, config));
    console.log(`\nNew: ${result.manifest.fileName}`);
    for (const table of (await tablesOf(result.outputPath)).tables) printSummary(summarizeTable(table, config));
  }
  console.log(`\n⚠ Check row counts, settlement tallies and population sums against the previous archive before treating ${result.manifest.fileName} as authoritative.`);
}

async function qa(args: string[], config: ArchiveConfig): Promise<void> {
  const [archivePath, notePath] = positionals(args);
  if (!archivePath || !notePath) usage('qa <archive.zip> <note.json>');

  const note = await readQaNote(notePath);
  const { sha256, fileName, tables } = await tablesOf(archivePath);
  if (note.archive !== fileName) {
    console.warn(`⚠ Note is for ${note.archive}, checking ${fileName}`);
  }
  const summary = summarizeTable(pickTable(tables, note.table, archivePath), config);
  const discrepancies = compareWithQaNote(summary, sha256, note);

  console.log(`QA note: validated ${note.validatedAt}${note.validatedBy ? ` by ${note.validatedBy}` : ''}`);
  printSummary(summary);
  if (discrepancies.length > 0) {
    for (const d of discrepancies) console.error(`  ✗ ${describeDiscrepancy(d)}`);
    console.error(`✗ ${fileName} differs from its QA note`);
    process.exit(1);
  }
  console.log(`✓ ${fileName} matches its QA note`);
}

async function note(args: string[], config: ArchiveConfig): Promise<void> {
  const [archivePath, notePath] = positionals(args);
  if (!archivePath || !notePath) usage('note <archive.zip> <note.json> [--by <name>] [--table <entry>]');

  const { sha256, fileName, tables } = await tablesOf(archivePath);
  const summary = summarizeTable(pickTable(tables, getFlag(args, '--table'), archivePath), config);
  const qaNote = createQaNote({ archive: fileName, sha256, summary, validatedBy: getFlag(args, '--by') });
  await writeQaNote(notePath, qaNote);
  printSummary(summary);
  console.log(`✓ QA note written: ${notePath}`);
}

// ── Main ────────────────────────────────────────────────────────────────

const [command, ...args] = process.argv.slice(2);

const commands: Record<string, (args: string[], config: ArchiveConfig) => Promise<void>> = {
  list, extract, hash, check, compare, inspect,
  summarize, lint, repackage, qa, note,
};

const handler = command ? commands[command] : undefined;

if (!handler) {
  console.log(`kyca: Know Your City survey archives

  kyca list <root>
  kyca extract <archive.zip> <dest-dir> [--overwrite] [--dry-run]
  kyca hash <archive.zip...> [--write <SHA256SUMS>]
  kyca check <SHA256SUMS>
  kyca compare <a.zip> <b.zip>
  kyca inspect <archive.zip>
  kyca summarize <archive.zip>
  kyca lint <cleaned.zip> [--raw <original.zip>]
  kyca repackage <dir> <output-dir> (--supersedes <previous.zip> | --kind <ori|cln> --city <City> --country <Country> [--version <n>])
  kyca qa <archive.zip> <note.json>
  kyca note <archive.zip> <note.json> [--by <name>] [--table <entry>]

Archives: kyc_ori_data_<City>_<Country>.zip, kyc_cln_data_<City>_<Country>.zip,
          kyc_settlement_population_extract_v<N>.zip`);
  process.exit(command ? 1 : 0);
}

loadConfig(process.cwd())
  .then(config => handler(args, config))
  .catch((err: unknown) => {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });
