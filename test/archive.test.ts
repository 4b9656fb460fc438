import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { writeFile, mkdir, rm, readFile, readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import AdmZip from 'adm-zip';
import {
  extractArchive,
  readArchive,
  repackageArchive,
  compareArchives,
  collectEntries,
} from '../src/archive.js';
import { sha256File } from '../src/checksum.js';
import { defaultConfig } from '../src/config.js';

const ACCRA_CSV = 'settlement_id,name,population\nGH-001,Old Fadama,1200\nGH-002,Agbogbloshie,300\n';

describe('archive', () => {
  const tmp = join(tmpdir(), `kyc-archive-test-${process.pid}-${Date.now()}`);
  const source = join(tmp, 'source');
  const repo = join(tmp, 'repo');
  const accra = join(repo, 'kyc_cln_data_Accra_Ghana.zip');

  before(async () => {
    await mkdir(join(source, 'docs'), { recursive: true });
    await mkdir(repo, { recursive: true });
    await writeFile(join(source, 'accra.csv'), ACCRA_CSV);
    await writeFile(join(source, 'docs', 'codebook.txt'), 'population: persons per settlement');
    await writeFile(join(source, '.DS_Store'), 'finder noise');
  });

  after(async () => {
    await rm(tmp, { recursive: true });
  });

  it('should package a directory under its archive name', async () => {
    const result = await repackageArchive({
      sourceDir: source,
      outputDir: repo,
      name: { kind: 'cleaned', city: 'Accra', country: 'Ghana', version: 1 },
    });

    assert.strictEqual(result.outputPath, accra);
    assert.strictEqual(result.previous, null);
    assert.strictEqual(result.manifest.fileName, 'kyc_cln_data_Accra_Ghana.zip');
    assert.deepStrictEqual(result.manifest.name, { kind: 'cleaned', city: 'Accra', country: 'Ghana', version: 1 });
    assert.deepStrictEqual(result.manifest.entries.map(e => e.path), ['accra.csv', 'docs/codebook.txt']);
    assert.strictEqual(result.manifest.sha256, await sha256File(accra));
  });

  it('should refuse to overwrite an existing archive', async () => {
    const before = await sha256File(accra);
    await assert.rejects(
      repackageArchive({
        sourceDir: source,
        outputDir: repo,
        name: { kind: 'cleaned', city: 'Accra', country: 'Ghana', version: 1 },
      }),
      /Refusing to overwrite existing archive/
    );
    assert.strictEqual(await sha256File(accra), before);
  });

  it('should extract into a new directory', async () => {
    const dest = join(tmp, 'data', 'Accra');
    const manifest = await extractArchive({ archivePath: accra, outputPath: dest });

    assert.strictEqual(manifest.entries.length, 2);
    assert.strictEqual(await readFile(join(dest, 'accra.csv'), 'utf8'), ACCRA_CSV);
    assert.strictEqual(
      await readFile(join(dest, 'docs', 'codebook.txt'), 'utf8'),
      'population: persons per settlement'
    );
  });

  it('should refuse an existing destination unless told to overwrite', async () => {
    const dest = join(tmp, 'data', 'Accra');
    await assert.rejects(
      extractArchive({ archivePath: accra, outputPath: dest }),
      /Destination already exists/
    );

    await writeFile(join(dest, 'accra.csv'), 'edited');
    await extractArchive({ archivePath: accra, outputPath: dest, overwrite: true });
    assert.strictEqual(await readFile(join(dest, 'accra.csv'), 'utf8'), ACCRA_CSV);
  });

  it('should write nothing on a dry run', async () => {
    const dest = join(tmp, 'dry-run');
    const manifest = await extractArchive({ archivePath: accra, outputPath: dest, dryRun: true });
    assert.strictEqual(manifest.entries.length, 2);
    await assert.rejects(stat(dest), /ENOENT/);
  });

  it('should fail on a corrupt archive without creating the destination', async () => {
    const corrupt = join(tmp, 'kyc_ori_data_Broken_Ghana.zip');
    await writeFile(corrupt, 'this is not a zip');
    const dest = join(tmp, 'broken');
    await assert.rejects(extractArchive({ archivePath: corrupt, outputPath: dest }), /Corrupt archive/);
    await assert.rejects(stat(dest), /ENOENT/);
  });

  it('should re-zip unedited files to a byte-identical archive', async () => {
    const dest = join(tmp, 'roundtrip');
    await extractArchive({ archivePath: accra, outputPath: dest });

    const again = await repackageArchive({
      sourceDir: dest,
      outputDir: join(tmp, 'roundtrip-out'),
      name: { kind: 'cleaned', city: 'Accra', country: 'Ghana', version: 1 },
    });

    assert.strictEqual(await sha256File(again.outputPath), await sha256File(accra));
  });

  it('should supersede with the next free version', async () => {
    const edited = join(tmp, 'edited');
    await mkdir(edited, { recursive: true });
    await writeFile(join(edited, 'accra.csv'), ACCRA_CSV + 'GH-003,Sabon Zongo,450\n');

    const v2 = await repackageArchive({ sourceDir: edited, outputDir: repo, supersedes: accra });
    assert.strictEqual(v2.manifest.fileName, 'kyc_cln_data_Accra_Ghana_v2.zip');
    assert.strictEqual(v2.previous, accra);

    const v3 = await repackageArchive({ sourceDir: edited, outputDir: repo, supersedes: accra });
    assert.strictEqual(v3.manifest.fileName, 'kyc_cln_data_Accra_Ghana_v3.zip');

    assert.deepStrictEqual((await readdir(repo)).sort(), [
      'kyc_cln_data_Accra_Ghana.zip',
      'kyc_cln_data_Accra_Ghana_v2.zip',
      'kyc_cln_data_Accra_Ghana_v3.zip',
    ]);
  });

  it('should refuse to supersede an archive with a non-conforming name', async () => {
    const odd = join(tmp, 'accra-final.zip');
    await writeFile(odd, 'x');
    await assert.rejects(
      repackageArchive({ sourceDir: source, outputDir: repo, supersedes: odd }),
      /name does not follow the archive convention/
    );
  });

  it('should require a name or an archive to supersede', async () => {
    await assert.rejects(
      repackageArchive({ sourceDir: source, outputDir: repo }),
      /Either a target archive name or an archive to supersede is required/
    );
  });

  it('should throw on an empty directory', async () => {
    const empty = join(tmp, 'empty');
    await mkdir(empty, { recursive: true });
    await assert.rejects(
      repackageArchive({
        sourceDir: empty,
        outputDir: join(tmp, 'empty-out'),
        name: { kind: 'original', city: 'Accra', country: 'Ghana', version: 1 },
      }),
      /No files found/
    );
  });

  it('should skip excluded names when collecting', async () => {
    const entries = await collectEntries(source, { ...defaultConfig(), exclude: ['docs'] });
    assert.deepStrictEqual(entries.map(e => e.name), ['accra.csv']);
  });

  it('should report byte-identical copies', async () => {
    const copy = join(tmp, 'copy', 'kyc_cln_data_Accra_Ghana.zip');
    await mkdir(join(tmp, 'copy'), { recursive: true });
    await writeFile(copy, await readFile(accra));

    const result = await compareArchives(accra, copy);
    assert.strictEqual(result.identical, true);
    assert.strictEqual(result.sameContent, true);
  });

  it('should tell metadata-only differences from content changes', async () => {
    const { entries } = await readArchive(accra);
    const zip = new AdmZip();
    for (const e of entries) zip.addFile(e.name, e.data);
    const rezipped = join(tmp, 'rezipped.zip');
    await writeFile(rezipped, zip.toBuffer());

    const sameFiles = await compareArchives(accra, rezipped);
    assert.strictEqual(sameFiles.identical, false);
    assert.strictEqual(sameFiles.sameContent, true);

    const changed = await compareArchives(accra, join(repo, 'kyc_cln_data_Accra_Ghana_v2.zip'));
    assert.strictEqual(changed.identical, false);
    assert.strictEqual(changed.sameContent, false);
    assert.deepStrictEqual(changed.changed, ['accra.csv']);
    assert.deepStrictEqual(changed.removed, ['docs/codebook.txt']);
    assert.deepStrictEqual(changed.added, []);
  });
});
