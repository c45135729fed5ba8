import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { packFiles } from '../src/pack.js';
import { listArchive } from '../src/list.js';
import { FarBinary } from '../src/far-binary.js';

describe('pack', () => {
  const tmp = join(tmpdir(), `far-pack-test-${Date.now()}`);
  const input = join(tmp, 'input');
  const output = join(tmp, 'output');

  before(async () => {
    await mkdir(join(input, 'nested'), { recursive: true });
    await mkdir(output, { recursive: true });

    await writeFile(join(input, 'b.txt'), 'bee');
    await writeFile(join(input, 'a.txt'), 'ay');
    await writeFile(join(input, 'nested', 'ignored.txt'), 'not packed');
  });

  after(async () => {
    await rm(tmp, { recursive: true });
  });

  it('should pack the files of a directory sorted by name', async () => {
    const outputFile = join(output, 'dir.far');
    const result = await packFiles({ inputPaths: [input], outputFile });

    assert.strictEqual(result.fileCount, 2);
    assert.strictEqual(result.totalSize, 67);

    const loaded = await FarBinary.read({ filePath: outputFile });
    assert.strictEqual(loaded.totalSize, 67);
    assert.deepStrictEqual(loaded.archive.entries, [
      { name: 'a.txt', size: 2, offset: 16 },
      { name: 'b.txt', size: 3, offset: 18 },
    ]);
  });

  it('should keep the order of individual file inputs', async () => {
    const outputFile = join(output, 'files.far');
    await packFiles({ inputPaths: [join(input, 'b.txt'), join(input, 'a.txt')], outputFile });

    const loaded = await FarBinary.read({ filePath: outputFile });
    const hydrated = FarBinary.hydrate({ archive: loaded.archive, buffer: loaded.buffer });
    assert.deepStrictEqual(hydrated.entries.map((entry) => entry.offset), [16, 19]);
    assert.deepStrictEqual(hydrated.files.map((file) => file.data.toString('utf8')), ['bee', 'ay']);
  });

  it('should write the empty archive for no inputs', async () => {
    const outputFile = join(output, 'empty.far');
    const result = await packFiles({ inputPaths: [], outputFile });

    assert.strictEqual(result.fileCount, 0);
    assert.strictEqual(result.totalSize, 20);
    assert.strictEqual((await readFile(outputFile)).length, 20);
  });

  it('should reject duplicate member names', async () => {
    await assert.rejects(
      packFiles({ inputPaths: [input, join(input, 'a.txt')], outputFile: join(output, 'dup.far') }),
      /Duplicate member name "a.txt"/
    );
  });

  it('should wrap errors from missing inputs', async () => {
    await assert.rejects(
      packFiles({ inputPaths: [join(input, 'missing.txt')], outputFile: join(output, 'missing.far') }),
      { name: 'PackError' }
    );
  });

  it('should list entries with and without hashes', async () => {
    const outputFile = join(output, 'dir.far');

    const plain = await listArchive({ inputFile: outputFile });
    assert.strictEqual(plain.version, 1);
    assert.strictEqual(plain.totalSize, 67);
    assert.strictEqual(plain.sha256, FarBinary.hashFileData({ data: await readFile(outputFile) }));
    assert.deepStrictEqual(plain.entries, [
      { name: 'a.txt', size: 2, offset: 16 },
      { name: 'b.txt', size: 3, offset: 18 },
    ]);

    const hashed = await listArchive({ inputFile: outputFile, hashes: true });
    assert.strictEqual(hashed.entries[0].sha256, FarBinary.hashFileData({ data: Buffer.from('ay') }));
    assert.strictEqual(hashed.entries[1].sha256, FarBinary.hashFileData({ data: Buffer.from('bee') }));
  });
});
