import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ManifestSerializer } from '../src/utils/manifest-serializer.js';
import type { FarWarning } from '../src/types/far-error.js';
import type { FarFileEntry } from '../src/types/far-file-entry.js';

function record(size: number, sizeDuplicate: number, offset: number, name: Buffer): Buffer {
  const fields = Buffer.alloc(16);
  fields.writeUInt32LE(size, 0);
  fields.writeUInt32LE(sizeDuplicate, 4);
  fields.writeUInt32LE(offset, 8);
  fields.writeUInt32LE(name.length, 12);
  return Buffer.concat([fields, name]);
}

function count(n: number): Buffer {
  const buffer = Buffer.alloc(4);
  buffer.writeUInt32LE(n, 0);
  return buffer;
}

const noWarnings = (warning: FarWarning): void => {
  assert.fail(`unexpected warning: ${warning.message}`);
};

describe('manifest serializer', () => {
  const entries: FarFileEntry[] = [
    { name: 'a.txt', size: 3, offset: 16 },
    { name: 'résumé.txt', size: 0, offset: 19 },
  ];

  it('should write count, doubled size, offset and UTF-8 name per entry', () => {
    const manifest = ManifestSerializer.serialize(entries);

    assert.strictEqual(manifest.length, 53);
    assert.strictEqual(manifest.readUInt32LE(0), 2);
    assert.strictEqual(manifest.readUInt32LE(4), 3);
    assert.strictEqual(manifest.readUInt32LE(8), 3);
    assert.strictEqual(manifest.readUInt32LE(12), 16);
    assert.strictEqual(manifest.readUInt32LE(16), 5);
    assert.strictEqual(manifest.toString('utf8', 20, 25), 'a.txt');
    assert.strictEqual(manifest.readUInt32LE(25), 0);
    assert.strictEqual(manifest.readUInt32LE(29), 0);
    assert.strictEqual(manifest.readUInt32LE(33), 19);
    assert.strictEqual(manifest.readUInt32LE(37), 12);
    assert.strictEqual(manifest.toString('utf8', 41, 53), 'résumé.txt');
  });

  it('should write only the count for no entries', () => {
    const manifest = ManifestSerializer.serialize([]);
    assert.deepStrictEqual(manifest, Buffer.from([0, 0, 0, 0]));
  });

  it('should read entries back in order', () => {
    const manifest = ManifestSerializer.serialize(entries);
    assert.deepStrictEqual(ManifestSerializer.deserialize(manifest, 0, noWarnings), entries);
  });

  it('should start reading at the manifest offset', () => {
    const manifest = ManifestSerializer.serialize(entries);
    const buffer = Buffer.concat([Buffer.alloc(7, 0xaa), manifest]);
    assert.deepStrictEqual(ManifestSerializer.deserialize(buffer, 7, noWarnings), entries);
  });

  it('should grow past its initial capacity', () => {
    const many: FarFileEntry[] = [];
    for (let i = 0; i < 40; i++) {
      many.push({ name: `file-${i}.bin`, size: i, offset: 16 + i });
    }
    const manifest = ManifestSerializer.serialize(many);
    assert.deepStrictEqual(ManifestSerializer.deserialize(manifest, 0, noWarnings), many);
  });

  it('should fail with TruncatedManifest when a name is cut short', () => {
    const manifest = ManifestSerializer.serialize(entries);
    assert.throws(
      () => ManifestSerializer.deserialize(manifest.subarray(0, manifest.length - 1), 0, noWarnings),
      { name: 'FarBinaryError', code: 'TruncatedManifest' }
    );
  });

  it('should fail with TruncatedManifest when records are missing', () => {
    assert.throws(
      () => ManifestSerializer.deserialize(count(1), 0, noWarnings),
      { name: 'FarBinaryError', code: 'TruncatedManifest' }
    );
  });

  it('should fail with TruncatedManifest when the count itself is missing', () => {
    assert.throws(
      () => ManifestSerializer.deserialize(Buffer.alloc(2), 0, noWarnings),
      { name: 'FarBinaryError', code: 'TruncatedManifest' }
    );
  });

  it('should fail with InvalidUtf8Name on malformed name bytes', () => {
    const buffer = Buffer.concat([count(1), record(0, 0, 16, Buffer.from([0xff, 0xfe]))]);
    assert.throws(
      () => ManifestSerializer.deserialize(buffer, 0, noWarnings),
      { name: 'FarBinaryError', code: 'InvalidUtf8Name' }
    );
  });

  it('should warn and keep the primary size when the duplicate differs', () => {
    const buffer = Buffer.concat([count(1), record(5, 7, 16, Buffer.from('x'))]);
    const warnings: FarWarning[] = [];

    const result = ManifestSerializer.deserialize(buffer, 0, (warning) => warnings.push(warning));

    assert.deepStrictEqual(result, [{ name: 'x', size: 5, offset: 16 }]);
    assert.strictEqual(warnings.length, 1);
    assert.strictEqual(warnings[0].code, 'ManifestInconsistent');
    assert.strictEqual(warnings[0].entryIndex, 0);
    assert.strictEqual(warnings[0].message, 'Manifest entry 0 stores size 5 and duplicate size 7');
  });
});
