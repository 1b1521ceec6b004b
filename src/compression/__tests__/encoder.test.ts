/**
 * Tests for the Encoder
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import * as zlib from 'zlib';
import {Encoder} from '../encoder';
import {ArchiveFormat, UpdateStatus} from '../types';
import {
  ArchiveStateError,
  IOFailureError,
  UnsupportedFormatError,
} from '../../errors';

/**
 * Split updates into phases, each headed by the update carrying its brief
 */
function phases(updates: UpdateStatus[]): Array<{brief: string; total?: number; increments: number}> {
  const result: Array<{brief: string; total?: number; increments: number}> = [];
  for (const update of updates) {
    if (update.brief !== undefined) {
      result.push({brief: update.brief, total: update.total, increments: 0});
    }
    const current = result[result.length - 1];
    if (current !== undefined && update.increment !== undefined) {
      current.increments += update.increment;
    }
  }
  return result;
}

describe('Encoder', () => {
  let testDir: string;
  let sourceDir: string;
  let outputDir: string;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'encoder-test-'));
    sourceDir = path.join(testDir, 'source');
    outputDir = path.join(testDir, 'output');
    fs.mkdirSync(path.join(sourceDir, 'nested'), {recursive: true});
    fs.writeFileSync(path.join(sourceDir, 'one.txt'), 'one');
    fs.writeFileSync(path.join(sourceDir, 'two.txt'), 'two');
    fs.writeFileSync(path.join(sourceDir, 'nested', 'three.txt'), 'three');
  });

  afterEach(() => {
    if (fs.existsSync(testDir)) {
      fs.rmSync(testDir, {recursive: true, force: true});
    }
  });

  const entries = () => [
    {archivePath: 'one.txt', sourcePath: path.join(sourceDir, 'one.txt')},
    {archivePath: 'two.txt', sourcePath: path.join(sourceDir, 'two.txt')},
    {
      archivePath: 'nested/three.txt',
      sourcePath: path.join(sourceDir, 'nested', 'three.txt'),
    },
  ];

  describe('create()', () => {
    test('should reject an unsupported suffix before touching the filesystem', async () => {
      await expect(Encoder.create(outputDir, 'backup.rar')).rejects.toThrow(
        UnsupportedFormatError
      );
      expect(fs.existsSync(outputDir)).toBe(false);
    });

    test('should open the zip output immediately', async () => {
      const encoder = await Encoder.create(outputDir, 'bundle.zip');
      expect(encoder.format).toBe(ArchiveFormat.ZIP);
      expect(fs.existsSync(path.join(outputDir, 'bundle.zip'))).toBe(true);
      await encoder.finish();
    });

    test('should defer output for tar-backed formats', async () => {
      const encoder = await Encoder.create(outputDir, 'bundle.tar.gz');
      expect(encoder.format).toBe(ArchiveFormat.GZIP);
      expect(encoder.outputPath).toBe(path.join(outputDir, 'bundle.tar.gz'));
      expect(fs.existsSync(outputDir)).toBe(false);
    });
  });

  describe('finish()', () => {
    test('should write a gzip stream at the output path', async () => {
      const encoder = await Encoder.create(outputDir, 'bundle.tgz');
      await encoder.addEntries(entries());
      const archive = await encoder.finish();

      expect(archive.path).toBe(path.join(outputDir, 'bundle.tgz'));
      expect(archive.format).toBe(ArchiveFormat.GZIP);
      const tarBytes = zlib.gunzipSync(fs.readFileSync(archive.path));
      // tar header starts with the first entry's name
      expect(tarBytes.subarray(0, 7).toString()).toBe('one.txt');
    });

    test('should produce identical digests for identical input', async () => {
      const first = await Encoder.create(path.join(outputDir, 'a'), 'bundle.tar.gz');
      await first.addEntries(entries());
      const second = await Encoder.create(path.join(outputDir, 'b'), 'bundle.tar.gz');
      await second.addEntries(entries());

      const firstDigest = await (await first.finish()).digest();
      const secondDigest = await (await second.finish()).digest();

      expect(firstDigest).toMatch(/^[0-9a-f]{64}$/);
      expect(secondDigest).toBe(firstDigest);
    });

    test('should accept compress() as an alias', async () => {
      const encoder = await Encoder.create(outputDir, 'bundle.tar.xz');
      await encoder.addFile('one.txt', path.join(sourceDir, 'one.txt'));
      const archive = await encoder.compress();
      expect(fs.statSync(archive.path).size).toBeGreaterThan(0);
    });

    test('should fail with IOFailureError for a missing source file', async () => {
      const encoder = await Encoder.create(outputDir, 'bundle.tar.bz2');
      await expect(
        encoder.addFile('ghost.txt', path.join(sourceDir, 'ghost.txt'))
      ).rejects.toThrow(IOFailureError);
    });
  });

  describe('state', () => {
    test('should reject every call after finish()', async () => {
      const encoder = await Encoder.create(outputDir, 'bundle.tar.gz');
      await encoder.addEntries(entries());
      await encoder.finish();

      await expect(
        encoder.addFile('one.txt', path.join(sourceDir, 'one.txt'))
      ).rejects.toThrow(ArchiveStateError);
      await expect(encoder.addEntries(entries())).rejects.toThrow(ArchiveStateError);
      await expect(encoder.finish()).rejects.toThrow(
        'cannot finish: archive is finished'
      );
    });
  });

  describe('progress', () => {
    test('should report archiving and compression with exact totals', async () => {
      const updates: UpdateStatus[] = [];
      const encoder = await Encoder.create(outputDir, 'bundle.tar.gz', {
        status: update => updates.push(update),
      });
      await encoder.addEntries(entries());
      const archive = await encoder.finish();
      await archive.digest();

      const observed = phases(updates);
      expect(observed.map(phase => phase.brief)).toEqual([
        'Archiving (tar.gz)',
        'Compressing (tar.gz)',
        'Digesting (sha256)',
      ]);
      expect(observed[0]).toEqual({brief: 'Archiving (tar.gz)', total: 3, increments: 3});
      expect(observed[1].total).toBeDefined();
      expect(observed[1].increments).toBe(observed[1].total);
      expect(observed[2].total).toBeUndefined();
    });

    test('should emit entry details during archiving', async () => {
      const updates: UpdateStatus[] = [];
      const encoder = await Encoder.create(outputDir, 'bundle.zip', {
        status: update => updates.push(update),
      });
      await encoder.addEntries(entries());
      await encoder.finish();

      expect(updates).toEqual([
        {brief: 'Archiving (zip)', total: 3},
        {detail: 'one.txt', increment: 1},
        {detail: 'two.txt', increment: 1},
        {detail: 'nested/three.txt', increment: 1},
        {detail: '...'},
      ]);
    });

    test('should count a file added on its own', async () => {
      const updates: UpdateStatus[] = [];
      const encoder = await Encoder.create(outputDir, 'bundle.tar.gz', {
        status: update => updates.push(update),
      });
      await encoder.addFile('one.txt', path.join(sourceDir, 'one.txt'));

      expect(updates).toEqual([{detail: 'one.txt', increment: 1}]);
    });
  });
});
