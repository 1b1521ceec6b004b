/**
 * Tests for the in-memory tar container
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import * as tar from 'tar-stream';
import {TarBuilder, unpackTar} from '../tar';
import {CodecFailureError} from '../../../errors';

/**
 * Build tar bytes straight from headers, bypassing TarBuilder
 */
async function rawTar(
  entries: Array<{header: Parameters<tar.Pack['entry']>[0]; contents?: string}>
): Promise<Buffer> {
  const pack = tar.pack();
  const chunks: Buffer[] = [];
  pack.on('data', (chunk: unknown) => {
    if (Buffer.isBuffer(chunk)) chunks.push(chunk);
  });
  const ended = new Promise<void>(resolve => pack.on('end', () => resolve()));
  for (const {header, contents} of entries) {
    if (contents === undefined) {
      pack.entry(header);
    } else {
      pack.entry(header, contents);
    }
  }
  pack.finalize();
  await ended;
  return Buffer.concat(chunks);
}

describe('Tar container', () => {
  let testDir: string;
  let sourceDir: string;
  let outputDir: string;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tar-test-'));
    sourceDir = path.join(testDir, 'source');
    outputDir = path.join(testDir, 'output');
    fs.mkdirSync(sourceDir);
  });

  afterEach(() => {
    if (fs.existsSync(testDir)) {
      fs.rmSync(testDir, {recursive: true, force: true});
    }
  });

  test('should round-trip files with their modes', async () => {
    fs.writeFileSync(path.join(sourceDir, 'run.sh'), '#!/bin/sh\necho hi\n');
    fs.chmodSync(path.join(sourceDir, 'run.sh'), 0o755);
    fs.writeFileSync(path.join(sourceDir, 'data.txt'), 'data');
    fs.chmodSync(path.join(sourceDir, 'data.txt'), 0o644);

    const builder = new TarBuilder();
    await builder.append('bin/run.sh', path.join(sourceDir, 'run.sh'));
    await builder.append('data.txt', path.join(sourceDir, 'data.txt'));
    expect(builder.entries).toBe(2);

    const count = await unpackTar(await builder.toBuffer(), outputDir);

    expect(count).toBe(2);
    expect(fs.readFileSync(path.join(outputDir, 'bin/run.sh'), 'utf8')).toBe(
      '#!/bin/sh\necho hi\n'
    );
    expect(fs.statSync(path.join(outputDir, 'bin/run.sh')).mode & 0o777).toBe(0o755);
    expect(fs.statSync(path.join(outputDir, 'data.txt')).mode & 0o777).toBe(0o644);
  });

  test('should store symlinks as symlinks', async () => {
    fs.writeFileSync(path.join(sourceDir, 'target.txt'), 'target');
    fs.symlinkSync('target.txt', path.join(sourceDir, 'link.txt'));

    const builder = new TarBuilder();
    await builder.append('target.txt', path.join(sourceDir, 'target.txt'));
    await builder.append('link.txt', path.join(sourceDir, 'link.txt'));
    await unpackTar(await builder.toBuffer(), outputDir);

    const link = path.join(outputDir, 'link.txt');
    expect(fs.lstatSync(link).isSymbolicLink()).toBe(true);
    expect(fs.readlinkSync(link)).toBe('target.txt');
    expect(fs.readFileSync(link, 'utf8')).toBe('target');
  });

  test('should materialize directory entries and skip the root', async () => {
    const bytes = await rawTar([
      {header: {name: './', type: 'directory'}},
      {header: {name: 'empty/', type: 'directory'}},
      {header: {name: 'empty/../file.txt', type: 'file'}, contents: 'x'},
    ]);

    expect(await unpackTar(bytes, outputDir)).toBe(2);
    expect(fs.statSync(path.join(outputDir, 'empty')).isDirectory()).toBe(true);
    expect(fs.readFileSync(path.join(outputDir, 'file.txt'), 'utf8')).toBe('x');
  });

  test('should reject entries escaping the output directory', async () => {
    const bytes = await rawTar([
      {header: {name: '../evil.txt', type: 'file'}, contents: 'evil'},
    ]);

    await expect(unpackTar(bytes, outputDir)).rejects.toThrow(CodecFailureError);
    expect(fs.existsSync(path.join(testDir, 'evil.txt'))).toBe(false);
  });

  test('should reject files written through an unpacked symlink', async () => {
    const outside = path.join(testDir, 'outside');
    fs.mkdirSync(outside);
    const bytes = await rawTar([
      {header: {name: 'link', type: 'symlink', linkname: outside}},
      {header: {name: 'link/evil.txt', type: 'file'}, contents: 'evil'},
    ]);

    await expect(unpackTar(bytes, outputDir)).rejects.toThrow(
      'tar: entry escapes the output directory: link/evil.txt'
    );
    expect(fs.existsSync(path.join(outside, 'evil.txt'))).toBe(false);
  });

  test('should reject directories created through a relative symlink', async () => {
    const bytes = await rawTar([
      {header: {name: 'up', type: 'symlink', linkname: '..'}},
      {header: {name: 'up/planted/', type: 'directory'}},
    ]);

    await expect(unpackTar(bytes, outputDir)).rejects.toThrow(CodecFailureError);
    expect(fs.existsSync(path.join(testDir, 'planted'))).toBe(false);
  });

  test('should replace a symlink at a file entry instead of writing through it', async () => {
    const victim = path.join(testDir, 'victim.txt');
    fs.writeFileSync(victim, 'untouched');
    const bytes = await rawTar([
      {header: {name: 'target.txt', type: 'symlink', linkname: victim}},
      {header: {name: 'target.txt', type: 'file'}, contents: 'replaced'},
    ]);

    expect(await unpackTar(bytes, outputDir)).toBe(2);
    expect(fs.readFileSync(victim, 'utf8')).toBe('untouched');
    const target = path.join(outputDir, 'target.txt');
    expect(fs.lstatSync(target).isSymbolicLink()).toBe(false);
    expect(fs.readFileSync(target, 'utf8')).toBe('replaced');
  });

  test('should reject bytes that are not a tar', async () => {
    const garbage = Buffer.alloc(1024, 0x41);
    await expect(unpackTar(garbage, outputDir)).rejects.toThrow(CodecFailureError);
  });
});
