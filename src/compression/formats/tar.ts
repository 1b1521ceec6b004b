/**
 * In-memory tar container built and unpacked with tar-stream
 */

import * as core from '@actions/core';
import * as fs from 'fs';
import * as path from 'path';
import * as tar from 'tar-stream';
import {
  ArchiveError,
  CodecFailureError,
  IOFailureError,
  isSystemError,
  withIO,
} from '../../errors';
import {formatBytes, resolveInside} from '../../utils';

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Accumulates entries into a tar byte stream held in memory
 */
export class TarBuilder {
  private readonly pack = tar.pack();
  private readonly chunks: Buffer[] = [];
  private readonly ended: Promise<void>;
  private failure?: Error;
  private entryCount = 0;

  constructor() {
    this.pack.on('data', (chunk: unknown) => {
      if (Buffer.isBuffer(chunk)) {
        this.chunks.push(chunk);
      }
    });
    this.ended = new Promise<void>((resolve, reject) => {
      this.pack.on('end', () => resolve());
      this.pack.on('error', (error: unknown) => {
        this.failure = toError(error);
        reject(this.failure);
      });
    });
    // Failures surface through throwIfFailed() or toBuffer()
    this.ended.catch(() => undefined);
  }

  get entries(): number {
    return this.entryCount;
  }

  /**
   * Append a file from disk. Symlinks become symlink entries carrying
   * their target; regular files keep their mode and mtime.
   */
  async append(archivePath: string, sourcePath: string): Promise<void> {
    this.throwIfFailed();
    const stats = await withIO('stat', sourcePath, () =>
      fs.promises.lstat(sourcePath)
    );

    if (stats.isSymbolicLink()) {
      const linkname = await withIO('readlink', sourcePath, () =>
        fs.promises.readlink(sourcePath)
      );
      await this.writeEntry(
        {
          name: archivePath,
          type: 'symlink',
          linkname,
          mode: stats.mode & 0o7777,
          mtime: stats.mtime,
        },
        Buffer.alloc(0)
      );
    } else if (stats.isFile()) {
      const contents = await withIO('read', sourcePath, () =>
        fs.promises.readFile(sourcePath)
      );
      await this.writeEntry(
        {
          name: archivePath,
          type: 'file',
          size: contents.length,
          mode: stats.mode & 0o7777,
          mtime: stats.mtime,
        },
        contents
      );
    } else {
      throw new IOFailureError(
        'read',
        sourcePath,
        new Error('not a regular file or symlink')
      );
    }

    this.entryCount++;
  }

  /**
   * Finalize the archive and return its bytes. The builder cannot be
   * used afterwards.
   */
  async toBuffer(): Promise<Buffer> {
    this.throwIfFailed();
    this.pack.finalize();
    try {
      await this.ended;
    } catch (error) {
      throw new CodecFailureError('tar', 'failed to finalize archive', error);
    }
    const bytes = Buffer.concat(this.chunks);
    core.debug(
      `[tar] Packed ${this.entryCount} entries into ${formatBytes(bytes.length)}`
    );
    return bytes;
  }

  private writeEntry(header: Parameters<tar.Pack['entry']>[0], contents: Buffer): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.pack.entry(header, contents, (err?: Error | null) => {
        if (err) {
          reject(new CodecFailureError('tar', `failed to add ${header.name}`, err));
        } else {
          resolve();
        }
      });
    });
  }

  private throwIfFailed(): void {
    if (this.failure) {
      throw new CodecFailureError('tar', 'archive stream failed', this.failure);
    }
  }
}

/**
 * Unpack tar bytes into a directory. Files, directories and symlinks are
 * materialized; other entry types are skipped. Every entry must resolve
 * inside the directory, also once symlinks already unpacked are followed.
 *
 * @returns number of entries materialized
 */
export async function unpackTar(
  tarBytes: Buffer,
  targetDir: string
): Promise<number> {
  core.debug(`[tar] Unpacking ${formatBytes(tarBytes.length)} into ${targetDir}`);
  await withIO('mkdir', targetDir, () =>
    fs.promises.mkdir(targetDir, {recursive: true})
  );
  const realRoot = await withIO('stat', targetDir, () =>
    fs.promises.realpath(targetDir)
  );

  const extract = tar.extract();
  let extractedEntries = 0;

  extract.on('entry', (header, stream, next) => {
    const chunks: Buffer[] = [];
    const fail = (error: unknown): void => {
      stream.resume();
      extract.destroy(toError(error));
    };

    stream.on('data', (chunk: unknown) => {
      if (Buffer.isBuffer(chunk)) {
        chunks.push(chunk);
      }
    });
    stream.on('error', (error: unknown) =>
      fail(new CodecFailureError('tar', `failed to read ${header.name}`, error))
    );
    stream.on('end', () => {
      materialize(header, Buffer.concat(chunks), targetDir, realRoot).then(
        written => {
          if (written) extractedEntries++;
          next();
        },
        fail
      );
    });
  });

  const finished = new Promise<void>((resolve, reject) => {
    extract.on('finish', () => resolve());
    extract.on('error', (error: unknown) => reject(error));
  });

  extract.end(tarBytes);

  try {
    await finished;
  } catch (error) {
    if (error instanceof ArchiveError) throw error;
    throw new CodecFailureError('tar', 'invalid tar stream', error);
  }

  core.debug(`[tar] Unpacked ${extractedEntries} entries`);
  return extractedEntries;
}

function escapes(name: string): CodecFailureError {
  return new CodecFailureError('tar', `entry escapes the output directory: ${name}`);
}

/**
 * Follow the deepest existing ancestor of `entryPath` through any symlinks
 * and require it to stay under `realRoot`
 */
async function assertContained(
  realRoot: string,
  entryPath: string,
  name: string
): Promise<void> {
  let ancestor = path.dirname(entryPath);
  for (;;) {
    let real: string;
    try {
      real = await fs.promises.realpath(ancestor);
    } catch (error) {
      const parent = path.dirname(ancestor);
      if (isSystemError(error) && error.code === 'ENOENT' && parent !== ancestor) {
        ancestor = parent;
        continue;
      }
      throw new IOFailureError('stat', ancestor, error);
    }

    const relative = path.relative(realRoot, real);
    if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
      throw escapes(name);
    }
    return;
  }
}

/**
 * A link left at the entry path would redirect the write
 */
async function removeExistingLink(entryPath: string): Promise<void> {
  let isLink = false;
  try {
    isLink = (await fs.promises.lstat(entryPath)).isSymbolicLink();
  } catch (error) {
    if (!isSystemError(error) || error.code !== 'ENOENT') {
      throw new IOFailureError('stat', entryPath, error);
    }
  }
  if (isLink) {
    await withIO('remove', entryPath, () => fs.promises.unlink(entryPath));
  }
}

async function materialize(
  header: tar.Header,
  contents: Buffer,
  targetDir: string,
  realRoot: string
): Promise<boolean> {
  const entryPath = resolveInside(targetDir, header.name);

  if (entryPath === undefined) {
    if (header.type === 'directory') {
      // The root itself ("./")
      return false;
    }
    throw escapes(header.name);
  }

  switch (header.type) {
    case 'directory':
      await assertContained(realRoot, entryPath, header.name);
      await withIO('mkdir', entryPath, () =>
        fs.promises.mkdir(entryPath, {recursive: true})
      );
      return true;

    case 'file':
      await assertContained(realRoot, entryPath, header.name);
      await withIO('mkdir', path.dirname(entryPath), () =>
        fs.promises.mkdir(path.dirname(entryPath), {recursive: true})
      );
      await removeExistingLink(entryPath);
      await withIO('write', entryPath, () =>
        fs.promises.writeFile(entryPath, contents)
      );
      if (header.mode) {
        const mode = header.mode & 0o7777;
        await withIO('write', entryPath, () =>
          fs.promises.chmod(entryPath, mode)
        );
      }
      return true;

    case 'symlink': {
      const linkTarget = header.linkname || '';
      await assertContained(realRoot, entryPath, header.name);
      await withIO('mkdir', path.dirname(entryPath), () =>
        fs.promises.mkdir(path.dirname(entryPath), {recursive: true})
      );
      // Remove existing file/link if present
      await withIO('remove', entryPath, () =>
        fs.promises.rm(entryPath, {force: true})
      );
      await withIO('symlink', entryPath, () =>
        fs.promises.symlink(linkTarget, entryPath)
      );
      return true;
    }

    default:
      core.debug(`[tar] Skipping unsupported entry type: ${header.type}`);
      return false;
  }
}
