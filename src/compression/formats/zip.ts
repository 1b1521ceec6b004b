/**
 * zip container: archiver for writing, unzipper for reading
 */

import * as core from '@actions/core';
import * as fs from 'fs';
import {once} from 'events';
import archiver from 'archiver';
import * as unzipper from 'unzipper';
import {
  CodecFailureError,
  IOFailureError,
  isSystemError,
  withIO,
} from '../../errors';
import {formatBytes} from '../../utils';

// Every zip entry is written with executable-style permissions
export const ZIP_ENTRY_MODE = 0o755;

/**
 * Streams entries into a zip file opened up front
 */
export class ZipWriter {
  private failure?: Error;
  private entryCount = 0;

  private constructor(
    readonly outputFile: string,
    private readonly output: fs.WriteStream,
    private readonly archive: archiver.Archiver
  ) {
    archive.on('entry', entry => {
      core.debug(`[zip] Added: ${entry.name}`);
    });

    archive.on('warning', err => {
      core.warning(`[zip] ${err.message}`);
    });

    archive.on('error', err => {
      this.failure = err;
    });

    // Pipe archive to output file
    archive.pipe(output);
  }

  static async open(outputFile: string, compressionLevel: number): Promise<ZipWriter> {
    const output = fs.createWriteStream(outputFile);
    await withIO('open', outputFile, () => once(output, 'open'));
    const archive = archiver('zip', {
      zlib: {level: compressionLevel},
    });
    return new ZipWriter(outputFile, output, archive);
  }

  append(archivePath: string, contents: Buffer): void {
    this.throwIfFailed();
    this.archive.append(contents, {name: archivePath, mode: ZIP_ENTRY_MODE});
    this.entryCount++;
  }

  /**
   * Write the central directory and wait for the file to close
   */
  async finish(): Promise<number> {
    this.throwIfFailed();
    try {
      await Promise.all([once(this.output, 'close'), this.archive.finalize()]);
    } catch (error) {
      if (isSystemError(error)) {
        throw new IOFailureError('write', this.outputFile, error);
      }
      throw new CodecFailureError('zip', 'failed to write archive', error);
    }
    this.throwIfFailed();

    const totalBytes = this.archive.pointer();
    core.debug(
      `[zip] Archive created: ${formatBytes(totalBytes)} (${this.entryCount} entries)`
    );
    return totalBytes;
  }

  private throwIfFailed(): void {
    if (this.failure) {
      throw new CodecFailureError('zip', 'archive stream failed', this.failure);
    }
  }
}

/**
 * Read the central directory of a zip file without reading any entry data
 */
export async function openZip(archivePath: string): Promise<unzipper.CentralDirectory> {
  try {
    const directory = await unzipper.Open.file(archivePath);
    core.debug(`[zip] ${archivePath}: ${directory.files.length} entries`);
    return directory;
  } catch (error) {
    if (isSystemError(error)) {
      throw new IOFailureError('open', archivePath, error);
    }
    throw new CodecFailureError('zip', `cannot read ${archivePath}`, error);
  }
}
