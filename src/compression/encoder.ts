/**
 * Encoder: packs entries into one archive of the format named by the
 * output filename.
 *
 * zip entries are streamed straight into the output file. Every other
 * format first collects entries into an in-memory tar, then compresses
 * that tar as a whole on finish().
 */

import * as core from '@actions/core';
import * as fs from 'fs';
import * as path from 'path';
import {pipeline} from 'stream/promises';
import {
  ArchiveStateError,
  CodecFailureError,
  IOFailureError,
  isSystemError,
  withIO,
} from '../errors';
import {formatBytes, removePath} from '../utils';
import {BackgroundTask, waitForTask} from './background';
import {digestFile} from './digest';
import {SEVEN_Z_TAR_FILENAME, extension, resolveFormat} from './driver';
import {getStreamCodec, isStreamFormat} from './factory';
import {TarBuilder, ZipWriter, sevenZip} from './formats';
import {StatusReporter} from './status';
import {ArchiveFormat, EncoderOptions, Entry, StreamCodec} from './types';

export const DEFAULT_COMPRESSION_LEVEL = 6;

// Number of chunks the tar is split into while compressing
const COMPRESS_PROGRESS_STEPS = 100;

type EncoderState = 'accepting' | 'finalizing' | 'finished';

type Container =
  | {kind: 'tar'; builder: TarBuilder}
  | {kind: 'zip'; writer: ZipWriter};

/**
 * A finished archive on disk
 */
export class CompressedArchive {
  constructor(
    readonly path: string,
    readonly format: ArchiveFormat,
    private readonly status: StatusReporter
  ) {}

  /**
   * sha256 of the archive, computed on a worker thread
   */
  digest(): Promise<string> {
    return digestFile(this.path, this.status);
  }
}

export class Encoder {
  private state: EncoderState = 'accepting';

  private constructor(
    readonly format: ArchiveFormat,
    readonly outputDirectory: string,
    readonly outputFilename: string,
    private readonly container: Container,
    private readonly status: StatusReporter,
    private readonly compressionLevel: number
  ) {}

  /**
   * Resolve the format from `outputFilename` and prepare the container.
   * An unsupported suffix fails before anything touches the filesystem.
   */
  static async create(
    outputDirectory: string,
    outputFilename: string,
    options: EncoderOptions = {}
  ): Promise<Encoder> {
    const format = resolveFormat(outputFilename);
    const compressionLevel = options.compressionLevel ?? DEFAULT_COMPRESSION_LEVEL;
    const status = new StatusReporter(options.status);
    const outputPath = path.join(outputDirectory, outputFilename);

    core.debug(`[encoder:${format}] Output: ${outputPath}`);

    let container: Container;
    if (format === ArchiveFormat.ZIP) {
      await withIO('mkdir', outputDirectory, () =>
        fs.promises.mkdir(outputDirectory, {recursive: true})
      );
      container = {
        kind: 'zip',
        writer: await ZipWriter.open(outputPath, compressionLevel),
      };
    } else {
      container = {kind: 'tar', builder: new TarBuilder()};
    }

    return new Encoder(
      format,
      outputDirectory,
      outputFilename,
      container,
      status,
      compressionLevel
    );
  }

  get outputPath(): string {
    return path.join(this.outputDirectory, this.outputFilename);
  }

  async addFile(archivePath: string, sourcePath: string): Promise<void> {
    this.assertAccepting('add a file');
    this.status.update({detail: archivePath, increment: 1});
    await this.append(archivePath, sourcePath);
  }

  async addEntries(entries: Entry[]): Promise<void> {
    this.assertAccepting('add entries');
    this.status.phase(`Archiving (${extension(this.format)})`, entries.length);

    for (const entry of entries) {
      await this.addFile(entry.archivePath, entry.sourcePath);
    }

    this.status.detail('...');
    core.debug(`[encoder:${this.format}] Added ${entries.length} entries`);
  }

  /**
   * Finalize the archive. The encoder is consumed, whatever the outcome.
   */
  async finish(): Promise<CompressedArchive> {
    this.assertAccepting('finish');
    this.state = 'finalizing';

    const format = this.format;
    try {
      if (this.container.kind === 'zip') {
        await this.container.writer.finish();
      } else {
        const tarBytes = await this.container.builder.toBuffer();
        if (isStreamFormat(format)) {
          await this.compressStream(tarBytes, getStreamCodec(format));
        } else {
          await this.compressSevenZip(tarBytes);
        }
      }
    } finally {
      this.state = 'finished';
    }

    const stats = await withIO('stat', this.outputPath, () =>
      fs.promises.stat(this.outputPath)
    );
    core.info(
      `Archive created: ${this.outputPath} (${formatBytes(stats.size)})`
    );

    return new CompressedArchive(this.outputPath, this.format, this.status);
  }

  compress(): Promise<CompressedArchive> {
    return this.finish();
  }

  private async append(archivePath: string, sourcePath: string): Promise<void> {
    const name = archivePath.replace(/^\/+/, '');
    if (this.container.kind === 'tar') {
      await this.container.builder.append(name, sourcePath);
    } else {
      const contents = await withIO('read', sourcePath, () =>
        fs.promises.readFile(sourcePath)
      );
      this.container.writer.append(name, contents);
    }
  }

  /**
   * Stream the tar through the codec in fixed-size chunks, one tick each
   */
  private async compressStream(
    tarBytes: Buffer,
    codec: StreamCodec
  ): Promise<void> {
    await withIO('mkdir', this.outputDirectory, () =>
      fs.promises.mkdir(this.outputDirectory, {recursive: true})
    );

    const chunkSize = Math.max(
      1,
      Math.ceil(tarBytes.length / COMPRESS_PROGRESS_STEPS)
    );
    const totalChunks = Math.ceil(tarBytes.length / chunkSize);
    const status = this.status;

    status.phase(`Compressing (${extension(this.format)})`, totalChunks);
    core.debug(
      `[encoder:${this.format}] Compressing ${formatBytes(tarBytes.length)} in ${totalChunks} chunks`
    );

    async function* chunks(): AsyncGenerator<Buffer> {
      for (let offset = 0; offset < tarBytes.length; offset += chunkSize) {
        status.tick();
        yield tarBytes.subarray(offset, offset + chunkSize);
      }
    }

    try {
      await pipeline(
        chunks(),
        codec.createCompressor(this.compressionLevel),
        fs.createWriteStream(this.outputPath)
      );
    } catch (error) {
      await removePath(this.outputPath, `encoder:${this.format}`);
      if (isSystemError(error)) {
        throw new IOFailureError('write', this.outputPath, error);
      }
      throw new CodecFailureError(this.format, 'compression failed', error);
    }
  }

  /**
   * 7za only takes files: stage the tar in a private directory, compress it
   * on a background task, then remove the staging directory.
   */
  private async compressSevenZip(tarBytes: Buffer): Promise<void> {
    await withIO('mkdir', this.outputDirectory, () =>
      fs.promises.mkdir(this.outputDirectory, {recursive: true})
    );
    const stagingDir = await withIO('mkdir', this.outputDirectory, () =>
      fs.promises.mkdtemp(path.join(this.outputDirectory, '.seven7-'))
    );
    const archivePath = path.resolve(this.outputPath);

    try {
      const tarPath = path.join(stagingDir, SEVEN_Z_TAR_FILENAME);
      await withIO('write', tarPath, () => fs.promises.writeFile(tarPath, tarBytes));
      // 7za appends to an existing archive
      await withIO('remove', archivePath, () =>
        fs.promises.rm(archivePath, {force: true})
      );

      this.status.phase(`Compressing (${extension(this.format)})`);
      const task = BackgroundTask.run('7z compress', () =>
        sevenZip.compressFile(
          archivePath,
          stagingDir,
          SEVEN_Z_TAR_FILENAME,
          this.compressionLevel
        )
      );
      await waitForTask(task, this.status);
    } finally {
      await removePath(stagingDir, `encoder:${this.format}`);
    }
  }

  private assertAccepting(operation: string): void {
    if (this.state !== 'accepting') {
      throw new ArchiveStateError(operation, this.state);
    }
  }
}
