/**
 * Decoder: verifies and extracts an archive of any supported format into a
 * directory, then reports what the directory actually contains.
 */

import * as core from '@actions/core';
import * as fs from 'fs';
import * as path from 'path';
import {pipeline} from 'stream/promises';
import * as unzipper from 'unzipper';
import {
  ArchiveStateError,
  CodecFailureError,
  DigestMismatchError,
  IOFailureError,
  isSystemError,
  withIO,
} from '../errors';
import {formatBytes, listFiles, removePath, resolveInside} from '../utils';
import {BackgroundTask, waitForTask} from './background';
import {digestFile, digestsEqual} from './digest';
import {SEVEN_Z_TAR_FILENAME, extension, resolveFormat} from './driver';
import {getStreamCodec} from './factory';
import {openZip, sevenZip, unpackTar} from './formats';
import {ByteProgress, StatusReporter} from './status';
import {
  ArchiveFormat,
  DecoderOptions,
  ExtractedArchive,
  StreamCodec,
} from './types';

const READ_CHUNK_SIZE = 8192;
const EXTRACT_PROGRESS_STEPS = 100;

type DecoderState = 'created' | 'extracting' | 'scanned';

type Source =
  | {kind: 'stream'; codec: StreamCodec}
  | {kind: 'zip'; directory: unzipper.CentralDirectory}
  | {kind: 'sevenZip'};

export class Decoder {
  private state: DecoderState = 'created';

  private constructor(
    readonly format: ArchiveFormat,
    readonly inputPath: string,
    readonly outputDirectory: string,
    private readonly inputSize: number,
    private readonly expectedDigest: string | undefined,
    private readonly source: Source,
    private readonly status: StatusReporter
  ) {}

  /**
   * Resolve the format and open the input. No archive content is read yet.
   */
  static async open(
    inputPath: string,
    expectedDigest: string | undefined,
    outputDirectory: string,
    options: DecoderOptions = {}
  ): Promise<Decoder> {
    const format = resolveFormat(inputPath);
    const stats = await withIO('stat', inputPath, () => fs.promises.stat(inputPath));

    core.debug(`[decoder:${format}] Input: ${inputPath} (${formatBytes(stats.size)})`);

    let source: Source;
    switch (format) {
      case ArchiveFormat.ZIP:
        source = {kind: 'zip', directory: await openZip(inputPath)};
        break;
      case ArchiveFormat.SEVEN_Z:
        await assertReadable(inputPath);
        source = {kind: 'sevenZip'};
        break;
      default:
        // Opened in extract(), so an unused decoder holds no handle
        await assertReadable(inputPath);
        source = {kind: 'stream', codec: getStreamCodec(format)};
    }

    return new Decoder(
      format,
      inputPath,
      outputDirectory,
      stats.size,
      expectedDigest,
      source,
      new StatusReporter(options.status)
    );
  }

  /**
   * Verify the digest (when one was given), extract, and walk the output
   * directory. The decoder is consumed, whatever the outcome.
   */
  async extract(): Promise<ExtractedArchive> {
    if (this.state !== 'created') {
      throw new ArchiveStateError('extract', this.state);
    }
    this.state = 'extracting';

    try {
      if (this.expectedDigest !== undefined) {
        await this.verifyDigest(this.expectedDigest);
      }

      await withIO('mkdir', this.outputDirectory, () =>
        fs.promises.mkdir(this.outputDirectory, {recursive: true})
      );

      const tarBytes = await this.decompress();

      if (tarBytes !== undefined) {
        this.status.phase('Unpacking (tar)');
        const task = BackgroundTask.run('tar unpack', () =>
          unpackTar(tarBytes, this.outputDirectory)
        );
        await waitForTask(task, this.status);
      }

      const files = new Set(await listFiles(this.outputDirectory));
      core.info(`Extracted ${files.size} files into ${this.outputDirectory}`);
      return {outputDirectory: this.outputDirectory, files};
    } finally {
      this.state = 'scanned';
    }
  }

  private async verifyDigest(expected: string): Promise<void> {
    const actual = await digestFile(this.inputPath, this.status);
    if (!digestsEqual(expected, actual)) {
      throw new DigestMismatchError(expected, actual);
    }
    core.debug(`[decoder:${this.format}] Digest verified: ${actual}`);
  }

  /**
   * @returns tar bytes, or undefined when the container extracted itself
   */
  private async decompress(): Promise<Buffer | undefined> {
    switch (this.source.kind) {
      case 'stream':
        return this.decompressStream(this.source.codec);
      case 'zip':
        await this.extractZip(this.source.directory);
        return undefined;
      case 'sevenZip':
        return this.decompressSevenZip();
    }
  }

  private async decompressStream(codec: StreamCodec): Promise<Buffer> {
    this.status.phase(
      `Extracting (${extension(this.format)})`,
      EXTRACT_PROGRESS_STEPS,
      'creating tar as binary blob'
    );

    const progress = new ByteProgress(
      this.status,
      this.inputSize,
      EXTRACT_PROGRESS_STEPS
    );
    const chunks: Buffer[] = [];
    const handle = await withIO('open', this.inputPath, () =>
      fs.promises.open(this.inputPath, 'r')
    );

    try {
      await pipeline(
        handle.createReadStream({highWaterMark: READ_CHUNK_SIZE, autoClose: false}),
        async function* (source: AsyncIterable<Buffer>) {
          for await (const chunk of source) {
            progress.advance(chunk.length);
            yield chunk;
          }
        },
        codec.createDecompressor(),
        async (source: AsyncIterable<Buffer | string>) => {
          for await (const chunk of source) {
            chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
          }
        }
      );
    } catch (error) {
      if (isSystemError(error)) {
        throw new IOFailureError('read', this.inputPath, error);
      }
      throw new CodecFailureError(this.format, `cannot decompress ${this.inputPath}`, error);
    } finally {
      await handle.close();
    }
    progress.complete();

    const tarBytes = Buffer.concat(chunks);
    core.debug(
      `[decoder:${this.format}] Decompressed ${formatBytes(this.inputSize)} to ${formatBytes(tarBytes.length)}`
    );
    return tarBytes;
  }

  /**
   * Write every file entry by hand (one tick each), then let unzipper's bulk
   * extract materialize directories and anything the manual pass skipped.
   */
  private async extractZip(directory: unzipper.CentralDirectory): Promise<void> {
    this.status.phase('Extracting (zip)', directory.files.length);

    for (const file of directory.files) {
      this.status.update({detail: file.path, increment: 1});
      if (file.type !== 'File') {
        continue;
      }

      const destination = resolveInside(this.outputDirectory, file.path);
      if (destination === undefined) {
        throw new CodecFailureError(
          'zip',
          `entry escapes the output directory: ${file.path}`
        );
      }

      const contents = await this.readZipEntry(file);
      await withIO('mkdir', path.dirname(destination), () =>
        fs.promises.mkdir(path.dirname(destination), {recursive: true})
      );
      await withIO('write', destination, () =>
        fs.promises.writeFile(destination, contents)
      );

      const mode = (file.externalFileAttributes >>> 16) & 0o7777;
      if (mode !== 0) {
        await withIO('write', destination, () => fs.promises.chmod(destination, mode));
      }
    }

    try {
      await directory.extract({path: this.outputDirectory});
    } catch (error) {
      if (isSystemError(error)) {
        throw new IOFailureError('write', this.outputDirectory, error);
      }
      throw new CodecFailureError('zip', `cannot extract ${this.inputPath}`, error);
    }
  }

  private async readZipEntry(file: unzipper.File): Promise<Buffer> {
    try {
      return await file.buffer();
    } catch (error) {
      throw new CodecFailureError('zip', `cannot read entry ${file.path}`, error);
    }
  }

  /**
   * 7za extracts to disk: run it into a private staging directory on a
   * background task, load the tar it produced, drop the staging directory.
   */
  private async decompressSevenZip(): Promise<Buffer> {
    const stagingDir = await withIO('mkdir', this.outputDirectory, () =>
      fs.promises.mkdtemp(path.join(this.outputDirectory, '.seven7-'))
    );

    try {
      this.status.phase(
        `Extracting (${extension(this.format)})`,
        undefined,
        'creating tar as binary blob'
      );
      const task = BackgroundTask.run('7z extract', () =>
        sevenZip.extractArchive(path.resolve(this.inputPath), stagingDir)
      );
      await waitForTask(task, this.status);

      const tarPath = await locateStagedTar(stagingDir);
      return await withIO('read', tarPath, () => fs.promises.readFile(tarPath));
    } finally {
      await removePath(stagingDir, `decoder:${this.format}`);
    }
  }
}

async function assertReadable(inputPath: string): Promise<void> {
  await withIO('open', inputPath, () =>
    fs.promises.access(inputPath, fs.constants.R_OK)
  );
}

/**
 * Archives written here always hold SEVEN_Z_TAR_FILENAME; a foreign tar.7z
 * holding a single file of another name is accepted too.
 */
async function locateStagedTar(stagingDir: string): Promise<string> {
  const files = await listFiles(stagingDir);
  if (files.includes(SEVEN_Z_TAR_FILENAME)) {
    return path.join(stagingDir, SEVEN_Z_TAR_FILENAME);
  }
  if (files.length === 1) {
    core.debug(`[decoder:7z] Using ${files[0]} as the tar stream`);
    return path.join(stagingDir, files[0]);
  }
  throw new CodecFailureError(
    '7z',
    `expected a single tar in the archive, found ${files.length} files`
  );
}
