/**
 * Compression module types and interfaces
 */

export enum ArchiveFormat {
  GZIP = 'gzip',
  BZIP2 = 'bzip2',
  ZIP = 'zip',
  SEVEN_Z = '7z',
  XZ = 'xz',
}

/**
 * A single file mapped from disk into the archive
 */
export interface Entry {
  /**
   * Path inside the archive, forward-slash separated, no leading slash
   */
  archivePath: string;
  sourcePath: string;
}

/**
 * Sparse progress update. Absent fields mean "no change".
 * A `total` resets a determinate bar to that scale; an `increment`
 * in a phase without a total is an indeterminate tick.
 */
export interface UpdateStatus {
  brief?: string;
  detail?: string;
  increment?: number;
  total?: number;
}

export type StatusSink = (status: UpdateStatus) => void;

export interface ManifestOptions {
  /**
   * Globs a path must match at least one of. Absent means every file.
   */
  includes?: string[];
  /**
   * Globs removing matching paths, applied after includes
   */
  excludes?: string[];
}

export interface EncoderOptions {
  status?: StatusSink;
  /**
   * Compression level (1-9, where 9 = best compression)
   */
  compressionLevel?: number;
}

export interface DecoderOptions {
  status?: StatusSink;
}

export interface ExtractedArchive {
  outputDirectory: string;
  /**
   * Every non-directory path under the output directory after extraction
   */
  files: Set<string>;
}

export interface DetectionResult {
  available: boolean;
  command: string;
  version?: string;
}

/**
 * Formats whose codec compresses a single byte stream (the tar)
 */
export type StreamFormat = ArchiveFormat.GZIP | ArchiveFormat.BZIP2 | ArchiveFormat.XZ;

/**
 * A streaming compressor/decompressor pair
 */
export interface StreamCodec {
  readonly format: StreamFormat;
  createCompressor(compressionLevel: number): NodeJS.ReadWriteStream;
  createDecompressor(): NodeJS.ReadWriteStream;
}
