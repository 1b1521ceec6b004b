import * as core from '@actions/core';
import * as path from 'path';
import {
  ArchiveError,
  DigestMismatchError,
  UnsupportedFormatError,
} from './errors';
import {
  ArchiveFormat,
  Decoder,
  Encoder,
  buildManifest,
  detectSevenZip,
  fromFilename,
} from './compression';
import {
  ActionConfig,
  CompressConfig,
  ExtractConfig,
  getConfig,
} from './config';
import {LogProgress} from './progress';

export interface CompressResult {
  archivePath: string;
  digest: string;
  entryCount: number;
}

export interface ExtractResult {
  outputDirectory: string;
  files: string[];
}

/**
 * Archive `config.path`. Entries are sorted by archive path so repeated runs
 * over the same tree produce the same archive.
 */
export async function compress(
  config: CompressConfig,
  progress?: LogProgress
): Promise<CompressResult> {
  const entries = await buildManifest(config.path, {
    includes: config.includes,
    excludes: config.excludes,
  });
  entries.sort((a, b) =>
    a.archivePath < b.archivePath ? -1 : a.archivePath > b.archivePath ? 1 : 0
  );
  core.info(`📂 ${entries.length} files selected from ${config.path}`);

  const encoder = await Encoder.create(config.outputDirectory, config.outputFilename, {
    status: progress?.sink,
    compressionLevel: config.compressionLevel,
  });

  await encoder.addEntries(entries);
  const archive = await encoder.finish();
  const digest = await archive.digest();
  progress?.end();

  return {archivePath: archive.path, digest, entryCount: entries.length};
}

export async function extract(
  config: ExtractConfig,
  progress?: LogProgress
): Promise<ExtractResult> {
  const decoder = await Decoder.open(
    config.path,
    config.sha256,
    config.outputDirectory,
    {status: progress?.sink}
  );
  const extracted = await decoder.extract();
  progress?.end();

  return {
    outputDirectory: extracted.outputDirectory,
    files: [...extracted.files].sort(),
  };
}

async function logToolchain(config: ActionConfig): Promise<void> {
  const archiveName =
    config.mode === 'compress' ? config.outputFilename : path.basename(config.path);
  if (fromFilename(archiveName) !== ArchiveFormat.SEVEN_Z) {
    return;
  }
  const tool = await detectSevenZip();
  core.info(
    `🔧 7za: ${tool.available ? (tool.version ?? 'available') : 'not available'}`
  );
}

export async function run(): Promise<void> {
  try {
    core.info('🗜️ Archive Transcoder Action');
    core.debug(`Running on: ${process.platform} ${process.arch}`);
    core.debug(`Node version: ${process.version}`);

    const config = getConfig();
    const progress = config.progress ? new LogProgress() : undefined;
    await logToolchain(config);

    if (config.mode === 'compress') {
      const result = await compress(config, progress);
      core.setOutput('archive-path', result.archivePath);
      core.setOutput('digest', result.digest);
      core.info(`✅ Archive ready: ${result.archivePath}`);
      core.info(`   sha256: ${result.digest}`);
    } else {
      const result = await extract(config, progress);
      core.setOutput('files', JSON.stringify(result.files));
      core.setOutput('file-count', result.files.length.toString());
      core.info(
        `✅ Extracted ${result.files.length} files into ${result.outputDirectory}`
      );
    }
  } catch (error) {
    const errorMsg = error instanceof Error ? error.message : String(error);
    core.setFailed(`❌ Archive operation failed: ${errorMsg}`);

    if (error instanceof Error && error.stack) {
      core.debug('Stack trace:');
      core.debug(error.stack);
    }

    if (error instanceof UnsupportedFormatError) {
      core.error('');
      core.error('Supported suffixes: .tar.gz .tgz .tar.bz2 .tar.bz .zip .tar.7z .tar.xz');
    } else if (error instanceof DigestMismatchError) {
      core.error('');
      core.error('The archive does not match the expected sha256:');
      core.error('  - Verify the sha256 input was produced for this archive');
      core.error('  - Check the archive was not truncated in transfer');
    } else if (error instanceof ArchiveError) {
      core.debug(`Error code: ${error.code}`);
    }
  }
}
