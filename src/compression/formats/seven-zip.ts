/**
 * 7z codec: drives the 7za binary from 7zip-bin through @actions/exec.
 *
 * 7za only works on files, so callers stage the tar on disk first.
 */

import * as core from '@actions/core';
import * as exec from '@actions/exec';
import {CodecFailureError, TaskFailureError} from '../../errors';
import {detectSevenZip} from '../detector';

// 7za exit codes
const EXIT_OK = 0;
const EXIT_WARNING = 1;
const EXIT_FATAL = 2;

async function run7za(task: string, args: string[], cwd?: string): Promise<void> {
  const tool = await detectSevenZip();
  if (!tool.available) {
    throw new CodecFailureError('7z', `${tool.command} is not available`);
  }

  core.debug(`[7z] Executing: 7za ${args.join(' ')}`);

  let stdout = '';
  let stderr = '';
  let exitCode: number;

  try {
    exitCode = await exec.exec(tool.command, args, {
      cwd,
      silent: true,
      ignoreReturnCode: true,
      listeners: {
        stdout: (data: Buffer) => {
          stdout += data.toString();
        },
        stderr: (data: Buffer) => {
          stderr += data.toString();
        },
      },
    });
  } catch (error) {
    throw new TaskFailureError(task, 'could not start 7za', error);
  }

  const output = (stderr || stdout).trim();

  if (exitCode === EXIT_OK) {
    return;
  }
  if (exitCode === EXIT_WARNING) {
    core.warning(`[7z] 7za reported warnings: ${output}`);
    return;
  }
  if (exitCode === EXIT_FATAL) {
    throw new CodecFailureError('7z', `7za failed: ${output || 'no output'}`);
  }
  throw new TaskFailureError(
    task,
    `terminated abnormally: 7za exited with code ${exitCode}: ${output || 'no output'}`
  );
}

/**
 * Compress `fileName` (relative to `workingDir`) into a new 7z archive
 */
export async function compressFile(
  archivePath: string,
  workingDir: string,
  fileName: string,
  compressionLevel: number
): Promise<void> {
  await run7za(
    '7z compress',
    ['a', '-t7z', `-mx=${compressionLevel}`, '-bd', '-y', archivePath, fileName],
    workingDir
  );
}

/**
 * Extract every file of a 7z archive into `outputDir`
 */
export async function extractArchive(
  archivePath: string,
  outputDir: string
): Promise<void> {
  await run7za('7z extract', ['x', '-bd', '-y', `-o${outputDir}`, archivePath]);
}
