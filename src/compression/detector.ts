/**
 * 7za tool detection with caching
 */

import * as core from '@actions/core';
import * as exec from '@actions/exec';
import * as fs from 'fs';
import {path7za} from '7zip-bin';
import {DetectionResult} from './types';

// Cache the detection result for the lifetime of the process
let detectionCache: DetectionResult | undefined;

/**
 * Check the binary is executable, restoring the executable bit when the
 * package was unpacked without it
 */
async function ensureExecutable(command: string): Promise<boolean> {
  try {
    await fs.promises.access(command, fs.constants.X_OK);
    return true;
  } catch {
    core.debug(`  ${command} is not executable, trying chmod 755`);
  }

  try {
    await fs.promises.chmod(command, 0o755);
    await fs.promises.access(command, fs.constants.X_OK);
    return true;
  } catch (error) {
    const errorMsg = error instanceof Error ? error.message : String(error);
    core.debug(`  Cannot make ${command} executable: ${errorMsg}`);
    return false;
  }
}

/**
 * Get version of a command (for debugging)
 */
async function getCommandVersion(command: string): Promise<string | undefined> {
  try {
    let output = '';
    await exec.exec(command, [], {
      silent: true,
      ignoreReturnCode: true,
      listeners: {
        stdout: (data: Buffer) => {
          output += data.toString();
        },
      },
    });
    // 7za prints an empty line before its banner
    return output
      .split('\n')
      .map(line => line.trim())
      .find(line => line.length > 0);
  } catch {
    return undefined;
  }
}

/**
 * Detect the 7za binary bundled by 7zip-bin
 */
export async function detectSevenZip(): Promise<DetectionResult> {
  if (detectionCache) {
    return detectionCache;
  }

  core.debug('Detecting 7za availability...');

  const available = await ensureExecutable(path7za);
  const version = available ? await getCommandVersion(path7za) : undefined;

  const result: DetectionResult = {
    available,
    command: path7za,
    version,
  };

  core.debug(
    `  7za: ${available ? 'Available' : 'Not found'}${version ? ` (${version})` : ''}`
  );

  detectionCache = result;
  return result;
}

/**
 * Clear detection cache (useful for testing)
 */
export function clearDetectionCache(): void {
  detectionCache = undefined;
}
