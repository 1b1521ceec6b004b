import * as core from '@actions/core';
import * as fs from 'fs';
import * as path from 'path';
import {withIO} from './errors';

/**
 * Get file size in human-readable format
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 Bytes';

  const k = 1024;
  const sizes = ['Bytes', 'KB', 'MB', 'GB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);

  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(2))} ${sizes[i]}`;
}

/**
 * Convert a platform relative path into an archive path
 */
export function toArchivePath(relativePath: string): string {
  return relativePath.split(path.sep).join('/').replace(/^\/+/, '');
}

/**
 * Resolve an archive path under a directory.
 * Returns undefined when the result would escape the directory.
 */
export function resolveInside(
  directory: string,
  archivePath: string
): string | undefined {
  const root = path.resolve(directory);
  const target = path.resolve(root, archivePath);
  const relative = path.relative(root, target);
  if (
    relative === '' ||
    relative === '..' ||
    relative.startsWith(`..${path.sep}`) ||
    path.isAbsolute(relative)
  ) {
    return undefined;
  }
  return target;
}

/**
 * Recursively list every non-directory entry under a directory, relative to
 * it. Symlinks are listed, never followed.
 */
export async function listFiles(directory: string): Promise<string[]> {
  const files: string[] = [];

  const walk = async (current: string, prefix: string): Promise<void> => {
    const entries = await withIO('readdir', current, () =>
      fs.promises.readdir(current, {withFileTypes: true})
    );
    for (const entry of entries) {
      const relative = prefix ? `${prefix}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        await walk(path.join(current, entry.name), relative);
      } else {
        files.push(relative);
      }
    }
  };

  await walk(directory, '');
  return files;
}

/**
 * Remove a file or directory tree during cleanup.
 * Failures are logged as warnings and not raised.
 */
export async function removePath(target: string, tag: string): Promise<void> {
  try {
    await fs.promises.rm(target, {recursive: true, force: true});
    core.debug(`[${tag}] Removed ${target}`);
  } catch (error) {
    const errorMsg = error instanceof Error ? error.message : String(error);
    core.warning(`[${tag}] Failed to remove ${target}: ${errorMsg}`);
  }
}
