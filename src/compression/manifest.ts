/**
 * Manifest builder: walks an input path and filters it into archive entries
 */

import * as core from '@actions/core';
import * as fs from 'fs';
import * as path from 'path';
import {minimatch} from 'minimatch';
import {withIO} from '../errors';
import {Entry, ManifestOptions} from './types';

const GLOB_OPTIONS = {dot: true};

/**
 * Decide whether an archive path survives the include/exclude filters.
 * Includes are OR-ed; excludes remove anything they match afterwards.
 */
export function matchesFilters(
  archivePath: string,
  options: ManifestOptions
): boolean {
  const {includes, excludes} = options;

  if (
    includes !== undefined &&
    !includes.some(pattern => minimatch(archivePath, pattern, GLOB_OPTIONS))
  ) {
    return false;
  }

  if (
    excludes !== undefined &&
    excludes.some(pattern => minimatch(archivePath, pattern, GLOB_OPTIONS))
  ) {
    return false;
  }

  return true;
}

/**
 * List the files under `root` as archive entries.
 *
 * Archive paths are relative to `root` when it is a directory, or to its
 * parent when it is a single file. Output follows walk order.
 */
export async function buildManifest(
  root: string,
  options: ManifestOptions = {}
): Promise<Entry[]> {
  const stats = await withIO('stat', root, () => fs.promises.stat(root));
  const candidates: Entry[] = [];

  if (stats.isDirectory()) {
    await walk(root, '', candidates);
  } else if (stats.isFile()) {
    candidates.push({archivePath: path.basename(root), sourcePath: root});
  }

  const entries = candidates.filter(entry =>
    matchesFilters(entry.archivePath, options)
  );

  core.debug(
    `[manifest] ${root}: ${entries.length} of ${candidates.length} files selected`
  );
  return entries;
}

async function walk(
  directory: string,
  prefix: string,
  entries: Entry[]
): Promise<void> {
  const children = await withIO('readdir', directory, () =>
    fs.promises.readdir(directory, {withFileTypes: true})
  );

  for (const child of children) {
    const sourcePath = path.join(directory, child.name);
    const archivePath = prefix ? `${prefix}/${child.name}` : child.name;

    if (child.isDirectory()) {
      await walk(sourcePath, archivePath, entries);
    } else if (child.isFile() || child.isSymbolicLink()) {
      entries.push({archivePath, sourcePath});
    } else {
      core.debug(`[manifest] Skipping special file: ${sourcePath}`);
    }
  }
}
