/**
 * Driver registry: archive format <-> filename suffix
 */

import {ArchiveFormat} from './types';
import {UnsupportedFormatError} from '../errors';

// Fixed name of the tar stored inside every tar.7z archive
export const SEVEN_Z_TAR_FILENAME = 'swiss_army_archive_seven7_temp.tar';

interface FormatSuffixes {
  canonical: string;
  accepted: string[];
}

const FORMAT_SUFFIXES: Record<ArchiveFormat, FormatSuffixes> = {
  [ArchiveFormat.GZIP]: {canonical: 'tar.gz', accepted: ['tar.gz', 'tgz']},
  [ArchiveFormat.BZIP2]: {canonical: 'tar.bz2', accepted: ['tar.bz2', 'tar.bz']},
  [ArchiveFormat.ZIP]: {canonical: 'zip', accepted: ['zip']},
  [ArchiveFormat.SEVEN_Z]: {canonical: 'tar.7z', accepted: ['tar.7z']},
  [ArchiveFormat.XZ]: {canonical: 'tar.xz', accepted: ['tar.xz']},
};

const ALL_FORMATS = Object.values(ArchiveFormat);

// Longest suffix first so `tar.gz` wins over a shorter overlapping suffix
const SUFFIX_TABLE: Array<{suffix: string; format: ArchiveFormat}> = ALL_FORMATS.flatMap(
  format => FORMAT_SUFFIXES[format].accepted.map(suffix => ({suffix, format}))
).sort((a, b) => b.suffix.length - a.suffix.length);

export function extension(format: ArchiveFormat): string {
  return FORMAT_SUFFIXES[format].canonical;
}

export function fromExtension(ext: string): ArchiveFormat | undefined {
  const normalized = ext.toLowerCase().replace(/^\./, '');
  return SUFFIX_TABLE.find(({suffix}) => suffix === normalized)?.format;
}

export function fromFilename(filename: string): ArchiveFormat | undefined {
  const normalized = filename.toLowerCase();
  return SUFFIX_TABLE.find(({suffix}) => normalized.endsWith(`.${suffix}`))
    ?.format;
}

/**
 * Like fromFilename, but an unknown suffix is an error
 */
export function resolveFormat(filename: string): ArchiveFormat {
  const format = fromFilename(filename);
  if (format === undefined) {
    throw new UnsupportedFormatError(filename);
  }
  return format;
}

export function getAllFormats(): ArchiveFormat[] {
  return [...ALL_FORMATS];
}
