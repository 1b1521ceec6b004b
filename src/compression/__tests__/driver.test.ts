/**
 * Tests for format <-> suffix dispatch
 */

import {
  extension,
  fromExtension,
  fromFilename,
  getAllFormats,
  resolveFormat,
} from '../driver';
import {ArchiveFormat} from '../types';
import {UnsupportedFormatError} from '../../errors';

describe('Driver registry', () => {
  describe('fromFilename()', () => {
    test('should detect every accepted suffix', () => {
      expect(fromFilename('release-1.0.tar.gz')).toBe(ArchiveFormat.GZIP);
      expect(fromFilename('release.tgz')).toBe(ArchiveFormat.GZIP);
      expect(fromFilename('release.tar.bz2')).toBe(ArchiveFormat.BZIP2);
      expect(fromFilename('release.tar.bz')).toBe(ArchiveFormat.BZIP2);
      expect(fromFilename('release.zip')).toBe(ArchiveFormat.ZIP);
      expect(fromFilename('release.tar.7z')).toBe(ArchiveFormat.SEVEN_Z);
      expect(fromFilename('release.tar.xz')).toBe(ArchiveFormat.XZ);
    });

    test('should ignore suffix case', () => {
      expect(fromFilename('BACKUP.TAR.GZ')).toBe(ArchiveFormat.GZIP);
      expect(fromFilename('Photos.Zip')).toBe(ArchiveFormat.ZIP);
    });

    test('should work on full paths', () => {
      expect(fromFilename('/tmp/out/cache.tar.xz')).toBe(ArchiveFormat.XZ);
    });

    test('should return undefined for unknown suffixes', () => {
      expect(fromFilename('x.unknownext')).toBeUndefined();
      expect(fromFilename('archive.tar')).toBeUndefined();
      expect(fromFilename('archive.7z')).toBeUndefined();
      expect(fromFilename('tar.gz')).toBeUndefined();
    });
  });

  describe('fromExtension()', () => {
    test('should accept extensions with or without a leading dot', () => {
      expect(fromExtension('tar.gz')).toBe(ArchiveFormat.GZIP);
      expect(fromExtension('.tgz')).toBe(ArchiveFormat.GZIP);
      expect(fromExtension('TAR.BZ')).toBe(ArchiveFormat.BZIP2);
    });

    test('should return undefined for unknown extensions', () => {
      expect(fromExtension('rar')).toBeUndefined();
    });
  });

  describe('extension()', () => {
    test('should return the canonical suffix', () => {
      expect(getAllFormats().map(extension)).toEqual([
        'tar.gz',
        'tar.bz2',
        'zip',
        'tar.7z',
        'tar.xz',
      ]);
    });

    test('should round-trip through fromExtension', () => {
      for (const format of getAllFormats()) {
        expect(fromExtension(extension(format))).toBe(format);
      }
    });
  });

  describe('resolveFormat()', () => {
    test('should throw UnsupportedFormatError naming the file', () => {
      expect(() => resolveFormat('notes.rar')).toThrow(UnsupportedFormatError);
      expect(() => resolveFormat('notes.rar')).toThrow(
        'could not determine archive format from notes.rar suffix'
      );
    });
  });
});
