/**
 * gzip codec backed by Node's zlib
 */

import {createGunzip, createGzip, constants as zlibConstants} from 'zlib';
import {ArchiveFormat, StreamCodec} from '../types';

export const gzipCodec: StreamCodec = {
  format: ArchiveFormat.GZIP,

  createCompressor(compressionLevel: number) {
    return createGzip({
      level: compressionLevel,
      memLevel: zlibConstants.Z_DEFAULT_MEMLEVEL,
    });
  },

  createDecompressor() {
    return createGunzip();
  },
};
