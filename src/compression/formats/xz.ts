/**
 * xz codec backed by lzma-native
 */

import * as lzma from 'lzma-native';
import {ArchiveFormat, StreamCodec} from '../types';

export const xzCodec: StreamCodec = {
  format: ArchiveFormat.XZ,

  createCompressor(compressionLevel: number) {
    return lzma.createCompressor({preset: compressionLevel});
  },

  createDecompressor() {
    return lzma.createDecompressor();
  },
};
