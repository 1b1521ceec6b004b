/**
 * Codec factory: maps a stream format to its compressor/decompressor pair
 */

import {ArchiveFormat, StreamCodec, StreamFormat} from './types';
import {bzip2Codec, gzipCodec, xzCodec} from './formats';

// Registry of the formats that compress the tar as a single byte stream
const codecRegistry: Record<StreamFormat, StreamCodec> = {
  [ArchiveFormat.GZIP]: gzipCodec,
  [ArchiveFormat.BZIP2]: bzip2Codec,
  [ArchiveFormat.XZ]: xzCodec,
};

export function isStreamFormat(format: ArchiveFormat): format is StreamFormat {
  return (
    format === ArchiveFormat.GZIP ||
    format === ArchiveFormat.BZIP2 ||
    format === ArchiveFormat.XZ
  );
}

/**
 * Get the streaming codec for a format
 */
export function getStreamCodec(format: StreamFormat): StreamCodec {
  return codecRegistry[format];
}

/**
 * Get all registered streaming codecs
 */
export function getAllStreamCodecs(): StreamCodec[] {
  return Object.values(codecRegistry);
}
