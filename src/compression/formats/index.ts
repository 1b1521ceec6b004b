/**
 * Export all codec adapters
 */

// Streaming codecs (compress the tar as one byte stream)
export {gzipCodec} from './gzip';
export {bzip2Codec} from './bzip2';
export {xzCodec} from './xz';

// Containers and disk-based tools
export {TarBuilder, unpackTar} from './tar';
export {ZipWriter, openZip, ZIP_ENTRY_MODE} from './zip';
export * as sevenZip from './seven-zip';
