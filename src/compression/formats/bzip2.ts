/**
 * bzip2 codec backed by compressjs.
 *
 * compressjs works on whole buffers, so the streams below collect their
 * input and run the codec once the input ends.
 */

import {Transform, TransformCallback} from 'stream';
import {Bzip2} from 'compressjs';
import {ArchiveFormat, StreamCodec} from '../types';

type BufferCodec = (input: Buffer) => Buffer;

class WholeBufferTransform extends Transform {
  private readonly chunks: Buffer[] = [];

  constructor(private readonly convert: BufferCodec) {
    super();
  }

  _transform(
    chunk: Buffer,
    _encoding: BufferEncoding,
    callback: TransformCallback
  ): void {
    this.chunks.push(chunk);
    callback();
  }

  _flush(callback: TransformCallback): void {
    let output: Buffer;
    try {
      output = this.convert(Buffer.concat(this.chunks));
    } catch (error) {
      callback(error instanceof Error ? error : new Error(String(error)));
      return;
    }
    callback(null, output);
  }
}

export const bzip2Codec: StreamCodec = {
  format: ArchiveFormat.BZIP2,

  // compressjs picks its own block size; the level does not apply
  createCompressor() {
    return new WholeBufferTransform(input =>
      Buffer.from(Bzip2.compressFile(input))
    );
  },

  createDecompressor() {
    return new WholeBufferTransform(input =>
      Buffer.from(Bzip2.decompressFile(input))
    );
  },
};
