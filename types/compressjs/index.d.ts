// compressjs ships no type declarations; only the bzip2 codec is used here.
declare module 'compressjs' {
  interface FileCodec {
    compressFile(input: Uint8Array): Uint8Array | number[];
    decompressFile(input: Uint8Array): Uint8Array | number[];
  }

  export const Bzip2: FileCodec;
}
