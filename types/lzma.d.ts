/**
 * Type declarations for the `lzma` package (LZMA-JS), which ships none.
 * Only the synchronous decompressor is used.
 */
declare module 'lzma' {
  interface Lzma {
    /** Decompresses an LZMA-alone stream. Returns a string when the payload is valid UTF-8. */
    decompress(data: Uint8Array | number[]): string | number[];
  }

  const lzma: Lzma;
  export = lzma;
}
