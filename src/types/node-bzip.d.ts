declare module 'seek-bzip' {
  interface Bunzip {
    /**
     * Decode bzip2 compressed data
     * @param input - BZip2 compressed buffer (must start with BZh header)
     * @param output - Optional output buffer
     * @param multistream - Keep decoding concatenated bzip2 streams
     * @returns Decompressed buffer
     */
    decode(input: Buffer, output?: Buffer, multistream?: boolean): Buffer;
  }
  const Bunzip: Bunzip;
  export = Bunzip;
}
