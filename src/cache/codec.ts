import zlib from "zlib";
import { Encoding } from "./manifest";

export type CompressionKind = Exclude<Encoding, "plain">;

/** Transform applied to retired generations. The live value is never encoded. */
export interface Codec {
  readonly encoding: Encoding;
  compress(data: Buffer): Buffer;
  decompress(data: Buffer): Buffer;
}

const plainCodec: Codec = {
  encoding: "plain",
  compress: (data) => data,
  decompress: (data) => data,
};

const codecs: Record<Encoding, Codec> = {
  plain: plainCodec,
  gzip: {
    encoding: "gzip",
    compress: (data) => zlib.gzipSync(data),
    decompress: (data) => zlib.gunzipSync(data),
  },
  deflate: {
    encoding: "deflate",
    compress: (data) => zlib.deflateSync(data),
    decompress: (data) => zlib.inflateSync(data),
  },
  brotli: {
    encoding: "brotli",
    compress: (data) => zlib.brotliCompressSync(data),
    decompress: (data) => zlib.brotliDecompressSync(data),
  },
};

export function codecFor(encoding: Encoding): Codec {
  return codecs[encoding];
}

export function compressionCodec(kind: CompressionKind | "none" | undefined): Codec | undefined {
  if (!kind || kind === "none") return undefined;
  return codecs[kind];
}
