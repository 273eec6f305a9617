import { deflate } from 'pako';

const SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

export interface PngFixtureOptions {
  width: number;
  height: number;
  colorType: number;
  bitDepth?: number;
  interlace?: number;
  /** Filtered scanlines, filter byte first on each row. */
  scanlines: number[];
  palette?: number[];
  transparency?: number[];
}

export interface PngFixture {
  bytes: Buffer;
  /** The zlib stream as split across the IDAT chunks. */
  idat: Buffer;
}

/** CRCs are left zero; the reader under test does not check them. */
function chunk(type: string, data: Uint8Array): Buffer {
  const length = Buffer.alloc(4);
  length.writeUInt32BE(data.length);
  return Buffer.concat([length, Buffer.from(type, 'latin1'), Buffer.from(data), Buffer.alloc(4)]);
}

export function pngFixture(options: PngFixtureOptions): PngFixture {
  const ihdr = Buffer.alloc(13);
  ihdr.writeUInt32BE(options.width, 0);
  ihdr.writeUInt32BE(options.height, 4);
  ihdr[8] = options.bitDepth ?? 8;
  ihdr[9] = options.colorType;
  ihdr[12] = options.interlace ?? 0;

  const idat = Buffer.from(deflate(Uint8Array.from(options.scanlines)));
  const chunks = [chunk('IHDR', ihdr)];
  if (options.palette) chunks.push(chunk('PLTE', Uint8Array.from(options.palette)));
  if (options.transparency) chunks.push(chunk('tRNS', Uint8Array.from(options.transparency)));
  // Two IDAT chunks: readers must join them
  chunks.push(chunk('IDAT', idat.subarray(0, 2)), chunk('IDAT', idat.subarray(2)), chunk('IEND', new Uint8Array(0)));

  return { bytes: Buffer.concat([SIGNATURE, ...chunks]), idat };
}
