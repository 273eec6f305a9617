// src/core/export/png-image.ts
import { inflate } from 'pako';
import { PDFHexString, type PDFDocument, type PDFRef } from 'pdf-lib';

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

export type PngColorType = 0 | 2 | 3 | 4 | 6;

export interface PngHeader {
  width: number;
  height: number;
  bitDepth: number;
  colorType: PngColorType;
  interlaced: boolean;
}

export interface PngLayout {
  header: PngHeader;
  /** Concatenated IDAT payload: one zlib stream of filtered scanlines. */
  idat: Buffer;
  palette?: Buffer;
  transparency?: Buffer;
}

export interface EmbeddedImage {
  ref: PDFRef;
  width: number;
  height: number;
}

const CHANNELS: Record<PngColorType, number> = { 0: 1, 2: 3, 3: 1, 4: 2, 6: 4 };

function isColorType(value: number): value is PngColorType {
  return value === 0 || value === 2 || value === 3 || value === 4 || value === 6;
}

export function parsePng(bytes: Buffer): PngLayout {
  if (bytes.length < 8 || PNG_SIGNATURE.some((b, i) => bytes[i] !== b)) {
    throw new Error('Not a PNG file');
  }

  let header: PngHeader | undefined;
  let palette: Buffer | undefined;
  let transparency: Buffer | undefined;
  const idat: Buffer[] = [];

  let offset = 8;
  while (offset + 8 <= bytes.length) {
    const length = bytes.readUInt32BE(offset);
    const type = bytes.toString('latin1', offset + 4, offset + 8);
    const start = offset + 8;
    if (start + length + 4 > bytes.length) {
      throw new Error(`Truncated PNG chunk ${type}`);
    }
    const data = bytes.subarray(start, start + length);
    offset = start + length + 4;

    if (type === 'IHDR') {
      const colorType = data[9];
      if (length !== 13 || !isColorType(colorType)) {
        throw new Error('Invalid PNG header');
      }
      if (data[10] !== 0 || data[11] !== 0) {
        throw new Error('Unknown PNG compression or filter method');
      }
      header = {
        width: data.readUInt32BE(0),
        height: data.readUInt32BE(4),
        bitDepth: data[8],
        colorType,
        interlaced: data[12] === 1,
      };
    } else if (type === 'PLTE') {
      palette = data;
    } else if (type === 'tRNS') {
      transparency = data;
    } else if (type === 'IDAT') {
      idat.push(data);
    } else if (type === 'IEND') {
      break;
    }
  }

  if (!header) throw new Error('PNG has no IHDR chunk');
  if (idat.length === 0) throw new Error('PNG has no image data');
  if (header.colorType === 3 && !palette) throw new Error('Indexed PNG has no palette');

  return { header, idat: Buffer.concat(idat), palette, transparency };
}

function paeth(a: number, b: number, c: number): number {
  const p = a + b - c;
  const pa = Math.abs(p - a);
  const pb = Math.abs(p - b);
  const pc = Math.abs(p - c);
  if (pa <= pb && pa <= pc) return a;
  return pb <= pc ? b : c;
}

/** Reverses the per-row PNG filters; `bpp` is bytes per complete pixel, at least 1. */
export function unfilterScanlines(data: Uint8Array, height: number, stride: number, bpp: number): Uint8Array {
  if (data.length < height * (stride + 1)) {
    throw new Error('Truncated PNG image data');
  }

  const out = new Uint8Array(height * stride);
  for (let y = 0; y < height; y++) {
    const filter = data[y * (stride + 1)];
    const src = y * (stride + 1) + 1;
    const row = y * stride;
    const prev = row - stride;

    for (let x = 0; x < stride; x++) {
      const raw = data[src + x];
      const a = x >= bpp ? out[row + x - bpp] : 0;
      const b = y > 0 ? out[prev + x] : 0;
      const c = x >= bpp && y > 0 ? out[prev + x - bpp] : 0;
      let value: number;
      switch (filter) {
        case 0:
          value = raw;
          break;
        case 1:
          value = raw + a;
          break;
        case 2:
          value = raw + b;
          break;
        case 3:
          value = raw + ((a + b) >> 1);
          break;
        case 4:
          value = raw + paeth(a, b, c);
          break;
        default:
          throw new Error(`Unknown PNG filter type ${filter}`);
      }
      out[row + x] = value & 0xff;
    }
  }
  return out;
}

function decodeScanlines(png: PngLayout): Uint8Array {
  const { width, height, bitDepth, colorType } = png.header;
  const bitsPerPixel = CHANNELS[colorType] * bitDepth;
  const stride = Math.ceil((width * bitsPerPixel) / 8);
  return unfilterScanlines(inflate(png.idat), height, stride, Math.max(1, bitsPerPixel >> 3));
}

/** Splits interleaved grey+alpha or RGBA samples into colour and alpha planes. */
function splitAlpha(pixels: Uint8Array, png: PngLayout): { color: Uint8Array; alpha: Uint8Array } {
  const { width, height, bitDepth, colorType } = png.header;
  const sampleBytes = bitDepth >> 3;
  const colorBytes = (CHANNELS[colorType] - 1) * sampleBytes;
  const pixelCount = width * height;
  const color = new Uint8Array(pixelCount * colorBytes);
  const alpha = new Uint8Array(pixelCount * sampleBytes);

  for (let i = 0; i < pixelCount; i++) {
    const src = i * (colorBytes + sampleBytes);
    color.set(pixels.subarray(src, src + colorBytes), i * colorBytes);
    alpha.set(pixels.subarray(src + colorBytes, src + colorBytes + sampleBytes), i * sampleBytes);
  }
  return { color, alpha };
}

/** 8-bit alpha per pixel from palette indices and the tRNS table. */
function paletteAlpha(indices: Uint8Array, png: PngLayout, transparency: Buffer): Uint8Array {
  const { width, height, bitDepth } = png.header;
  const stride = Math.ceil((width * bitDepth) / 8);
  const mask = (1 << bitDepth) - 1;
  const alpha = new Uint8Array(width * height);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const bit = x * bitDepth;
      const index = (indices[y * stride + (bit >> 3)] >> (8 - bitDepth - (bit & 7))) & mask;
      alpha[y * width + x] = index < transparency.length ? transparency[index] : 0xff;
    }
  }
  return alpha;
}

function colorSpaceFor(png: PngLayout): string | [string, string, number, PDFHexString] {
  const { colorType } = png.header;
  if (colorType === 0 || colorType === 4) return 'DeviceGray';
  if (colorType === 2 || colorType === 6) return 'DeviceRGB';
  const palette = png.palette ?? Buffer.alloc(0);
  return ['Indexed', 'DeviceRGB', palette.length / 3 - 1, PDFHexString.of(palette.toString('hex'))];
}

/** Colour-key mask ranges for greyscale and RGB tRNS. */
function colorKeyMask(png: PngLayout): number[] | undefined {
  const { transparency, header } = png;
  if (!transparency) return undefined;
  if (header.colorType === 0 && transparency.length >= 2) {
    const key = transparency.readUInt16BE(0);
    return [key, key];
  }
  if (header.colorType === 2 && transparency.length >= 6) {
    return [0, 2, 4].flatMap(at => {
      const key = transparency.readUInt16BE(at);
      return [key, key];
    });
  }
  return undefined;
}

function registerAlphaMask(pdf: PDFDocument, alpha: Uint8Array, png: PngLayout, bitDepth: number): PDFRef | undefined {
  if (alpha.every(value => value === 0xff)) {
    return undefined;
  }
  const { width, height } = png.header;
  return pdf.context.register(
    pdf.context.flateStream(alpha, {
      Type: 'XObject',
      Subtype: 'Image',
      Width: width,
      Height: height,
      BitsPerComponent: bitDepth,
      ColorSpace: 'DeviceGray',
    })
  );
}

/**
 * Embeds a non-interlaced PNG as an image XObject without changing its colour
 * space or sample depth. Greyscale, RGB and indexed images keep their IDAT
 * stream byte for byte, decoded by the PDF reader through the PNG predictor.
 * Images with an alpha channel are unfiltered once and split into a colour
 * image and an SMask, since PDF has no interleaved alpha.
 */
export function embedPngLossless(pdf: PDFDocument, png: PngLayout): EmbeddedImage {
  const { width, height, bitDepth, colorType } = png.header;
  if (png.header.interlaced) {
    throw new Error('Interlaced PNG cannot be embedded without decoding');
  }

  const base = {
    Type: 'XObject',
    Subtype: 'Image',
    Width: width,
    Height: height,
    BitsPerComponent: bitDepth,
    ColorSpace: colorSpaceFor(png),
  };

  if (colorType === 4 || colorType === 6) {
    const { color, alpha } = splitAlpha(decodeScanlines(png), png);
    const smask = registerAlphaMask(pdf, alpha, png, bitDepth);
    const stream = pdf.context.flateStream(color, smask ? { ...base, SMask: smask } : base);
    return { ref: pdf.context.register(stream), width, height };
  }

  const alphaMask =
    colorType === 3 && png.transparency
      ? registerAlphaMask(pdf, paletteAlpha(decodeScanlines(png), png, png.transparency), png, 8)
      : undefined;
  const colorKey = colorKeyMask(png);

  const stream = pdf.context.stream(new Uint8Array(png.idat), {
    ...base,
    Filter: 'FlateDecode',
    DecodeParms: { Predictor: 15, Colors: CHANNELS[colorType], BitsPerComponent: bitDepth, Columns: width },
    ...(alphaMask ? { SMask: alphaMask } : {}),
    ...(colorKey ? { Mask: colorKey } : {}),
  });
  return { ref: pdf.context.register(stream), width, height };
}
