// src/core/extract/data-url.ts
import { ErrorCode, ExtractionError } from '../errors.js';

export interface DecodedDataUrl {
  mimeType: string;
  bytes: Buffer;
}

const BASE64_BODY = /^[A-Za-z0-9+/]*={0,2}$/;
const PERCENT_ESCAPE = /%([0-9a-f]{2})/gi;
const STRAY_PERCENT = /%(?![0-9a-f]{2})/i;

/**
 * Decode a `data:image/...` URL without touching the network.
 * Throws `ExtractionError` (decode_failed) for anything that is not a
 * non-empty image payload.
 */
export function decodeDataUrl(dataUrl: string): DecodedDataUrl {
  const comma = dataUrl.indexOf(',');
  if (!dataUrl.startsWith('data:') || comma === -1) {
    throw new ExtractionError(ErrorCode.DECODE_FAILED, 'Invalid data URL format');
  }

  const header = dataUrl.slice(5, comma);
  const [mimeType, ...params] = header.split(';');
  if (!mimeType.startsWith('image/')) {
    throw new ExtractionError(ErrorCode.DECODE_FAILED, `Not an image data URL: ${mimeType || '(none)'}`);
  }

  const body = dataUrl.slice(comma + 1);
  let bytes: Buffer;
  if (params.includes('base64')) {
    const compact = body.replace(/\s+/g, '');
    if (compact.length % 4 === 1 || !BASE64_BODY.test(compact)) {
      throw new ExtractionError(ErrorCode.DECODE_FAILED, 'Corrupt base64 payload', { mimeType });
    }
    bytes = Buffer.from(compact, 'base64');
  } else {
    if (STRAY_PERCENT.test(body)) {
      throw new ExtractionError(ErrorCode.DECODE_FAILED, 'Corrupt percent-encoded payload', { mimeType });
    }
    bytes = decodePercentEncoded(body);
  }

  if (bytes.length === 0) {
    throw new ExtractionError(ErrorCode.DECODE_FAILED, 'Empty image payload', { mimeType });
  }
  return { mimeType, bytes };
}

/** Each `%XX` is one raw byte, so binary payloads survive; literal text is UTF-8. */
function decodePercentEncoded(body: string): Buffer {
  const chunks: Buffer[] = [];
  let last = 0;
  for (const match of body.matchAll(PERCENT_ESCAPE)) {
    const index = match.index ?? last;
    chunks.push(Buffer.from(body.slice(last, index), 'utf8'), Buffer.from([parseInt(match[1], 16)]));
    last = index + match[0].length;
  }
  chunks.push(Buffer.from(body.slice(last), 'utf8'));
  return Buffer.concat(chunks);
}
