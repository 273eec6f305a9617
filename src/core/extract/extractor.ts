// src/core/extract/extractor.ts
import { AuthError, ErrorCode, ExtractionError, describeError } from '../errors.js';
import { fingerprint } from '../dedupe/fingerprint.js';
import type { FetchedResource, ViewerSurface } from '../render/viewer.js';
import { describeRef, isDataUrl } from '../render/utils.js';
import type { ExtractedImage, PageCandidate } from '../types/index.js';
import { decodeDataUrl } from './data-url.js';
import { sniffImageFormat } from './image-format.js';

/**
 * Turns a page-eligible candidate into image bytes plus fingerprint.
 *
 * Inline payloads are decoded locally; remote images are fetched through the
 * viewer's own browsing context so the portal session cookies ride along.
 */
export class PageExtractor {
  constructor(private surface: ViewerSurface) {}

  async extract(candidate: PageCandidate): Promise<ExtractedImage> {
    const bytes = isDataUrl(candidate.sourceRef)
      ? decodeDataUrl(candidate.sourceRef).bytes
      : await this.download(candidate.sourceRef);

    const format = sniffImageFormat(bytes);
    if (!format) {
      throw new ExtractionError(
        ErrorCode.DECODE_FAILED,
        `Unrecognised image bytes from ${describeRef(candidate.sourceRef)}`
      );
    }

    return {
      imageBytes: bytes,
      format,
      width: candidate.width,
      height: candidate.height,
      fingerprint: fingerprint(bytes),
      sourceKind: candidate.kind,
    };
  }

  private async download(url: string): Promise<Buffer> {
    let resource: FetchedResource;
    try {
      resource = await this.surface.fetchResource(url);
    } catch (error) {
      throw new ExtractionError(ErrorCode.FETCH_FAILED, `Fetch failed for ${describeRef(url)}: ${describeError(error)}`, { url });
    }

    if (resource.status === 401 || resource.status === 403) {
      throw new AuthError(`Portal rejected the session (HTTP ${resource.status})`, ErrorCode.AUTH_REJECTED, { url });
    }
    if (resource.status < 200 || resource.status >= 300) {
      throw new ExtractionError(ErrorCode.FETCH_FAILED, `HTTP ${resource.status} for ${describeRef(url)}`, {
        url,
        status: resource.status,
      });
    }
    if (resource.body.length === 0) {
      throw new ExtractionError(ErrorCode.FETCH_FAILED, `Empty body for ${describeRef(url)}`, { url });
    }
    return resource.body;
  }
}
