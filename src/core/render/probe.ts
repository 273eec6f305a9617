// src/core/render/probe.ts
import { MIN_PAGE_WIDTH } from '../config/constants.js';
import type { CandidateClass, PageCandidate, ProbeResult } from '../types/index.js';
import { isValidUrl } from './utils.js';
import type { ViewerSurface } from './viewer.js';

const IMAGE_DATA_URL = /^data:image\/[a-z0-9.+-]+(;[^,]*)?,/i;

function hasPayload(sourceRef: string): boolean {
  const header = sourceRef.match(IMAGE_DATA_URL);
  if (header) {
    return sourceRef.length > header[0].length;
  }
  return isValidUrl(sourceRef);
}

/**
 * Thumbnails are anything narrower than `minWidth`. Placeholders are
 * elements whose pixels are missing, still loading, or a single flat
 * colour; ad and blocked-page slots land here too.
 */
export function classifyCandidate(candidate: PageCandidate, minWidth: number = MIN_PAGE_WIDTH): CandidateClass {
  if (candidate.width < minWidth) {
    return 'thumbnail';
  }
  if (!candidate.complete || candidate.blank === true || !hasPayload(candidate.sourceRef)) {
    return 'placeholder';
  }
  return 'page';
}

export function partitionCandidates(candidates: PageCandidate[], minWidth: number = MIN_PAGE_WIDTH): ProbeResult {
  const result: ProbeResult = { pages: [], placeholders: [], thumbnails: [] };
  for (const candidate of candidates) {
    switch (classifyCandidate(candidate, minWidth)) {
      case 'page':
        result.pages.push(candidate);
        break;
      case 'placeholder':
        result.placeholders.push(candidate);
        break;
      case 'thumbnail':
        result.thumbnails.push(candidate);
        break;
    }
  }
  return result;
}

export class RenderProbe {
  constructor(private minWidth: number = MIN_PAGE_WIDTH) {}

  async probe(surface: ViewerSurface): Promise<ProbeResult> {
    return partitionCandidates(await surface.scan(), this.minWidth);
  }
}
