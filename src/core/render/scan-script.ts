// src/core/render/scan-script.ts
import type { PageCandidate } from '../types/index.js';

export interface ScanArgs {
  root: string;
  minSize: number;
}

/**
 * Runs inside the viewer tab via `page.evaluate`. It must stay
 * self-contained: Playwright serializes the function source, so nothing
 * from module scope is reachable here.
 */
export function scanViewer({ root, minSize }: ScanArgs): PageCandidate[] {
  const container = document.querySelector(root);
  if (!container) return [];

  const isBlank = (canvas: HTMLCanvasElement): boolean | null => {
    try {
      const probe = document.createElement('canvas');
      probe.width = 16;
      probe.height = 16;
      const ctx = probe.getContext('2d');
      if (!ctx) return null;
      ctx.drawImage(canvas, 0, 0, 16, 16);
      const data = ctx.getImageData(0, 0, 16, 16).data;
      for (let i = 4; i < data.length; i += 4) {
        if (
          data[i] !== data[0] ||
          data[i + 1] !== data[1] ||
          data[i + 2] !== data[2] ||
          data[i + 3] !== data[3]
        ) {
          return false;
        }
      }
      return true;
    } catch {
      return null;
    }
  };

  const result: PageCandidate[] = [];
  for (const el of Array.from(container.querySelectorAll('canvas, img'))) {
    const rect = el.getBoundingClientRect();

    if (el instanceof HTMLCanvasElement) {
      const width = el.width || rect.width;
      const height = el.height || rect.height;
      if (width < minSize || height < minSize) continue;

      let sourceRef = '';
      try {
        sourceRef = el.toDataURL('image/png');
      } catch {
        // tainted canvas: report it with no payload so it reads as a placeholder
      }
      result.push({ kind: 'canvas', width, height, sourceRef, complete: true, blank: isBlank(el) });
    } else if (el instanceof HTMLImageElement) {
      const width = el.naturalWidth || rect.width;
      const height = el.naturalHeight || rect.height;
      if (width < minSize || height < minSize) continue;

      result.push({
        kind: 'image',
        width,
        height,
        sourceRef: el.currentSrc || el.src || '',
        complete: el.complete && el.naturalWidth > 0,
        blank: null,
      });
    }
  }
  return result;
}
