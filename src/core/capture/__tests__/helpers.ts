import type { DriverOptions } from '../../config/capture-config.js';
import type { AdvanceOutcome, FetchedResource, ViewerSurface } from '../../render/viewer.js';
import type { PageCandidate } from '../../types/index.js';
import type { Clock } from '../timing.js';

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

/** PNG magic followed by a tag: sniffs as PNG, unique per tag. Not decodable. */
export function pngBytes(tag: string): Buffer {
  return Buffer.concat([PNG_SIGNATURE, Buffer.from(tag)]);
}

/** Smallest header pdf-lib accepts as a baseline RGB JPEG of the given size. */
export function jpegBytes(width: number, height: number, tag = ''): Buffer {
  const comment = Buffer.from(tag);
  return Buffer.concat([
    Buffer.from([0xff, 0xd8]),
    Buffer.from([0xff, 0xfe, 0x00, comment.length + 2]),
    comment,
    Buffer.from([0xff, 0xc0, 0x00, 0x11, 0x08]),
    Buffer.from([height >> 8, height & 0xff, width >> 8, width & 0xff]),
    Buffer.from([0x03, 0x01, 0x11, 0x00, 0x02, 0x11, 0x01, 0x03, 0x11, 0x01]),
    Buffer.from([0xff, 0xd9]),
  ]);
}

export function dataUrl(bytes: Buffer, mime = 'image/png'): string {
  return `data:${mime};base64,${bytes.toString('base64')}`;
}

export function canvasCandidate(bytes: Buffer, overrides: Partial<PageCandidate> = {}): PageCandidate {
  return {
    kind: 'canvas',
    width: 1200,
    height: 1800,
    sourceRef: dataUrl(bytes),
    complete: true,
    blank: false,
    ...overrides,
  };
}

export function imageCandidate(url: string, overrides: Partial<PageCandidate> = {}): PageCandidate {
  return {
    kind: 'image',
    width: 1200,
    height: 1800,
    sourceRef: url,
    complete: true,
    blank: null,
    ...overrides,
  };
}

export function placeholderCandidate(): PageCandidate {
  return canvasCandidate(pngBytes('blank'), { blank: true });
}

/**
 * Scripted viewer: scan N returns frames[N], the last frame repeating once
 * the script runs out.
 */
export class FakeViewer implements ViewerSurface {
  opened = false;
  scans = 0;
  advances = 0;
  fetched: string[] = [];

  constructor(
    private frames: PageCandidate[][],
    private resources: Record<string, FetchedResource | Error> = {},
    private advanceOutcomes: AdvanceOutcome[] = []
  ) {}

  async open(): Promise<void> {
    this.opened = true;
  }

  async scan(): Promise<PageCandidate[]> {
    const frame = this.frames[Math.min(this.scans, this.frames.length - 1)] ?? [];
    this.scans++;
    return frame;
  }

  async advance(): Promise<AdvanceOutcome> {
    this.advances++;
    return this.advanceOutcomes.shift() ?? 'button';
  }

  async fetchResource(url: string): Promise<FetchedResource> {
    this.fetched.push(url);
    const resource = this.resources[url];
    if (resource === undefined) {
      return { status: 404, body: Buffer.alloc(0) };
    }
    if (resource instanceof Error) {
      throw resource;
    }
    return resource;
  }
}

export function ok(body: Buffer): FetchedResource {
  return { status: 200, body, contentType: 'image/png' };
}

export class FakeClock implements Clock {
  current = 0;
  sleeps: number[] = [];

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }
}

export function driverOptions(overrides: Partial<DriverOptions> = {}): DriverOptions {
  return {
    minPageWidth: 800,
    maxPageRetries: 3,
    maxExtractionRetries: 2,
    maxStallRetries: 2,
    stepTimeoutMs: 1000,
    runBudgetMs: 600000,
    delays: {
      settleMs: 10,
      placeholderMs: 10,
      navigationMs: 40,
      stallMs: 20,
      extractionMs: 10,
    },
    verbose: false,
    ...overrides,
  };
}
