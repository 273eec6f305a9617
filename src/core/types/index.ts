export type BrowserType = 'chrome' | 'edge' | 'chromium' | 'auto';

export type ConfigurableBrowser = Exclude<BrowserType, 'auto'>;

export interface BrowserConfig {
  channel?: 'chrome' | 'msedge';
  name: string;
}

export type CandidateKind = 'canvas' | 'image';

/**
 * One page-bearing element seen inside the viewer during a single probe.
 * Never stored: a fresh set is produced on every scan.
 */
export interface PageCandidate {
  kind: CandidateKind;
  width: number;
  height: number;
  /** `data:image/...` payload for canvases, resource URL for images */
  sourceRef: string;
  /** false while an <img> is still decoding */
  complete: boolean;
  /** every sampled pixel identical (canvas only; null when unknown) */
  blank: boolean | null;
}

export type CandidateClass = 'thumbnail' | 'placeholder' | 'page';

export interface ProbeResult {
  pages: PageCandidate[];
  placeholders: PageCandidate[];
  thumbnails: PageCandidate[];
}

export type ImageFormat = 'png' | 'jpeg' | 'webp' | 'gif';

export interface ExtractedImage {
  imageBytes: Buffer;
  format: ImageFormat;
  width: number;
  height: number;
  fingerprint: string;
  sourceKind: CandidateKind;
}

export interface CapturedPage extends ExtractedImage {
  readonly sequenceIndex: number;
}

export type DriverState =
  | 'init'
  | 'probing'
  | 'retrying'
  | 'extracting'
  | 'advancing'
  | 'draining'
  | 'done'
  | 'failed';

export type EndReason =
  | 'empty-viewer'
  | 'next-disabled'
  | 'navigation-stall'
  | 'run-budget';

export type CapturePhase = 'config' | 'auth' | 'navigation' | 'extraction' | 'assembly';

export interface PageGap {
  /** number of pages captured before the gap */
  after: number;
  attempts: number;
}

export interface DroppedCandidate {
  sourceRef: string;
  attempts: number;
  reason: string;
}
