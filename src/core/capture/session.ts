// src/core/capture/session.ts
import { fingerprint } from '../dedupe/fingerprint.js';
import { isDataUrl } from '../render/utils.js';
import type { CaptureError } from '../errors.js';
import type {
  CapturedPage,
  DriverState,
  DroppedCandidate,
  EndReason,
  ExtractedImage,
  PageGap,
} from '../types/index.js';

export type AdmitOutcome =
  | { status: 'captured'; page: CapturedPage }
  | { status: 'duplicate'; sequenceIndex: number };

const TRANSITIONS: Record<DriverState, readonly DriverState[]> = {
  init: ['probing', 'failed'],
  probing: ['probing', 'retrying', 'extracting', 'advancing', 'draining', 'failed'],
  retrying: ['probing', 'failed'],
  extracting: ['advancing', 'draining', 'failed'],
  advancing: ['advancing', 'probing', 'draining', 'failed'],
  draining: ['done', 'failed'],
  done: [],
  failed: [],
};

export function isTerminal(state: DriverState): boolean {
  return state === 'done' || state === 'failed';
}

/**
 * State of one issue run. Owned by a single driver; pages go in through
 * `admit` and come out, frozen and ordered, through `freeze`.
 */
export class CaptureSession {
  state: DriverState = 'init';
  placeholderRetries = 0;
  stallRetries = 0;
  endReason?: EndReason;
  possiblyIncomplete = false;
  error?: CaptureError;

  private pages: CapturedPage[] = [];
  private seen = new Map<string, number>();
  private refFingerprints = new Map<string, string>();
  private observedRefs = new Set<string>();
  private droppedRefs = new Set<string>();
  private gaps: PageGap[] = [];
  private dropped: DroppedCandidate[] = [];
  private duplicates = 0;
  private frozen = false;

  constructor(readonly issueDate: string) {}

  transition(next: DriverState): void {
    if (!TRANSITIONS[this.state].includes(next)) {
      throw new Error(`Illegal driver transition: ${this.state} -> ${next}`);
    }
    this.state = next;
  }

  get size(): number {
    return this.pages.length;
  }

  get duplicateCount(): number {
    return this.duplicates;
  }

  /**
   * Insert an extracted image. A fingerprint already in the session is a
   * preload repeat: it is counted and discarded without using an index.
   */
  admit(image: ExtractedImage, sourceRef: string): AdmitOutcome {
    if (this.frozen) {
      throw new Error('Capture session is frozen');
    }
    this.refFingerprints.set(refKey(sourceRef), image.fingerprint);

    const existing = this.seen.get(image.fingerprint);
    if (existing !== undefined) {
      this.duplicates++;
      return { status: 'duplicate', sequenceIndex: existing };
    }

    const page: CapturedPage = Object.freeze({ ...image, sequenceIndex: this.pages.length + 1 });
    this.pages.push(page);
    this.seen.set(page.fingerprint, page.sequenceIndex);
    return { status: 'captured', page };
  }

  /** Fingerprint of a reference already extracted in this run, if any. */
  knownFingerprint(sourceRef: string): string | undefined {
    return this.refFingerprints.get(refKey(sourceRef));
  }

  noteDuplicate(): void {
    this.duplicates++;
  }

  markObserved(sourceRef: string): void {
    this.observedRefs.add(refKey(sourceRef));
  }

  hasObserved(sourceRef: string): boolean {
    return this.observedRefs.has(refKey(sourceRef));
  }

  isDropped(sourceRef: string): boolean {
    return this.droppedRefs.has(refKey(sourceRef));
  }

  recordDrop(sourceRef: string, attempts: number, reason: string): void {
    this.droppedRefs.add(refKey(sourceRef));
    this.dropped.push({ sourceRef: isDataUrl(sourceRef) ? 'data:' : sourceRef, attempts, reason });
  }

  recordGap(attempts: number): void {
    this.gaps.push({ after: this.pages.length, attempts });
  }

  getGaps(): PageGap[] {
    return [...this.gaps];
  }

  getDropped(): DroppedCandidate[] {
    return [...this.dropped];
  }

  getPages(): readonly CapturedPage[] {
    return [...this.pages];
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  freeze(): readonly CapturedPage[] {
    this.frozen = true;
    return Object.freeze([...this.pages]);
  }
}

// Inline payloads can be megabytes; key them by hash.
function refKey(sourceRef: string): string {
  return isDataUrl(sourceRef) ? `data:${fingerprint(Buffer.from(sourceRef))}` : sourceRef;
}
