// src/core/capture/driver.ts
import {
  AuthError,
  CaptureError,
  ErrorCode,
  NavigationStallError,
  RenderStallError,
  describeError,
} from '../errors.js';
import type { DriverOptions } from '../config/capture-config.js';
import { PageExtractor } from '../extract/extractor.js';
import { RenderProbe } from '../render/probe.js';
import { describeRef } from '../render/utils.js';
import type { ViewerSurface } from '../render/viewer.js';
import type {
  CapturedPage,
  DriverState,
  ExtractedImage,
  PageCandidate,
  ProbeResult,
} from '../types/index.js';
import { CaptureSession, isTerminal } from './session.js';
import { type Clock, exponentialBackoff, linearBackoff, systemClock, withTimeout } from './timing.js';

export interface DriverDeps {
  surface: ViewerSurface;
  probe?: RenderProbe;
  extractor?: PageExtractor;
  clock?: Clock;
  /** Checked between steps; the page being extracted is allowed to finish. */
  signal?: AbortSignal;
  /** Called once per newly captured page, in index order. */
  onPage?: (page: CapturedPage) => Promise<void>;
}

export interface DriverOutcome {
  state: 'done' | 'failed';
  session: CaptureSession;
  pages: readonly CapturedPage[];
  error?: CaptureError;
}

/**
 * Walks an issue of unknown length one "next page" at a time.
 *
 * The page count is never known up front, so the run ends on repeated
 * absence of new content: two empty probes in a row, a disabled next-page
 * control, or `maxStallRetries` advances that reveal nothing new. Page
 * identity is the content fingerprint, so preloaded pages that show up
 * early or more than once are captured exactly once.
 */
export class PaginationDriver {
  private readonly surface: ViewerSurface;
  private readonly probe: RenderProbe;
  private readonly extractor: PageExtractor;
  private readonly clock: Clock;
  private readonly session: CaptureSession;

  private startedAt = 0;
  private pending?: ProbeResult;
  private current: PageCandidate[] = [];
  private currentHasPlaceholders = false;
  private advancedSinceExtraction = false;
  private emptyProbes = 0;

  constructor(
    private readonly options: DriverOptions,
    issueDate: string,
    private readonly deps: DriverDeps
  ) {
    this.surface = deps.surface;
    this.probe = deps.probe ?? new RenderProbe(options.minPageWidth);
    this.extractor = deps.extractor ?? new PageExtractor(deps.surface);
    this.clock = deps.clock ?? systemClock;
    this.session = new CaptureSession(issueDate);
  }

  async run(): Promise<DriverOutcome> {
    this.startedAt = this.clock.now();

    try {
      while (!isTerminal(this.session.state)) {
        const next = await this.step(this.session.state);
        this.transition(next);
      }
    } catch (error) {
      if (!(error instanceof CaptureError)) {
        this.session.state = 'failed';
        throw error;
      }
      console.error(`[ERROR] Capture failed (${error.code}): ${error.message}`);
      this.session.error = error;
      this.transition('failed');
      return { state: 'failed', session: this.session, pages: this.session.getPages(), error };
    }

    const pages = this.session.freeze();
    console.error(
      `[INFO] Capture finished: ${pages.length} page(s), ${this.session.duplicateCount} duplicate(s), end: ${this.session.endReason ?? 'unknown'}`
    );
    return { state: 'done', session: this.session, pages };
  }

  private async step(state: DriverState): Promise<DriverState> {
    switch (state) {
      case 'init':
        await withTimeout(this.surface.open(), this.options.runBudgetMs, 'Opening the viewer');
        return 'probing';
      case 'probing':
        return this.probing();
      case 'retrying':
        await this.clock.sleep(
          exponentialBackoff(this.options.delays.placeholderMs, this.session.placeholderRetries, this.options.stepTimeoutMs)
        );
        return 'probing';
      case 'extracting':
        return this.extracting();
      case 'advancing':
        return this.advancing();
      case 'draining':
        return 'done';
      default:
        throw new Error(`No step for terminal state ${state}`);
    }
  }

  private transition(next: DriverState): void {
    if (this.options.verbose && next !== this.session.state) {
      console.error(`[DEBUG] ${this.session.state} -> ${next}`);
    }
    this.session.transition(next);
  }

  private async probing(): Promise<DriverState> {
    this.ensureNotCancelled();
    const overBudget = this.checkBudget();
    if (overBudget) return overBudget;

    const result = this.pending ?? (await this.safeProbe());
    this.pending = undefined;

    if (!result) {
      return this.onPlaceholders();
    }

    const fresh = result.pages.some(c => !this.session.hasObserved(c.sourceRef));
    if (fresh || (result.pages.length > 0 && result.placeholders.length === 0)) {
      this.emptyProbes = 0;
      this.session.placeholderRetries = 0;
      this.current = result.pages;
      this.currentHasPlaceholders = result.placeholders.length > 0;
      return 'extracting';
    }

    if (result.placeholders.length > 0) {
      this.emptyProbes = 0;
      return this.onPlaceholders();
    }

    if (this.session.size === 0) {
      // Nothing rendered yet: wait like a placeholder rather than ending
      return this.onPlaceholders();
    }

    this.emptyProbes++;
    if (this.emptyProbes >= 2) {
      console.error('[INFO] Viewer shows no pages on two consecutive probes; end of issue');
      this.session.endReason = 'empty-viewer';
      return 'draining';
    }
    await this.clock.sleep(this.options.delays.settleMs);
    return 'probing';
  }

  private onPlaceholders(): DriverState {
    this.session.placeholderRetries++;
    if (this.session.placeholderRetries <= this.options.maxPageRetries) {
      if (this.options.verbose) {
        console.error(
          `[DEBUG] Waiting for render (retry ${this.session.placeholderRetries}/${this.options.maxPageRetries})`
        );
      }
      return 'retrying';
    }

    const retries = this.options.maxPageRetries;
    this.session.placeholderRetries = 0;

    if (this.session.size === 0) {
      throw new RenderStallError(
        `Viewer never rendered a page after ${retries} retries`,
        ErrorCode.NO_PAGES_RENDERED
      );
    }

    const stall = new RenderStallError(`Page after #${this.session.size} never rendered after ${retries} retries`);
    console.error(`[WARN] ${stall.message}; skipping this position`);
    this.session.recordGap(retries + 1);
    this.session.stallRetries++;
    if (this.session.stallRetries >= this.options.maxStallRetries) {
      return this.endOnStall();
    }
    return 'advancing';
  }

  private async extracting(): Promise<DriverState> {
    const candidates = this.current;
    const afterAdvance = this.advancedSinceExtraction;
    this.current = [];
    this.advancedSinceExtraction = false;
    let captured = 0;

    for (const candidate of candidates) {
      const ref = candidate.sourceRef;
      this.session.markObserved(ref);
      if (this.session.isDropped(ref)) continue;

      if (this.session.knownFingerprint(ref) !== undefined) {
        this.session.noteDuplicate();
        continue;
      }

      const image = await this.extractWithRetry(candidate);
      if (!image) continue;

      const outcome = this.session.admit(image, ref);
      if (outcome.status === 'duplicate') {
        if (this.options.verbose) {
          console.error(`[DEBUG] Duplicate of page #${outcome.sequenceIndex}: ${describeRef(ref)}`);
        }
        continue;
      }

      captured++;
      const { page } = outcome;
      console.error(
        `[INFO] Page #${page.sequenceIndex}: ${page.sourceKind}, ${page.width}x${page.height} ${page.format}`
      );
      if (this.deps.onPage) {
        await this.deps.onPage(page);
      }
    }

    if (captured > 0) {
      this.session.stallRetries = 0;
      return 'advancing';
    }

    // New references that only repeat known content (re-signed URLs) are no progress
    if (afterAdvance && !this.currentHasPlaceholders) {
      return this.onNoProgress();
    }
    return 'advancing';
  }

  private async extractWithRetry(candidate: PageCandidate): Promise<ExtractedImage | null> {
    const attempts = this.options.maxExtractionRetries + 1;
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        return await withTimeout(
          this.extractor.extract(candidate),
          this.options.stepTimeoutMs,
          'Page extraction',
          'extraction'
        );
      } catch (error) {
        if (error instanceof AuthError) throw error;
        lastError = error;
        console.error(`[WARN] Extraction attempt ${attempt}/${attempts} failed: ${describeError(error)}`);
        if (attempt < attempts) {
          await this.clock.sleep(
            exponentialBackoff(this.options.delays.extractionMs, attempt, this.options.stepTimeoutMs)
          );
        }
      }
    }

    console.error(`[WARN] Dropping ${describeRef(candidate.sourceRef)} after ${attempts} attempts`);
    this.session.recordDrop(candidate.sourceRef, attempts, describeError(lastError));
    return null;
  }

  private async advancing(): Promise<DriverState> {
    this.ensureNotCancelled();
    const overBudget = this.checkBudget();
    if (overBudget) return overBudget;

    try {
      const outcome = await withTimeout(this.surface.advance(), this.options.stepTimeoutMs, 'Advancing');
      if (outcome === 'end') {
        console.error('[INFO] Next-page control is disabled; end of issue');
        this.session.endReason = 'next-disabled';
        return 'draining';
      }
    } catch (error) {
      if (error instanceof AuthError) throw error;
      console.error(`[WARN] Advance failed: ${describeError(error)}`);
    }
    this.advancedSinceExtraction = true;

    await this.clock.sleep(this.options.delays.navigationMs);
    const result = await this.safeProbe();

    if (result && result.pages.some(c => !this.session.hasObserved(c.sourceRef))) {
      // Progress is decided once the new references are fingerprinted
      this.pending = result;
      return 'probing';
    }

    if (result && result.placeholders.length > 0) {
      // The next page may still be rendering
      this.pending = result;
      return 'probing';
    }

    return this.onNoProgress();
  }

  private async onNoProgress(): Promise<DriverState> {
    this.session.stallRetries++;
    if (this.session.stallRetries >= this.options.maxStallRetries) {
      return this.endOnStall();
    }

    if (this.options.verbose) {
      console.error(`[DEBUG] No new page after advance (${this.session.stallRetries}/${this.options.maxStallRetries})`);
    }
    await this.clock.sleep(
      linearBackoff(this.options.delays.stallMs, this.session.stallRetries, this.options.stepTimeoutMs)
    );
    return 'advancing';
  }

  private endOnStall(): DriverState {
    const stall = new NavigationStallError(
      `No new page after ${this.options.maxStallRetries} advance attempt(s); treating as end of issue`
    );
    console.error(`[WARN] ${stall.message}`);
    this.session.endReason = 'navigation-stall';
    this.session.possiblyIncomplete = true;
    return 'draining';
  }

  private async safeProbe(): Promise<ProbeResult | null> {
    try {
      return await withTimeout(this.probe.probe(this.surface), this.options.stepTimeoutMs, 'Probing');
    } catch (error) {
      if (error instanceof AuthError) throw error;
      // Typically the execution context was torn down by a navigation
      console.error(`[WARN] Probe failed: ${describeError(error)}`);
      return null;
    }
  }

  private checkBudget(): DriverState | null {
    const elapsed = this.clock.now() - this.startedAt;
    if (elapsed <= this.options.runBudgetMs) {
      return null;
    }
    if (this.session.size === 0) {
      throw new RenderStallError(
        `No page rendered within the run budget (${this.options.runBudgetMs}ms)`,
        ErrorCode.NO_PAGES_RENDERED
      );
    }
    console.error(`[WARN] Run budget of ${this.options.runBudgetMs}ms exhausted; finishing with captured pages`);
    this.session.endReason = 'run-budget';
    this.session.possiblyIncomplete = true;
    return 'draining';
  }

  private ensureNotCancelled(): void {
    if (this.deps.signal?.aborted) {
      throw new CaptureError(ErrorCode.CANCELLED, 'navigation', 'Capture cancelled', false);
    }
  }
}
