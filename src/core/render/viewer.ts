// src/core/render/viewer.ts
import type { BrowserContext, Page } from 'playwright';
import { CaptureError, ErrorCode, describeError } from '../errors.js';
import { MIN_ELEMENT_SIZE } from '../config/constants.js';
import type { ViewerOptions } from '../config/capture-config.js';
import type { PageCandidate } from '../types/index.js';
import { scanViewer } from './scan-script.js';
import { isValidUrl } from './utils.js';

/** How the last "next page" request was issued; `end` means the control is disabled. */
export type AdvanceOutcome = 'button' | 'keyboard' | 'end';

export interface FetchedResource {
  status: number;
  body: Buffer;
  contentType?: string;
}

/**
 * The one browsing surface a capture run drives. Calls are never
 * overlapped: each completes before the next is issued.
 */
export interface ViewerSurface {
  open(): Promise<void>;
  scan(): Promise<PageCandidate[]>;
  advance(): Promise<AdvanceOutcome>;
  fetchResource(url: string): Promise<FetchedResource>;
}

export interface PlaywrightViewerOptions extends ViewerOptions {
  stepTimeoutMs: number;
  verbose?: boolean;
}

export class PlaywrightViewer implements ViewerSurface {
  private page: Page;

  constructor(
    private context: BrowserContext,
    page: Page,
    private options: PlaywrightViewerOptions
  ) {
    this.page = page;
  }

  getPage(): Page {
    return this.page;
  }

  async open(): Promise<void> {
    const { issueLocator, stepTimeoutMs } = this.options;

    try {
      if (isValidUrl(issueLocator)) {
        console.error(`[INFO] Opening viewer: ${issueLocator}`);
        await this.page.goto(issueLocator, { waitUntil: 'load', timeout: stepTimeoutMs });
      } else {
        // The issue link usually opens the viewer in a new tab
        console.error(`[INFO] Opening issue via ${issueLocator}`);
        await this.page.waitForSelector(issueLocator, { timeout: stepTimeoutMs });
        const popup = this.context
          .waitForEvent('page', { timeout: stepTimeoutMs })
          .catch(() => undefined);
        await this.page.click(issueLocator, { timeout: stepTimeoutMs });
        const opened = await popup;
        if (opened) {
          this.page = opened;
          await opened.bringToFront();
        }
      }
    } catch (error) {
      throw new CaptureError(
        ErrorCode.NAVIGATION_FAILED,
        'navigation',
        `Failed to open issue: ${describeError(error)}`,
        true,
        'Check --issue points at the viewer entry point',
        { issueLocator }
      );
    }

    await this.waitForIdle();

    for (const selector of this.options.preCaptureClicks) {
      try {
        await this.page.waitForSelector(selector, { timeout: stepTimeoutMs });
        await this.page.click(selector, { timeout: stepTimeoutMs });
        console.error(`[INFO] Clicked ${selector}`);
      } catch (error) {
        console.error(`[WARN] ${selector} not clickable, continuing: ${describeError(error)}`);
      }
    }
  }

  async scan(): Promise<PageCandidate[]> {
    await this.page
      .waitForLoadState('domcontentloaded', { timeout: this.options.stepTimeoutMs })
      .catch(() => {
        // Scan whatever is there
      });
    return this.page.evaluate(scanViewer, {
      root: this.options.viewerRoot,
      minSize: MIN_ELEMENT_SIZE,
    });
  }

  async advance(): Promise<AdvanceOutcome> {
    const button = this.page.locator(this.options.nextSelector).first();

    if ((await button.count()) > 0) {
      if (!(await button.isEnabled())) {
        return 'end';
      }
      try {
        await button.click({ timeout: this.options.stepTimeoutMs });
        return 'button';
      } catch (error) {
        console.error(`[WARN] Next-page button click failed, pressing ArrowRight: ${describeError(error)}`);
      }
    } else if (this.options.verbose) {
      console.error('[DEBUG] No next-page button, pressing ArrowRight');
    }

    await this.page.keyboard.press('ArrowRight');
    return 'keyboard';
  }

  async fetchResource(url: string): Promise<FetchedResource> {
    // context.request shares the browser context's cookie jar
    const response = await this.context.request.get(url, { timeout: this.options.stepTimeoutMs });
    return {
      status: response.status(),
      body: await response.body(),
      contentType: response.headers()['content-type'],
    };
  }

  private async waitForIdle(): Promise<void> {
    await this.page
      .waitForLoadState('networkidle', { timeout: this.options.stepTimeoutMs })
      .catch(() => {
        // Viewers that poll never go idle
      });
  }
}
