// src/core/render/browser-selector.ts
import { chromium } from 'playwright';
import { CaptureError, ErrorCode } from '../errors.js';
import { BROWSER_CONFIGS } from '../config/browser-config.js';
import type { BrowserType, ConfigurableBrowser } from '../types/index.js';

export class BrowserSelector {
  /**
   * An explicit choice must be available or this throws; `auto` returns the
   * first available browser in priority order.
   */
  async select(browserType: BrowserType = 'auto'): Promise<ConfigurableBrowser> {
    if (browserType !== 'auto') {
      if (!(await this.isAvailable(browserType))) {
        throw new CaptureError(
          ErrorCode.BROWSER_NOT_FOUND,
          'config',
          `[${ErrorCode.BROWSER_NOT_FOUND}] Browser '${browserType}' is not available on this system`,
          false,
          browserType === 'chromium'
            ? 'Run issue-capture install-browsers'
            : `Install ${BROWSER_CONFIGS[browserType].name} or use --browser auto`
        );
      }
      return browserType;
    }

    for (const type of this.getAutoPriority()) {
      if (await this.isAvailable(type)) {
        return type;
      }
    }

    throw new CaptureError(
      ErrorCode.BROWSER_NOT_FOUND,
      'config',
      'No supported browser found',
      false,
      'Install Google Chrome or Microsoft Edge, or run issue-capture install-browsers'
    );
  }

  private getAutoPriority(): ConfigurableBrowser[] {
    return ['edge', 'chrome', 'chromium'];
  }

  /** Probe by launching headless and closing straight away. */
  async isAvailable(browserType: ConfigurableBrowser): Promise<boolean> {
    try {
      const browser = await chromium.launch({
        channel: BROWSER_CONFIGS[browserType].channel,
        headless: true,
      });
      await browser.close();
      return true;
    } catch {
      return false;
    }
  }
}
