// src/core/render/browser.ts
import { chromium, type Browser, type BrowserContext } from 'playwright';
import { DEFAULT_USER_AGENT, DEFAULT_VIEWPORT } from '../config/constants.js';
import { BROWSER_CONFIGS } from '../config/browser-config.js';
import { CaptureError, ErrorCode, describeError } from '../errors.js';
import { BrowserSelector } from './browser-selector.js';
import type { BrowserType } from '../types/index.js';

export interface BrowserOptions {
  browserType?: BrowserType;
  headless?: boolean;
}

/**
 * Owns the browser for one capture run. Every run gets a fresh,
 * non-persistent context so no session leaks between runs.
 */
export class BrowserManager {
  private browser?: Browser;
  private context?: BrowserContext;

  constructor(private options: BrowserOptions = {}) {}

  async launch(): Promise<BrowserContext> {
    if (this.context) {
      return this.context;
    }

    const selector = new BrowserSelector();
    const selected = await selector.select(this.options.browserType);
    const browserConfig = BROWSER_CONFIGS[selected];

    try {
      console.error(`[INFO] Launching ${browserConfig.name}`);
      this.browser = await chromium.launch({
        channel: browserConfig.channel,
        headless: this.options.headless ?? false,
        args: ['--start-maximized', '--disable-blink-features=AutomationControlled'],
      });
      this.context = await this.browser.newContext({
        viewport: DEFAULT_VIEWPORT,
        userAgent: DEFAULT_USER_AGENT,
      });
    } catch (error) {
      await this.close();
      throw new CaptureError(
        ErrorCode.BROWSER_NOT_FOUND,
        'config',
        `Failed to launch browser: ${describeError(error)}`,
        false,
        `Ensure ${browserConfig.name} is installed on your system`
      );
    }

    return this.context;
  }

  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = undefined;
    this.context = undefined;
    if (browser) {
      await browser.close();
    }
  }
}
