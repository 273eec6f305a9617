// src/core/config/browser-config.ts
import type { BrowserConfig, ConfigurableBrowser } from '../types/index.js';

export const BROWSER_CONFIGS: Record<ConfigurableBrowser, BrowserConfig> = {
  edge: {
    channel: 'msedge',
    name: 'Microsoft Edge',
  },
  chrome: {
    channel: 'chrome',
    name: 'Google Chrome',
  },
  // Playwright's own build, present after `issue-capture install-browsers`
  chromium: {
    name: 'Chromium',
  },
};
