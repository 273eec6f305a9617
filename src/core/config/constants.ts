// src/core/config/constants.ts
export const DEFAULT_STEP_TIMEOUT = 20000;
export const DEFAULT_RUN_BUDGET = 30 * 60 * 1000;

/**
 * Narrowest element still treated as a full page. Thumbnail strips and
 * previews render below it. This is the one heuristic that needs retuning
 * when the viewer's layout changes.
 */
export const MIN_PAGE_WIDTH = 800;
/** Anything smaller on either axis is a UI icon and never reported. */
export const MIN_ELEMENT_SIZE = 100;

export const RETRY_COUNTS = {
  placeholder: 5,
  extraction: 2,
  // Trade-off between run latency and cutting an issue short.
  navigationStall: 2,
} as const;

export const DELAYS = {
  settle: 1000,
  placeholder: 1000,
  navigation: 4000,
  stall: 2000,
  extraction: 1000,
} as const;

export const DEFAULT_VIEWER_ROOT = '#app';
export const DEFAULT_NEXT_SELECTOR = '#next-page-button';
export const DEFAULT_USERNAME_SELECTOR = '#username';
export const DEFAULT_PASSWORD_SELECTOR = '#password';

export const DEFAULT_OUTPUT_DIR = './output';
export const DEFAULT_PAGES_DIR = './output_pages';

export const CREDENTIAL_ENV = {
  username: 'ISSUE_CAPTURE_USERNAME',
  password: 'ISSUE_CAPTURE_PASSWORD',
} as const;

export const DEFAULT_VIEWPORT = { width: 1920, height: 1080 };
export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';
