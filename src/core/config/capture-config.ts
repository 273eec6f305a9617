// src/core/config/capture-config.ts
import { CaptureError, ErrorCode } from '../errors.js';
import { formatIssueDate, parseIssueDate } from '../export/path.js';
import type { BrowserType } from '../types/index.js';
import {
  CREDENTIAL_ENV,
  DEFAULT_NEXT_SELECTOR,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_PAGES_DIR,
  DEFAULT_PASSWORD_SELECTOR,
  DEFAULT_RUN_BUDGET,
  DEFAULT_STEP_TIMEOUT,
  DEFAULT_USERNAME_SELECTOR,
  DEFAULT_VIEWER_ROOT,
  DELAYS,
  MIN_PAGE_WIDTH,
  RETRY_COUNTS,
} from './constants.js';

export interface Credentials {
  username: string;
  password: string;
}

export interface DriverDelays {
  settleMs: number;
  placeholderMs: number;
  navigationMs: number;
  stallMs: number;
  extractionMs: number;
}

/** Knobs the pagination loop reads. */
export interface DriverOptions {
  minPageWidth: number;
  maxPageRetries: number;
  maxExtractionRetries: number;
  maxStallRetries: number;
  stepTimeoutMs: number;
  runBudgetMs: number;
  delays: DriverDelays;
  verbose: boolean;
}

export interface ViewerOptions {
  issueLocator: string;
  viewerRoot: string;
  nextSelector: string;
  preCaptureClicks: string[];
}

export interface AuthOptions {
  portalUrl?: string;
  loginLinkSelector?: string;
  usernameSelector: string;
  passwordSelector: string;
  credentials?: Credentials;
}

export interface CaptureConfig extends DriverOptions, ViewerOptions, AuthOptions {
  issueDate: string;
  outputDir: string;
  pagesDir: string;
  keepPages: boolean;
  browser: BrowserType;
  headless: boolean;
}

/** Raw values as they arrive from the CLI; everything optional except the issue. */
export interface CaptureConfigInput {
  issue?: string;
  portal?: string;
  loginLink?: string;
  viewerRoot?: string;
  nextSelector?: string;
  click?: string[];
  minWidth?: string | number;
  maxRetries?: string | number;
  maxExtractRetries?: string | number;
  maxStalls?: string | number;
  stepTimeout?: string | number;
  runBudget?: string | number;
  out?: string;
  pagesDir?: string;
  keepPages?: boolean;
  date?: string;
  browser?: BrowserType;
  headless?: boolean;
  verbose?: boolean;
}

function invalid(message: string, suggestion?: string): CaptureError {
  return new CaptureError(ErrorCode.INVALID_CONFIG, 'config', message, false, suggestion);
}

function toInteger(
  name: string,
  value: string | number | undefined,
  fallback: number,
  min: number
): number {
  if (value === undefined) {
    return fallback;
  }
  const parsed = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isInteger(parsed) || parsed < min) {
    throw invalid(`${name} must be an integer >= ${min}, got "${value}"`);
  }
  return parsed;
}

export function readCredentials(env: NodeJS.ProcessEnv = process.env): Credentials | undefined {
  const username = env[CREDENTIAL_ENV.username];
  const password = env[CREDENTIAL_ENV.password];
  if (!username || !password) {
    return undefined;
  }
  return { username, password };
}

export function resolveCaptureConfig(
  input: CaptureConfigInput,
  env: NodeJS.ProcessEnv = process.env,
  now: Date = new Date()
): CaptureConfig {
  const issueLocator = input.issue?.trim();
  if (!issueLocator) {
    throw invalid('An issue locator is required', 'Pass --issue <url|selector>');
  }

  let issueDate = formatIssueDate(now);
  if (input.date) {
    const parsed = parseIssueDate(input.date);
    if (!parsed) {
      throw invalid(`Invalid issue date: ${input.date}`, 'Use YYYY-MM-DD or YYYYMMDD');
    }
    issueDate = parsed;
  }

  const credentials = readCredentials(env);
  if (input.portal && !credentials) {
    throw invalid(
      'A portal URL was given but no credentials are set',
      `Set ${CREDENTIAL_ENV.username} and ${CREDENTIAL_ENV.password}`
    );
  }

  const stepTimeoutMs = toInteger('--step-timeout', input.stepTimeout, DEFAULT_STEP_TIMEOUT, 1);

  return Object.freeze({
    issueLocator,
    viewerRoot: input.viewerRoot ?? DEFAULT_VIEWER_ROOT,
    nextSelector: input.nextSelector ?? DEFAULT_NEXT_SELECTOR,
    preCaptureClicks: input.click ?? [],
    portalUrl: input.portal,
    loginLinkSelector: input.loginLink,
    usernameSelector: DEFAULT_USERNAME_SELECTOR,
    passwordSelector: DEFAULT_PASSWORD_SELECTOR,
    credentials,
    minPageWidth: toInteger('--min-width', input.minWidth, MIN_PAGE_WIDTH, 1),
    maxPageRetries: toInteger('--max-retries', input.maxRetries, RETRY_COUNTS.placeholder, 0),
    maxExtractionRetries: toInteger('--max-extract-retries', input.maxExtractRetries, RETRY_COUNTS.extraction, 0),
    maxStallRetries: toInteger('--max-stalls', input.maxStalls, RETRY_COUNTS.navigationStall, 1),
    stepTimeoutMs,
    runBudgetMs: toInteger('--run-budget', input.runBudget, DEFAULT_RUN_BUDGET, stepTimeoutMs),
    delays: {
      settleMs: DELAYS.settle,
      placeholderMs: DELAYS.placeholder,
      navigationMs: DELAYS.navigation,
      stallMs: DELAYS.stall,
      extractionMs: DELAYS.extraction,
    },
    issueDate,
    outputDir: input.out ?? DEFAULT_OUTPUT_DIR,
    pagesDir: input.pagesDir ?? DEFAULT_PAGES_DIR,
    keepPages: input.keepPages ?? true,
    browser: input.browser ?? 'auto',
    headless: input.headless ?? false,
    verbose: input.verbose ?? false,
  });
}
