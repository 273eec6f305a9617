// src/cli/commands/capture.ts
import { Command } from 'commander';
import { resolveCaptureConfig, type CaptureConfigInput } from '../../core/config/capture-config.js';
import { CaptureError, createFailedResult, describeError } from '../../core/errors.js';
import type { CaptureResult } from '../../core/export/types.js';
import { CaptureOrchestrator } from '../../core/orchestrator.js';
import type { BrowserType } from '../../core/types/index.js';
import { EXIT_CODES, exitCodeFor } from '../exit-codes.js';

const DEFAULT_BROWSER: BrowserType = 'auto';

export function parseBrowserType(value: string): BrowserType {
  if (value === 'chrome' || value === 'edge' || value === 'chromium' || value === 'auto') {
    return value;
  }
  throw new Error(`Invalid browser: ${value}. Use chrome, edge, chromium, or auto`);
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function registerCaptureCommand(program: Command): void {
  program
    .command('capture', { isDefault: true })
    .description('Capture every page of one issue into <YYYYMMDD>.pdf')
    .requiredOption('--issue <locator>', 'Viewer entry point: URL, or selector of the issue link')
    .option('--portal <url>', 'Portal to log in to first (credentials from environment)')
    .option('--login-link <selector>', 'Element to click to reach the login form')
    .option('--click <selector>', 'Viewer element to click before capturing (repeatable)', collect, [])
    .option('--viewer-root <selector>', 'Viewer content container')
    .option('--next-selector <selector>', 'Next-page button')
    .option('--min-width <px>', 'Narrowest element treated as a page')
    .option('--max-retries <n>', 'Placeholder retries per page position')
    .option('--max-extract-retries <n>', 'Extraction retries per page')
    .option('--max-stalls <n>', 'Advances without new content before stopping')
    .option('--step-timeout <ms>', 'Upper bound for each viewer step')
    .option('--run-budget <ms>', 'Upper bound for the whole capture')
    .option('--date <date>', 'Issue date for the file name (YYYY-MM-DD, default today)')
    .option('--out <dir>', 'Output directory for the PDF')
    .option('--pages-dir <dir>', 'Directory for per-page images')
    .option('--no-keep-pages', 'Do not write per-page images')
    .option('--browser <browser>', 'Browser to use (chrome|edge|chromium|auto)', parseBrowserType, DEFAULT_BROWSER)
    .option('--headless', 'Run the browser headless', false)
    .option('--json', 'Print the run report as JSON', false)
    .option('--verbose', 'Verbose output', false)
    .action(async (options: CaptureConfigInput & { json: boolean }) => {
      const code = await runCapture(options);
      if (code !== EXIT_CODES.success) {
        process.exit(code);
      }
    });
}

export async function runCapture(options: CaptureConfigInput & { json?: boolean }): Promise<number> {
  let result: CaptureResult;
  const controller = new AbortController();
  const onSigint = (): void => {
    console.error('[WARN] Stop requested; finishing the current page');
    controller.abort();
  };

  try {
    const config = resolveCaptureConfig(options);
    process.once('SIGINT', onSigint);
    const orchestrator = new CaptureOrchestrator(config);
    result = await orchestrator.capture(controller.signal);
  } catch (error) {
    if (!(error instanceof CaptureError)) {
      console.error('Error:', describeError(error));
      return EXIT_CODES.config;
    }
    result = createFailedResult(error, options.date ?? '');
  } finally {
    process.removeListener('SIGINT', onSigint);
  }

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  }

  if (result.status === 'success') {
    console.log('Saved to:', result.paths?.documentPath);
    console.log('Pages:', result.stats?.pageCount);
    if (result.diagnostics?.possiblyIncomplete) {
      console.log('Warning: capture stopped on a stall; the issue may be incomplete');
    }
  } else {
    const error = result.diagnostics?.error;
    console.error(`Failed [${error?.phase ?? 'unknown'}]:`, error?.message);
    if (error?.suggestion) {
      console.error('Suggestion:', error.suggestion);
    }
  }

  return exitCodeFor(result);
}
