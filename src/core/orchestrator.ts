// src/core/orchestrator.ts
import type { BrowserContext, Page } from 'playwright';
import { PortalLogin, type Authenticator } from './auth/portal-login.js';
import { PaginationDriver, type DriverOutcome } from './capture/driver.js';
import { type Clock, systemClock } from './capture/timing.js';
import type { CaptureConfig } from './config/capture-config.js';
import { CaptureError, createFailedResult, describeError } from './errors.js';
import { DocumentAssembler } from './export/assembler.js';
import { PageStore } from './export/page-store.js';
import { documentPath } from './export/path.js';
import type { CaptureResult } from './export/types.js';
import { BrowserManager } from './render/browser.js';
import { PlaywrightViewer, type ViewerSurface } from './render/viewer.js';
import type { CapturedPage } from './types/index.js';

export type BrowserLauncher = Pick<BrowserManager, 'launch' | 'close'>;

export interface OrchestratorDeps {
  browserManager?: BrowserLauncher;
  authenticator?: Authenticator;
  assembler?: DocumentAssembler;
  clock?: Clock;
  createSurface?: (context: BrowserContext, page: Page) => ViewerSurface;
}

/**
 * One issue, end to end: launch, log in, walk the viewer, assemble the PDF.
 * Either exactly one complete document is written or none is.
 */
export class CaptureOrchestrator {
  private browserManager: BrowserLauncher;
  private assembler: DocumentAssembler;
  private clock: Clock;
  private warnings: string[] = [];

  constructor(private config: CaptureConfig, private deps: OrchestratorDeps = {}) {
    this.browserManager =
      deps.browserManager ?? new BrowserManager({ browserType: config.browser, headless: config.headless });
    this.assembler = deps.assembler ?? new DocumentAssembler();
    this.clock = deps.clock ?? systemClock;
  }

  async capture(signal?: AbortSignal): Promise<CaptureResult> {
    const startedAt = this.clock.now();
    this.warnings = [];

    try {
      const context = await this.browserManager.launch();
      const page = await context.newPage();

      const authenticator = this.resolveAuthenticator();
      if (authenticator) {
        await authenticator.authenticate(page);
      }

      const surface = this.deps.createSurface
        ? this.deps.createSurface(context, page)
        : new PlaywrightViewer(context, page, this.config);
      const store = this.config.keepPages ? new PageStore(this.config.pagesDir) : undefined;

      const driver = new PaginationDriver(this.config, this.config.issueDate, {
        surface,
        clock: this.clock,
        signal,
        onPage: store ? capturedPage => this.persist(store, capturedPage) : undefined,
      });
      const outcome = await driver.run();

      if (outcome.state === 'failed' && outcome.error) {
        return this.withDiagnostics(createFailedResult(outcome.error, this.config.issueDate), outcome);
      }

      const assembled = await this.assembler.assemble(
        outcome.pages,
        documentPath(this.config.outputDir, this.config.issueDate),
        { title: `Issue ${this.config.issueDate}` }
      );
      console.error(`[INFO] Saved ${assembled.pageCount} page(s) to ${assembled.path}`);

      return this.withDiagnostics(
        {
          status: 'success',
          issueDate: this.config.issueDate,
          paths: { documentPath: assembled.path, pagesDir: store?.getDir() },
          stats: {
            pageCount: assembled.pageCount,
            duplicates: outcome.session.duplicateCount,
            durationMs: this.clock.now() - startedAt,
          },
        },
        outcome
      );
    } catch (error) {
      if (error instanceof CaptureError) {
        return createFailedResult(error, this.config.issueDate);
      }
      throw error;
    } finally {
      await this.browserManager.close();
    }
  }

  private resolveAuthenticator(): Authenticator | undefined {
    if (this.deps.authenticator) {
      return this.deps.authenticator;
    }
    const { portalUrl, credentials } = this.config;
    if (!portalUrl || !credentials) {
      return undefined;
    }
    return new PortalLogin({ ...this.config, portalUrl, credentials, timeout: this.config.stepTimeoutMs });
  }

  // Intermediate files are a convenience; a failed write never stops the run.
  private async persist(store: PageStore, page: CapturedPage): Promise<void> {
    try {
      await store.put(page);
    } catch (error) {
      const warning = `Could not persist page #${page.sequenceIndex}: ${describeError(error)}`;
      console.error(`[WARN] ${warning}`);
      this.warnings.push(warning);
    }
  }

  private withDiagnostics(result: CaptureResult, outcome: DriverOutcome): CaptureResult {
    const { session } = outcome;
    const warnings = [...(result.diagnostics?.warnings ?? []), ...this.warnings];
    if (session.possiblyIncomplete) {
      warnings.push('Capture ended on a stall; the issue may be incomplete');
    }
    return {
      ...result,
      diagnostics: {
        ...result.diagnostics,
        endReason: session.endReason,
        possiblyIncomplete: session.possiblyIncomplete,
        warnings,
        gaps: session.getGaps(),
        dropped: session.getDropped(),
      },
    };
  }
}
