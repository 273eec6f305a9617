// src/core/export/page-store.ts
import * as fs from 'fs/promises';
import { join } from 'path';
import type { CapturedPage } from '../types/index.js';
import { pageFilename } from './path.js';

/**
 * Keeps each captured page on disk as `page_NNN.<ext>` for inspection or
 * recovery. The PDF never reads from here.
 */
export class PageStore {
  constructor(private pagesDir: string) {}

  async put(page: CapturedPage): Promise<string> {
    await fs.mkdir(this.pagesDir, { recursive: true });
    const filepath = join(this.pagesDir, pageFilename(page.sequenceIndex, page.format));
    await fs.writeFile(filepath, page.imageBytes);
    return filepath;
  }

  getDir(): string {
    return this.pagesDir;
  }
}
