// src/core/export/path.ts
import * as path from 'path';
import type { ImageFormat } from '../types/index.js';

const EXTENSIONS: Record<ImageFormat, string> = {
  png: 'png',
  jpeg: 'jpg',
  webp: 'webp',
  gif: 'gif',
};

export function formatIssueDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}${month}${day}`;
}

/**
 * Accepts `2026-10-18` or `20261018` and returns `20261018`,
 * or null when the value is not a calendar date.
 */
export function parseIssueDate(value: string): string | null {
  const match = value.trim().match(/^(\d{4})-?(\d{2})-?(\d{2})$/);
  if (!match) {
    return null;
  }
  const [, year, month, day] = match;
  const date = new Date(Number(year), Number(month) - 1, Number(day));
  if (
    date.getFullYear() !== Number(year) ||
    date.getMonth() !== Number(month) - 1 ||
    date.getDate() !== Number(day)
  ) {
    return null;
  }
  return `${year}${month}${day}`;
}

export function documentPath(outputDir: string, issueDate: string): string {
  return path.join(outputDir, `${issueDate}.pdf`);
}

export function pageFilename(sequenceIndex: number, format: ImageFormat): string {
  return `page_${String(sequenceIndex).padStart(3, '0')}.${EXTENSIONS[format]}`;
}
