// src/core/export/assembler.ts
import * as fs from 'fs/promises';
import * as path from 'path';
import {
  PDFDocument,
  concatTransformationMatrix,
  drawObject,
  popGraphicsState,
  pushGraphicsState,
} from 'pdf-lib';
import { AssemblyError, ErrorCode, describeError } from '../errors.js';
import type { CapturedPage } from '../types/index.js';
import { type EmbeddedImage, embedPngLossless, parsePng } from './png-image.js';

export interface AssembledDocument {
  path: string;
  pageCount: number;
  byteLength: number;
}

export interface AssembleOptions {
  title?: string;
}

/**
 * Builds the issue PDF: one PDF page per captured image, in index order,
 * each page exactly the image's pixel size. JPEG data is embedded as the
 * original DCT stream; PNG keeps its IDAT stream, colour space and bit depth
 * (see `embedPngLossless`). Only interlaced PNGs go through pdf-lib's
 * decoder, which stores them as 8-bit RGB.
 */
export class DocumentAssembler {
  async assemble(
    pages: readonly CapturedPage[],
    outputPath: string,
    options: AssembleOptions = {}
  ): Promise<AssembledDocument> {
    if (pages.length === 0) {
      throw new AssemblyError(ErrorCode.NO_PAGES_CAPTURED, 'No pages were captured; nothing to assemble');
    }

    const ordered = [...pages].sort((a, b) => a.sequenceIndex - b.sequenceIndex);
    ordered.forEach((page, i) => {
      if (page.sequenceIndex !== i + 1) {
        throw new AssemblyError(
          ErrorCode.EXPORT_FAILED,
          `Page indices are not contiguous: expected ${i + 1}, found ${page.sequenceIndex}`
        );
      }
    });

    const bytes = await this.render(ordered, options);
    await this.writeAtomically(outputPath, bytes);

    return { path: outputPath, pageCount: ordered.length, byteLength: bytes.length };
  }

  private async render(pages: CapturedPage[], options: AssembleOptions): Promise<Uint8Array> {
    const pdf = await PDFDocument.create();
    if (options.title) {
      pdf.setTitle(options.title);
    }
    pdf.setProducer('issue-capture');

    for (const page of pages) {
      const image = await this.embed(pdf, page);
      const pdfPage = pdf.addPage([image.width, image.height]);
      const name = pdfPage.node.newXObject('Image', image.ref);
      pdfPage.pushOperators(
        pushGraphicsState(),
        concatTransformationMatrix(image.width, 0, 0, image.height, 0, 0),
        drawObject(name),
        popGraphicsState()
      );
    }

    try {
      return await pdf.save();
    } catch (error) {
      throw new AssemblyError(ErrorCode.EXPORT_FAILED, `Failed to serialize PDF: ${describeError(error)}`);
    }
  }

  private async embed(pdf: PDFDocument, page: CapturedPage): Promise<EmbeddedImage> {
    // pdf-lib reads `bytes.buffer` from offset 0; pooled Buffers start elsewhere
    const bytes = new Uint8Array(page.imageBytes);
    try {
      switch (page.format) {
        case 'jpeg': {
          const image = await pdf.embedJpg(bytes);
          return { ref: image.ref, width: image.width, height: image.height };
        }
        case 'png': {
          const png = parsePng(page.imageBytes);
          if (!png.header.interlaced) {
            return embedPngLossless(pdf, png);
          }
          console.error(`[WARN] Page #${page.sequenceIndex} is an interlaced PNG; re-encoding it as 8-bit RGB`);
          const image = await pdf.embedPng(bytes);
          return { ref: image.ref, width: image.width, height: image.height };
        }
        default:
          throw new AssemblyError(
            ErrorCode.UNSUPPORTED_FORMAT,
            `Page #${page.sequenceIndex} is ${page.format}; only PNG and JPEG embed without re-encoding`,
            { sequenceIndex: page.sequenceIndex, format: page.format }
          );
      }
    } catch (error) {
      if (error instanceof AssemblyError) throw error;
      throw new AssemblyError(
        ErrorCode.EXPORT_FAILED,
        `Failed to embed page #${page.sequenceIndex}: ${describeError(error)}`,
        { sequenceIndex: page.sequenceIndex }
      );
    }
  }

  /** The final path only ever holds a complete document. */
  private async writeAtomically(outputPath: string, bytes: Uint8Array): Promise<void> {
    const partialPath = `${outputPath}.partial`;
    try {
      await fs.mkdir(path.dirname(outputPath), { recursive: true });
      await fs.writeFile(partialPath, bytes);
      await fs.rename(partialPath, outputPath);
    } catch (error) {
      await fs.rm(partialPath, { force: true }).catch((cleanupError: unknown) => {
        console.error(`[WARN] Could not remove ${partialPath}: ${describeError(cleanupError)}`);
      });
      throw new AssemblyError(
        ErrorCode.EXPORT_FAILED,
        `Failed to write ${outputPath}: ${describeError(error)}`,
        { outputPath }
      );
    }
  }
}
