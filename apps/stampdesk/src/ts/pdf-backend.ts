/**
 * PDF backend built on pdf-lib.
 *
 * Exposes the three file-to-file primitives the core is written against:
 * - inspect page dimensions
 * - stamp one image onto one page of file F, writing file F'
 * - collect a page sequence of file F into file F'
 */

import { readFile, writeFile } from 'fs/promises';
import { PDFDocument } from 'pdf-lib';

import {
  FileSystemError,
  PageCollectionError,
  PdfInspectionError,
  WatermarkPlacementError,
  errorMessage,
} from './errors';
import { loggers } from './logger';
import type { PageDimensions, PageOrder, PlacementDescriptor } from './types';

const log = loggers.PdfBackend;

async function readPdfBytes(path: string): Promise<Uint8Array> {
  try {
    return await readFile(path);
  } catch (error) {
    throw new PdfInspectionError(`Could not read PDF ${path}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

async function loadPdf(path: string): Promise<PDFDocument> {
  const bytes = await readPdfBytes(path);
  try {
    return await PDFDocument.load(bytes);
  } catch (error) {
    throw new PdfInspectionError(`Could not parse PDF ${path}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

async function savePdf(doc: PDFDocument, outputPath: string): Promise<void> {
  const bytes = await doc.save();
  try {
    await writeFile(outputPath, bytes);
  } catch (error) {
    throw new FileSystemError(`Could not write ${outputPath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

/**
 * Dimensions of every page, in points, in page order
 *
 * @throws PdfInspectionError if the file is unreadable, encrypted or has no pages
 */
export async function inspectPdf(path: string): Promise<PageDimensions[]> {
  const doc = await loadPdf(path);
  const pages = doc.getPages().map((page) => page.getSize());
  if (pages.length === 0) {
    throw new PdfInspectionError(`No page dimensions found for ${path}`);
  }
  log.debug('Inspected PDF', { path, pageCount: pages.length });
  return pages;
}

export async function getPageCount(path: string): Promise<number> {
  return (await inspectPdf(path)).length;
}

function assertDescriptor(descriptor: PlacementDescriptor, pageCount: number): void {
  const { x, y, scale, page } = descriptor;
  if (!Number.isFinite(x) || !Number.isFinite(y)) {
    throw new WatermarkPlacementError(`Placement offset must be finite, got (${x}, ${y})`);
  }
  if (!Number.isFinite(scale) || scale <= 0) {
    throw new WatermarkPlacementError(`Placement scale must be positive, got ${scale}`);
  }
  if (!Number.isInteger(page) || page < 1 || page > pageCount) {
    throw new WatermarkPlacementError(
      `Placement page ${page} is outside the document (1-${pageCount})`
    );
  }
}

/**
 * Draw the PNG at `imagePath` on one page of `inputPath` and write the
 * result to `outputPath`. The image is drawn at its pixel size times
 * `descriptor.scale`, with its bottom-left corner at (x, y).
 */
export async function addImageWatermark(
  inputPath: string,
  outputPath: string,
  imagePath: string,
  descriptor: PlacementDescriptor
): Promise<void> {
  const doc = await loadPdf(inputPath);
  assertDescriptor(descriptor, doc.getPageCount());

  let imageBytes: Uint8Array;
  try {
    imageBytes = await readFile(imagePath);
  } catch (error) {
    throw new FileSystemError(`Could not read stamp image ${imagePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  try {
    const image = await doc.embedPng(imageBytes);
    const page = doc.getPage(descriptor.page - 1);
    page.drawImage(image, {
      x: descriptor.x,
      y: descriptor.y,
      width: image.width * descriptor.scale,
      height: image.height * descriptor.scale,
    });
  } catch (error) {
    throw new WatermarkPlacementError(
      `Could not place stamp on page ${descriptor.page}: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  await savePdf(doc, outputPath);
  log.debug('Watermark written', { outputPath, page: descriptor.page });
}

/**
 * Check that `order` is non-empty and only names pages 1..pageCount
 *
 * @throws PageCollectionError
 */
export function validatePageOrder(order: PageOrder, pageCount: number): void {
  if (order.length === 0) {
    throw new PageCollectionError('A page order must keep at least one page');
  }
  for (const pageNum of order) {
    if (!Number.isInteger(pageNum) || pageNum < 1 || pageNum > pageCount) {
      throw new PageCollectionError(
        `Page ${pageNum} does not exist (document has ${pageCount} pages)`
      );
    }
  }
}

/**
 * Write the pages of `inputPath` listed in `order` (1-indexed, repeats
 * allowed) to `outputPath`, in that order.
 *
 * @throws PageCollectionError if `order` is empty or references a missing page
 */
export async function collectPages(
  inputPath: string,
  outputPath: string,
  order: PageOrder
): Promise<void> {
  const source = await loadPdf(inputPath);

  validatePageOrder(order, source.getPageCount());

  const target = await PDFDocument.create();
  try {
    const copied = await target.copyPages(
      source,
      order.map((pageNum) => pageNum - 1)
    );
    for (const page of copied) {
      target.addPage(page);
    }
  } catch (error) {
    throw new PageCollectionError(`Could not collect pages: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  await savePdf(target, outputPath);
  log.debug('Collected pages', { outputPath, order });
}
