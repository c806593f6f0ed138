/**
 * Page Transform
 *
 * Rewrites a PDF to a new page order (reorder, duplicate, delete in one
 * sequence) and moves stamps along with their pages:
 * - a page listed twice carries a copy of each of its stamps to both places
 * - a page left out takes its stamps with it
 */

import { randomUUID } from 'crypto';
import { rm } from 'fs/promises';
import { tmpdir } from 'os';
import { basename, dirname, join } from 'path';

import type { StampDeskConfig } from './config';
import { PageCollectionError } from './errors';
import { loggers } from './logger';
import { collectPages } from './pdf-backend';
import { newStampId, type IdFactory } from './stamp-model';
import type { DocumentRecord, PageOrder, Stamp } from './types';

const log = loggers.PageTransform;

// ============================================================================
// Page orders
// ============================================================================

/**
 * [1, 2, ..., pageCount]
 */
export function identityOrder(pageCount: number): number[] {
  return Array.from({ length: pageCount }, (_, i) => i + 1);
}

export type PageAction =
  | { type: 'identity' }
  | { type: 'delete'; page: number }
  | { type: 'duplicate'; page: number }
  /** Insert `copied` right after `page` */
  | { type: 'paste'; page: number; copied: number };

/**
 * New page order for a page action on a `pageCount`-page document
 */
export function buildPageOrder(action: PageAction, pageCount: number): number[] {
  const current = identityOrder(pageCount);

  switch (action.type) {
    case 'identity':
      return current;
    case 'delete':
      return current.filter((p) => p !== action.page);
    case 'duplicate':
      return current.flatMap((p) => (p === action.page ? [p, p] : [p]));
    case 'paste':
      return current.flatMap((p) => (p === action.page ? [p, action.copied] : [p]));
  }
}

/**
 * Move the entry at index `from` to index `to` (both 0-indexed) in a copy
 * of `order`; used while the user drags thumbnails around.
 */
export function movePage(order: PageOrder, from: number, to: number): number[] {
  if (from < 0 || from >= order.length || to < 0 || to >= order.length) {
    throw new PageCollectionError(`Cannot move page from ${from} to ${to} in ${order.length} pages`);
  }
  const next = [...order];
  const [moved] = next.splice(from, 1);
  next.splice(to, 0, moved);
  return next;
}

export function isIdentityOrder(order: PageOrder): boolean {
  return order.every((p, i) => p === i + 1);
}

// ============================================================================
// Stamp remapping
// ============================================================================

/**
 * Stamps for the new page order. For each position i (new page i + 1) every
 * stamp on original page `order[i]` is cloned with a fresh id. Stamps on
 * pages absent from `order` are dropped. Within one page the original
 * stacking order is kept.
 */
export function remapStamps(
  stamps: readonly Stamp[],
  order: PageOrder,
  idFactory: IdFactory = newStampId
): Stamp[] {
  const remapped: Stamp[] = [];

  order.forEach((originalPage, index) => {
    for (const stamp of stamps) {
      if (stamp.pageNum !== originalPage) continue;
      remapped.push({ ...stamp, id: idFactory(), pageNum: index + 1 });
    }
  });

  return remapped;
}

// ============================================================================
// Transform
// ============================================================================

/**
 * Write the pages of `sourcePdfPath` in `newOrder` to a new temp file
 *
 * @returns path of the new PDF
 * @throws PdfInspectionError, PageCollectionError, FileSystemError
 */
export async function transformPages(
  sourcePdfPath: string,
  newOrder: PageOrder,
  tempPrefix: string
): Promise<string> {
  const outputPath = join(
    tmpdir(),
    `${tempPrefix}mod_${process.pid}_${randomUUID().slice(0, 8)}_${basename(sourcePdfPath)}`
  );
  await collectPages(sourcePdfPath, outputPath, newOrder);
  log.info('Pages collected', { sourcePdfPath, outputPath, pageCount: newOrder.length });
  return outputPath;
}

/**
 * Whether `path` is a file `transformPages` wrote (and nothing else owns)
 */
export function isTransformOutput(path: string, tempPrefix: string): boolean {
  return dirname(path) === tmpdir() && basename(path).startsWith(`${tempPrefix}mod_`);
}

async function discardSuperseded(path: string): Promise<void> {
  try {
    await rm(path, { force: true });
    log.debug('Superseded transform output removed', { path });
  } catch (error) {
    log.warn('Could not remove superseded transform output', { path }, error);
  }
}

export interface PageTransformResult {
  path: string;
  pageCount: number;
  /** Stamps discarded because their page was deleted */
  droppedStamps: number;
}

/**
 * Transform a document's file and remap its stamps.
 *
 * The document is only touched after the new file has been written, so a
 * failure leaves it exactly as it was. A previous transform output that
 * the new file replaces is deleted.
 */
export async function applyPageOrder(
  doc: DocumentRecord,
  newOrder: PageOrder,
  settings: Pick<StampDeskConfig, 'tempPrefix'>,
  idFactory: IdFactory = newStampId
): Promise<PageTransformResult> {
  const previous = doc.path;
  const path = await transformPages(previous, newOrder, settings.tempPrefix);

  const kept = new Set(newOrder);
  const droppedStamps = doc.stamps.filter((s) => !kept.has(s.pageNum)).length;

  doc.stamps = remapStamps(doc.stamps, newOrder, idFactory);
  doc.path = path;
  doc.pageCount = newOrder.length;
  log.debug('Document remapped', { id: doc.id, stamps: doc.stamps.length, droppedStamps });

  // The user's own file is never removed, only earlier rewrites of it
  if (isTransformOutput(previous, settings.tempPrefix)) {
    await discardSuperseded(previous);
  }

  return { path, pageCount: newOrder.length, droppedStamps };
}
