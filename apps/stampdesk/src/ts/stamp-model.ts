/**
 * Stamp collection operations over a document.
 *
 * A document's `stamps` array is replaced, never mutated in place, so
 * observers holding the previous array keep a consistent snapshot. Order
 * is z-order: later stamps draw on top and win pointer-hit ties.
 */

import { randomUUID } from 'crypto';

import { DEFAULT_CONFIG } from './config';
import { InvalidInputError } from './errors';
import type { DocumentRecord, Point, Size, Stamp, StampGeometry, StampRequest } from './types';

export type IdFactory = () => string;

export const newStampId: IdFactory = () => randomUUID();

// ============================================================================
// Validation
// ============================================================================

function assertFinite(name: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new InvalidInputError(`Stamp ${name} must be a finite number, got ${value}`);
  }
}

/**
 * Check geometry invariants: finite position, positive size, page >= 1
 *
 * @throws InvalidInputError
 */
export function validateStampGeometry(geometry: StampGeometry): void {
  assertFinite('x', geometry.x);
  assertFinite('y', geometry.y);
  assertFinite('width', geometry.width);
  assertFinite('height', geometry.height);
  if (geometry.width <= 0 || geometry.height <= 0) {
    throw new InvalidInputError(
      `Stamp size must be positive, got ${geometry.width}x${geometry.height}`
    );
  }
  if (!Number.isInteger(geometry.pageNum) || geometry.pageNum < 1) {
    throw new InvalidInputError(`Stamp page must be an integer >= 1, got ${geometry.pageNum}`);
  }
}

/**
 * @throws InvalidInputError if the document's page count is known and
 *   `pageNum` is past it
 */
export function assertPageInDocument(doc: DocumentRecord, pageNum: number): void {
  if (doc.pageCount !== undefined && pageNum > doc.pageCount) {
    throw new InvalidInputError(
      `Page ${pageNum} does not exist (document has ${doc.pageCount} pages)`
    );
  }
}

export function validateStampRequest(request: StampRequest): void {
  if (typeof request.image !== 'string' || request.image.trim().length === 0) {
    throw new InvalidInputError('Stamp image reference must not be empty');
  }
  validateStampGeometry(request);
}

// ============================================================================
// Construction
// ============================================================================

/**
 * Build a stamp request at `origin` with size `size` (both default to the
 * configured defaults)
 */
export function createStamp(
  image: string,
  pageNum: number,
  origin: Point = DEFAULT_CONFIG.defaultStampOrigin,
  size: Size = DEFAULT_CONFIG.defaultStampSize
): StampRequest {
  return {
    image,
    x: origin.x,
    y: origin.y,
    width: size.width,
    height: size.height,
    pageNum,
  };
}

// ============================================================================
// Collection operations
// ============================================================================

/**
 * Append a stamp with a fresh id
 */
export function addStamp(
  doc: DocumentRecord,
  request: StampRequest,
  idFactory: IdFactory = newStampId
): Stamp {
  validateStampRequest(request);
  assertPageInDocument(doc, request.pageNum);
  const stamp: Stamp = { ...request, id: idFactory() };
  doc.stamps = [...doc.stamps, stamp];
  return stamp;
}

/**
 * Replace geometry fields of one stamp. `id` and `image` are preserved.
 *
 * @returns the updated stamp, or undefined if no stamp has that id
 */
export function updateStamp(
  doc: DocumentRecord,
  id: string,
  patch: Partial<StampGeometry>
): Stamp | undefined {
  const index = doc.stamps.findIndex((s) => s.id === id);
  if (index === -1) return undefined;

  const current = doc.stamps[index];
  const next: Stamp = {
    id: current.id,
    image: current.image,
    x: patch.x ?? current.x,
    y: patch.y ?? current.y,
    width: patch.width ?? current.width,
    height: patch.height ?? current.height,
    pageNum: patch.pageNum ?? current.pageNum,
  };
  validateStampGeometry(next);
  assertPageInDocument(doc, next.pageNum);

  const stamps = [...doc.stamps];
  stamps[index] = next;
  doc.stamps = stamps;
  return next;
}

/**
 * Move a stamp to a new top-left on `pageNum`, e.g. after a cross-page drop
 */
export function moveStamp(
  doc: DocumentRecord,
  id: string,
  pageNum: number,
  position: Point
): Stamp | undefined {
  return updateStamp(doc, id, { pageNum, x: position.x, y: position.y });
}

/**
 * @returns true if a stamp was removed
 */
export function removeStamp(doc: DocumentRecord, id: string): boolean {
  const stamps = doc.stamps.filter((s) => s.id !== id);
  if (stamps.length === doc.stamps.length) return false;
  doc.stamps = stamps;
  return true;
}

export function clearStamps(doc: DocumentRecord): void {
  doc.stamps = [];
}

/**
 * Clone `source` with a new id, offset by `offset` points on both axes and
 * retargeted to the active page, then append it.
 */
export function duplicateOnPaste(
  doc: DocumentRecord,
  source: Stamp,
  activePage: number,
  offset: number,
  idFactory: IdFactory = newStampId
): Stamp {
  return addStamp(
    doc,
    {
      image: source.image,
      x: source.x + offset,
      y: source.y + offset,
      width: source.width,
      height: source.height,
      pageNum: activePage,
    },
    idFactory
  );
}

/**
 * Topmost stamp on `pageNum` containing `point` (document space)
 */
export function stampAt(doc: DocumentRecord, pageNum: number, point: Point): Stamp | undefined {
  for (let i = doc.stamps.length - 1; i >= 0; i--) {
    const s = doc.stamps[i];
    if (
      s.pageNum === pageNum &&
      point.x >= s.x &&
      point.x <= s.x + s.width &&
      point.y >= s.y &&
      point.y <= s.y + s.height
    ) {
      return s;
    }
  }
  return undefined;
}

/**
 * Stamps whose page no longer exists in a document of `pageCount` pages
 */
export function findOrphanedStamps(stamps: readonly Stamp[], pageCount: number): Stamp[] {
  return stamps.filter((s) => s.pageNum < 1 || s.pageNum > pageCount);
}

/**
 * Strip identity for hand-off to the pipeline
 */
export function toStampRequests(stamps: readonly Stamp[]): StampRequest[] {
  return stamps.map(({ image, x, y, width, height, pageNum }) => ({
    image,
    x,
    y,
    width,
    height,
    pageNum,
  }));
}
