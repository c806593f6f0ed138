import type { PageDimensions } from './types';

/**
 * Intrinsic page sizes observed by the viewer, per document.
 *
 * No stamp may be placed on a document until at least one of its pages has
 * reported its size. Pages without their own entry fall back to the first
 * size seen for the document.
 */
export class PageSizeRegistry {
  private readonly sizes = new Map<string, Map<number, PageDimensions>>();
  private readonly first = new Map<string, PageDimensions>();

  record(documentId: string, pageNum: number, size: PageDimensions): void {
    if (!(size.width > 0 && size.height > 0)) return;

    let pages = this.sizes.get(documentId);
    if (!pages) {
      pages = new Map();
      this.sizes.set(documentId, pages);
    }
    pages.set(pageNum, { width: size.width, height: size.height });
    if (!this.first.has(documentId)) {
      this.first.set(documentId, { width: size.width, height: size.height });
    }
  }

  get(documentId: string, pageNum: number): PageDimensions | undefined {
    return this.sizes.get(documentId)?.get(pageNum) ?? this.first.get(documentId);
  }

  hasAny(documentId: string): boolean {
    return this.first.has(documentId);
  }

  /** Drop everything known about a document, e.g. after its pages changed */
  forget(documentId: string): void {
    this.sizes.delete(documentId);
    this.first.delete(documentId);
  }
}
