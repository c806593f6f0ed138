/**
 * DocumentStore - explicit application state
 *
 * Holds the open documents (in list order), the active document and the
 * stamp clipboard. It is created by the UI layer and passed into the
 * operations that need it; there is no module-level instance.
 */

import { randomUUID } from 'crypto';
import { basename } from 'path';

import type { StampDeskConfig } from './config';
import { InvalidInputError } from './errors';
import { loggers } from './logger';
import type { PageSizeRegistry } from './page-size-registry';
import { addStamp, createStamp, duplicateOnPaste, type IdFactory, newStampId } from './stamp-model';
import type { DocumentRecord, DocumentStatus, Point, Stamp } from './types';

const log = loggers.DocumentStore;

export interface ImportResult {
  added: DocumentRecord[];
  /** Paths skipped because they were already open */
  skipped: string[];
}

type StoreSettings = Pick<StampDeskConfig, 'pasteOffset' | 'defaultStampSize' | 'defaultStampOrigin'>;

export class DocumentStore {
  private docs: DocumentRecord[] = [];
  private active = -1;
  private clipboard: Stamp | null = null;

  constructor(
    private readonly settings: StoreSettings,
    private readonly idFactory: IdFactory = newStampId
  ) {}

  get documents(): readonly DocumentRecord[] {
    return this.docs;
  }

  get activeIndex(): number {
    return this.active;
  }

  get activeDocument(): DocumentRecord | undefined {
    return this.active === -1 ? undefined : this.docs[this.active];
  }

  get clipboardStamp(): Stamp | null {
    return this.clipboard;
  }

  find(id: string): DocumentRecord | undefined {
    return this.docs.find((d) => d.id === id);
  }

  setActive(index: number): void {
    if (index < -1 || index >= this.docs.length) return;
    this.active = index;
  }

  // ============================================================================
  // Documents
  // ============================================================================

  /**
   * Open PDF files. Paths already open are skipped; new documents start
   * `pending` and selected.
   */
  importFiles(paths: readonly string[]): ImportResult {
    const open = new Set(this.docs.map((d) => d.path));
    const added: DocumentRecord[] = [];
    const skipped: string[] = [];

    for (const path of paths) {
      if (open.has(path)) {
        skipped.push(path);
        continue;
      }
      open.add(path);
      added.push({
        id: randomUUID(),
        name: basename(path) || 'document.pdf',
        path,
        stamps: [],
        status: 'pending',
        selected: true,
      });
    }

    this.docs = [...this.docs, ...added];
    if (this.active === -1 && added.length > 0) {
      this.active = 0;
    }

    log.info('Imported files', { added: added.length, skipped: skipped.length });
    return { added, skipped };
  }

  /**
   * Remove a document; the active index follows the removed document's
   * neighbour (the next one, or the previous one if it was last).
   */
  removeDocument(id: string): boolean {
    const index = this.docs.findIndex((d) => d.id === id);
    if (index === -1) return false;

    this.docs = this.docs.filter((d) => d.id !== id);

    if (this.active === index) {
      if (this.docs.length === 0) {
        this.active = -1;
      } else {
        this.active = index === this.docs.length ? index - 1 : index;
      }
    } else if (this.active > index) {
      this.active -= 1;
    }
    return true;
  }

  setSelected(id: string, selected: boolean): void {
    const doc = this.find(id);
    if (doc) doc.selected = selected;
  }

  selectAll(selected: boolean): void {
    for (const doc of this.docs) doc.selected = selected;
  }

  selectedDocuments(): DocumentRecord[] {
    return this.docs.filter((d) => d.selected);
  }

  /**
   * Record how many pages a document has, e.g. once the viewer has loaded it
   */
  setPageCount(id: string, pageCount: number): void {
    if (!Number.isInteger(pageCount) || pageCount < 1) {
      throw new InvalidInputError(`Page count must be an integer >= 1, got ${pageCount}`);
    }
    const doc = this.find(id);
    if (doc) doc.pageCount = pageCount;
  }

  setStatus(id: string, status: DocumentStatus, details: { resultPath?: string; error?: string } = {}): void {
    const doc = this.find(id);
    if (!doc) return;
    doc.status = status;
    if (details.resultPath !== undefined) doc.resultPath = details.resultPath;
    doc.error = status === 'error' ? details.error : undefined;
  }

  // ============================================================================
  // Stamps on the active document
  // ============================================================================

  /**
   * Place a new stamp on the active document at the viewport centre (or the
   * default origin).
   *
   * @returns null until the document's page count and at least one page
   *   size are known
   * @throws InvalidInputError if `activePage` is not a page of the document
   */
  placeStamp(
    image: string,
    activePage: number,
    sizes: PageSizeRegistry,
    viewportCenter?: Point
  ): Stamp | null {
    const doc = this.activeDocument;
    if (!doc || doc.pageCount === undefined || !sizes.hasAny(doc.id)) return null;

    const origin =
      viewportCenter && viewportCenter.x > 0 && viewportCenter.y > 0
        ? viewportCenter
        : this.settings.defaultStampOrigin;
    return addStamp(
      doc,
      createStamp(image, activePage, origin, this.settings.defaultStampSize),
      this.idFactory
    );
  }

  /**
   * @returns false if the active document has no such stamp
   */
  copyStamp(stampId: string): boolean {
    const stamp = this.activeDocument?.stamps.find((s) => s.id === stampId);
    if (!stamp) return false;
    this.clipboard = { ...stamp };
    return true;
  }

  /**
   * Paste the clipboard stamp onto `activePage` of the active document
   *
   * @returns null without a clipboard stamp or a known page count
   * @throws InvalidInputError if `activePage` is not a page of the document
   */
  pasteStamp(activePage: number): Stamp | null {
    const doc = this.activeDocument;
    if (!doc || doc.pageCount === undefined || !this.clipboard) return null;
    return duplicateOnPaste(doc, this.clipboard, activePage, this.settings.pasteOffset, this.idFactory);
  }
}
