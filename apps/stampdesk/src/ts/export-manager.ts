/**
 * ExportManager - per-document and batch operations over a DocumentStore
 *
 * Features:
 * - Drives document status: pending -> processing -> completed | error
 * - Batch export runs selected documents one at a time, in list order
 * - A failing document never stops the rest of the batch
 * - Page transforms leave the document untouched when they fail
 */

import type { StampDeskConfig } from './config';
import type { DocumentStore } from './document-store';
import { getUserFriendlyError, type UserError } from './error-messages';
import { StampDeskError, UnexpectedError, toStampDeskError } from './errors';
import { EXPORT_EVENTS, ExportEvents } from './export-events';
import { loggers } from './logger';
import { applyPageOrder, buildPageOrder, type PageAction, type PageTransformResult } from './page-transform';
import { getPageCount } from './pdf-backend';
import { toStampRequests, type IdFactory, newStampId } from './stamp-model';
import type { StampPipeline } from './stamp-pipeline';
import { startTask, type TaskHandle } from './tasks';
import type { PageOrder } from './types';

const log = loggers.ExportManager;

// ============================================================
// Types
// ============================================================

export type DocumentOutcome =
  | { documentId: string; name: string; status: 'completed'; resultPath: string }
  /** No stamps: nothing was written */
  | { documentId: string; name: string; status: 'skipped'; resultPath: string }
  | {
      documentId: string;
      name: string;
      status: 'error';
      error: StampDeskError;
      notification: UserError;
    };

export interface BatchResult {
  outcomes: DocumentOutcome[];
  successCount: number;
  failureCount: number;
  cancelled: boolean;
}

export type TransformOutcome =
  | { status: 'completed'; result: PageTransformResult }
  | { status: 'error'; error: StampDeskError; notification: UserError };

const wrapUnexpected = (message: string, options: { cause: unknown }) =>
  new UnexpectedError(message, options);

// ============================================================
// ExportManager Class
// ============================================================

export class ExportManager {
  readonly events: ExportEvents;
  private readonly idFactory: IdFactory;

  constructor(
    private readonly store: DocumentStore,
    private readonly pipeline: StampPipeline,
    private readonly settings: Pick<StampDeskConfig, 'tempPrefix'>,
    options: { events?: ExportEvents; idFactory?: IdFactory } = {}
  ) {
    this.events = options.events ?? new ExportEvents();
    this.idFactory = options.idFactory ?? newStampId;
  }

  /**
   * Export one document. Never throws for pipeline failures: they are
   * recorded on the document and returned as an `error` outcome.
   */
  async exportDocument(documentId: string): Promise<DocumentOutcome> {
    const doc = this.store.find(documentId);
    if (!doc) {
      throw new UnexpectedError(`No open document with id ${documentId}`);
    }

    if (doc.stamps.length === 0) {
      log.debug('Skipping document without stamps', { name: doc.name });
      return { documentId, name: doc.name, status: 'skipped', resultPath: doc.path };
    }

    this.store.setStatus(documentId, 'processing');
    this.events.emit(EXPORT_EVENTS.DOCUMENT_STARTED, {
      documentId,
      name: doc.name,
      stampCount: doc.stamps.length,
    });
    const started = Date.now();

    try {
      const resultPath = await this.pipeline.run({
        pdfFilePath: doc.path,
        stamps: toStampRequests(doc.stamps),
      });

      this.store.setStatus(documentId, 'completed', { resultPath });
      this.events.emit(EXPORT_EVENTS.DOCUMENT_COMPLETED, {
        documentId,
        name: doc.name,
        resultPath,
        durationMs: Date.now() - started,
      });
      log.info('Exported', { name: doc.name, resultPath });
      return { documentId, name: doc.name, status: 'completed', resultPath };
    } catch (caught) {
      const error = toStampDeskError(caught, wrapUnexpected);
      this.store.setStatus(documentId, 'error', { error: error.message });
      this.events.emit(EXPORT_EVENTS.DOCUMENT_FAILED, {
        documentId,
        name: doc.name,
        code: error.code,
        error: error.message,
      });
      log.error('Export failed', { name: doc.name, code: error.code }, error);
      return {
        documentId,
        name: doc.name,
        status: 'error',
        error,
        notification: getUserFriendlyError(error, doc.name),
      };
    }
  }

  /**
   * Export every selected document in list order. Checks `signal` before
   * each document; a document already running always finishes. Documents
   * closed while the batch runs are left out of the result.
   */
  async exportSelected(signal?: AbortSignal): Promise<BatchResult> {
    const outcomes: DocumentOutcome[] = [];
    let cancelled = false;

    for (const doc of this.store.selectedDocuments()) {
      if (signal?.aborted) {
        cancelled = true;
        log.info('Batch export stopped', { remaining: doc.name });
        break;
      }
      if (!this.store.find(doc.id)) {
        log.info('Document closed during batch export', { name: doc.name });
        continue;
      }
      outcomes.push(await this.exportDocument(doc.id));
    }

    const result: BatchResult = {
      outcomes,
      successCount: outcomes.filter((o) => o.status === 'completed').length,
      failureCount: outcomes.filter((o) => o.status === 'error').length,
      cancelled,
    };
    this.events.emit(EXPORT_EVENTS.BATCH_COMPLETED, {
      successCount: result.successCount,
      failureCount: result.failureCount,
      cancelled,
    });
    return result;
  }

  /**
   * Run `exportSelected` as a cancellable task
   */
  startBatchExport(): TaskHandle<BatchResult> {
    return startTask(
      (signal) => this.exportSelected(signal),
      (result) => result.cancelled
    );
  }

  // ============================================================
  // Page transforms
  // ============================================================

  /**
   * Rewrite a document to `newOrder` and remap its stamps. On failure the
   * document keeps its path, stamps and status.
   */
  async reorderPages(documentId: string, newOrder: PageOrder): Promise<TransformOutcome> {
    const doc = this.store.find(documentId);
    if (!doc) {
      throw new UnexpectedError(`No open document with id ${documentId}`);
    }

    try {
      const result = await applyPageOrder(doc, newOrder, this.settings, this.idFactory);
      log.info('Pages updated', { name: doc.name, pageCount: result.pageCount });
      return { status: 'completed', result };
    } catch (caught) {
      const error = toStampDeskError(caught, wrapUnexpected);
      log.error('Page update failed', { name: doc.name, code: error.code }, error);
      return { status: 'error', error, notification: getUserFriendlyError(error, doc.name) };
    }
  }

  /**
   * Delete, duplicate or paste a page of a document
   */
  async performPageAction(documentId: string, action: PageAction): Promise<TransformOutcome> {
    const doc = this.store.find(documentId);
    if (!doc) {
      throw new UnexpectedError(`No open document with id ${documentId}`);
    }

    let pageCount: number;
    try {
      pageCount = await this.loadPageCount(documentId);
    } catch (caught) {
      const error = toStampDeskError(caught, wrapUnexpected);
      return { status: 'error', error, notification: getUserFriendlyError(error, doc.name) };
    }
    return this.reorderPages(documentId, buildPageOrder(action, pageCount));
  }

  /**
   * Read a document's page count from its current file and record it on
   * the document
   *
   * @throws PdfInspectionError if the file cannot be read as a PDF
   */
  async loadPageCount(documentId: string): Promise<number> {
    const doc = this.store.find(documentId);
    if (!doc) {
      throw new UnexpectedError(`No open document with id ${documentId}`);
    }
    const pageCount = await getPageCount(doc.path);
    this.store.setPageCount(documentId, pageCount);
    return pageCount;
  }

  /**
   * Run `reorderPages` as a task the UI can track
   */
  startPageTransform(documentId: string, newOrder: PageOrder): TaskHandle<TransformOutcome> {
    return startTask(() => this.reorderPages(documentId, newOrder));
  }
}
