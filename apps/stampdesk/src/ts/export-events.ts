/**
 * Export Events - progress notifications for batch export
 *
 * Lets the UI layer react to export progress without coupling to the
 * export manager.
 *
 * Event types:
 * - stampdesk:document-started - A document's pipeline has begun
 * - stampdesk:document-completed - A document was written
 * - stampdesk:document-failed - A document's export failed
 * - stampdesk:batch-completed - The batch finished or was stopped
 */

import { EventEmitter } from 'events';

import type { StampDeskErrorCode } from './errors';

// ============================================================
// Event Types
// ============================================================

export const EXPORT_EVENTS = {
  DOCUMENT_STARTED: 'stampdesk:document-started',
  DOCUMENT_COMPLETED: 'stampdesk:document-completed',
  DOCUMENT_FAILED: 'stampdesk:document-failed',
  BATCH_COMPLETED: 'stampdesk:batch-completed',
} as const;

export type ExportEventType = (typeof EXPORT_EVENTS)[keyof typeof EXPORT_EVENTS];

// ============================================================
// Event Detail Interfaces
// ============================================================

export interface DocumentStartedDetail {
  documentId: string;
  name: string;
  stampCount: number;
}

export interface DocumentCompletedDetail {
  documentId: string;
  name: string;
  resultPath: string;
  durationMs: number;
}

export interface DocumentFailedDetail {
  documentId: string;
  name: string;
  code: StampDeskErrorCode;
  error: string;
}

export interface BatchCompletedDetail {
  successCount: number;
  failureCount: number;
  /** True if the batch was stopped before every selected document ran */
  cancelled: boolean;
}

export interface ExportEventDetails {
  [EXPORT_EVENTS.DOCUMENT_STARTED]: DocumentStartedDetail;
  [EXPORT_EVENTS.DOCUMENT_COMPLETED]: DocumentCompletedDetail;
  [EXPORT_EVENTS.DOCUMENT_FAILED]: DocumentFailedDetail;
  [EXPORT_EVENTS.BATCH_COMPLETED]: BatchCompletedDetail;
}

// ============================================================
// Emitter
// ============================================================

export class ExportEvents {
  private readonly emitter = new EventEmitter();

  /**
   * @returns a function that removes the listener
   */
  on<K extends ExportEventType>(
    type: K,
    listener: (detail: ExportEventDetails[K]) => void
  ): () => void {
    this.emitter.on(type, listener);
    return () => {
      this.emitter.off(type, listener);
    };
  }

  emit<K extends ExportEventType>(type: K, detail: ExportEventDetails[K]): void {
    this.emitter.emit(type, detail);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
