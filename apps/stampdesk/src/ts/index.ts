/**
 * StampDesk core - stamp overlay and page rearrangement for PDF files.
 *
 * This module exports everything a UI shell needs: the document store,
 * the export manager, viewer geometry and the configuration loader.
 */

// Shared types
export type {
  Point,
  Size,
  Rect,
  DocumentStatus,
  Stamp,
  StampGeometry,
  StampRequest,
  DocumentRecord,
  PageOrder,
  PlacementBox,
  PlacementDescriptor,
  PageDimensions,
} from './types';

// Configuration and logging
export { DEFAULT_CONFIG, configFromEnv, resolveConfig } from './config';
export type { StampDeskConfig } from './config';
export {
  createLogger,
  configureFromEnv,
  enableLogging,
  disableLogging,
  getLogConfig,
  loggers,
} from './logger';
export type { Logger, LogLevel } from './logger';

// Errors
export {
  StampDeskError,
  ImageDecodeError,
  PdfInspectionError,
  WatermarkPlacementError,
  PageCollectionError,
  FileSystemError,
  InvalidInputError,
  UnexpectedError,
  isStampDeskError,
  errorMessage,
  toStampDeskError,
} from './errors';
export type { StampDeskErrorCode } from './errors';
export { getUserFriendlyError, formatNotification } from './error-messages';
export type { UserError, ErrorIcon } from './error-messages';

// Viewer geometry
export {
  DEFAULT_ZOOM_BOUNDS,
  zoomBounds,
  clampZoom,
  effectiveScale,
  screenToDocument,
  documentToScreen,
  screenRectToDocument,
  documentRectToScreen,
  documentToPdfPoints,
  rectCenter,
  resolveTargetPage,
  resolveDrop,
  zoomAroundPoint,
  stepZoom,
  viewportCenterInDocument,
} from './geometry';
export type { ZoomBounds, ZoomSettings, RenderedPage, DropTarget, ViewState } from './geometry';
export { PageSizeRegistry } from './page-size-registry';

// Stamps and documents
export {
  newStampId,
  validateStampGeometry,
  validateStampRequest,
  assertPageInDocument,
  createStamp,
  addStamp,
  updateStamp,
  moveStamp,
  removeStamp,
  clearStamps,
  duplicateOnPaste,
  stampAt,
  findOrphanedStamps,
  toStampRequests,
} from './stamp-model';
export type { IdFactory } from './stamp-model';
export { DocumentStore } from './document-store';
export type { ImportResult } from './document-store';

// Stamping
export {
  computeContainFit,
  toPdfPlacement,
  boxTopFromPdfY,
  supersampledSize,
  isDataUrl,
  loadImageBytes,
  decodeImage,
  compositeStamp,
} from './compositor';
export type { DecodedImage, CompositedStamp } from './compositor';
export { StampPipeline } from './stamp-pipeline';
export type { StampJob } from './stamp-pipeline';
export { stripExportSuffix, candidateFileName, reserveOutputPath } from './output-naming';
export type { OutputReservation } from './output-naming';
export { TempScope, withTempScope } from './temp-files';

// Pages
export {
  inspectPdf,
  getPageCount,
  addImageWatermark,
  validatePageOrder,
  collectPages,
} from './pdf-backend';
export {
  identityOrder,
  buildPageOrder,
  movePage,
  isIdentityOrder,
  remapStamps,
  transformPages,
  isTransformOutput,
  applyPageOrder,
} from './page-transform';
export type { PageAction, PageTransformResult } from './page-transform';

// Export orchestration
export { ExportManager } from './export-manager';
export type { DocumentOutcome, BatchResult, TransformOutcome } from './export-manager';
export { EXPORT_EVENTS, ExportEvents } from './export-events';
export type {
  ExportEventType,
  ExportEventDetails,
  DocumentStartedDetail,
  DocumentCompletedDetail,
  DocumentFailedDetail,
  BatchCompletedDetail,
} from './export-events';
export { startTask } from './tasks';
export type { TaskState, TaskOutcome, TaskHandle } from './tasks';
