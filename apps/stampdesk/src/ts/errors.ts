/**
 * Error taxonomy for stamping and page transforms.
 *
 * Every failure is scoped to one document's operation. Callers catch a
 * `StampDeskError`, mark the document as `error` and surface a
 * notification; nothing here is retried automatically.
 */

export type StampDeskErrorCode =
  | 'IMAGE_DECODE'
  | 'PDF_INSPECTION'
  | 'WATERMARK_PLACEMENT'
  | 'PAGE_COLLECTION'
  | 'FILE_SYSTEM'
  | 'INVALID_INPUT'
  | 'UNEXPECTED';

/**
 * Base class for all errors raised by the core.
 */
export class StampDeskError extends Error {
  readonly code: StampDeskErrorCode;

  constructor(code: StampDeskErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StampDeskError';
    this.code = code;
  }
}

/**
 * The stamp image is unreadable or not a PNG/JPEG raster.
 */
export class ImageDecodeError extends StampDeskError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('IMAGE_DECODE', message, options);
    this.name = 'ImageDecodeError';
  }
}

/**
 * Page count or page dimensions could not be read from the source PDF.
 */
export class PdfInspectionError extends StampDeskError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PDF_INSPECTION', message, options);
    this.name = 'PdfInspectionError';
  }
}

/**
 * The PDF backend rejected a computed placement descriptor.
 */
export class WatermarkPlacementError extends StampDeskError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('WATERMARK_PLACEMENT', message, options);
    this.name = 'WatermarkPlacementError';
  }
}

/**
 * Selecting pages for a page transform failed.
 */
export class PageCollectionError extends StampDeskError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PAGE_COLLECTION', message, options);
    this.name = 'PageCollectionError';
  }
}

/**
 * A temp file or the destination file could not be created or written.
 */
export class FileSystemError extends StampDeskError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('FILE_SYSTEM', message, options);
    this.name = 'FileSystemError';
  }
}

/**
 * A request crossing into the core is malformed.
 */
export class InvalidInputError extends StampDeskError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INVALID_INPUT', message, options);
    this.name = 'InvalidInputError';
  }
}

/**
 * Anything thrown that is not part of the taxonomy, wrapped at the
 * document boundary.
 */
export class UnexpectedError extends StampDeskError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('UNEXPECTED', message, options);
    this.name = 'UnexpectedError';
  }
}

export function isStampDeskError(error: unknown): error is StampDeskError {
  return error instanceof StampDeskError;
}

/**
 * Extract a message from any thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

/**
 * Pass taxonomy errors through; wrap anything else with `wrap`, keeping the
 * original as `cause`.
 */
export function toStampDeskError(
  error: unknown,
  wrap: (message: string, options: { cause: unknown }) => StampDeskError
): StampDeskError {
  if (isStampDeskError(error)) return error;
  return wrap(errorMessage(error), { cause: error });
}
