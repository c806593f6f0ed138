// Shared data model for documents, stamps and page geometry

/**
 * A point in one of the three coordinate spaces (screen, layout, PDF)
 */
export interface Point {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

/**
 * Axis-aligned rectangle, origin at its top-left corner
 */
export interface Rect extends Point, Size {}

/**
 * Processing status of a document in the export list
 */
export type DocumentStatus = 'pending' | 'processing' | 'completed' | 'error';

/**
 * A placed image (signature, seal) on one page of a document.
 *
 * Geometry is stored in PDF points at layout scale 1 with a top-left
 * origin, never in zoomed screen units.
 */
export interface Stamp {
  id: string;
  /** `data:` URL with base64 PNG/JPEG bytes, or a filesystem path */
  image: string;
  x: number;
  y: number;
  width: number;
  height: number;
  /** 1-indexed page in the document's current page order */
  pageNum: number;
}

/**
 * Geometry fields of a stamp that may be replaced after placement
 */
export type StampGeometry = Pick<Stamp, 'x' | 'y' | 'width' | 'height' | 'pageNum'>;

/**
 * A stamp as the pipeline receives it (no identity)
 */
export type StampRequest = Omit<Stamp, 'id'>;

/**
 * A PDF file opened in the workspace
 */
export interface DocumentRecord {
  id: string;
  /** Display name (file basename) */
  name: string;
  /** Current source file; replaced after a page transform */
  path: string;
  /** Pages in `path`, once known */
  pageCount?: number;
  /** Insertion order is z-order: later stamps draw on top */
  stamps: Stamp[];
  status: DocumentStatus;
  resultPath?: string;
  /** Message of the last failure, when status is `error` */
  error?: string;
  /** Included in batch export */
  selected: boolean;
}

/**
 * Ordered sequence of original 1-indexed page numbers. Repeats duplicate a
 * page, omissions delete it.
 */
export type PageOrder = readonly number[];

/**
 * Aspect-preserving fit of an image inside a stamp box, in PDF points
 */
export interface PlacementBox {
  finalWidth: number;
  finalHeight: number;
  offsetX: number;
  offsetY: number;
}

/**
 * Where the PDF backend draws a stamp image: bottom-left origin, points
 */
export interface PlacementDescriptor {
  x: number;
  y: number;
  /** Multiplier applied to the image's pixel size to get its size in points */
  scale: number;
  /** 1-indexed target page */
  page: number;
}

/**
 * Intrinsic size of one PDF page in points
 */
export interface PageDimensions {
  width: number;
  height: number;
}
