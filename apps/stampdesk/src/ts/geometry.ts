/**
 * Coordinate conversion between the three spaces the viewer deals with:
 * - screen space (pointer pixels, after zoom and scroll, origin top-left)
 * - layout/document space (PDF points at scale 1, origin top-left)
 * - PDF space (points, origin bottom-left; see compositor for the flip)
 *
 * Stamp geometry is always stored in document space so that zooming or
 * scrolling never changes what gets exported.
 */

import { DEFAULT_CONFIG, type StampDeskConfig } from './config';
import { InvalidInputError } from './errors';
import type { PageSizeRegistry } from './page-size-registry';
import type { Point, Rect } from './types';

export interface ZoomBounds {
  min: number;
  max: number;
}

export type ZoomSettings = Pick<StampDeskConfig, 'minZoom' | 'maxZoom' | 'zoomStep'>;

export function zoomBounds(settings: Pick<StampDeskConfig, 'minZoom' | 'maxZoom'>): ZoomBounds {
  return { min: settings.minZoom, max: settings.maxZoom };
}

export const DEFAULT_ZOOM_BOUNDS: Readonly<ZoomBounds> = zoomBounds(DEFAULT_CONFIG);

function assertScale(scale: number): void {
  if (!Number.isFinite(scale) || scale <= 0) {
    throw new InvalidInputError(`Viewer scale must be a positive number, got ${scale}`);
  }
}

// ============================================================================
// Scale
// ============================================================================

/**
 * Clamp a user zoom factor into the allowed range
 */
export function clampZoom(zoom: number, bounds: ZoomBounds = DEFAULT_ZOOM_BOUNDS): number {
  if (!Number.isFinite(zoom)) {
    throw new InvalidInputError(`Zoom must be a finite number, got ${zoom}`);
  }
  return Math.min(Math.max(zoom, bounds.min), bounds.max);
}

/**
 * Viewer scale: fit-to-container base scale times the (clamped) user zoom
 */
export function effectiveScale(
  baseScale: number,
  zoom: number,
  bounds: ZoomBounds = DEFAULT_ZOOM_BOUNDS
): number {
  assertScale(baseScale);
  return baseScale * clampZoom(zoom, bounds);
}

// ============================================================================
// Point and rect conversion
// ============================================================================

/**
 * (screenPoint - pageScreenOrigin) / viewerScale
 */
export function screenToDocument(
  screenPoint: Point,
  viewerScale: number,
  pageScreenOrigin: Point
): Point {
  assertScale(viewerScale);
  return {
    x: (screenPoint.x - pageScreenOrigin.x) / viewerScale,
    y: (screenPoint.y - pageScreenOrigin.y) / viewerScale,
  };
}

export function documentToScreen(
  documentPoint: Point,
  viewerScale: number,
  pageScreenOrigin: Point
): Point {
  assertScale(viewerScale);
  return {
    x: documentPoint.x * viewerScale + pageScreenOrigin.x,
    y: documentPoint.y * viewerScale + pageScreenOrigin.y,
  };
}

export function screenRectToDocument(
  screenRect: Rect,
  viewerScale: number,
  pageScreenOrigin: Point
): Rect {
  const topLeft = screenToDocument(screenRect, viewerScale, pageScreenOrigin);
  return {
    ...topLeft,
    width: screenRect.width / viewerScale,
    height: screenRect.height / viewerScale,
  };
}

export function documentRectToScreen(
  documentRect: Rect,
  viewerScale: number,
  pageScreenOrigin: Point
): Rect {
  const topLeft = documentToScreen(documentRect, viewerScale, pageScreenOrigin);
  return {
    ...topLeft,
    width: documentRect.width * viewerScale,
    height: documentRect.height * viewerScale,
  };
}

/**
 * Layout space is PDF points at scale 1, so this is the identity. Kept as
 * a named step so call sites say which space they hand on.
 */
export function documentToPdfPoints(documentPoint: Point): Point {
  return { x: documentPoint.x, y: documentPoint.y };
}

// ============================================================================
// Page hit-testing
// ============================================================================

/**
 * A page container as currently rendered on screen
 */
export interface RenderedPage {
  /** 1-indexed page number */
  pageNum: number;
  /** Screen-space bounds of the page container */
  bounds: Rect;
}

export function rectCenter(rect: Rect): Point {
  return { x: rect.x + rect.width / 2, y: rect.y + rect.height / 2 };
}

function containsPoint(rect: Rect, point: Point): boolean {
  return (
    point.x >= rect.x &&
    point.x <= rect.x + rect.width &&
    point.y >= rect.y &&
    point.y <= rect.y + rect.height
  );
}

/**
 * Page whose rendered bounds contain the centre of `screenRect`, or null
 * when the centre falls outside every page (the stamp keeps its page).
 */
export function resolveTargetPage(
  screenRect: Rect,
  pages: readonly RenderedPage[]
): number | null {
  const center = rectCenter(screenRect);
  const hit = pages.find((page) => containsPoint(page.bounds, center));
  return hit ? hit.pageNum : null;
}

export interface DropTarget {
  pageNum: number;
  /** New top-left of the stamp in the target page's document space */
  x: number;
  y: number;
}

/**
 * Resolve where a dragged stamp lands.
 *
 * The scale is taken from the target page itself (rendered width over
 * intrinsic width), so it stays right while a zoom is in flight.
 *
 * @returns null if the drop missed every page, or the page's intrinsic or
 *   rendered width is not known yet
 */
export function resolveDrop(
  screenRect: Rect,
  pages: readonly RenderedPage[],
  sizes: PageSizeRegistry,
  documentId: string
): DropTarget | null {
  const pageNum = resolveTargetPage(screenRect, pages);
  if (pageNum === null) return null;

  const page = pages.find((p) => p.pageNum === pageNum);
  const intrinsic = sizes.get(documentId, pageNum);
  // Not laid out yet
  if (!page || !intrinsic || !(page.bounds.width > 0)) return null;

  const scale = page.bounds.width / intrinsic.width;
  const topLeft = screenToDocument(screenRect, scale, page.bounds);
  return { pageNum, x: topLeft.x, y: topLeft.y };
}

// ============================================================================
// Zoom and viewport
// ============================================================================

/**
 * Zoom and scroll offsets of the scroll container
 */
export interface ViewState {
  zoom: number;
  scrollLeft: number;
  scrollTop: number;
}

/**
 * Change zoom while keeping `anchor` (a point in the container's viewport,
 * e.g. the pointer or the viewport centre) over the same content.
 */
export function zoomAroundPoint(
  view: ViewState,
  requestedZoom: number,
  anchor: Point,
  bounds: ZoomBounds = DEFAULT_ZOOM_BOUNDS
): ViewState {
  const zoom = clampZoom(requestedZoom, bounds);
  if (zoom === view.zoom) return view;

  const ratio = zoom / view.zoom;
  const contentX = view.scrollLeft + anchor.x;
  const contentY = view.scrollTop + anchor.y;

  return {
    zoom,
    scrollLeft: Math.max(0, contentX * ratio - anchor.x),
    scrollTop: Math.max(0, contentY * ratio - anchor.y),
  };
}

/**
 * Zoom button: one `zoomStep` in or out, anchored on the viewport centre
 */
export function stepZoom(
  view: ViewState,
  direction: 'in' | 'out',
  viewportWidth: number,
  viewportHeight: number,
  settings: ZoomSettings = DEFAULT_CONFIG
): ViewState {
  const delta = direction === 'in' ? settings.zoomStep : -settings.zoomStep;
  return zoomAroundPoint(
    view,
    view.zoom + delta,
    { x: viewportWidth / 2, y: viewportHeight / 2 },
    zoomBounds(settings)
  );
}

/**
 * Document-space point of the active page under the viewport centre. Used
 * as the placement of a newly added stamp.
 */
export function viewportCenterInDocument(
  containerRect: Rect,
  pageRect: Rect,
  viewerScale: number
): Point {
  return screenToDocument(rectCenter(containerRect), viewerScale, pageRect);
}
