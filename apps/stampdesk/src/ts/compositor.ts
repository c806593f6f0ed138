/**
 * Image Compositor
 *
 * Turns a stamp box (document space, points, top-left origin) and a source
 * raster into a supersampled PNG plus the descriptor the PDF backend needs
 * to draw it (bottom-left origin).
 *
 * The image is fitted with "object-fit: contain" semantics and centred on
 * the axis it does not fill.
 */

import { readFile, writeFile } from 'fs/promises';
import sharp from 'sharp';

import { FileSystemError, ImageDecodeError, InvalidInputError, errorMessage } from './errors';
import { loggers } from './logger';
import type { TempScope } from './temp-files';
import type { PlacementBox, PlacementDescriptor, Rect, Size, StampRequest } from './types';

const log = loggers.Compositor;

const SUPPORTED_FORMATS = new Set(['png', 'jpeg']);

// ============================================================================
// Geometry
// ============================================================================

/**
 * Largest image-shaped box inside `box`, centred on the slack axis
 */
export function computeContainFit(box: Size, image: Size): PlacementBox {
  if (!(box.width > 0 && box.height > 0)) {
    throw new InvalidInputError(`Stamp box must be positive, got ${box.width}x${box.height}`);
  }
  if (!(image.width > 0 && image.height > 0)) {
    throw new ImageDecodeError(`Image has no pixels (${image.width}x${image.height})`);
  }

  const targetRatio = box.width / box.height;
  const imgRatio = image.width / image.height;

  if (imgRatio > targetRatio) {
    // Relatively wider: fill the width
    const finalHeight = box.width / imgRatio;
    return {
      finalWidth: box.width,
      finalHeight,
      offsetX: 0,
      offsetY: (box.height - finalHeight) / 2,
    };
  }

  const finalWidth = box.height * imgRatio;
  return {
    finalWidth,
    finalHeight: box.height,
    offsetX: (box.width - finalWidth) / 2,
    offsetY: 0,
  };
}

/**
 * Flip the fitted image's top-left document position into the backend's
 * bottom-left convention.
 */
export function toPdfPlacement(
  box: Rect,
  fit: PlacementBox,
  pageHeight: number,
  page: number,
  qualityFactor: number
): PlacementDescriptor {
  return {
    x: box.x + fit.offsetX,
    y: pageHeight - (box.y + fit.offsetY + fit.finalHeight),
    scale: 1 / qualityFactor,
    page,
  };
}

/**
 * Inverse of the y-flip in `toPdfPlacement`: recover the box's top-left y
 */
export function boxTopFromPdfY(pdfY: number, fit: PlacementBox, pageHeight: number): number {
  return pageHeight - pdfY - fit.finalHeight - fit.offsetY;
}

/**
 * Pixel size of the supersampled raster; never below one pixel
 */
export function supersampledSize(fit: PlacementBox, qualityFactor: number): Size {
  return {
    width: Math.max(1, Math.round(fit.finalWidth * qualityFactor)),
    height: Math.max(1, Math.round(fit.finalHeight * qualityFactor)),
  };
}

// ============================================================================
// Image sources
// ============================================================================

export function isDataUrl(reference: string): boolean {
  return reference.startsWith('data:');
}

/**
 * Raw bytes of a `data:` URL (base64) or an image file path
 *
 * @throws ImageDecodeError if the reference cannot be read
 */
export async function loadImageBytes(reference: string): Promise<Buffer> {
  if (isDataUrl(reference)) {
    const marker = reference.indexOf(';base64,');
    if (marker === -1) {
      throw new ImageDecodeError('Image data URL is not base64-encoded');
    }
    const bytes = Buffer.from(reference.slice(marker + ';base64,'.length), 'base64');
    if (bytes.length === 0) {
      throw new ImageDecodeError('Image data URL is empty');
    }
    return bytes;
  }

  try {
    return await readFile(reference);
  } catch (error) {
    throw new ImageDecodeError(`Could not read image ${reference}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

export interface DecodedImage {
  bytes: Buffer;
  format: 'png' | 'jpeg';
  width: number;
  height: number;
}

/**
 * Read the intrinsic pixel size of a PNG or JPEG
 *
 * @throws ImageDecodeError for anything else
 */
export async function decodeImage(bytes: Buffer): Promise<DecodedImage> {
  let metadata: sharp.Metadata;
  try {
    metadata = await sharp(bytes).metadata();
  } catch (error) {
    throw new ImageDecodeError(`Unsupported or corrupt image: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const { format, width, height } = metadata;
  if (format !== 'png' && format !== 'jpeg') {
    throw new ImageDecodeError(
      `Unsupported image format "${format ?? 'unknown'}" (expected ${[...SUPPORTED_FORMATS].join(' or ')})`
    );
  }
  if (!width || !height) {
    throw new ImageDecodeError('Image has no intrinsic size');
  }
  return { bytes, format, width, height };
}

// ============================================================================
// Compositing
// ============================================================================

export interface CompositedStamp {
  /** Supersampled PNG inside the caller's temp scope */
  imagePath: string;
  descriptor: PlacementDescriptor;
  fit: PlacementBox;
  pixelSize: Size;
}

/**
 * Decode, fit, supersample and write one stamp image.
 *
 * The PNG is written into `scope` and removed when the scope is disposed.
 */
export async function compositeStamp(
  stamp: StampRequest,
  pageHeight: number,
  scope: TempScope,
  qualityFactor: number
): Promise<CompositedStamp> {
  const decoded = await decodeImage(await loadImageBytes(stamp.image));
  const fit = computeContainFit(stamp, decoded);
  const pixelSize = supersampledSize(fit, qualityFactor);

  let png: Buffer;
  try {
    png = await sharp(decoded.bytes)
      .resize(pixelSize.width, pixelSize.height, {
        fit: 'fill',
        kernel: sharp.kernel.lanczos3,
      })
      .png()
      .toBuffer();
  } catch (error) {
    throw new ImageDecodeError(`Could not resample image: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const imagePath = scope.file('stamp', '.png');
  try {
    await writeFile(imagePath, png);
  } catch (error) {
    throw new FileSystemError(`Could not write temporary stamp image: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const descriptor = toPdfPlacement(stamp, fit, pageHeight, stamp.pageNum, qualityFactor);
  log.debug('Composited stamp', {
    page: stamp.pageNum,
    source: `${decoded.width}x${decoded.height}`,
    pixels: `${pixelSize.width}x${pixelSize.height}`,
    descriptor,
  });

  return { imagePath, descriptor, fit, pixelSize };
}
