/**
 * Runtime configuration for the stamping core.
 *
 * Defaults match the desktop app's behavior; the environment and explicit
 * overrides are layered on top by `resolveConfig`.
 */

import { homedir } from 'os';
import { join } from 'path';

import { InvalidInputError } from './errors';
import type { Point, Size } from './types';

export interface StampDeskConfig {
  /** Destination directory for exported PDFs */
  outputDir: string;
  /** Suffix appended to exported base names (e.g. report_capgo.pdf) */
  outputSuffix: string;
  /** Supersampling multiplier for stamp rasters */
  qualityFactor: number;
  /** Offset in points applied to a pasted stamp */
  pasteOffset: number;
  minZoom: number;
  maxZoom: number;
  /** Zoom delta for the +/- buttons */
  zoomStep: number;
  /** Size of a freshly placed stamp, in points */
  defaultStampSize: Size;
  /** Placement used when the viewport centre is unknown */
  defaultStampOrigin: Point;
  /** Prefix for temp directories and page-transform outputs */
  tempPrefix: string;
}

export const DEFAULT_CONFIG: Readonly<StampDeskConfig> = {
  outputDir: join(homedir(), 'Downloads'),
  outputSuffix: '_capgo',
  qualityFactor: 4,
  pasteOffset: 20,
  minZoom: 0.4,
  maxZoom: 4.0,
  zoomStep: 0.2,
  // 150x80 at 70%
  defaultStampSize: { width: 105, height: 56 },
  defaultStampOrigin: { x: 50, y: 50 },
  tempPrefix: 'stampdesk_',
};

function parsePositiveNumber(name: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidInputError(`${name} must be a positive number, got "${raw}"`);
  }
  return value;
}

function assertPositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidInputError(`${name} must be a positive number, got ${value}`);
  }
}

/**
 * Read the overrides the environment provides
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<StampDeskConfig> {
  const overrides: Partial<StampDeskConfig> = {};

  const outputDir = env.STAMPDESK_OUTPUT_DIR?.trim();
  if (outputDir) {
    overrides.outputDir = outputDir;
  }

  const quality = env.STAMPDESK_QUALITY_FACTOR?.trim();
  if (quality) {
    overrides.qualityFactor = parsePositiveNumber('STAMPDESK_QUALITY_FACTOR', quality);
  }

  return overrides;
}

/**
 * Merge defaults, environment and explicit overrides (in that order)
 *
 * @throws InvalidInputError if a numeric setting is out of range
 */
export function resolveConfig(
  overrides: Partial<StampDeskConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): StampDeskConfig {
  const resolved: StampDeskConfig = {
    ...DEFAULT_CONFIG,
    ...configFromEnv(env),
    ...overrides,
  };

  assertPositive('qualityFactor', resolved.qualityFactor);
  assertPositive('minZoom', resolved.minZoom);
  assertPositive('maxZoom', resolved.maxZoom);
  assertPositive('zoomStep', resolved.zoomStep);
  assertPositive('defaultStampSize.width', resolved.defaultStampSize.width);
  assertPositive('defaultStampSize.height', resolved.defaultStampSize.height);
  if (resolved.minZoom > resolved.maxZoom) {
    throw new InvalidInputError(
      `minZoom (${resolved.minZoom}) must not exceed maxZoom (${resolved.maxZoom})`
    );
  }
  if (!Number.isFinite(resolved.pasteOffset)) {
    throw new InvalidInputError('pasteOffset must be a finite number');
  }
  if (resolved.outputSuffix.length === 0) {
    throw new InvalidInputError('outputSuffix must not be empty');
  }

  return resolved;
}
