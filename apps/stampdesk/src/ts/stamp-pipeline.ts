/**
 * Stamp Pipeline
 *
 * Applies an ordered list of stamps to one PDF as a chain of single-image
 * steps: the first step reads the original file, each later step reads the
 * previous step's output, and the last step writes the export path.
 * Intermediate PDFs and stamp rasters live in one temp scope that is
 * removed whatever the outcome.
 */

import { rm } from 'fs/promises';

import { compositeStamp } from './compositor';
import type { StampDeskConfig } from './config';
import { WatermarkPlacementError, errorMessage } from './errors';
import { loggers } from './logger';
import { reserveOutputPath } from './output-naming';
import { addImageWatermark, inspectPdf } from './pdf-backend';
import { validateStampRequest } from './stamp-model';
import { withTempScope } from './temp-files';
import type { StampRequest } from './types';

const log = loggers.StampPipeline;

/**
 * Input to one pipeline run
 */
export interface StampJob {
  pdfFilePath: string;
  /** Applied in this order; later stamps draw over earlier ones */
  stamps: readonly StampRequest[];
}

type PipelineSettings = Pick<
  StampDeskConfig,
  'outputDir' | 'outputSuffix' | 'qualityFactor' | 'tempPrefix'
>;

export class StampPipeline {
  constructor(private readonly settings: PipelineSettings) {}

  /**
   * Stamp `job.pdfFilePath` and return the absolute output path.
   *
   * With no stamps the input path is returned unchanged and nothing is
   * written.
   *
   * @throws ImageDecodeError, PdfInspectionError, WatermarkPlacementError,
   *   FileSystemError, InvalidInputError
   */
  async run(job: StampJob): Promise<string> {
    const { pdfFilePath, stamps } = job;
    if (stamps.length === 0) {
      log.debug('No stamps; returning input unchanged', { pdfFilePath });
      return pdfFilePath;
    }

    stamps.forEach(validateStampRequest);

    // Fails before anything is written
    const pages = await inspectPdf(pdfFilePath);
    for (const [i, stamp] of stamps.entries()) {
      if (stamp.pageNum > pages.length) {
        throw new WatermarkPlacementError(
          `Stamp ${i + 1} targets page ${stamp.pageNum} but the document has ${pages.length} pages`
        );
      }
    }

    const { outputDir, outputSuffix, qualityFactor, tempPrefix } = this.settings;
    const reservation = await reserveOutputPath(pdfFilePath, outputDir, outputSuffix);
    const outputPath = reservation.path;
    log.info('Stamping document', { pdfFilePath, outputPath, stampCount: stamps.length });

    try {
      await withTempScope(tempPrefix, async (scope) => {
        let currentInput = pdfFilePath;

        for (const [i, stamp] of stamps.entries()) {
          const isLast = i === stamps.length - 1;
          const stepOutput = isLast ? outputPath : scope.file('intermediate', '.pdf');
          const pageHeight = pages[stamp.pageNum - 1].height;

          const composited = await compositeStamp(stamp, pageHeight, scope, qualityFactor);
          await addImageWatermark(currentInput, stepOutput, composited.imagePath, composited.descriptor);

          log.debug(`Applied stamp ${i + 1}/${stamps.length}`, { page: stamp.pageNum });
          currentInput = stepOutput;
        }
      });
    } catch (error) {
      await removePartialOutput(outputPath);
      log.error('Stamping failed', { pdfFilePath }, error);
      throw error;
    } finally {
      reservation.release();
    }

    log.info('Stamped document written', { outputPath });
    return outputPath;
  }
}

async function removePartialOutput(path: string): Promise<void> {
  try {
    await rm(path, { force: true });
  } catch (error) {
    log.warn('Could not remove partial output', { path, reason: errorMessage(error) });
  }
}
