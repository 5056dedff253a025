import * as path from 'path';
import { readImageFile, writeImageFile } from './image-processor';
import { generateOutputPath } from './files';
import { getWatermarkInfo, hasWatermarkArea } from './lib/geometry';
import { errorMessage } from './errors';
import type { WatermarkEngine } from './lib/engine';
import type { ProcessOptions } from './config';
import type { Logger } from './logger';
import type { ImageFormat, WatermarkInfo } from './types';

export interface ProcessResult {
  inputPath: string;
  outputPath: string;
  width: number;
  height: number;
  format: ImageFormat;
  watermark: WatermarkInfo;
}

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
}

/**
 * Remove the watermark from one file and write the result beside it, in the
 * same format it was read in.
 */
export async function processImageFile(
  engine: WatermarkEngine,
  inputPath: string,
  options: ProcessOptions,
  logger: Logger
): Promise<ProcessResult> {
  const { raster, format: detectedFormat } = await readImageFile(inputPath);
  const { width, height } = raster;
  // Unknown containers are written as lossless PNG
  const format = detectedFormat ?? 'png';
  const watermark = getWatermarkInfo(width, height);

  logger.detail(`Processing: ${inputPath} (${width}x${height}, format: ${format})`);
  logger.detail(
    `  Watermark: ${watermark.config.size}x${watermark.config.size} at position (${watermark.position.x}, ${watermark.position.y})`
  );
  if (!hasWatermarkArea(width, height)) {
    logger.warn(`Warning: ${path.basename(inputPath)} is smaller than the watermark area; only the overlapping part is restored`);
  }

  const cleaned = engine.removeWatermark(raster);

  const outputPath = generateOutputPath(inputPath, options.suffix);
  await writeImageFile(outputPath, cleaned, format, options.jpegQuality);
  logger.info(`Saved: ${outputPath}`);

  return { inputPath, outputPath, width, height, format, watermark };
}

// A failing file is reported and skipped; the rest of the batch still runs
export async function processImageFiles(
  engine: WatermarkEngine,
  files: string[],
  options: ProcessOptions,
  logger: Logger
): Promise<BatchSummary> {
  let succeeded = 0;

  for (const file of files) {
    try {
      await processImageFile(engine, file, options, logger);
      succeeded++;
    } catch (error) {
      logger.error(`Error processing ${file}: ${errorMessage(error)}`);
    }
  }

  return { total: files.length, succeeded, failed: files.length - succeeded };
}
