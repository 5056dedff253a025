export { WatermarkEngine, applyReverseBlend, applyWatermark, ALPHA_THRESHOLD, MAX_ALPHA, LOGO_VALUE } from './lib/engine';
export { calculateAlphaMap } from './lib/alphaMap';
export {
  detectConfig,
  calculatePosition,
  getWatermarkInfo,
  hasWatermarkArea,
  clamp,
  SMALL_WATERMARK,
  LARGE_WATERMARK,
} from './lib/geometry';
export { loadReferenceImage, decodeReference, referenceAssetPath } from './lib/assets';
export type { DecodedImage } from './image-processor';
export { decodeImage, encodeImage, readImageFile, writeImageFile, detectImageFormat } from './image-processor';
export { processImageFile, processImageFiles } from './processor';
export type { ProcessResult, BatchSummary } from './processor';
export { DEFAULT_OPTIONS, parseConfig, readConfig, resolveOptions } from './config';
export type { ProcessOptions, FileConfig } from './config';
export { ReferenceAssetError, ImageDecodeError, UsageError } from './errors';
export { createConsoleLogger } from './logger';
export type { Logger } from './logger';
export type {
  RasterImage,
  AlphaMap,
  WatermarkConfig,
  WatermarkPosition,
  WatermarkInfo,
  WatermarkSize,
  ImageFormat,
} from './types';
