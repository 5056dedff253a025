import type { WatermarkConfig, WatermarkInfo, WatermarkPosition } from '../types';

export const SMALL_WATERMARK: Readonly<WatermarkConfig> = Object.freeze({ size: 48, margin: 32 });
export const LARGE_WATERMARK: Readonly<WatermarkConfig> = Object.freeze({ size: 96, margin: 64 });

// Both sides must be strictly larger; a single long edge keeps the small logo.
const LARGE_IMAGE_THRESHOLD = 1024;

export function detectConfig(width: number, height: number): WatermarkConfig {
  if (width > LARGE_IMAGE_THRESHOLD && height > LARGE_IMAGE_THRESHOLD) {
    return LARGE_WATERMARK;
  }
  return SMALL_WATERMARK;
}

/**
 * Square anchored to the bottom-right corner, inset by the margin on both
 * edges. Not clamped: images smaller than margin + size give negative
 * coordinates, and consumers skip whatever falls outside the image.
 */
export function calculatePosition(
  imgWidth: number,
  imgHeight: number,
  config: WatermarkConfig
): WatermarkPosition {
  return {
    x: imgWidth - config.margin - config.size,
    y: imgHeight - config.margin - config.size,
    width: config.size,
    height: config.size,
  };
}

export function getWatermarkInfo(width: number, height: number): WatermarkInfo {
  const config = detectConfig(width, height);
  return { config, position: calculatePosition(width, height, config) };
}

// True when the whole watermark square lies inside the image
export function hasWatermarkArea(width: number, height: number): boolean {
  const { size, margin } = detectConfig(width, height);
  return width >= size + margin && height >= size + margin;
}

export function clamp(value: number, min: number, max: number): number {
  if (value < min) return min;
  if (value > max) return max;
  return value;
}
