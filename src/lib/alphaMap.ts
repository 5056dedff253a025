import type { AlphaMap, RasterImage } from '../types';

/**
 * Compute per-pixel alpha values from a captured watermark reference.
 *
 * The references were captured on pure black, so pixel brightness maps
 * directly to the logo's opacity:
 *   watermarked = alpha * 255 + (1 - alpha) * 0  ->  alpha = pixel / 255
 *
 * The brightest channel wins so that slight colour fringing in the capture
 * still counts as logo.
 */
export function calculateAlphaMap(reference: RasterImage): AlphaMap {
  const { width, height, data } = reference;
  const alphaMap = new Float32Array(width * height);

  for (let i = 0; i < alphaMap.length; i++) {
    const idx = i * 4;
    alphaMap[i] = Math.max(data[idx], data[idx + 1], data[idx + 2]) / 255;
  }

  return alphaMap;
}
