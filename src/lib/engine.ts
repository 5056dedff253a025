/**
 * Reverse alpha blending to recover the pixels beneath the logo.
 *
 * The logo is composited as:
 *   watermarked = alpha * 255 + (1 - alpha) * original
 *
 * Solving for original:
 *   original = (watermarked - alpha * 255) / (1 - alpha)
 */

import { calculateAlphaMap } from './alphaMap';
import { loadReferenceImage } from './assets';
import { calculatePosition, clamp, detectConfig } from './geometry';
import { ReferenceAssetError } from '../errors';
import type { AlphaMap, RasterImage, WatermarkPosition, WatermarkSize } from '../types';

// Below this the logo contributes nothing measurable
export const ALPHA_THRESHOLD = 0.002;
// Keeps 1 - alpha away from zero
export const MAX_ALPHA = 0.99;
// The logo is pure white
export const LOGO_VALUE = 255;

/**
 * In-place reverse blend over a packed RGBA buffer. Coordinates outside the
 * image are skipped, as are alpha values under the threshold. The pixel's
 * own alpha byte is left alone. Restored channels are truncated to integers.
 *
 * `alphaMap` must hold exactly `position.width * position.height` values,
 * row-major with `position.width` as the stride.
 */
export function applyReverseBlend(
  data: Uint8Array,
  width: number,
  height: number,
  alphaMap: AlphaMap,
  position: WatermarkPosition
): void {
  const { x, y } = position;
  const size = position.width;
  if (alphaMap.length !== position.width * position.height) {
    throw new RangeError(
      `alpha map has ${alphaMap.length} values, position needs ${position.width * position.height}`
    );
  }

  for (let row = 0; row < position.height; row++) {
    const imgY = y + row;
    if (imgY < 0 || imgY >= height) continue;

    for (let col = 0; col < size; col++) {
      const imgX = x + col;
      if (imgX < 0 || imgX >= width) continue;

      let alpha = alphaMap[row * size + col];
      if (alpha < ALPHA_THRESHOLD) continue;
      alpha = Math.min(alpha, MAX_ALPHA);

      const oneMinusAlpha = 1 - alpha;
      const idx = (imgY * width + imgX) * 4;

      for (let c = 0; c < 3; c++) {
        const original = (data[idx + c] - alpha * LOGO_VALUE) / oneMinusAlpha;
        data[idx + c] = Math.trunc(clamp(original, 0, 255));
      }
    }
  }
}

/**
 * Forward composite of the logo onto a copy of the raster. Used to build
 * fixtures and to check that removal inverts it.
 */
export function applyWatermark(
  raster: RasterImage,
  alphaMap: AlphaMap,
  position: WatermarkPosition
): RasterImage {
  const { width, height } = raster;
  const data = new Uint8Array(raster.data);
  const size = position.width;

  for (let row = 0; row < position.height; row++) {
    const imgY = position.y + row;
    if (imgY < 0 || imgY >= height) continue;

    for (let col = 0; col < size; col++) {
      const imgX = position.x + col;
      if (imgX < 0 || imgX >= width) continue;

      const alpha = alphaMap[row * size + col];
      const idx = (imgY * width + imgX) * 4;
      for (let c = 0; c < 3; c++) {
        data[idx + c] = Math.round(alpha * LOGO_VALUE + (1 - alpha) * data[idx + c]);
      }
    }
  }

  return { width, height, data };
}

function validateAlphaMap(alphaMap: AlphaMap, size: WatermarkSize): void {
  if (alphaMap.length !== size * size) {
    throw new ReferenceAssetError(
      `${size}px alpha map has ${alphaMap.length} values, expected ${size * size}`
    );
  }
  for (let i = 0; i < alphaMap.length; i++) {
    if (!(alphaMap[i] >= 0 && alphaMap[i] <= 1)) {
      throw new ReferenceAssetError(`${size}px alpha map value ${alphaMap[i]} at ${i} is outside [0, 1]`);
    }
  }
}

/**
 * Holds the alpha maps for both logo sizes. Build one per run and share it:
 * the maps are never written after construction, so concurrent removals need
 * no coordination.
 */
export class WatermarkEngine {
  private readonly alphaMap48: AlphaMap;
  private readonly alphaMap96: AlphaMap;

  constructor(alphaMap48: AlphaMap, alphaMap96: AlphaMap) {
    validateAlphaMap(alphaMap48, 48);
    validateAlphaMap(alphaMap96, 96);
    // Copied; nothing outside the engine holds a reference to its maps
    this.alphaMap48 = Float32Array.from(alphaMap48);
    this.alphaMap96 = Float32Array.from(alphaMap96);
  }

  static fromReferences(reference48: RasterImage, reference96: RasterImage): WatermarkEngine {
    return new WatermarkEngine(calculateAlphaMap(reference48), calculateAlphaMap(reference96));
  }

  // Loads the bundled references; rejects with ReferenceAssetError if either is unusable
  static async create(): Promise<WatermarkEngine> {
    const [reference48, reference96] = await Promise.all([
      loadReferenceImage(48),
      loadReferenceImage(96),
    ]);
    return WatermarkEngine.fromReferences(reference48, reference96);
  }

  alphaMapFor(size: WatermarkSize): AlphaMap {
    return Float32Array.from(size === 96 ? this.alphaMap96 : this.alphaMap48);
  }

  /**
   * Returns a new raster with the logo removed. The input is not modified and
   * every byte outside the watermark square is copied unchanged.
   */
  removeWatermark(image: RasterImage): RasterImage {
    const { width, height } = image;
    const data = new Uint8Array(image.data);

    const config = detectConfig(width, height);
    const position = calculatePosition(width, height, config);
    const alphaMap = config.size === 96 ? this.alphaMap96 : this.alphaMap48;

    applyReverseBlend(data, width, height, alphaMap, position);

    return { width, height, data };
  }
}
