/**
 * Decoded raster: packed RGBA, 4 bytes per pixel, row-major from the top-left.
 */
export interface RasterImage {
  width: number;
  height: number;
  data: Uint8Array;
}

// One normalized transparency value per reference pixel, row-major
export type AlphaMap = Float32Array;

export type WatermarkSize = 48 | 96;

export interface WatermarkConfig {
  size: WatermarkSize;
  margin: number;
}

export interface WatermarkPosition {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface WatermarkInfo {
  config: WatermarkConfig;
  position: WatermarkPosition;
}

export type ImageFormat = 'png' | 'jpeg';
