import * as fs from 'fs';
import * as path from 'path';
import { Jimp } from 'jimp';
import { ReferenceAssetError, errorMessage } from '../errors';
import type { RasterImage, WatermarkSize } from '../types';

// Captures of the logo over pure black, shipped beside the package
const ASSETS_DIR = path.resolve(__dirname, '..', '..', 'assets');

export function referenceAssetPath(size: WatermarkSize): string {
  return path.join(ASSETS_DIR, `bg_${size}.png`);
}

export async function decodeReference(buffer: Buffer, size: WatermarkSize): Promise<RasterImage> {
  const image = await Jimp.read(buffer).catch((error: unknown) => {
    throw new ReferenceAssetError(`failed to decode ${size}px reference: ${errorMessage(error)}`, {
      cause: error,
    });
  });

  const { width, height, data } = image.bitmap;
  if (width !== size || height !== size) {
    throw new ReferenceAssetError(
      `${size}px reference has wrong dimensions: ${width}x${height}`
    );
  }

  return { width, height, data };
}

export async function loadReferenceImage(size: WatermarkSize): Promise<RasterImage> {
  const assetPath = referenceAssetPath(size);
  let buffer: Buffer;
  try {
    buffer = await fs.promises.readFile(assetPath);
  } catch (error) {
    throw new ReferenceAssetError(`failed to load ${size}px reference: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  return decodeReference(buffer, size);
}
