import * as fs from 'fs';
import { Jimp } from 'jimp';
import { ImageDecodeError, errorMessage } from './errors';
import type { ImageFormat, RasterImage } from './types';

export interface DecodedImage {
  raster: RasterImage;
  // Format sniffed from the file header; undefined when unrecognised
  format: ImageFormat | undefined;
}

export const DEFAULT_JPEG_QUALITY = 95;

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const JPEG_SIGNATURE = [0xff, 0xd8, 0xff];

function startsWith(buffer: Uint8Array, signature: number[]): boolean {
  return buffer.length >= signature.length && signature.every((byte, i) => buffer[i] === byte);
}

export function detectImageFormat(buffer: Uint8Array): ImageFormat | undefined {
  if (startsWith(buffer, PNG_SIGNATURE)) return 'png';
  if (startsWith(buffer, JPEG_SIGNATURE)) return 'jpeg';
  return undefined;
}

export async function decodeImage(buffer: Buffer): Promise<DecodedImage> {
  const image = await Jimp.read(buffer).catch((error: unknown) => {
    throw new ImageDecodeError(`failed to decode image: ${errorMessage(error)}`, { cause: error });
  });

  const { width, height, data } = image.bitmap;
  return {
    raster: { width, height, data },
    format: detectImageFormat(buffer),
  };
}

/**
 * Encode in the given format. PNG stays lossless; JPEG is written at the
 * requested quality. Anything unrecognised is written as PNG.
 */
export async function encodeImage(
  raster: RasterImage,
  format: ImageFormat | undefined,
  jpegQuality: number = DEFAULT_JPEG_QUALITY
): Promise<Buffer> {
  const image = new Jimp({
    width: raster.width,
    height: raster.height,
    data: Buffer.from(raster.data),
  });

  if (format === 'jpeg') {
    return image.getBuffer('image/jpeg', { quality: jpegQuality });
  }
  return image.getBuffer('image/png');
}

export async function readImageFile(filepath: string): Promise<DecodedImage> {
  const buffer = await fs.promises.readFile(filepath);
  return decodeImage(buffer);
}

export async function writeImageFile(
  filepath: string,
  raster: RasterImage,
  format: ImageFormat | undefined,
  jpegQuality: number = DEFAULT_JPEG_QUALITY
): Promise<void> {
  const encoded = await encodeImage(raster, format, jpegQuality);
  await fs.promises.writeFile(filepath, encoded);
}
