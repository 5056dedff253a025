/**
 * Tests for reverse alpha blending
 */

import {
  ALPHA_THRESHOLD,
  LOGO_VALUE,
  MAX_ALPHA,
  WatermarkEngine,
  applyReverseBlend,
  applyWatermark,
} from '../engine';
import { calculatePosition, detectConfig } from '../geometry';
import { ReferenceAssetError } from '../../errors';
import type { RasterImage } from '../../types';

function uniformAlphaMap(size: number, value: number): Float32Array {
  return new Float32Array(size * size).fill(value);
}

function createSolidImage(
  width: number,
  height: number,
  rgba: [number, number, number, number]
): RasterImage {
  const data = new Uint8Array(width * height * 4);
  for (let i = 0; i < width * height; i++) {
    data.set(rgba, i * 4);
  }
  return { width, height, data };
}

function pixelAt(image: RasterImage, x: number, y: number): number[] {
  const idx = (y * image.width + x) * 4;
  return Array.from(image.data.subarray(idx, idx + 4));
}

describe('constants', () => {
  test('match the logo model', () => {
    expect(ALPHA_THRESHOLD).toBe(0.002);
    expect(MAX_ALPHA).toBe(0.99);
    expect(LOGO_VALUE).toBe(255);
  });
});

describe('WatermarkEngine construction', () => {
  test('rejects a map of the wrong length', () => {
    expect(() => new WatermarkEngine(uniformAlphaMap(47, 0.5), uniformAlphaMap(96, 0.5))).toThrow(
      ReferenceAssetError
    );
    expect(() => new WatermarkEngine(uniformAlphaMap(48, 0.5), uniformAlphaMap(48, 0.5))).toThrow(
      '96px alpha map has 2304 values, expected 9216'
    );
  });

  test('rejects values outside [0, 1]', () => {
    const alphaMap = uniformAlphaMap(48, 0.5);
    alphaMap[10] = 1.5;
    expect(() => new WatermarkEngine(alphaMap, uniformAlphaMap(96, 0.5))).toThrow(ReferenceAssetError);
  });

  test('keeps its own copy of the maps', () => {
    const alphaMap48 = uniformAlphaMap(48, 0.5);
    const engine = new WatermarkEngine(alphaMap48, uniformAlphaMap(96, 0.25));
    alphaMap48.fill(0);

    expect(engine.alphaMapFor(48)[0]).toBe(0.5);
    expect(engine.alphaMapFor(96)[0]).toBe(0.25);
  });

  test('builds from decoded references', () => {
    const engine = WatermarkEngine.fromReferences(
      createSolidImage(48, 48, [255, 255, 255, 255]),
      createSolidImage(96, 96, [0, 0, 0, 255])
    );

    expect(engine.alphaMapFor(48).every((alpha) => alpha === 1)).toBe(true);
    expect(engine.alphaMapFor(96).every((alpha) => alpha === 0)).toBe(true);
  });

  test('create() loads the bundled references', async () => {
    const engine = await WatermarkEngine.create();

    const alphaMap48 = engine.alphaMapFor(48);
    const alphaMap96 = engine.alphaMapFor(96);
    expect(alphaMap48.length).toBe(48 * 48);
    expect(alphaMap96.length).toBe(96 * 96);
    expect(alphaMap48.some((alpha) => alpha > 0)).toBe(true);
    expect(alphaMap96.every((alpha) => alpha >= 0 && alpha <= 1)).toBe(true);
  });
});

describe('applyReverseBlend', () => {
  const position = { x: 0, y: 0, width: 1, height: 1 };

  test('inverts the blend for each colour channel', () => {
    const data = new Uint8Array([200, 150, 100, 77]);
    applyReverseBlend(data, 1, 1, new Float32Array([0.5]), position);

    // (200 - 127.5) / 0.5 = 145, (150 - 127.5) / 0.5 = 45, 100 goes negative
    expect(Array.from(data)).toEqual([145, 45, 0, 77]);
  });

  test('truncates fractional results', () => {
    const data = new Uint8Array([201, 201, 201, 255]);
    applyReverseBlend(data, 1, 1, new Float32Array([0.3]), position);

    // (201 - 76.5) / 0.7 = 177.857...
    expect(Array.from(data)).toEqual([177, 177, 177, 255]);
  });

  test('rejects a map that does not match the position', () => {
    const data = new Uint8Array([200, 200, 200, 255]);
    expect(() => applyReverseBlend(data, 1, 1, uniformAlphaMap(2, 0.5), position)).toThrow(
      'alpha map has 4 values, position needs 1'
    );
    expect(Array.from(data)).toEqual([200, 200, 200, 255]);
  });

  test('skips fully transparent alpha', () => {
    const data = new Uint8Array([10, 20, 30, 255]);
    applyReverseBlend(data, 1, 1, new Float32Array([0]), position);
    expect(Array.from(data)).toEqual([10, 20, 30, 255]);
  });

  test('caps alpha at MAX_ALPHA instead of dividing by zero', () => {
    const data = new Uint8Array([253, 253, 253, 255]);
    applyReverseBlend(data, 1, 1, new Float32Array([1]), position);

    // (253 - 0.99 * 255) / 0.01 = 55
    expect(Array.from(data)).toEqual([55, 55, 55, 255]);
  });

  test('skips coordinates outside the image', () => {
    const data = new Uint8Array([200, 200, 200, 255]);
    applyReverseBlend(data, 1, 1, uniformAlphaMap(2, 0.5), { x: -1, y: -1, width: 2, height: 2 });

    // Only the bottom-right cell of the map lands on the single pixel
    expect(Array.from(data)).toEqual([145, 145, 145, 255]);
  });
});

describe('WatermarkEngine.removeWatermark', () => {
  const engine = new WatermarkEngine(uniformAlphaMap(48, 0.5), uniformAlphaMap(96, 0.5));

  test('preserves image dimensions', () => {
    for (const [width, height] of [
      [100, 100],
      [800, 600],
      [1100, 1100],
      [30, 30],
    ]) {
      const result = engine.removeWatermark(createSolidImage(width, height, [128, 128, 128, 255]));
      expect(result.width).toBe(width);
      expect(result.height).toBe(height);
      expect(result.data.length).toBe(width * height * 4);
    }
  });

  test('does not modify the input buffer', () => {
    const image = createSolidImage(200, 150, [200, 200, 200, 255]);
    const before = Uint8Array.from(image.data);

    const result = engine.removeWatermark(image);

    expect(result.data).not.toBe(image.data);
    expect(Buffer.from(image.data).equals(Buffer.from(before))).toBe(true);
  });

  test('only touches pixels inside the watermark square', () => {
    const image = createSolidImage(200, 150, [100, 150, 200, 255]);
    const result = engine.removeWatermark(image);
    // 200 - 32 - 48 = 120, 150 - 32 - 48 = 70
    const { x, y } = calculatePosition(200, 150, detectConfig(200, 150));
    expect([x, y]).toEqual([120, 70]);

    let changedOutside = 0;
    let inside = 0;
    for (let py = 0; py < 150; py++) {
      for (let px = 0; px < 200; px++) {
        const isInside = px >= 120 && px < 168 && py >= 70 && py < 118;
        const pixel = pixelAt(result, px, py);
        if (isInside) {
          inside++;
          expect(pixel).toEqual([0, 45, 145, 255]);
        } else if (pixel.join() !== '100,150,200,255') {
          changedOutside++;
        }
      }
    }

    expect(inside).toBe(48 * 48);
    expect(changedOutside).toBe(0);
  });

  test('preserves every pixel alpha byte', () => {
    const image = createSolidImage(120, 100, [220, 220, 220, 128]);
    const result = engine.removeWatermark(image);

    for (let i = 3; i < result.data.length; i += 4) {
      expect(result.data[i]).toBe(128);
    }
  });

  test('uses the 96px map when both sides exceed 1024', () => {
    const largeOnly = new WatermarkEngine(uniformAlphaMap(48, 0), uniformAlphaMap(96, 0.5));
    const image = createSolidImage(1100, 1100, [200, 200, 200, 255]);

    const result = largeOnly.removeWatermark(image);

    // 1100 - 64 - 96 = 940
    expect(pixelAt(result, 940, 940)).toEqual([145, 145, 145, 255]);
    expect(pixelAt(result, 1035, 1035)).toEqual([145, 145, 145, 255]);
    expect(pixelAt(result, 939, 940)).toEqual([200, 200, 200, 255]);
    expect(pixelAt(result, 1036, 1036)).toEqual([200, 200, 200, 255]);
  });

  test('restores the overlapping part of an undersized image', () => {
    // Position is (-20, -20); only [0, 28) x [0, 28) overlaps
    const result = engine.removeWatermark(createSolidImage(60, 60, [200, 200, 200, 255]));

    expect(pixelAt(result, 0, 0)).toEqual([145, 145, 145, 255]);
    expect(pixelAt(result, 27, 27)).toEqual([145, 145, 145, 255]);
    expect(pixelAt(result, 28, 27)).toEqual([200, 200, 200, 255]);
    expect(pixelAt(result, 59, 59)).toEqual([200, 200, 200, 255]);
  });

  test('leaves a tiny image untouched when the square misses it entirely', () => {
    const image = createSolidImage(10, 10, [200, 200, 200, 255]);
    const result = engine.removeWatermark(image);
    expect(Array.from(result.data)).toEqual(Array.from(image.data));
  });
});

describe('round trip', () => {
  function createPatternImage(width: number, height: number): RasterImage {
    const data = new Uint8Array(width * height * 4);
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        const idx = (y * width + x) * 4;
        data[idx] = (x * 7 + y * 13) % 256;
        data[idx + 1] = (x * 3 + y * 5 + 40) % 256;
        data[idx + 2] = (x * 11 + y * 2 + 90) % 256;
        data[idx + 3] = 255;
      }
    }
    return { width, height, data };
  }

  function maxChannelDifference(a: RasterImage, b: RasterImage): number {
    let max = 0;
    for (let i = 0; i < a.data.length; i++) {
      max = Math.max(max, Math.abs(a.data[i] - b.data[i]));
    }
    return max;
  }

  test('removal undoes a composited gradient logo', () => {
    const size = 48;
    const alphaMap = new Float32Array(size * size);
    for (let i = 0; i < alphaMap.length; i++) {
      alphaMap[i] = (i / alphaMap.length) * 0.5;
    }
    const engine = new WatermarkEngine(alphaMap, uniformAlphaMap(96, 0));

    const original = createPatternImage(320, 240);
    const position = calculatePosition(320, 240, detectConfig(320, 240));
    const watermarked = applyWatermark(original, alphaMap, position);

    expect(maxChannelDifference(original, watermarked)).toBeGreaterThan(50);
    expect(maxChannelDifference(original, engine.removeWatermark(watermarked))).toBeLessThanOrEqual(1);
  });

  test('removal undoes the bundled large logo', async () => {
    const engine = await WatermarkEngine.create();
    const original = createPatternImage(1280, 1100);
    const position = calculatePosition(1280, 1100, detectConfig(1280, 1100));
    const watermarked = applyWatermark(original, engine.alphaMapFor(96), position);

    expect(maxChannelDifference(original, engine.removeWatermark(watermarked))).toBeLessThanOrEqual(1);
  });
});
