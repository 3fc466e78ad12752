import { describe, it, expect } from 'vitest';
import type { PackedImage, Rgba8 } from '@cutout/types';
import { createPackedImage, fromAccessor } from '@cutout/core';
import {
  autoMask,
  detectUniformBackground,
  hasAlpha,
  maskFromAlpha,
  maskFromBackground,
} from './masks';

function filled(width: number, height: number, color: Rgba8): PackedImage {
  const image = createPackedImage(width, height);
  for (let i = 0; i < width * height; i++) {
    image.data.set([color.r, color.g, color.b, color.a], i * 4);
  }
  return image;
}

function setPixel(image: PackedImage, x: number, y: number, color: Rgba8): void {
  image.data.set([color.r, color.g, color.b, color.a], y * image.stride + x * 4);
}

const WHITE: Rgba8 = { r: 255, g: 255, b: 255, a: 255 };
const BLACK: Rgba8 = { r: 0, g: 0, b: 0, a: 255 };
const BLUE: Rgba8 = { r: 0, g: 0, b: 255, a: 255 };
const RED: Rgba8 = { r: 255, g: 0, b: 0, a: 255 };

describe('hasAlpha', () => {
  it('detects translucency on the sample grid', () => {
    const image = filled(10, 10, WHITE);
    setPixel(image, 5, 5, { r: 255, g: 255, b: 255, a: 128 });

    expect(hasAlpha(image)).toBe(true);
  });

  it('reports opaque images as having no alpha', () => {
    expect(hasAlpha(filled(10, 10, WHITE))).toBe(false);
  });

  it('reports gray images as having no alpha', () => {
    expect(hasAlpha(createPackedImage(10, 10, 'gray'))).toBe(false);
  });

  it('trusts accessors that declare no alpha channel', () => {
    const image = fromAccessor({ width: 4, height: 4 }, () => ({ r: 0, g: 0, b: 0, a: 0 }), false);

    expect(hasAlpha(image)).toBe(false);
  });
});

describe('maskFromAlpha', () => {
  it('copies the alpha channel of a packed image', () => {
    const image = filled(4, 1, WHITE);
    [0, 64, 128, 255].forEach((a, x) => setPixel(image, x, 0, { ...WHITE, a }));

    expect(Array.from(maskFromAlpha(image).data)).toEqual([0, 64, 128, 255]);
  });

  it('honors a padded stride', () => {
    const data = new Uint8Array([
      0, 0, 0, 10, 0, 0, 0, 20, 99, 99,
      0, 0, 0, 30, 0, 0, 0, 40, 99, 99,
    ]);
    const image: PackedImage = { kind: 'packed', format: 'rgba', data, width: 2, height: 2, stride: 10 };

    expect(Array.from(maskFromAlpha(image).data)).toEqual([10, 20, 30, 40]);
  });

  it('reads alpha through an accessor', () => {
    const image = fromAccessor({ width: 3, height: 2 }, (x, y) => ({ r: 0, g: 0, b: 0, a: x + y * 3 }));

    expect(Array.from(maskFromAlpha(image).data)).toEqual([0, 1, 2, 3, 4, 5]);
  });

  it('treats gray images as fully opaque', () => {
    const mask = maskFromAlpha(createPackedImage(3, 3, 'gray'));

    expect(mask.data.every((v) => v === 255)).toBe(true);
    expect(mask.size).toEqual({ width: 3, height: 3 });
  });
});

describe('maskFromBackground', () => {
  it('separates an object from the background color', () => {
    const image = filled(10, 10, WHITE);
    setPixel(image, 5, 5, BLACK);

    const mask = maskFromBackground(image, { r: 255, g: 255, b: 255 }, 10);

    expect(mask.data[0]).toBe(0);
    expect(mask.data[5 * 10 + 5]).toBe(255);
  });

  it('keeps colors within tolerance as background', () => {
    const image = filled(2, 2, { r: 250, g: 255, b: 255, a: 255 });

    const mask = maskFromBackground(image, { r: 255, g: 255, b: 255 }, 10);

    expect(Array.from(mask.data)).toEqual([0, 0, 0, 0]);
  });

  it('gives the same result for accessor sources', () => {
    const image = fromAccessor({ width: 2, height: 1 }, (x) => (x === 0 ? WHITE : BLACK));

    const mask = maskFromBackground(image, { r: 255, g: 255, b: 255 }, 10);

    expect(Array.from(mask.data)).toEqual([0, 255]);
  });
});

describe('detectUniformBackground', () => {
  it('recognizes a solid border and reports its color', () => {
    const estimate = detectUniformBackground(filled(100, 100, BLUE));

    expect(estimate.uniform).toBe(true);
    expect(estimate.color).toEqual({ r: 0, g: 0, b: 255 });
  });

  it('ignores the interior', () => {
    const image = filled(20, 20, WHITE);
    setPixel(image, 10, 10, BLACK);

    expect(detectUniformBackground(image).uniform).toBe(true);
  });

  it('rejects a split border', () => {
    const image = filled(100, 100, WHITE);
    for (let y = 0; y < 100; y++) {
      for (let x = 50; x < 100; x++) setPixel(image, x, y, BLACK);
    }

    expect(detectUniformBackground(image).uniform).toBe(false);
  });
});

describe('autoMask', () => {
  it('prefers the alpha channel', () => {
    const image = filled(10, 10, { r: 0, g: 0, b: 0, a: 0 });
    setPixel(image, 5, 5, { r: 0, g: 0, b: 0, a: 200 });

    const mask = autoMask(image);

    expect(mask.data[5 * 10 + 5]).toBe(200);
    expect(mask.data[0]).toBe(0);
  });

  it('falls back to the background color', () => {
    const image = filled(10, 10, BLUE);
    setPixel(image, 5, 5, RED);

    const mask = autoMask(image);

    expect(mask.data[5 * 10 + 5]).toBe(255);
    expect(mask.data[0]).toBe(0);
  });

  it('falls back to edges when the border is not uniform', () => {
    const image = filled(20, 20, BLACK);
    for (let y = 0; y < 20; y++) {
      for (let x = 10; x < 20; x++) setPixel(image, x, y, WHITE);
    }

    const mask = autoMask(image);

    expect(mask.data[10 * 20 + 9]).toBe(255);
    expect(mask.data[10 * 20 + 3]).toBe(0);
    expect(mask.data[10 * 20 + 16]).toBe(0);
    expect(mask.data[10 * 20]).toBe(0);
  });
});
