import { describe, it, expect } from 'vitest';
import type { PackedImage } from '@cutout/types';
import { createPackedImage, fromAccessor } from '@cutout/core';
import { luma, maskFromEdges, toGrayscale } from './edges';

/** Gray image: 0 left of `edgeX`, 255 from it onward. */
function stepImage(width: number, height: number, edgeX: number): PackedImage {
  const image = createPackedImage(width, height, 'gray');
  for (let y = 0; y < height; y++) {
    for (let x = edgeX; x < width; x++) image.data[y * width + x] = 255;
  }
  return image;
}

describe('luma', () => {
  it('uses integer BT.601 weights', () => {
    expect(luma(255, 0, 0)).toBe(76);
    expect(luma(0, 255, 0)).toBe(149);
    expect(luma(0, 0, 255)).toBe(29);
    expect(luma(255, 255, 255)).toBe(255);
  });
});

describe('toGrayscale', () => {
  it('converts packed RGBA pixels', () => {
    const image = createPackedImage(4, 1);
    image.data.set([255, 0, 0, 255, 0, 255, 0, 255, 0, 0, 255, 255, 255, 255, 255, 255]);

    const gray = toGrayscale(image);

    expect(gray.format).toBe('gray');
    expect(gray.stride).toBe(4);
    expect(Array.from(gray.data)).toEqual([76, 149, 29, 255]);
  });

  it('matches the packed path for accessors', () => {
    const colors = [
      { r: 255, g: 0, b: 0, a: 255 },
      { r: 0, g: 255, b: 0, a: 255 },
    ];
    const image = fromAccessor({ width: 2, height: 1 }, (x) => colors[x]);

    expect(Array.from(toGrayscale(image).data)).toEqual([76, 149]);
  });

  it('repacks padded gray rows', () => {
    const image: PackedImage = {
      kind: 'packed',
      format: 'gray',
      data: new Uint8Array([1, 2, 0, 3, 4, 0]),
      width: 2,
      height: 2,
      stride: 3,
    };

    expect(Array.from(toGrayscale(image).data)).toEqual([1, 2, 3, 4]);
  });
});

describe('maskFromEdges', () => {
  it('marks a vertical edge and nothing in flat regions', () => {
    const mask = maskFromEdges(stepImage(20, 20, 10), 50);

    for (let y = 1; y < 19; y++) {
      expect(mask.data[y * 20 + 9]).toBe(255);
      expect(mask.data[y * 20 + 10]).toBe(255);
    }
    expect(mask.data[2 * 20 + 2]).toBe(0);
    expect(mask.data[18 * 20 + 18]).toBe(0);
  });

  it('never classifies the border', () => {
    const mask = maskFromEdges(stepImage(20, 20, 1), 10);

    for (let i = 0; i < 20; i++) {
      expect(mask.data[i]).toBe(0);
      expect(mask.data[19 * 20 + i]).toBe(0);
      expect(mask.data[i * 20]).toBe(0);
      expect(mask.data[i * 20 + 19]).toBe(0);
    }
    expect(mask.data[5 * 20 + 1]).toBe(255);
  });

  it('compares the gradient magnitude strictly', () => {
    // A 1-level step yields gx = 4, magnitude 4
    const image = createPackedImage(3, 3, 'gray');
    image.data.set([0, 0, 1, 0, 0, 1, 0, 0, 1]);

    expect(maskFromEdges(image, 4).data[4]).toBe(0);
    expect(maskFromEdges(image, 3).data[4]).toBe(255);
  });
});
