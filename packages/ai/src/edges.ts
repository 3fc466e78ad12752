/**
 * @module edges
 * Luma conversion and Sobel edge masks.
 */

import type { ImageSource, Mask, PackedImage } from '@cutout/types';
import { createPackedImage, readPixel } from '@cutout/core';

/** BT.601 luma weights, scaled by 1000. */
const LUMA_R = 299;
const LUMA_G = 587;
const LUMA_B = 114;

/** Integer BT.601 luma of an 8-bit RGB triple. */
export function luma(r: number, g: number, b: number): number {
  return Math.floor((LUMA_R * r + LUMA_G * g + LUMA_B * b) / 1000);
}

/**
 * Reduce an image to a tightly packed single-channel intensity image.
 * Packed RGBA sources are read straight from the buffer; gray sources are copied.
 */
export function toGrayscale(image: ImageSource): PackedImage {
  const { width, height } = image;
  const gray = createPackedImage(width, height, 'gray');
  const out = gray.data;

  if (image.kind === 'packed') {
    const { data, stride } = image;
    if (image.format === 'gray') {
      for (let y = 0; y < height; y++) {
        out.set(data.subarray(y * stride, y * stride + width), y * width);
      }
      return gray;
    }
    for (let y = 0; y < height; y++) {
      let i = y * stride;
      let o = y * width;
      for (let x = 0; x < width; x++, i += 4, o++) {
        out[o] = luma(data[i], data[i + 1], data[i + 2]);
      }
    }
    return gray;
  }

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const p = readPixel(image, x, y);
      out[y * width + x] = luma(p.r, p.g, p.b);
    }
  }
  return gray;
}

/**
 * Sobel edge mask.
 * Interior pixels whose gradient magnitude exceeds `threshold` become 255.
 * The 1-pixel border is never classified and stays 0.
 *
 * @param threshold - Gradient magnitude cutoff (compared squared).
 */
export function maskFromEdges(image: ImageSource, threshold: number): Mask {
  const { width, height } = image;
  const g = toGrayscale(image).data;
  const data = new Uint8Array(width * height);
  const limit = threshold * threshold;

  for (let y = 1; y < height - 1; y++) {
    const up = (y - 1) * width;
    const mid = y * width;
    const down = (y + 1) * width;
    for (let x = 1; x < width - 1; x++) {
      const tl = g[up + x - 1];
      const tc = g[up + x];
      const tr = g[up + x + 1];
      const ml = g[mid + x - 1];
      const mr = g[mid + x + 1];
      const bl = g[down + x - 1];
      const bc = g[down + x];
      const br = g[down + x + 1];

      const gx = tr + 2 * mr + br - tl - 2 * ml - bl;
      const gy = bl + 2 * bc + br - tl - 2 * tc - tr;
      if (gx * gx + gy * gy > limit) {
        data[mid + x] = 255;
      }
    }
  }

  return { data, size: { width, height } };
}
