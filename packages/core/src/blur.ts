/**
 * @module blur
 * Separable Gaussian blur for color images.
 */

import type { ImageSource, PackedImage } from '@cutout/types';
import { clamp, toRgbaImage } from './pixels';

/**
 * Build a normalized 1D Gaussian kernel covering +-3 sigma.
 */
export function gaussianKernel(sigma: number): Float32Array {
  const r = Math.max(1, Math.ceil(sigma * 3));
  const kernelSize = r * 2 + 1;
  const kernel = new Float32Array(kernelSize);
  let sum = 0;
  for (let i = 0; i < kernelSize; i++) {
    const x = i - r;
    const value = Math.exp(-(x * x) / (2 * sigma * sigma));
    kernel[i] = value;
    sum += value;
  }
  // Normalize
  for (let i = 0; i < kernelSize; i++) {
    kernel[i] /= sum;
  }
  return kernel;
}

/**
 * Apply a two-pass separable Gaussian blur to all four channels.
 * Samples past the image edge are clamped to the nearest edge pixel.
 *
 * @param image - Source image (not mutated).
 * @param sigma - Standard deviation in pixels. Values <= 0 return an unblurred copy.
 * @returns New packed RGBA image.
 */
export function gaussianBlur(image: ImageSource, sigma: number): PackedImage {
  const src = toRgbaImage(image);
  const { width, height } = src;
  const result: PackedImage = {
    kind: 'packed',
    format: 'rgba',
    data: new Uint8Array(src.data),
    width,
    height,
    stride: width * 4,
  };
  if (sigma <= 0 || width === 0 || height === 0) {
    return result;
  }

  const kernel = gaussianKernel(sigma);
  const r = (kernel.length - 1) / 2;
  const s = src.data;

  // Horizontal pass
  const temp = new Float32Array(width * height * 4);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const o = (y * width + x) * 4;
      for (let k = 0; k < kernel.length; k++) {
        const clampedX = clamp(x - r + k, 0, width - 1);
        const i = (y * width + clampedX) * 4;
        const w = kernel[k];
        temp[o] += s[i] * w;
        temp[o + 1] += s[i + 1] * w;
        temp[o + 2] += s[i + 2] * w;
        temp[o + 3] += s[i + 3] * w;
      }
    }
  }

  // Vertical pass
  const out = result.data;
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let r0 = 0;
      let g0 = 0;
      let b0 = 0;
      let a0 = 0;
      for (let k = 0; k < kernel.length; k++) {
        const clampedY = clamp(y - r + k, 0, height - 1);
        const i = (clampedY * width + x) * 4;
        const w = kernel[k];
        r0 += temp[i] * w;
        g0 += temp[i + 1] * w;
        b0 += temp[i + 2] * w;
        a0 += temp[i + 3] * w;
      }
      const o = (y * width + x) * 4;
      out[o] = clamp(Math.round(r0), 0, 255);
      out[o + 1] = clamp(Math.round(g0), 0, 255);
      out[o + 2] = clamp(Math.round(b0), 0, 255);
      out[o + 3] = clamp(Math.round(a0), 0, 255);
    }
  }

  return result;
}
