/**
 * @module resize
 * Bilinear resampling of color images.
 */

import type { ImageSource, RgbaImage } from '@cutout/types';
import { clamp, toRgbaImage } from './pixels';

/**
 * Map a destination coordinate to its source coordinate (pixel-center aligned),
 * clamped to the valid source range.
 */
export function sourceCoordinate(dst: number, srcLen: number, dstLen: number): number {
  return clamp(((dst + 0.5) * srcLen) / dstLen - 0.5, 0, srcLen - 1);
}

/**
 * Resize an image to `width x height` with bilinear interpolation.
 *
 * @param image - Any image source. Non-RGBA sources are packed first.
 * @returns A new tightly packed RGBA image.
 */
export function resizeBilinear(image: ImageSource, width: number, height: number): RgbaImage {
  const src = toRgbaImage(image);
  const sw = src.width;
  const sh = src.height;
  const out = new Uint8Array(width * height * 4);
  const s = src.data;

  for (let y = 0; y < height; y++) {
    const fy = sourceCoordinate(y, sh, height);
    const y0 = Math.floor(fy);
    const y1 = Math.min(y0 + 1, sh - 1);
    const wy = fy - y0;

    for (let x = 0; x < width; x++) {
      const fx = sourceCoordinate(x, sw, width);
      const x0 = Math.floor(fx);
      const x1 = Math.min(x0 + 1, sw - 1);
      const wx = fx - x0;

      const i00 = (y0 * sw + x0) * 4;
      const i10 = (y0 * sw + x1) * 4;
      const i01 = (y1 * sw + x0) * 4;
      const i11 = (y1 * sw + x1) * 4;
      const o = (y * width + x) * 4;

      for (let c = 0; c < 4; c++) {
        const top = s[i00 + c] + (s[i10 + c] - s[i00 + c]) * wx;
        const bottom = s[i01 + c] + (s[i11 + c] - s[i01 + c]) * wx;
        out[o + c] = Math.round(top + (bottom - top) * wy);
      }
    }
  }

  return { data: out, width, height };
}
