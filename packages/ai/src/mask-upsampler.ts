/**
 * @module mask-upsampler
 * Refines a low-resolution mask to a target resolution:
 * bilinear resize, then a separable 5-pixel box blur.
 *
 * Intermediates live in pooled scratch buffers, so repeated calls only
 * allocate the returned mask.
 */

import type { Mask, Size } from '@cutout/types';
import { BlurBufferPool, InvalidMaskError, sourceCoordinate } from '@cutout/core';

/** Box blur window (pixels). */
export const BLUR_WINDOW = 5;

const BLUR_RADIUS = (BLUR_WINDOW - 1) / 2;

/**
 * Bilinearly resize a flat single-channel buffer into `dst`.
 * `dst` must hold at least `dstWidth * dstHeight` bytes.
 */
export function resizeGrayBilinear(
  src: Uint8Array,
  srcSize: Size,
  dst: Uint8Array,
  dstSize: Size,
): void {
  const sw = srcSize.width;
  const sh = srcSize.height;
  const { width, height } = dstSize;

  for (let y = 0; y < height; y++) {
    const fy = sourceCoordinate(y, sh, height);
    const y0 = Math.floor(fy);
    const y1 = Math.min(y0 + 1, sh - 1);
    const wy = fy - y0;
    const row0 = y0 * sw;
    const row1 = y1 * sw;
    const out = y * width;

    for (let x = 0; x < width; x++) {
      const fx = sourceCoordinate(x, sw, width);
      const x0 = Math.floor(fx);
      const x1 = Math.min(x0 + 1, sw - 1);
      const wx = fx - x0;

      const top = src[row0 + x0] + (src[row0 + x1] - src[row0 + x0]) * wx;
      const bottom = src[row1 + x0] + (src[row1 + x1] - src[row1 + x0]) * wx;
      dst[out + x] = Math.round(top + (bottom - top) * wy);
    }
  }
}

/**
 * One line of a running-sum box blur.
 * Reads `len` samples starting at `offset`, `step` apart; samples past either
 * end are clamped to the nearest valid one.
 */
function blurLine(
  src: Uint8Array,
  dst: Uint8Array,
  offset: number,
  step: number,
  len: number,
): void {
  const last = len - 1;
  let sum = 0;
  for (let k = -BLUR_RADIUS; k <= BLUR_RADIUS; k++) {
    const i = k < 0 ? 0 : k > last ? last : k;
    sum += src[offset + i * step];
  }

  for (let i = 0; i < len; i++) {
    dst[offset + i * step] = Math.round(sum / BLUR_WINDOW);
    const add = Math.min(i + BLUR_RADIUS + 1, last);
    const sub = Math.max(i - BLUR_RADIUS, 0);
    sum += src[offset + add * step] - src[offset + sub * step];
  }
}

/** Horizontal box blur of every row. */
export function boxBlurHorizontal(src: Uint8Array, dst: Uint8Array, size: Size): void {
  for (let y = 0; y < size.height; y++) {
    blurLine(src, dst, y * size.width, 1, size.width);
  }
}

/** Vertical box blur of every column. */
export function boxBlurVertical(src: Uint8Array, dst: Uint8Array, size: Size): void {
  for (let x = 0; x < size.width; x++) {
    blurLine(src, dst, x, size.width, size.height);
  }
}

/**
 * Resize a mask to `target` and smooth it.
 *
 * @param pool - Scratch pool; buffers are returned even if a stage throws.
 * @returns New mask of `target` size.
 */
export function upsampleMask(mask: Mask, target: Size, pool: BlurBufferPool): Mask {
  const { width, height } = mask.size;
  if (width <= 0 || height <= 0 || mask.data.length !== width * height) {
    throw new InvalidMaskError(`cannot upsample a ${width}x${height} mask with ${mask.data.length} bytes`);
  }

  const size = { width: target.width, height: target.height };
  const out = new Uint8Array(size.width * size.height);
  if (out.length === 0) {
    return { data: out, size };
  }

  pool.with(out.length, ({ tmp, hPass }) => {
    resizeGrayBilinear(mask.data, mask.size, tmp, size);
    boxBlurHorizontal(tmp, hPass, size);
    boxBlurVertical(hPass, out, size);
  });

  return { data: out, size };
}
