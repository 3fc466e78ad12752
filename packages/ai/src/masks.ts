/**
 * @module masks
 * Mask strategies that do not need the model: alpha extraction,
 * background-color distance, and the automatic dispatcher.
 *
 * Each strategy returns a mask the same size as the image.
 */

import type { ImageSource, Mask, Rgb8 } from '@cutout/types';
import { gaussianBlur, hasAlphaChannel, readPixel } from '@cutout/core';
import { maskFromEdges } from './edges';

/** Points per axis sampled by {@link hasAlpha}. */
const ALPHA_SAMPLES_PER_AXIS = 5;

/** Summed squared deviation (16-bit channels) per sample below which a background is uniform. */
const UNIFORM_VARIANCE_LIMIT = 2e8;

/** Color distance tolerance used by {@link autoMask} on uniform backgrounds. */
export const AUTO_BACKGROUND_TOLERANCE = 200;

/** Sobel threshold used by {@link autoMask} when no other signal is reliable. */
export const AUTO_EDGE_THRESHOLD = 200;

/** Sigma of the blur applied before edge detection in {@link autoMask}. */
const AUTO_EDGE_BLUR_SIGMA = 1;

/** 8-bit to 16-bit channel scale. */
const WIDEN = 257;

/** Evenly spaced sample positions covering both ends of `[0, len)`. */
function samplePositions(len: number, count: number): number[] {
  if (len <= 1) return [0];
  const positions: number[] = [];
  for (let i = 0; i < count; i++) {
    positions.push(Math.round((i * (len - 1)) / (count - 1)));
  }
  return positions;
}

/**
 * Whether the image has non-trivial alpha: any pixel on a sparse
 * 5x5 grid (edges and center included) below full opacity.
 */
export function hasAlpha(image: ImageSource): boolean {
  if (!hasAlphaChannel(image) || image.width === 0 || image.height === 0) {
    return false;
  }
  const xs = samplePositions(image.width, ALPHA_SAMPLES_PER_AXIS);
  const ys = samplePositions(image.height, ALPHA_SAMPLES_PER_AXIS);

  for (const y of ys) {
    for (const x of xs) {
      if (readPixel(image, x, y).a < 255) {
        return true;
      }
    }
  }
  return false;
}

/** Use the image's alpha channel as the mask. Sources without alpha yield 255 everywhere. */
export function maskFromAlpha(image: ImageSource): Mask {
  const { width, height } = image;
  const data = new Uint8Array(width * height);

  if (image.kind === 'packed') {
    if (image.format === 'gray') {
      data.fill(255);
    } else {
      const { data: src, stride } = image;
      for (let y = 0; y < height; y++) {
        let i = y * stride + 3;
        let o = y * width;
        for (let x = 0; x < width; x++, i += 4, o++) {
          data[o] = src[i];
        }
      }
    }
  } else {
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        data[y * width + x] = image.getPixel(x, y).a;
      }
    }
  }

  return { data, size: { width, height } };
}

/**
 * Mark pixels farther than `tolerance` from `background` as foreground (255).
 * Distances are compared squared in 16-bit channel space.
 */
export function maskFromBackground(image: ImageSource, background: Rgb8, tolerance: number): Mask {
  const { width, height } = image;
  const data = new Uint8Array(width * height);
  const limit = tolerance * tolerance * WIDEN * WIDEN;
  const bgR = background.r * WIDEN;
  const bgG = background.g * WIDEN;
  const bgB = background.b * WIDEN;

  const classify = (r: number, g: number, b: number): number => {
    const dr = r * WIDEN - bgR;
    const dg = g * WIDEN - bgG;
    const db = b * WIDEN - bgB;
    return dr * dr + dg * dg + db * db > limit ? 255 : 0;
  };

  if (image.kind === 'packed' && image.format === 'rgba') {
    const { data: src, stride } = image;
    for (let y = 0; y < height; y++) {
      let i = y * stride;
      let o = y * width;
      for (let x = 0; x < width; x++, i += 4, o++) {
        data[o] = classify(src[i], src[i + 1], src[i + 2]);
      }
    }
  } else {
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        const p = readPixel(image, x, y);
        data[y * width + x] = classify(p.r, p.g, p.b);
      }
    }
  }

  return { data, size: { width, height } };
}

/** Result of {@link detectUniformBackground}. */
export interface BackgroundEstimate {
  /** Centroid of the sampled border colors. */
  color: Rgb8;
  /** Whether the samples are close enough to call the background uniform. */
  uniform: boolean;
}

/**
 * Sample the four corners and the top/bottom edge midpoints and decide
 * whether they share one background color.
 */
export function detectUniformBackground(image: ImageSource): BackgroundEstimate {
  const right = Math.max(0, image.width - 1);
  const bottom = Math.max(0, image.height - 1);
  const midX = Math.floor(image.width / 2);
  const points: Array<[number, number]> = [
    [0, 0],
    [right, 0],
    [0, bottom],
    [right, bottom],
    [midX, 0],
    [midX, bottom],
  ];

  const samples = points.map(([x, y]) => {
    const p = readPixel(image, x, y);
    return [p.r * WIDEN, p.g * WIDEN, p.b * WIDEN];
  });

  const n = samples.length;
  const mean = [0, 0, 0];
  for (const s of samples) {
    mean[0] += s[0] / n;
    mean[1] += s[1] / n;
    mean[2] += s[2] / n;
  }

  let variance = 0;
  for (const s of samples) {
    const dr = s[0] - mean[0];
    const dg = s[1] - mean[1];
    const db = s[2] - mean[2];
    variance += dr * dr + dg * dg + db * db;
  }
  variance /= n;

  return {
    color: {
      r: Math.floor(Math.round(mean[0]) / WIDEN),
      g: Math.floor(Math.round(mean[1]) / WIDEN),
      b: Math.floor(Math.round(mean[2]) / WIDEN),
    },
    uniform: variance < UNIFORM_VARIANCE_LIMIT,
  };
}

/**
 * Pick the most reliable model-free mask:
 * 1. the alpha channel, when the image has non-trivial alpha;
 * 2. distance from the border color, when the border is uniform;
 * 3. Sobel edges of a lightly blurred copy otherwise.
 */
export function autoMask(image: ImageSource): Mask {
  if (hasAlpha(image)) {
    return maskFromAlpha(image);
  }

  const background = detectUniformBackground(image);
  if (background.uniform) {
    return maskFromBackground(image, background.color, AUTO_BACKGROUND_TOLERANCE);
  }

  const blurred = gaussianBlur(image, AUTO_EDGE_BLUR_SIGMA);
  return maskFromEdges(blurred, AUTO_EDGE_THRESHOLD);
}
