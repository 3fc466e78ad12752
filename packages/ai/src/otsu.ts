/**
 * @module otsu
 * Adaptive binarization of model logits with Otsu's method.
 *
 * Logits are mapped through a precomputed sigmoid table into a 256-bin
 * histogram; the split maximizing between-class variance is the threshold.
 */

import type { Mask, Size } from '@cutout/types';
import { clamp } from '@cutout/core';

/** Sigmoid values sampled at evenly spaced logits in `[min, max]`. */
export interface SigmoidTable {
  readonly values: readonly number[];
  readonly min: number;
  readonly max: number;
}

/** Number of histogram bins (8-bit). */
const BINS = 256;

/** Build an immutable sigmoid lookup table. */
export function createSigmoidTable(size = BINS, min = -6, max = 6): SigmoidTable {
  const values: number[] = [];
  for (let i = 0; i < size; i++) {
    const x = min + ((max - min) * i) / (size - 1);
    values.push(sigmoid(x));
  }
  return Object.freeze({ values: Object.freeze(values), min, max });
}

/** Table built once at module load and shared by every threshold computation. */
export const SIGMOID_TABLE: SigmoidTable = createSigmoidTable();

/** Logistic sigmoid. */
export function sigmoid(x: number): number {
  return 1 / (1 + Math.exp(-x));
}

/** Map a probability in [0,1] to its 8-bit histogram bin. */
export function probabilityBin(p: number): number {
  return clamp(Math.floor(p * 255), 0, 255);
}

/**
 * Histogram bin of a logit, read through the sigmoid table.
 * Logits outside the table range land in its first or last entry.
 */
export function logitBin(logit: number, table: SigmoidTable = SIGMOID_TABLE): number {
  const last = table.values.length - 1;
  const idx = clamp(Math.round(((logit - table.min) / (table.max - table.min)) * last), 0, last);
  return probabilityBin(table.values[idx]);
}

/**
 * Build the 256-bin histogram of `sigmoid(logit)` using the lookup table.
 * NaN logits are ignored.
 */
export function logitHistogram(logits: ArrayLike<number>, table: SigmoidTable = SIGMOID_TABLE): Uint32Array {
  const hist = new Uint32Array(BINS);
  for (let i = 0; i < logits.length; i++) {
    const v = logits[i];
    if (Number.isNaN(v)) continue;
    hist[logitBin(v, table)]++;
  }
  return hist;
}

/**
 * Compute the Otsu threshold of a logit field.
 *
 * @param logits - Raw (pre-sigmoid) model output.
 * @param table - Sigmoid lookup table; defaults to the shared one.
 * @returns Threshold `t / 255` in [0, 1]. Strictly inside (0, 1) whenever
 *   the histogram has mass on both sides of some split. The first best split wins ties.
 */
export function otsuThreshold(logits: ArrayLike<number>, table: SigmoidTable = SIGMOID_TABLE): number {
  const hist = logitHistogram(logits, table);

  let total = 0;
  let sum = 0;
  for (let t = 0; t < BINS; t++) {
    total += hist[t];
    sum += t * hist[t];
  }

  let sumB = 0;
  let wB = 0;
  let varMax = 0;
  let threshold = 0;

  for (let t = 0; t < BINS - 1; t++) {
    wB += hist[t];
    sumB += t * hist[t];
    if (wB === 0) continue;
    const wF = total - wB;
    if (wF === 0) break;

    const mB = sumB / wB;
    const mF = (sum - sumB) / wF;
    const varBetween = wB * wF * (mB - mF) * (mB - mF);
    if (varBetween > varMax) {
      varMax = varBetween;
      threshold = t;
    }
  }

  return threshold / 255;
}

/**
 * Binarize logits against a threshold from {@link otsuThreshold}.
 * A pixel is foreground when its {@link logitBin} lies above the threshold bin,
 * so the mask splits pixels exactly as the histogram did.
 *
 * @param size - Spatial size of the logit field (width * height === logits.length).
 * @param table - Must be the table the threshold was computed with.
 * @returns Mask with values 0 or 255.
 */
export function binarizeLogits(
  logits: ArrayLike<number>,
  threshold: number,
  size: Size,
  table: SigmoidTable = SIGMOID_TABLE,
): Mask {
  const count = size.width * size.height;
  if (logits.length !== count) {
    throw new Error(`Logit count (${logits.length}) does not match ${size.width}x${size.height}`);
  }

  const thresholdBin = Math.round(threshold * 255);
  const data = new Uint8Array(count);
  for (let i = 0; i < count; i++) {
    data[i] = logitBin(logits[i], table) > thresholdBin ? 255 : 0;
  }
  return { data, size: { ...size } };
}
