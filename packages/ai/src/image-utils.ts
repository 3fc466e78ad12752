/**
 * @module image-utils
 * Tensor preprocessing and output reduction for the segmentation model.
 *
 * The model expects:
 * - Input size: a fixed square (320x320 by default)
 * - Normalization: per-channel mean/std on [0,1] RGB
 * - Format: NCHW Float32Array
 */

import type { ImageSource, Normalization, OutputMode } from '@cutout/types';
import { InferenceError, resizeBilinear } from '@cutout/core';

/** ImageNet normalization constants. */
export const IMAGENET_NORMALIZATION: Normalization = Object.freeze({
  mean: Object.freeze([0.485, 0.456, 0.406] as const),
  std: Object.freeze([0.229, 0.224, 0.225] as const),
});

/** Default model input edge length. */
export const DEFAULT_INPUT_SIZE = 320;

/**
 * Preprocess an image for model input.
 * 1. Resize to inputSize x inputSize (bilinear, aspect ratio not kept)
 * 2. Normalize with the given mean/std
 * 3. Write NCHW floats
 *
 * @param into - Optional destination of length `3 * inputSize^2` (e.g. from a pool).
 * @returns The filled tensor.
 */
export function preprocessImage(
  image: ImageSource,
  inputSize: number,
  normalization: Normalization,
  into?: Float32Array,
): Float32Array {
  const plane = inputSize * inputSize;
  const tensor = into ?? new Float32Array(3 * plane);
  if (tensor.length !== 3 * plane) {
    throw new Error(`Tensor length ${tensor.length} does not match 3x${inputSize}x${inputSize}`);
  }

  const resized = resizeBilinear(image, inputSize, inputSize).data;
  const { mean, std } = normalization;

  for (let p = 0; p < plane; p++) {
    const i = p * 4;
    // NCHW layout: [channel][height][width]
    tensor[p] = (resized[i] / 255 - mean[0]) / std[0];
    tensor[plane + p] = (resized[i + 1] / 255 - mean[1]) / std[1];
    tensor[2 * plane + p] = (resized[i + 2] / 255 - mean[2]) / std[2];
  }

  return tensor;
}

/**
 * Reduce model outputs to a single logit field.
 * `'first'` takes output 0; `'average'` averages all outputs element-wise.
 *
 * @throws {InferenceError} No outputs, or an output of the wrong length.
 */
export function reduceOutputs(outputs: Float32Array[], mode: OutputMode, length: number): Float32Array {
  if (outputs.length === 0) {
    throw new InferenceError('Model returned no outputs');
  }
  for (const [i, out] of outputs.entries()) {
    if (out.length !== length) {
      throw new InferenceError(`Model output ${i} has ${out.length} values, expected ${length}`);
    }
  }

  if (mode === 'first') {
    return outputs[0];
  }

  const averaged = new Float32Array(length);
  for (const out of outputs) {
    for (let i = 0; i < length; i++) {
      averaged[i] += out[i];
    }
  }
  for (let i = 0; i < length; i++) {
    averaged[i] /= outputs.length;
  }
  return averaged;
}
