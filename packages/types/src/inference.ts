/**
 * @module inference
 * Contract between the pipeline and the external segmentation model.
 */

/** Per-channel normalization applied to [0,1] RGB values before inference. */
export interface Normalization {
  readonly mean: readonly [number, number, number];
  readonly std: readonly [number, number, number];
}

/**
 * Opaque model call: a 1x3xSxS normalized CHW tensor in, one or more
 * 1x1xSxS logit tensors out.
 */
export interface InferenceEngine {
  run(input: Float32Array, dims: readonly number[]): Promise<Float32Array[]>;
  release(): Promise<void>;
}

/** Session tuning forwarded to the runtime. */
export interface SessionTuning {
  intraOpNumThreads?: number;
  interOpNumThreads?: number;
  enableCpuMemArena?: boolean;
  enableMemPattern?: boolean;
}

/** How multiple model outputs are reduced to one logit field. */
export type OutputMode = 'first' | 'average';
