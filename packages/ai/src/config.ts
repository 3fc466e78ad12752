/**
 * @module config
 * Remover configuration: defaults and validation.
 */

import { availableParallelism } from 'node:os';
import type { InferenceEngine, Logger, Normalization, OutputMode, SessionTuning } from '@cutout/types';
import { ConfigError, createConsoleLogger } from '@cutout/core';
import { DEFAULT_INPUT_SIZE, IMAGENET_NORMALIZATION } from './image-utils';

/** Creates the inference engine for a resolved config. */
export type EngineFactory = (config: ResolvedRemoverConfig) => Promise<InferenceEngine>;

/** Options accepted by the remover. Only `modelPath` is required. */
export interface RemoverConfig {
  /** Path to the ONNX segmentation model. */
  modelPath: string;
  /** Square model input edge length. */
  inputSize?: number;
  /** Per-channel normalization applied before inference. */
  normalization?: Normalization;
  /** How multiple model outputs are reduced. */
  outputMode?: OutputMode;
  /** Runtime session tuning. */
  session?: SessionTuning;
  /** Compositor worker count; 1 composites on the calling thread. */
  workers?: number;
  logger?: Logger;
}

/** Config with every default applied. */
export type ResolvedRemoverConfig = Required<RemoverConfig>;

/**
 * Apply defaults and validate.
 * @throws {ConfigError} A value is out of range.
 */
export function resolveRemoverConfig(config: RemoverConfig): ResolvedRemoverConfig {
  const resolved: ResolvedRemoverConfig = {
    modelPath: config.modelPath,
    inputSize: config.inputSize ?? DEFAULT_INPUT_SIZE,
    normalization: config.normalization ?? IMAGENET_NORMALIZATION,
    outputMode: config.outputMode ?? 'first',
    session: { ...config.session },
    workers: config.workers ?? availableParallelism(),
    logger: config.logger ?? createConsoleLogger('cutout'),
  };

  if (!resolved.modelPath) {
    throw new ConfigError('modelPath is required');
  }
  if (!Number.isInteger(resolved.inputSize) || resolved.inputSize <= 0) {
    throw new ConfigError(`inputSize must be a positive integer, got ${resolved.inputSize}`);
  }
  if (resolved.normalization.std.some((s) => s === 0)) {
    throw new ConfigError('normalization std values must be non-zero');
  }
  if (!Number.isInteger(resolved.workers) || resolved.workers < 1) {
    throw new ConfigError(`workers must be an integer >= 1, got ${resolved.workers}`);
  }
  if (resolved.outputMode !== 'first' && resolved.outputMode !== 'average') {
    throw new ConfigError(`Unsupported output mode: ${String(resolved.outputMode)}`);
  }

  return resolved;
}
