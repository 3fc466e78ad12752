/**
 * @module remover
 * Background removal and smart cropping around an external segmentation model.
 *
 * Pipeline:
 * - Preprocess: image → normalized NCHW tensor (pooled)
 * - Inference: serialized through a single lock
 * - Otsu threshold → binary mask at model resolution
 * - Remove background: upsample + blur the mask, composite over white in parallel
 * - Smart crop: object bounds → scaled, padded, clipped crop of the original
 *
 * @see {@link ./otsu}
 * @see {@link ./crop}
 * @see {@link ./compositor}
 */

import { readFile, writeFile } from 'fs/promises';
import type { CropConfig, ImageSource, InferenceEngine, Logger, Mask, MaskStrategy, RgbaImage } from '@cutout/types';
import {
  BlurBufferPool,
  InferenceError,
  NotInitializedError,
  ObjectPool,
  decodePng,
  encodePng,
  fromRgbaImage,
} from '@cutout/core';
import { resolveRemoverConfig, type EngineFactory, type RemoverConfig, type ResolvedRemoverConfig } from './config';
import { preprocessImage, reduceOutputs } from './image-utils';
import { binarizeLogits, otsuThreshold } from './otsu';
import { cropImage } from './crop';
import { upsampleMask } from './mask-upsampler';
import { InlineRowExecutor, compositeOnWhite, type RowExecutor } from './compositor';
import { WorkerRowExecutor } from './row-workers';
import { createOnnxEngine } from './onnx-engine';
import { InferenceLock } from './inference-lock';

const defaultEngineFactory: EngineFactory = (config) => createOnnxEngine(config.modelPath, config.session);

/**
 * Background remover.
 *
 * Usage:
 * ```ts
 * const remover = new BackgroundRemover({ modelPath: './models/u2netp.onnx' });
 * await remover.initialize();
 * const cutout = await remover.removeBackground(image);
 * const cropped = await remover.smartCrop(image, { margin: 5 });
 * await remover.dispose();
 * ```
 */
export class BackgroundRemover {
  private readonly config: ResolvedRemoverConfig;
  private readonly engineFactory: EngineFactory;
  private readonly logger: Logger;
  private readonly lock: InferenceLock;
  private readonly tensorPool: ObjectPool<Float32Array>;
  private readonly blurPool = new BlurBufferPool();
  private engine: InferenceEngine | null = null;
  private executor: RowExecutor | null = null;

  /**
   * @param engineFactory - Creates the inference engine; defaults to ONNX Runtime.
   */
  constructor(config: RemoverConfig, engineFactory: EngineFactory = defaultEngineFactory) {
    this.config = resolveRemoverConfig(config);
    this.engineFactory = engineFactory;
    this.logger = this.config.logger;
    this.lock = new InferenceLock();
    const tensorLength = 3 * this.config.inputSize * this.config.inputSize;
    this.tensorPool = new ObjectPool(() => new Float32Array(tensorLength));
  }

  get isReady(): boolean {
    return this.engine !== null;
  }

  /** Model input edge length. */
  get inputSize(): number {
    return this.config.inputSize;
  }

  /** Load the model. */
  async initialize(): Promise<void> {
    if (this.engine) return;
    try {
      this.engine = await this.engineFactory(this.config);
    } catch (err) {
      throw new InferenceError(`Failed to load model ${this.config.modelPath}`, { cause: err });
    }
    this.logger.info(`model loaded: ${this.config.modelPath}`);
  }

  /**
   * Run the model and binarize its output with Otsu's threshold.
   * @returns Binary mask at model resolution (inputSize x inputSize).
   */
  async predictMask(image: ImageSource): Promise<Mask> {
    const engine = this.requireEngine();
    const { inputSize, normalization, outputMode } = this.config;
    const size = { width: inputSize, height: inputSize };
    const tensor = this.tensorPool.acquire();

    try {
      preprocessImage(image, inputSize, normalization, tensor);
      const logits = await this.lock.run(async () => {
        const started = performance.now();
        let outputs: Float32Array[];
        try {
          outputs = await engine.run(tensor, [1, 3, inputSize, inputSize]);
        } catch (err) {
          if (err instanceof InferenceError) throw err;
          throw new InferenceError('inference failed', { cause: err });
        }
        this.logger.debug(`inference took ${(performance.now() - started).toFixed(1)}ms`);
        return reduceOutputs(outputs, outputMode, inputSize * inputSize);
      });

      return binarizeLogits(logits, otsuThreshold(logits), size);
    } finally {
      this.tensorPool.release(tensor);
    }
  }

  /**
   * Remove the background, replacing it with white.
   * @returns Opaque RGBA image the size of the input.
   */
  async removeBackground(image: ImageSource): Promise<RgbaImage> {
    const mask = await this.predictMask(image);
    const full = upsampleMask(mask, { width: image.width, height: image.height }, this.blurPool);
    return compositeOnWhite(image, full, this.getExecutor());
  }

  /**
   * Crop the original image around the object the model finds.
   * @throws {NoObjectDetectedError} The predicted mask is empty.
   */
  async smartCrop(image: ImageSource, config?: Partial<CropConfig>): Promise<RgbaImage> {
    const mask = await this.predictMask(image);
    const scaleX = image.width / this.config.inputSize;
    const scaleY = image.height / this.config.inputSize;
    return cropImage(image, mask, config, scaleX, scaleY);
  }

  /**
   * Crop around the object found by a model-free mask strategy (e.g. `autoMask`).
   * Needs no model.
   */
  async smartCropFromMask(
    image: ImageSource,
    strategy: MaskStrategy,
    config?: Partial<CropConfig>,
  ): Promise<RgbaImage> {
    return cropImage(image, strategy(image), config, 1, 1);
  }

  /** Read a PNG, remove its background, and write the result as PNG. */
  async removeBackgroundFromFile(inputPath: string, outputPath: string): Promise<void> {
    const image = fromRgbaImage(decodePng(await readFile(inputPath)));
    const result = await this.removeBackground(image);
    await writeFile(outputPath, encodePng(result));
    this.logger.info(`background removed: ${inputPath} -> ${outputPath}`);
  }

  /** Read a PNG, smart-crop it, and write the crop as PNG. */
  async smartCropFile(inputPath: string, outputPath: string, config?: Partial<CropConfig>): Promise<void> {
    const image = fromRgbaImage(decodePng(await readFile(inputPath)));
    const result = await this.smartCrop(image, config);
    await writeFile(outputPath, encodePng(result));
    this.logger.info(`cropped ${inputPath} to ${result.width}x${result.height} -> ${outputPath}`);
  }

  /** Release the model and compositor workers. */
  async dispose(): Promise<void> {
    const engine = this.engine;
    const executor = this.executor;
    this.engine = null;
    this.executor = null;
    this.tensorPool.dispose();

    if (executor) {
      await executor.close();
    }
    if (engine) {
      await engine.release();
      this.logger.info('model released');
    }
  }

  private requireEngine(): InferenceEngine {
    if (!this.engine) {
      throw new NotInitializedError();
    }
    return this.engine;
  }

  private getExecutor(): RowExecutor {
    if (!this.executor) {
      this.executor = this.config.workers > 1
        ? new WorkerRowExecutor(this.config.workers, this.logger)
        : new InlineRowExecutor();
    }
    return this.executor;
  }
}
