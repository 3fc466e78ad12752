/**
 * @cutout/ai
 *
 * Segmentation post-processing around an ONNX model: mask strategies,
 * Otsu binarization, smart crop geometry, mask refinement and parallel
 * compositing.
 *
 * @packageDocumentation
 */

// Facade
export { BackgroundRemover } from './remover';
export { resolveRemoverConfig } from './config';
export type { EngineFactory, RemoverConfig, ResolvedRemoverConfig } from './config';

// Inference plumbing
export { createOnnxEngine } from './onnx-engine';
export { InferenceLock } from './inference-lock';
export { preprocessImage, reduceOutputs, IMAGENET_NORMALIZATION, DEFAULT_INPUT_SIZE } from './image-utils';

// Otsu threshold
export {
  otsuThreshold,
  binarizeLogits,
  logitHistogram,
  createSigmoidTable,
  sigmoid,
  probabilityBin,
  logitBin,
  SIGMOID_TABLE,
} from './otsu';
export type { SigmoidTable } from './otsu';

// Mask strategies
export {
  autoMask,
  hasAlpha,
  maskFromAlpha,
  maskFromBackground,
  detectUniformBackground,
  AUTO_BACKGROUND_TOLERANCE,
  AUTO_EDGE_THRESHOLD,
} from './masks';
export type { BackgroundEstimate } from './masks';
export { maskFromEdges, toGrayscale, luma } from './edges';

// Bounds and crop geometry
export {
  detectObjectBounds,
  scaleBounds,
  cropMargin,
  computeCropRect,
  extractRegion,
  cropImage,
  resolveCropConfig,
  DEFAULT_CROP_CONFIG,
} from './crop';

// Mask refinement
export { upsampleMask, resizeGrayBilinear, boxBlurHorizontal, boxBlurVertical, BLUR_WINDOW } from './mask-upsampler';

// Compositing
export { compositeOnWhite, partitionRows, blendRows, InlineRowExecutor } from './compositor';
export type { BlendJob, RowExecutor, RowRange } from './compositor';
export { WorkerRowExecutor } from './row-workers';
