/**
 * @cutout/core
 *
 * Image plumbing shared by the segmentation pipeline: codec, pixel access,
 * resampling, scratch pools, errors and logging.
 *
 * @packageDocumentation
 */

// PNG codec
export { encodePng, decodePng } from './png-codec';

// Pixel access
export {
  clamp,
  bytesPerPixel,
  createPackedImage,
  fromRgbaImage,
  fromAccessor,
  readPixel,
  hasAlphaChannel,
  toRgbaImage,
} from './pixels';

// Resampling and blur
export { resizeBilinear, sourceCoordinate } from './resize';
export { gaussianBlur, gaussianKernel } from './blur';

// Scratch pools
export { ObjectPool, BlurBuffers, BlurBufferPool } from './pool';
export type { PoolFactory } from './pool';

// Errors
export {
  NoObjectDetectedError,
  InvalidMaskError,
  InferenceError,
  ConfigError,
  NotInitializedError,
} from './errors';

// Logging
export { createConsoleLogger, silentLogger } from './logger';
