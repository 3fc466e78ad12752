/**
 * @cutout/types
 *
 * Shared type definitions for the cutout pipeline.
 * This package contains zero runtime code — only TypeScript interfaces
 * and types that serve as the "contract" between all packages.
 *
 * @packageDocumentation
 */

// Common primitives
export type { Rgb8, Rgba8, Size } from './common';

// Images
export type { ImageSource, PackedFormat, PackedImage, PixelAccessor, RgbaImage } from './image';

// Masks and crop geometry
export type { CropConfig, CropRect, Mask, MaskStrategy, ObjectBounds } from './segmentation';

// Inference collaborator
export type { InferenceEngine, Normalization, OutputMode, SessionTuning } from './inference';

// Logging
export type { Logger } from './logger';
