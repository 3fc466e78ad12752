/**
 * @module segmentation
 * Mask, bounds and crop types shared by the mask strategies and crop geometry.
 */

import type { Size } from './common';
import type { ImageSource } from './image';

/**
 * Single-channel 8-bit mask.
 * Values are 0/255 when produced for bounds detection, or continuous when used as alpha.
 */
export interface Mask {
  /** Mask values, row-major, width * height bytes. */
  data: Uint8Array;
  /** Mask dimensions. */
  size: Size;
}

/** A mask strategy: derives a mask the same size as the image. */
export type MaskStrategy = (image: ImageSource) => Mask;

/** Smallest axis-aligned box holding every mask pixel at or above a threshold. */
export interface ObjectBounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
  /** maxX - minX */
  width: number;
  /** maxY - minY */
  height: number;
  centerX: number;
  centerY: number;
}

/** Smart crop options. */
export interface CropConfig {
  /** Margin in pixels around the detected object. */
  margin: number;
  /** Margin as a fraction of the object dimensions. Overrides `margin` when > 0. */
  marginPercent: number;
  /** Minimum mask value (0-255) counted as part of the object. */
  minThreshold: number;
  /** Expand the shorter side so the crop is square where the image allows. */
  squareCrop: boolean;
}

/** Crop rectangle in image space. `maxX`/`maxY` are exclusive. */
export interface CropRect {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}
