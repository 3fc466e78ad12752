/**
 * @module crop
 * Object bounds detection and crop geometry.
 *
 * Bounds are found in mask space, scaled into image space, padded by a
 * margin, clipped to the image, and optionally squared.
 */

import type { CropConfig, CropRect, ImageSource, Mask, ObjectBounds, RgbaImage, Size } from '@cutout/types';
import { ConfigError, InvalidMaskError, NoObjectDetectedError, readPixel } from '@cutout/core';

/** Crop settings used when the caller passes none. */
export const DEFAULT_CROP_CONFIG: Readonly<CropConfig> = Object.freeze({
  margin: 20,
  marginPercent: 0,
  minThreshold: 10,
  squareCrop: false,
});

/**
 * Fill unset crop fields from {@link DEFAULT_CROP_CONFIG} and validate the result.
 * A `marginPercent` above 0 replaces the margin, so it needs no explicit `margin: 0`.
 */
export function resolveCropConfig(config?: Partial<CropConfig>): CropConfig {
  const resolved: CropConfig = {
    margin: config?.margin ?? DEFAULT_CROP_CONFIG.margin,
    marginPercent: config?.marginPercent ?? DEFAULT_CROP_CONFIG.marginPercent,
    minThreshold: config?.minThreshold ?? DEFAULT_CROP_CONFIG.minThreshold,
    squareCrop: config?.squareCrop ?? DEFAULT_CROP_CONFIG.squareCrop,
  };

  if (!Number.isInteger(resolved.margin) || resolved.margin < 0) {
    throw new ConfigError(`margin must be a non-negative integer, got ${resolved.margin}`);
  }
  if (!(resolved.marginPercent >= 0)) {
    throw new ConfigError(`marginPercent must be >= 0, got ${resolved.marginPercent}`);
  }
  if (!Number.isInteger(resolved.minThreshold) || resolved.minThreshold < 0 || resolved.minThreshold > 255) {
    throw new ConfigError(`minThreshold must be an integer in 0-255, got ${resolved.minThreshold}`);
  }
  return resolved;
}

function boundsFromExtent(minX: number, minY: number, maxX: number, maxY: number): ObjectBounds {
  const width = maxX - minX;
  const height = maxY - minY;
  return {
    minX,
    minY,
    maxX,
    maxY,
    width,
    height,
    centerX: minX + Math.floor(width / 2),
    centerY: minY + Math.floor(height / 2),
  };
}

/**
 * Find the smallest box containing every mask value >= `minThreshold`.
 *
 * @returns The bounds (max coordinates inclusive), or `null` when no pixel qualifies.
 */
export function detectObjectBounds(mask: Mask, minThreshold: number): ObjectBounds | null {
  const { width, height } = mask.size;
  const data = mask.data;
  let minX = width;
  let minY = height;
  let maxX = -1;
  let maxY = -1;

  for (let y = 0; y < height; y++) {
    const row = y * width;
    for (let x = 0; x < width; x++) {
      if (data[row + x] >= minThreshold) {
        if (x < minX) minX = x;
        if (x > maxX) maxX = x;
        if (y < minY) minY = y;
        if (y > maxY) maxY = y;
      }
    }
  }

  if (maxX < 0) {
    return null;
  }
  return boundsFromExtent(minX, minY, maxX, maxY);
}

/** Scale mask-space bounds into image space. Coordinates are truncated. */
export function scaleBounds(bounds: ObjectBounds, scaleX: number, scaleY: number): ObjectBounds {
  return boundsFromExtent(
    Math.trunc(bounds.minX * scaleX),
    Math.trunc(bounds.minY * scaleY),
    Math.trunc(bounds.maxX * scaleX),
    Math.trunc(bounds.maxY * scaleY),
  );
}

/**
 * Margin applied on every side. With `marginPercent > 0` the larger of the
 * two per-axis percentages replaces the fixed margin.
 */
export function cropMargin(bounds: ObjectBounds, config: CropConfig): number {
  if (config.marginPercent > 0) {
    const marginX = Math.round(bounds.width * config.marginPercent);
    const marginY = Math.round(bounds.height * config.marginPercent);
    return Math.max(marginX, marginY);
  }
  return config.margin;
}

/**
 * Compute the clipped crop rectangle for image-space bounds.
 * With `squareCrop`, the shorter side grows symmetrically by the difference;
 * clipping at an image edge can leave the result non-square.
 */
export function computeCropRect(bounds: ObjectBounds, imageSize: Size, config: CropConfig): CropRect {
  const { width, height } = imageSize;
  const margin = cropMargin(bounds, config);

  let minX = Math.max(0, bounds.minX - margin);
  let minY = Math.max(0, bounds.minY - margin);
  let maxX = Math.min(width, bounds.maxX + margin);
  let maxY = Math.min(height, bounds.maxY + margin);

  if (config.squareCrop) {
    const cropW = maxX - minX;
    const cropH = maxY - minY;
    if (cropW > cropH) {
      const diff = cropW - cropH;
      const before = Math.floor(diff / 2);
      minY = Math.max(0, minY - before);
      maxY = Math.min(height, maxY + (diff - before));
    } else if (cropH > cropW) {
      const diff = cropH - cropW;
      const before = Math.floor(diff / 2);
      minX = Math.max(0, minX - before);
      maxX = Math.min(width, maxX + (diff - before));
    }
  }

  return { minX, minY, maxX, maxY };
}

/** Copy a rectangle of the image into a new RGBA image. */
export function extractRegion(image: ImageSource, rect: CropRect): RgbaImage {
  const width = Math.max(0, rect.maxX - rect.minX);
  const height = Math.max(0, rect.maxY - rect.minY);
  const data = new Uint8Array(width * height * 4);

  if (image.kind === 'packed' && image.format === 'rgba') {
    const rowBytes = width * 4;
    for (let y = 0; y < height; y++) {
      const start = (rect.minY + y) * image.stride + rect.minX * 4;
      data.set(image.data.subarray(start, start + rowBytes), y * rowBytes);
    }
    return { data, width, height };
  }

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const p = readPixel(image, rect.minX + x, rect.minY + y);
      const o = (y * width + x) * 4;
      data[o] = p.r;
      data[o + 1] = p.g;
      data[o + 2] = p.b;
      data[o + 3] = p.a;
    }
  }
  return { data, width, height };
}

/** Throw {@link InvalidMaskError} unless the mask holds `width * height` bytes. */
export function assertMask(mask: Mask | null | undefined): asserts mask is Mask {
  if (!mask) {
    throw new InvalidMaskError('mask is missing');
  }
  const { width, height } = mask.size;
  if (width <= 0 || height <= 0 || mask.data.length === 0) {
    throw new InvalidMaskError('mask is empty');
  }
  if (mask.data.length !== width * height) {
    throw new InvalidMaskError(
      `mask data length (${mask.data.length}) does not match ${width}x${height}`,
    );
  }
}

/**
 * Crop the image around the object found in `mask`.
 *
 * @param mask - Mask in its own resolution; `scaleX`/`scaleY` map it onto the image.
 * @param config - Crop settings; see {@link resolveCropConfig}.
 * @throws {InvalidMaskError} The mask is missing or empty.
 * @throws {NoObjectDetectedError} No mask value reaches `minThreshold`.
 */
export function cropImage(
  image: ImageSource,
  mask: Mask | null | undefined,
  config?: Partial<CropConfig>,
  scaleX = 1,
  scaleY = 1,
): RgbaImage {
  assertMask(mask);
  const resolved = resolveCropConfig(config);

  const bounds = detectObjectBounds(mask, resolved.minThreshold);
  if (!bounds) {
    throw new NoObjectDetectedError();
  }

  const scaled = scaleBounds(bounds, scaleX, scaleY);
  const rect = computeCropRect(scaled, { width: image.width, height: image.height }, resolved);
  return extractRegion(image, rect);
}
