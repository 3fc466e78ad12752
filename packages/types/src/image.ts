/**
 * @module image
 * In-memory image sources consumed by the segmentation pipeline.
 *
 * Two shapes are supported:
 * - {@link PackedImage}: a raw byte buffer with a known layout. Every pixel
 *   operation has a fast path that indexes this buffer directly.
 * - {@link PixelAccessor}: anything that can answer "what color is (x, y)".
 *   Used as the generic fallback (decoders with exotic layouts, views, tests).
 */

import type { Rgba8 } from './common';

/** Byte layout of a {@link PackedImage}. */
export type PackedFormat =
  /** 4 bytes per pixel: R, G, B and straight alpha. */
  | 'rgba'
  /** 1 byte per pixel intensity; always opaque. */
  | 'gray';

/** Image stored as a flat byte buffer. Rows start every `stride` bytes. */
export interface PackedImage {
  readonly kind: 'packed';
  format: PackedFormat;
  data: Uint8Array | Uint8ClampedArray;
  width: number;
  height: number;
  /** Bytes between the starts of consecutive rows. */
  stride: number;
}

/** Image exposing only per-pixel reads. */
export interface PixelAccessor {
  readonly kind: 'accessor';
  width: number;
  height: number;
  /** Whether pixels may carry alpha below 255. */
  hasAlphaChannel: boolean;
  /** Read the pixel at (x, y). Coordinates are always in range. */
  getPixel(x: number, y: number): Rgba8;
}

/** Any image the pipeline can read. */
export type ImageSource = PackedImage | PixelAccessor;

/** Tightly packed RGBA image, as produced by the codec and the compositor. */
export interface RgbaImage {
  /** RGBA pixel data. Length is width * height * 4. */
  data: Uint8Array | Uint8ClampedArray;
  /** Width in pixels. */
  width: number;
  /** Height in pixels. */
  height: number;
}
