/**
 * @module common
 * Common primitive types used across all packages.
 */

/** Straight (non-premultiplied) color with 0-255 integer channels. */
export interface Rgba8 {
  /** Red channel (0-255) */
  r: number;
  /** Green channel (0-255) */
  g: number;
  /** Blue channel (0-255) */
  b: number;
  /** Alpha channel (0-255, 255 = opaque) */
  a: number;
}

/** Opaque color with 0-255 integer channels. */
export type Rgb8 = Omit<Rgba8, 'a'>;

/** Size in pixels. */
export interface Size {
  /** Width in pixels */
  width: number;
  /** Height in pixels */
  height: number;
}
