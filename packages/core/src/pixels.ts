/**
 * @module pixels
 * Constructors and generic reads for {@link ImageSource} values.
 *
 * Pixel operations take a fast path on `kind === 'packed'` and fall back to
 * {@link readPixel} for everything else.
 */

import type { ImageSource, PackedFormat, PackedImage, PixelAccessor, Rgba8, RgbaImage, Size } from '@cutout/types';

/** Clamp `v` into `[lo, hi]`. */
export function clamp(v: number, lo: number, hi: number): number {
  return v < lo ? lo : v > hi ? hi : v;
}

/** Bytes per pixel of a packed format. */
export function bytesPerPixel(format: PackedFormat): number {
  return format === 'rgba' ? 4 : 1;
}

/**
 * Allocate a zero-filled packed image with a tight stride.
 */
export function createPackedImage(width: number, height: number, format: PackedFormat = 'rgba'): PackedImage {
  const stride = width * bytesPerPixel(format);
  return { kind: 'packed', format, data: new Uint8Array(stride * height), width, height, stride };
}

/** View a tightly packed RGBA image (codec output) as an image source. */
export function fromRgbaImage(image: RgbaImage): PackedImage {
  if (image.data.length !== image.width * image.height * 4) {
    throw new Error(
      `Image data length (${image.data.length}) does not match dimensions (${image.width}x${image.height}x4)`,
    );
  }
  return {
    kind: 'packed',
    format: 'rgba',
    data: image.data,
    width: image.width,
    height: image.height,
    stride: image.width * 4,
  };
}

/**
 * Wrap a per-pixel reader as an image source.
 * @param hasAlphaChannel - Whether the reader can return alpha below 255.
 */
export function fromAccessor(
  size: Size,
  getPixel: (x: number, y: number) => Rgba8,
  hasAlphaChannel = true,
): PixelAccessor {
  return { kind: 'accessor', width: size.width, height: size.height, hasAlphaChannel, getPixel };
}

/** Read one pixel as straight RGBA, whatever the source layout. */
export function readPixel(image: ImageSource, x: number, y: number): Rgba8 {
  if (image.kind === 'accessor') {
    return image.getPixel(x, y);
  }
  if (image.format === 'gray') {
    const v = image.data[y * image.stride + x];
    return { r: v, g: v, b: v, a: 255 };
  }
  const i = y * image.stride + x * 4;
  const d = image.data;
  return { r: d[i], g: d[i + 1], b: d[i + 2], a: d[i + 3] };
}

/** Whether the source can carry alpha below 255 at all. */
export function hasAlphaChannel(image: ImageSource): boolean {
  return image.kind === 'accessor' ? image.hasAlphaChannel : image.format === 'rgba';
}

/** Copy any image source into a tightly packed RGBA image. */
export function toRgbaImage(image: ImageSource): RgbaImage {
  const { width, height } = image;
  const data = new Uint8Array(width * height * 4);

  if (image.kind === 'packed' && image.format === 'rgba') {
    const rowBytes = width * 4;
    for (let y = 0; y < height; y++) {
      data.set(image.data.subarray(y * image.stride, y * image.stride + rowBytes), y * rowBytes);
    }
    return { data, width, height };
  }

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const p = readPixel(image, x, y);
      const o = (y * width + x) * 4;
      data[o] = p.r;
      data[o + 1] = p.g;
      data[o + 2] = p.b;
      data[o + 3] = p.a;
    }
  }
  return { data, width, height };
}
