/**
 * @module compositor
 * Alpha-composites an image over solid white using a full-resolution mask.
 *
 * Rows are split into contiguous, non-overlapping ranges; each range is
 * blended by exactly one unit of work, and the call resolves once every
 * range is done. Workers never share destination rows, so no locking is needed.
 *
 * @see {@link ./row-workers} for the worker-thread executor
 */

import type { ImageSource, Mask, RgbaImage } from '@cutout/types';
import { InvalidMaskError, toRgbaImage } from '@cutout/core';

/** Half-open row range `[start, end)`. */
export interface RowRange {
  start: number;
  end: number;
}

/** Buffers and geometry of one composite call. */
export interface BlendJob {
  /** Tightly packed RGBA source. */
  src: Uint8Array;
  /** One byte per pixel, used as alpha. */
  mask: Uint8Array;
  /** Tightly packed RGBA destination. */
  dst: Uint8Array;
  width: number;
  height: number;
}

/** Runs row ranges of a {@link BlendJob}. */
export interface RowExecutor {
  /** Number of ranges a job is split into. */
  readonly concurrency: number;
  /** Allocate a buffer the executor can hand to its units of work. */
  allocate(length: number): Uint8Array;
  /** Blend every range; resolves when all have finished. */
  run(job: BlendJob, ranges: RowRange[]): Promise<void>;
  /** Release executor resources. */
  close(): Promise<void>;
}

/**
 * Split `height` rows into at most `parts` contiguous, non-empty ranges.
 * Range sizes differ by at most one row.
 */
export function partitionRows(height: number, parts: number): RowRange[] {
  const count = Math.max(1, Math.min(Math.floor(parts), height));
  const ranges: RowRange[] = [];
  for (let i = 0; i < count; i++) {
    const start = Math.floor((i * height) / count);
    const end = Math.floor(((i + 1) * height) / count);
    if (end > start) {
      ranges.push({ start, end });
    }
  }
  return ranges;
}

/**
 * Blend rows `[startRow, endRow)`: `out = (m * src + (255 - m) * 255) / 255`,
 * with opaque output alpha.
 *
 * Kept free of outside references: worker threads run its source text.
 */
export function blendRows(
  src: Uint8Array,
  mask: Uint8Array,
  dst: Uint8Array,
  width: number,
  startRow: number,
  endRow: number,
): void {
  for (let y = startRow; y < endRow; y++) {
    let p = y * width;
    const rowEnd = p + width;
    for (; p < rowEnd; p++) {
      const m = mask[p];
      const inv = (255 - m) * 255;
      const i = p * 4;
      dst[i] = ((m * src[i] + inv) / 255) | 0;
      dst[i + 1] = ((m * src[i + 1] + inv) / 255) | 0;
      dst[i + 2] = ((m * src[i + 2] + inv) / 255) | 0;
      dst[i + 3] = 255;
    }
  }
}

/** Runs every range on the calling thread. */
export class InlineRowExecutor implements RowExecutor {
  readonly concurrency = 1;

  allocate(length: number): Uint8Array {
    return new Uint8Array(length);
  }

  async run(job: BlendJob, ranges: RowRange[]): Promise<void> {
    for (const range of ranges) {
      blendRows(job.src, job.mask, job.dst, job.width, range.start, range.end);
    }
  }

  async close(): Promise<void> {}
}

/**
 * Composite `image` over white using `mask` as alpha.
 *
 * @param mask - Same size as the image.
 * @param executor - Where the row ranges run.
 * @returns New opaque RGBA image.
 * @throws {InvalidMaskError} The mask size differs from the image.
 */
export async function compositeOnWhite(
  image: ImageSource,
  mask: Mask,
  executor: RowExecutor,
): Promise<RgbaImage> {
  const { width, height } = image;
  if (mask.size.width !== width || mask.size.height !== height || mask.data.length !== width * height) {
    throw new InvalidMaskError(
      `mask ${mask.size.width}x${mask.size.height} does not match image ${width}x${height}`,
    );
  }

  const rgba = toRgbaImage(image);
  const src = executor.allocate(rgba.data.length);
  src.set(rgba.data);
  const alpha = executor.allocate(mask.data.length);
  alpha.set(mask.data);
  const dst = executor.allocate(width * height * 4);

  if (height > 0 && width > 0) {
    const ranges = partitionRows(height, executor.concurrency);
    await executor.run({ src, mask: alpha, dst, width, height }, ranges);
  }

  return { data: dst, width, height };
}
