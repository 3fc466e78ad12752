import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { InferenceEngine, PackedImage, Rgba8 } from '@cutout/types';
import {
  InferenceError,
  NoObjectDetectedError,
  NotInitializedError,
  createPackedImage,
  decodePng,
  encodePng,
  silentLogger,
} from '@cutout/core';
import { BackgroundRemover } from './remover';
import { autoMask } from './masks';
import type { ResolvedRemoverConfig } from './config';

const INPUT_SIZE = 10;

/** Logits of a square object covering `[from, to]` on both axes. */
function objectLogits(from = 4, to = 6, inside = 5, outside = -5): Float32Array {
  const logits = new Float32Array(INPUT_SIZE * INPUT_SIZE).fill(outside);
  for (let y = from; y <= to; y++) {
    for (let x = from; x <= to; x++) logits[y * INPUT_SIZE + x] = inside;
  }
  return logits;
}

function filled(width: number, height: number, color: Rgba8): PackedImage {
  const image = createPackedImage(width, height);
  for (let i = 0; i < width * height; i++) image.data.set([color.r, color.g, color.b, color.a], i * 4);
  return image;
}

const RED: Rgba8 = { r: 255, g: 0, b: 0, a: 255 };

function createFakeEngine(outputs: () => Float32Array[] = () => [objectLogits()]) {
  return {
    run: vi.fn(async (_input: Float32Array, _dims: readonly number[]) => outputs()),
    release: vi.fn(async () => {}),
  } satisfies InferenceEngine;
}

function createRemover(engine: InferenceEngine, overrides: { workers?: number; outputMode?: 'first' | 'average' } = {}) {
  const factory = vi.fn(async (_config: ResolvedRemoverConfig) => engine);
  const remover = new BackgroundRemover(
    { modelPath: 'model.onnx', inputSize: INPUT_SIZE, workers: 1, logger: silentLogger, ...overrides },
    factory,
  );
  return { remover, factory };
}

describe('BackgroundRemover', () => {
  describe('initialize', () => {
    it('should create the engine once', async () => {
      const { remover, factory } = createRemover(createFakeEngine());

      expect(remover.isReady).toBe(false);
      await remover.initialize();
      await remover.initialize();

      expect(remover.isReady).toBe(true);
      expect(factory).toHaveBeenCalledTimes(1);
      expect(factory.mock.calls[0][0]).toMatchObject({ modelPath: 'model.onnx', inputSize: INPUT_SIZE });
    });

    it('should wrap load failures', async () => {
      const cause = new Error('missing file');
      const remover = new BackgroundRemover({ modelPath: 'missing.onnx', logger: silentLogger }, async () => {
        throw cause;
      });

      const error = await remover.initialize().catch((err: unknown) => err);

      expect(error).toBeInstanceOf(InferenceError);
      expect(error).toMatchObject({ cause });
      expect(remover.isReady).toBe(false);
    });

    it('should log the loaded model', async () => {
      const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      const remover = new BackgroundRemover(
        { modelPath: 'model.onnx', inputSize: INPUT_SIZE, workers: 1, logger },
        async () => createFakeEngine(),
      );

      await remover.initialize();

      expect(logger.info).toHaveBeenCalledWith('model loaded: model.onnx');
    });
  });

  describe('predictMask', () => {
    it('should reject before initialize', async () => {
      const { remover } = createRemover(createFakeEngine());

      await expect(remover.predictMask(filled(20, 20, RED))).rejects.toThrow(NotInitializedError);
    });

    it('should feed a normalized NCHW tensor', async () => {
      const engine = createFakeEngine();
      const { remover } = createRemover(engine);
      await remover.initialize();

      await remover.predictMask(filled(20, 20, RED));

      const [input, dims] = engine.run.mock.calls[0];
      expect(input.length).toBe(3 * INPUT_SIZE * INPUT_SIZE);
      expect(dims).toEqual([1, 3, INPUT_SIZE, INPUT_SIZE]);
      expect(input[0]).toBeCloseTo((1 - 0.485) / 0.229, 5);
    });

    it('should binarize the logits at the Otsu threshold', async () => {
      const { remover } = createRemover(createFakeEngine());
      await remover.initialize();

      const mask = await remover.predictMask(filled(20, 20, RED));

      expect(mask.size).toEqual({ width: INPUT_SIZE, height: INPUT_SIZE });
      expect(mask.data[5 * INPUT_SIZE + 5]).toBe(255);
      expect(mask.data[0]).toBe(0);
      expect(mask.data.filter((v) => v === 255).length).toBe(9);
    });

    it('should average outputs when configured', async () => {
      const engine = createFakeEngine(() => [objectLogits(), objectLogits(4, 6, -5, -5)]);
      const { remover } = createRemover(engine, { outputMode: 'average' });
      await remover.initialize();

      const mask = await remover.predictMask(filled(20, 20, RED));

      expect(mask.data[5 * INPUT_SIZE + 5]).toBe(255);
      expect(mask.data.filter((v) => v === 255).length).toBe(9);
    });

    it('should reuse the pooled input tensor', async () => {
      const engine = createFakeEngine();
      const { remover } = createRemover(engine);
      await remover.initialize();

      await remover.predictMask(filled(20, 20, RED));
      await remover.predictMask(filled(20, 20, RED));

      expect(engine.run.mock.calls[1][0]).toBe(engine.run.mock.calls[0][0]);
    });

    it('should never run the engine concurrently', async () => {
      let active = 0;
      let peak = 0;
      const engine: InferenceEngine = {
        async run() {
          active++;
          peak = Math.max(peak, active);
          await new Promise((resolve) => setTimeout(resolve, 5));
          active--;
          return [objectLogits()];
        },
        async release() {},
      };
      const { remover } = createRemover(engine);
      await remover.initialize();

      await Promise.all([1, 2, 3].map(() => remover.predictMask(filled(20, 20, RED))));

      expect(peak).toBe(1);
    });

    it('should wrap engine failures and keep serving', async () => {
      const engine = createFakeEngine();
      const cause = new Error('session crashed');
      engine.run.mockRejectedValueOnce(cause);
      const { remover } = createRemover(engine);
      await remover.initialize();

      await expect(remover.predictMask(filled(20, 20, RED))).rejects.toMatchObject({ name: 'InferenceError', cause });
      const mask = await remover.predictMask(filled(20, 20, RED));

      expect(mask.data[5 * INPUT_SIZE + 5]).toBe(255);
    });

    it('should reject outputs of the wrong size', async () => {
      const { remover } = createRemover(createFakeEngine(() => [new Float32Array(7)]));
      await remover.initialize();

      await expect(remover.predictMask(filled(20, 20, RED))).rejects.toThrow(InferenceError);
    });
  });

  describe('smartCrop', () => {
    it('should crop the scaled object bounds', async () => {
      const { remover } = createRemover(createFakeEngine());
      await remover.initialize();

      const cropped = await remover.smartCrop(filled(100, 100, RED), { margin: 0 });

      expect([cropped.width, cropped.height]).toEqual([20, 20]);
    });

    it('should apply the default margin', async () => {
      const { remover } = createRemover(createFakeEngine());
      await remover.initialize();

      const cropped = await remover.smartCrop(filled(100, 100, RED));

      expect([cropped.width, cropped.height]).toEqual([60, 60]);
    });

    it('should report an empty prediction', async () => {
      const { remover } = createRemover(createFakeEngine(() => [new Float32Array(INPUT_SIZE * INPUT_SIZE).fill(-100)]));
      await remover.initialize();

      await expect(remover.smartCrop(filled(100, 100, RED))).rejects.toThrow(NoObjectDetectedError);
    });
  });

  describe('smartCropFromMask', () => {
    it('should crop without a model', async () => {
      const { remover, factory } = createRemover(createFakeEngine());
      const image = filled(100, 100, { r: 255, g: 255, b: 255, a: 255 });
      for (let y = 40; y <= 60; y++) {
        for (let x = 40; x <= 60; x++) image.data.set([0, 0, 0, 255], (y * 100 + x) * 4);
      }

      const cropped = await remover.smartCropFromMask(image, autoMask, { margin: 0 });

      expect([cropped.width, cropped.height]).toEqual([20, 20]);
      expect(factory).not.toHaveBeenCalled();
    });
  });

  describe('removeBackground', () => {
    it('should whiten the background and keep the object', async () => {
      const { remover } = createRemover(createFakeEngine());
      await remover.initialize();

      const result = await remover.removeBackground(filled(20, 20, RED));

      expect([result.width, result.height]).toEqual([20, 20]);
      expect(Array.from(result.data.subarray(0, 4))).toEqual([255, 255, 255, 255]);
      const center = (10 * 20 + 10) * 4;
      expect(result.data[center]).toBe(255);
      expect(result.data[center + 1]).toBeLessThan(64);
      expect(result.data[center + 3]).toBe(255);
    });

    it('should give the same result on worker threads', async () => {
      const inline = createRemover(createFakeEngine()).remover;
      const threaded = createRemover(createFakeEngine(), { workers: 2 }).remover;
      await inline.initialize();
      await threaded.initialize();

      try {
        const a = await inline.removeBackground(filled(20, 20, RED));
        const b = await threaded.removeBackground(filled(20, 20, RED));

        expect(Array.from(b.data)).toEqual(Array.from(a.data));
      } finally {
        await inline.dispose();
        await threaded.dispose();
      }
    });
  });

  describe('file helpers', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'cutout-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should remove the background of a PNG file', async () => {
      const { remover } = createRemover(createFakeEngine());
      await remover.initialize();
      const input = join(dir, 'in.png');
      const output = join(dir, 'out.png');
      await writeFile(input, encodePng({ data: filled(20, 20, RED).data, width: 20, height: 20 }));

      await remover.removeBackgroundFromFile(input, output);

      const result = decodePng(await readFile(output));
      expect([result.width, result.height]).toEqual([20, 20]);
      expect(Array.from(result.data.subarray(0, 4))).toEqual([255, 255, 255, 255]);
    });

    it('should smart-crop a PNG file', async () => {
      const { remover } = createRemover(createFakeEngine());
      await remover.initialize();
      const input = join(dir, 'in.png');
      const output = join(dir, 'crop.png');
      await writeFile(input, encodePng({ data: filled(100, 100, RED).data, width: 100, height: 100 }));

      await remover.smartCropFile(input, output, { margin: 5 });

      const result = decodePng(await readFile(output));
      expect([result.width, result.height]).toEqual([30, 30]);
    });
  });

  describe('dispose', () => {
    it('should release the engine', async () => {
      const engine = createFakeEngine();
      const { remover } = createRemover(engine);
      await remover.initialize();

      await remover.dispose();

      expect(engine.release).toHaveBeenCalledTimes(1);
      expect(remover.isReady).toBe(false);
      await expect(remover.predictMask(filled(20, 20, RED))).rejects.toThrow(NotInitializedError);
    });
  });
});
