import { readFile } from 'fs/promises';
import * as ort from 'onnxruntime-web';
import type { InferenceEngine, SessionTuning } from '@cutout/types';
import { InferenceError } from '@cutout/core';

/**
 * Load an ONNX model from disk and wrap it as an {@link InferenceEngine}.
 * The first model input receives the image tensor; every output is returned in model order.
 */
export async function createOnnxEngine(modelPath: string, tuning: SessionTuning = {}): Promise<InferenceEngine> {
  const model = await readFile(modelPath);
  const session = await ort.InferenceSession.create(new Uint8Array(model), {
    executionProviders: ['wasm'],
    ...tuning,
  });

  const inputName = session.inputNames[0];
  if (inputName === undefined) {
    await session.release();
    throw new InferenceError(`Model ${modelPath} declares no inputs`);
  }

  return {
    async run(input: Float32Array, dims: readonly number[]): Promise<Float32Array[]> {
      const outputs = await session.run({ [inputName]: new ort.Tensor('float32', input, dims) });
      return session.outputNames.map((name) => {
        const tensor = outputs[name];
        if (!tensor || !(tensor.data instanceof Float32Array)) {
          throw new InferenceError(`Model output ${name} is not a float32 tensor`);
        }
        return tensor.data;
      });
    },
    release: () => session.release(),
  };
}
