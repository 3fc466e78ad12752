/**
 * @module row-workers
 * Worker-thread executor for the compositor.
 *
 * Each composite call sends one row range to each worker. Buffers live in
 * `SharedArrayBuffer`s, so workers write straight into the destination.
 * Workers are kept referenced only while they have work in flight, so an idle
 * pool never keeps the process alive.
 */

import { Worker } from 'node:worker_threads';
import { availableParallelism } from 'node:os';
import type { Logger } from '@cutout/types';
import { silentLogger } from '@cutout/core';
import { blendRows, type BlendJob, type RowExecutor, type RowRange } from './compositor';

/** Message sent to a worker. */
interface BlendTask {
  id: number;
  src: SharedArrayBuffer;
  mask: SharedArrayBuffer;
  dst: SharedArrayBuffer;
  width: number;
  start: number;
  end: number;
}

/** Message received from a worker. */
interface BlendReply {
  id: number;
  error?: string;
}

interface Pending {
  resolve: () => void;
  reject: (error: Error) => void;
}

interface PooledWorker {
  worker: Worker;
  pending: Map<number, Pending>;
}

const WORKER_SOURCE = `
const { parentPort } = require('node:worker_threads');
const blendRows = ${blendRows.toString()};
parentPort.on('message', (task) => {
  try {
    blendRows(
      new Uint8Array(task.src),
      new Uint8Array(task.mask),
      new Uint8Array(task.dst),
      task.width,
      task.start,
      task.end,
    );
    parentPort.postMessage({ id: task.id });
  } catch (err) {
    parentPort.postMessage({ id: task.id, error: String(err) });
  }
});
`;

function isBlendReply(value: unknown): value is BlendReply {
  return typeof value === 'object' && value !== null && 'id' in value && typeof value.id === 'number';
}

function sharedBufferOf(view: Uint8Array): SharedArrayBuffer {
  const { buffer } = view;
  if (!(buffer instanceof SharedArrayBuffer) || view.byteOffset !== 0 || view.byteLength !== buffer.byteLength) {
    throw new Error('Worker executor buffers must come from allocate()');
  }
  return buffer;
}

/** Runs row ranges on a fixed set of worker threads. */
export class WorkerRowExecutor implements RowExecutor {
  readonly concurrency: number;
  private readonly logger: Logger;
  private workers = new Map<number, PooledWorker>();
  private nextId = 0;
  private closed = false;

  /**
   * @param size - Number of workers; defaults to the available parallelism.
   */
  constructor(size: number = availableParallelism(), logger: Logger = silentLogger) {
    this.concurrency = Math.max(1, Math.floor(size));
    this.logger = logger;
  }

  allocate(length: number): Uint8Array {
    return new Uint8Array(new SharedArrayBuffer(length));
  }

  async run(job: BlendJob, ranges: RowRange[]): Promise<void> {
    if (this.closed) {
      throw new Error('Worker executor is closed');
    }
    const src = sharedBufferOf(job.src);
    const mask = sharedBufferOf(job.mask);
    const dst = sharedBufferOf(job.dst);

    await Promise.all(
      ranges.map((range, i) =>
        this.dispatch(this.workerAt(i % this.concurrency), {
          id: this.nextId++,
          src,
          mask,
          dst,
          width: job.width,
          start: range.start,
          end: range.end,
        }),
      ),
    );
  }

  async close(): Promise<void> {
    this.closed = true;
    const workers = [...this.workers.values()];
    this.workers.clear();
    for (const { pending } of workers) {
      for (const p of pending.values()) {
        p.reject(new Error('Worker executor closed'));
      }
      pending.clear();
    }
    await Promise.all(workers.map(({ worker }) => worker.terminate()));
    if (workers.length > 0) {
      this.logger.debug(`terminated ${workers.length} compositor workers`);
    }
  }

  private workerAt(index: number): PooledWorker {
    const existing = this.workers.get(index);
    if (existing) return existing;

    const worker = new Worker(WORKER_SOURCE, { eval: true });
    worker.unref();
    const pooled: PooledWorker = { worker, pending: new Map() };

    worker.on('message', (message: unknown) => {
      if (!isBlendReply(message)) return;
      const p = pooled.pending.get(message.id);
      if (!p) return;
      pooled.pending.delete(message.id);
      if (pooled.pending.size === 0) worker.unref();
      if (message.error !== undefined) {
        p.reject(new Error(`Compositor worker failed: ${message.error}`));
      } else {
        p.resolve();
      }
    });
    worker.on('error', (err: Error) => this.fail(pooled, err));
    worker.on('exit', (code: number) => {
      if (pooled.pending.size > 0) {
        this.fail(pooled, new Error(`Compositor worker exited with code ${code}`));
      }
    });

    this.workers.set(index, pooled);
    return pooled;
  }

  private dispatch(pooled: PooledWorker, task: BlendTask): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      pooled.pending.set(task.id, { resolve, reject });
      pooled.worker.ref();
      pooled.worker.postMessage(task);
    });
  }

  /** Reject everything in flight on a broken worker and drop it from the pool. */
  private fail(pooled: PooledWorker, error: Error): void {
    this.logger.error('compositor worker failed', error);
    for (const p of pooled.pending.values()) {
      p.reject(error);
    }
    pooled.pending.clear();
    for (const [index, candidate] of this.workers) {
      if (candidate === pooled) this.workers.delete(index);
    }
  }
}
