/**
 * @module pool
 * Reusable scratch storage for the per-call pixel pipeline.
 *
 * Allocating large typed arrays on every call is expensive.
 * These pools recycle them to minimize GC pressure under repeated calls.
 *
 * Pooled objects are exclusively owned by the borrower between `acquire`
 * and `release`. JavaScript runs pool operations on one thread, so
 * concurrent async callers never observe a half-updated free list.
 */

const DEFAULT_MAX_POOL_SIZE = 16;

/** Creates fresh pool entries. */
export type PoolFactory<T> = () => T;

/**
 * Generic free-list pool. Entries are typed by the pool itself, so a
 * retrieved object never needs a runtime type check.
 */
export class ObjectPool<T> {
  private readonly free: T[] = [];
  private readonly factory: PoolFactory<T>;
  private readonly maxSize: number;

  constructor(factory: PoolFactory<T>, maxSize = DEFAULT_MAX_POOL_SIZE) {
    this.factory = factory;
    this.maxSize = maxSize;
  }

  /** Number of idle entries. */
  get size(): number {
    return this.free.length;
  }

  /** Take an idle entry, or create one. */
  acquire(): T {
    return this.free.pop() ?? this.factory();
  }

  /** Return an entry for reuse. Entries beyond the size limit are dropped. */
  release(item: T): void {
    if (this.free.length < this.maxSize) {
      this.free.push(item);
    }
  }

  /** Borrow an entry for the duration of `fn`, returning it even if `fn` throws. */
  use<R>(fn: (item: T) => R): R {
    const item = this.acquire();
    try {
      return fn(item);
    } finally {
      this.release(item);
    }
  }

  /** Drop all idle entries. */
  dispose(): void {
    this.free.length = 0;
  }
}

/**
 * Scratch pair for the resize + blur pipeline.
 * `tmp` holds the resized mask, `hPass` the horizontal blur result.
 *
 * Capacity only grows; {@link resize} re-slices the views to the current size.
 */
export class BlurBuffers {
  private tmpStorage = new Uint8Array(0);
  private hPassStorage = new Uint8Array(0);

  /** Resized intermediate, exactly `length` bytes long. */
  tmp: Uint8Array = this.tmpStorage;
  /** Horizontal-pass intermediate, exactly `length` bytes long. */
  hPass: Uint8Array = this.hPassStorage;

  /** Allocated bytes per buffer. */
  get capacity(): number {
    return this.tmpStorage.length;
  }

  /** Current working length. */
  get length(): number {
    return this.tmp.length;
  }

  /** Size both views to `size`, growing the backing storage when needed. */
  resize(size: number): this {
    if (this.tmpStorage.length < size) {
      this.tmpStorage = new Uint8Array(size);
      this.hPassStorage = new Uint8Array(size);
    }
    this.tmp = this.tmpStorage.subarray(0, size);
    this.hPass = this.hPassStorage.subarray(0, size);
    return this;
  }
}

/** Pool of {@link BlurBuffers} sized per request. */
export class BlurBufferPool {
  private readonly pool = new ObjectPool<BlurBuffers>(() => new BlurBuffers());

  /** Borrow a buffer pair whose views are exactly `size` bytes. */
  get(size: number): BlurBuffers {
    return this.pool.acquire().resize(size);
  }

  /** Return a buffer pair. Its contents must no longer be referenced. */
  put(buffers: BlurBuffers): void {
    this.pool.release(buffers);
  }

  /** Borrow a buffer pair for the duration of `fn`. */
  with<R>(size: number, fn: (buffers: BlurBuffers) => R): R {
    return this.pool.use((buffers) => fn(buffers.resize(size)));
  }

  /** Number of idle buffer pairs. */
  get idle(): number {
    return this.pool.size;
  }
}
