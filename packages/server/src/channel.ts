export const DEFAULT_CAPACITY = 100;

export type PushResult = 'ok' | 'closed';

export type BackpressureListener = (paused: boolean) => void;

export interface BodyChannelOptions {
  capacity?: number;
  /** Raised with `true` when the backlog exceeds capacity, `false` once it is back within it. */
  onBackpressure?: BackpressureListener;
}

type Taker = (chunk: Uint8Array | undefined) => void;

/**
 * Bounded, closable FIFO of body chunks between a producer and a consumer.
 *
 * Pushes are never refused while the channel is open: once the backlog goes
 * past `capacity` the backpressure signal is raised and the producer is
 * expected to stop until a `take()` brings the backlog back to `capacity`.
 * Closing is idempotent, wakes pending takers with end-of-stream and keeps
 * already buffered chunks readable.
 */
export class BodyChannel implements AsyncIterable<Uint8Array> {
  readonly capacity: number;

  private readonly chunks: Uint8Array[] = [];
  private readonly takers: Taker[] = [];
  private readonly waiters: (() => void)[] = [];
  private readonly onBackpressure?: BackpressureListener;
  private isClosed = false;
  private isPaused = false;

  constructor(options?: BodyChannelOptions) {
    this.capacity = options?.capacity ?? DEFAULT_CAPACITY;
    if (!Number.isInteger(this.capacity) || this.capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${this.capacity}`);
    }
    this.onBackpressure = options?.onBackpressure;
  }

  static from(chunks: Iterable<Uint8Array | string>, options?: BodyChannelOptions): BodyChannel {
    const channel = new BodyChannel(options);
    const encoder = new TextEncoder();
    for (const chunk of chunks) {
      channel.push(typeof chunk === 'string' ? encoder.encode(chunk) : chunk);
    }
    channel.close();
    return channel;
  }

  get size(): number {
    return this.chunks.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  get paused(): boolean {
    return this.isPaused;
  }

  push(chunk: Uint8Array): PushResult {
    if (this.isClosed) return 'closed';
    const taker = this.takers.shift();
    if (taker) {
      taker(chunk);
      return 'ok';
    }
    this.chunks.push(chunk);
    if (!this.isPaused && this.chunks.length > this.capacity) {
      this.isPaused = true;
      this.onBackpressure?.(true);
    }
    return 'ok';
  }

  /** Next chunk in order, or `undefined` once the channel is closed and drained. */
  take(): Promise<Uint8Array | undefined> {
    const chunk = this.chunks.shift();
    if (chunk !== undefined) {
      if (this.isPaused && this.chunks.length <= this.capacity) this.unpause();
      return Promise.resolve(chunk);
    }
    if (this.isClosed) return Promise.resolve(undefined);
    return new Promise((resolve) => {
      this.takers.push(resolve);
    });
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    for (const taker of this.takers.splice(0)) taker(undefined);
    // a closed channel refuses pushes, so a paused producer is released
    if (this.isPaused) this.unpause();
  }

  /** Resolves once the backpressure signal is clear or the channel is closed. */
  ready(): Promise<void> {
    if (!this.isPaused || this.isClosed) return Promise.resolve();
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** `push` for producers that can wait: resolves when there is room again. */
  async write(chunk: Uint8Array | string): Promise<PushResult> {
    const result = this.push(typeof chunk === 'string' ? new TextEncoder().encode(chunk) : chunk);
    if (result === 'ok') await this.ready();
    return result;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<Uint8Array> {
    for (;;) {
      const chunk = await this.take();
      if (chunk === undefined) return;
      yield chunk;
    }
  }

  private unpause(): void {
    this.isPaused = false;
    this.onBackpressure?.(false);
    for (const waiter of this.waiters.splice(0)) waiter();
  }
}
