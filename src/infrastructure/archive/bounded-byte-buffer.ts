/**
 * Fixed-capacity FIFO of bytes between the archive producer and the HTTP
 * consumer.
 *
 * Two independent wait queues: writers park on *not-full*, readers on
 * *not-empty*. The event loop serializes every mutation, so there is no lock;
 * waking a side only re-checks its condition.
 */

type Waiter = () => void;

class WaitQueue {
  private waiters: Waiter[] = [];

  wait(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  signal(): void {
    this.waiters.shift()?.();
  }

  broadcast(): void {
    const pending = this.waiters;
    this.waiters = [];
    for (const wake of pending) wake();
  }
}

export type BufferState =
  | { kind: 'open' }
  | { kind: 'ended' }
  | { kind: 'failed'; error: Error }
  | { kind: 'aborted'; error: Error };

export class BoundedByteBuffer {
  private readonly chunks: Buffer[] = [];
  private length = 0;
  private peak = 0;
  private state: BufferState = { kind: 'open' };
  private readonly notFull = new WaitQueue();
  private readonly notEmpty = new WaitQueue();

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
  }

  get bufferedBytes(): number {
    return this.length;
  }

  /** Highest number of bytes ever held at once. */
  get peakBufferedBytes(): number {
    return this.peak;
  }

  get status(): BufferState['kind'] {
    return this.state.kind;
  }

  /**
   * Appends `data`, splitting it so the buffer never exceeds capacity.
   * Rejects once the buffer is no longer open.
   */
  async write(data: Uint8Array): Promise<void> {
    let offset = 0;
    while (offset < data.length) {
      this.assertWritable();
      const free = this.capacity - this.length;
      if (free === 0) {
        await this.notFull.wait();
        continue;
      }
      const take = Math.min(free, data.length - offset);
      this.chunks.push(Buffer.from(data.subarray(offset, offset + take)));
      this.length += take;
      this.peak = Math.max(this.peak, this.length);
      offset += take;
      this.notEmpty.signal();
    }
  }

  /**
   * Waits until the buffer is full or the writer has finished, then drains it.
   * Resolves `null` at end of data or after an abort; rejects with the failure
   * after {@link fail}.
   */
  async read(): Promise<Buffer | null> {
    for (;;) {
      switch (this.state.kind) {
        case 'failed':
          throw this.state.error;
        case 'aborted':
          return null;
        case 'ended':
          return this.length > 0 ? this.drain() : null;
        case 'open':
          if (this.length >= this.capacity) return this.drain();
          await this.notEmpty.wait();
      }
    }
  }

  /** Writer finished normally; remaining bytes stay readable. */
  end(): void {
    if (this.state.kind !== 'open') return;
    this.state = { kind: 'ended' };
    this.notEmpty.broadcast();
  }

  /** Writer failed; buffered bytes are discarded and every read rejects. */
  fail(error: Error): void {
    if (this.state.kind === 'failed' || this.state.kind === 'aborted') return;
    this.state = { kind: 'failed', error };
    this.discard();
    this.notEmpty.broadcast();
    this.notFull.broadcast();
  }

  /** Consumer gave up; pending writes reject with `reason`, reads see end. */
  abort(reason: Error): void {
    if (this.state.kind === 'failed' || this.state.kind === 'aborted') return;
    this.state = { kind: 'aborted', error: reason };
    this.discard();
    this.notEmpty.broadcast();
    this.notFull.broadcast();
  }

  private assertWritable(): void {
    switch (this.state.kind) {
      case 'open':
        return;
      case 'failed':
      case 'aborted':
        throw this.state.error;
      case 'ended':
        throw new Error('write after end');
    }
  }

  private drain(): Buffer {
    const out = Buffer.concat(this.chunks, this.length);
    this.discard();
    this.notFull.broadcast();
    return out;
  }

  private discard(): void {
    this.chunks.length = 0;
    this.length = 0;
  }
}
