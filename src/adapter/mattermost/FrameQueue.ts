export interface FrameQueueOptions {
  /** Buffered frame count at which `onHigh` fires. */
  highWaterMark: number;
  /** Called once when the buffer reaches the high-water mark. */
  onHigh: () => void;
  /** Called once the reader has drained the buffer to half the mark. */
  onLow: () => void;
}

/**
 * Push-to-pull bridge between a socket's `message` callbacks and the
 * ingestor's `for await` loop. Frames come out in the order they went in.
 */
export class FrameQueue implements AsyncIterable<string> {
  private readonly buffered: string[] = [];
  private paused = false;

  constructor(private readonly options?: FrameQueueOptions) {}

  private readonly waiting: Array<{
    resolve: (result: IteratorResult<string>) => void;
    reject: (err: Error) => void;
  }> = [];
  private ended = false;
  private failure: Error | undefined;

  push(frame: string): void {
    if (this.ended) return;
    const waiter = this.waiting.shift();
    if (waiter) {
      waiter.resolve({ value: frame, done: false });
    } else {
      this.buffered.push(frame);
      if (this.options && !this.paused && this.buffered.length >= this.options.highWaterMark) {
        this.paused = true;
        this.options.onHigh();
      }
    }
  }

  end(): void {
    if (this.ended) return;
    this.ended = true;
    for (const waiter of this.waiting.splice(0)) {
      waiter.resolve({ value: undefined, done: true });
    }
  }

  fail(err: Error): void {
    if (this.ended) return;
    this.failure = err;
    this.ended = true;
    for (const waiter of this.waiting.splice(0)) {
      waiter.reject(err);
    }
  }

  next(): Promise<IteratorResult<string>> {
    const frame = this.buffered.shift();
    if (frame !== undefined) {
      if (this.options && this.paused && this.buffered.length <= this.options.highWaterMark / 2) {
        this.paused = false;
        this.options.onLow();
      }
      return Promise.resolve({ value: frame, done: false });
    }
    if (this.failure) return Promise.reject(this.failure);
    if (this.ended) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve, reject) => {
      this.waiting.push({ resolve, reject });
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<string> {
    return { next: () => this.next() };
  }
}
