interface Waiter<T> {
  resolve: (result: IteratorResult<T, undefined>) => void;
  reject: (error: Error) => void;
}

/**
 * Single-consumer queue bridging event callbacks to async iteration.
 * Buffered items are delivered before the end or failure.
 */
export class FrameQueue<T> {
  private readonly buffered: T[] = [];
  private waiter: Waiter<T> | null = null;
  private finished = false;
  private failure: Error | null = null;

  public get isFinished(): boolean {
    return this.finished;
  }

  public push(item: T): void {
    if (this.finished) {
      return;
    }
    const waiter = this.takeWaiter();
    if (waiter) {
      waiter.resolve({ done: false, value: item });
    } else {
      this.buffered.push(item);
    }
  }

  public end(): void {
    if (this.finished) {
      return;
    }
    this.finished = true;
    this.takeWaiter()?.resolve({ done: true, value: undefined });
  }

  public fail(error: Error): void {
    if (this.finished) {
      return;
    }
    this.finished = true;
    this.failure = error;
    this.takeWaiter()?.reject(error);
  }

  public next(): Promise<IteratorResult<T, undefined>> {
    if (this.buffered.length > 0) {
      const value = this.buffered[0];
      this.buffered.shift();
      return Promise.resolve({ done: false, value });
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.finished) {
      return Promise.resolve({ done: true, value: undefined });
    }
    return new Promise((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }

  /**
   * Iterates until the queue ends. Aborting the signal ends the queue.
   */
  public async *iterate(signal: AbortSignal): AsyncGenerator<T, void, undefined> {
    const onAbort = (): void => this.end();
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    try {
      for (;;) {
        const result = await this.next();
        if (result.done || signal.aborted) {
          return;
        }
        yield result.value;
      }
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }

  private takeWaiter(): Waiter<T> | null {
    const waiter = this.waiter;
    this.waiter = null;
    return waiter;
  }
}
