/**
 * Bounded multi-producer / single-consumer FIFO. Producers never wait: a
 * push beyond capacity or after close is refused. Closing discards anything
 * buffered and wakes pending readers with `undefined`.
 */
export class ResultChannel<T> {
  private readonly buffer: T[] = [];
  private readonly readers: ((value: T | undefined) => void)[] = [];
  private closedFlag = false;

  constructor(readonly capacity: number) {}

  get closed(): boolean {
    return this.closedFlag;
  }

  get length(): number {
    return this.buffer.length;
  }

  push(value: T): boolean {
    if (this.closedFlag) return false;

    const reader = this.readers.shift();
    if (reader) {
      reader(value);
      return true;
    }

    if (this.buffer.length >= this.capacity) return false;
    this.buffer.push(value);
    return true;
  }

  async take(): Promise<T | undefined> {
    if (this.buffer.length > 0) return this.buffer.shift();
    if (this.closedFlag) return undefined;

    return new Promise<T | undefined>((resolve) => {
      this.readers.push(resolve);
    });
  }

  close(): void {
    if (this.closedFlag) return;
    this.closedFlag = true;
    this.buffer.length = 0;
    for (const reader of this.readers.splice(0)) {
      reader(undefined);
    }
  }
}
