export class RingBuffer<T> {
  private buffer: (T | undefined)[];
  private nextIndex = 0;
  private size = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.buffer = new Array<T | undefined>(capacity);
  }

  /** Appends at the tail; returns the item evicted from the head, if the buffer was full. */
  push(item: T): T | undefined {
    const evicted = this.isFull() ? this.buffer[this.nextIndex] : undefined;
    this.buffer[this.nextIndex] = item;
    this.nextIndex = (this.nextIndex + 1) % this.capacity;
    if (this.size < this.capacity) {
      this.size++;
    }
    return evicted;
  }

  toArray(): T[] {
    const result: T[] = [];
    for (let i = 0; i < this.size; i++) {
      const idx = (this.nextIndex - this.size + i + this.capacity) % this.capacity;
      const val = this.buffer[idx];
      if (val !== undefined) result.push(val);
    }
    return result;
  }

  isFull(): boolean {
    return this.size === this.capacity;
  }

  length(): number {
    return this.size;
  }
}
