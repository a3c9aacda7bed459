/** Fixed-capacity FIFO of raw gesture counts; the oldest entry is overwritten once full. */
export class GestureHistory {
  private readonly slots: number[];
  private head = 0;
  private size = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<number>(capacity).fill(0);
  }

  get length(): number {
    return this.size;
  }

  isFull(): boolean {
    return this.size === this.capacity;
  }

  push(value: number): void {
    if (this.size < this.capacity) {
      this.slots[(this.head + this.size) % this.capacity] = value;
      this.size += 1;
      return;
    }
    this.slots[this.head] = value;
    this.head = (this.head + 1) % this.capacity;
  }

  /** Oldest first. */
  values(): number[] {
    const out: number[] = [];
    for (let i = 0; i < this.size; i++) {
      out.push(this.slots[(this.head + i) % this.capacity]);
    }
    return out;
  }

  clear(): void {
    this.head = 0;
    this.size = 0;
  }
}
