/**
 * Unbounded single-consumer message queue. Producers `push` without waiting;
 * the consumer awaits `next` and is woken by the first push.
 */
export class Channel<T> {
  private buffer: T[] = [];
  private waiters: Array<(value: T) => void> = [];

  push(value: T): void {
    const waiter = this.waiters.shift();
    if (waiter) waiter(value);
    else this.buffer.push(value);
  }

  next(): Promise<T> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      return Promise.resolve(value);
    }
    return new Promise<T>((resolve) => this.waiters.push(resolve));
  }

  /** Messages pushed but not yet consumed. */
  get pending(): number {
    return this.buffer.length;
  }
}
