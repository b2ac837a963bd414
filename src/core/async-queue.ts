/**
 * Unbounded single-producer/single-consumer channel. `push` never blocks;
 * a waiting consumer is handed the item directly.
 */
export class AsyncQueue<T> {
  private items: T[] = [];
  private resolvers: Array<(value: T) => void> = [];

  push(item: T) {
    const resolver = this.resolvers.shift();
    if (resolver) {
      resolver(item);
      return;
    }
    this.items.push(item);
  }

  async next(): Promise<T> {
    if (this.items.length > 0) {
      return this.items.shift() as T;
    }
    return new Promise<T>((resolve) => {
      this.resolvers.push(resolve);
    });
  }

  /**
   * Like `next`, but gives up after `timeoutMs` and resolves `undefined`.
   * A timed-out waiter is withdrawn, so no item is lost to it.
   */
  async nextWithin(timeoutMs: number): Promise<T | undefined> {
    if (this.items.length > 0) {
      return this.items.shift() as T;
    }
    return new Promise<T | undefined>((resolve) => {
      const resolver = (value: T) => {
        clearTimeout(timer);
        resolve(value);
      };
      const timer = setTimeout(() => {
        this.resolvers = this.resolvers.filter((r) => r !== resolver);
        resolve(undefined);
      }, timeoutMs);
      this.resolvers.push(resolver);
    });
  }

  size(): number {
    return this.items.length;
  }

  empty(): boolean {
    return this.items.length === 0;
  }

  clear(): void {
    this.items = [];
  }
}
