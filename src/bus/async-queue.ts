export class AsyncQueue<T extends object> {
  private items: T[] = [];
  private waiters: Array<(v: T) => void> = [];

  push(v: T): void {
    const waiter = this.waiters.shift();
    if (waiter) waiter(v);
    else this.items.push(v);
  }

  async pop(): Promise<T> {
    const item = this.take();
    if (item) return item;
    return new Promise<T>((resolve) => this.waiters.push(resolve));
  }

  /** Like pop, but resolves null when nothing arrives within `timeoutMs`. */
  async popWithin(timeoutMs: number): Promise<T | null> {
    const item = this.take();
    if (item) return item;
    return new Promise<T | null>((resolve) => {
      const waiter = (v: T) => {
        clearTimeout(timer);
        resolve(v);
      };
      const timer = setTimeout(() => {
        const idx = this.waiters.indexOf(waiter);
        if (idx >= 0) this.waiters.splice(idx, 1);
        resolve(null);
      }, timeoutMs);
      this.waiters.push(waiter);
    });
  }

  size(): number {
    return this.items.length;
  }

  private take(): T | null {
    return this.items.length ? this.items.splice(0, 1)[0] : null;
  }
}
