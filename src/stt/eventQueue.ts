interface Waiter<T> {
  resolve: (value: T | null) => void;
  timer: NodeJS.Timeout;
}

/**
 * Single-consumer queue whose reads time out, so a polling loop can keep
 * running its own timers between events.
 */
export class EventQueue<T> {
  private readonly items: T[] = [];
  private waiter?: Waiter<T>;
  private ended = false;

  public get isEnded(): boolean {
    return this.ended;
  }

  public get size(): number {
    return this.items.length;
  }

  public push(item: T): void {
    if (this.ended) {
      return;
    }

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      clearTimeout(waiter.timer);
      waiter.resolve(item);
      return;
    }

    this.items.push(item);
  }

  public next(timeoutMs: number): Promise<T | null> {
    const item = this.items.shift();
    if (item !== undefined) {
      return Promise.resolve(item);
    }
    if (this.ended) {
      return Promise.resolve(null);
    }
    if (this.waiter) {
      return Promise.reject(new Error('event queue already has a pending reader'));
    }

    return new Promise<T | null>((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = undefined;
        resolve(null);
      }, timeoutMs);
      timer.unref?.();
      this.waiter = { resolve, timer };
    });
  }

  public end(): void {
    this.ended = true;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      clearTimeout(waiter.timer);
      waiter.resolve(null);
    }
  }
}
