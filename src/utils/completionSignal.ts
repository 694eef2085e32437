/**
 * Lets callers wait for a condition that only changes when some unit of work
 * completes. Waiters are woken on every `notify()` and, when a poll interval
 * is set, at least once per interval.
 */
export class CompletionSignal {
  private listeners = new Set<() => void>();

  constructor(private readonly pollIntervalInMs: number | null = null) {}

  public get waiting(): number {
    return this.listeners.size;
  }

  public notify(): void {
    for (const listener of [...this.listeners]) {
      listener();
    }
  }

  public async waitUntil(condition: () => boolean): Promise<void> {
    while (!condition()) {
      await this.next();
    }
  }

  private next(): Promise<void> {
    return new Promise((resolve) => {
      let timer: NodeJS.Timeout | null = null;
      const wake = () => {
        if (timer) { clearTimeout(timer); }
        this.listeners.delete(wake);
        resolve();
      };
      this.listeners.add(wake);
      if (this.pollIntervalInMs !== null) {
        timer = setTimeout(wake, this.pollIntervalInMs);
      }
    });
  }
}
