/**
 * Runs async tasks with at most `maxConcurrent` in flight. A width of one
 * serializes tasks; `minInterval` spaces out task starts.
 */
export class TaskQueue {
  private activeCount = 0;
  private queue: Array<() => Promise<void>> = [];
  private lastStart = 0;

  constructor(
    private readonly maxConcurrent: number = 3,
    private readonly minInterval: number = 0,
    private readonly sleep: (ms: number) => Promise<void> = ms => new Promise(resolve => setTimeout(resolve, ms))
  ) {
    if (maxConcurrent < 1) {
      throw new Error(`Queue width must be at least 1, got ${maxConcurrent}`);
    }
  }

  add<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const wrappedTask = async () => {
        try {
          await this.throttle();
          resolve(await task());
        } catch (error) {
          reject(error);
        } finally {
          this.activeCount--;
          this.processQueue();
        }
      };

      this.queue.push(wrappedTask);
      this.processQueue();
    });
  }

  getStatus(): { active: number; queued: number } {
    return { active: this.activeCount, queued: this.queue.length };
  }

  private async throttle(): Promise<void> {
    if (this.minInterval <= 0) return;
    const wait = this.lastStart + this.minInterval - Date.now();
    if (this.lastStart > 0 && wait > 0) {
      await this.sleep(wait);
    }
    this.lastStart = Date.now();
  }

  private processQueue(): void {
    while (this.activeCount < this.maxConcurrent && this.queue.length > 0) {
      const task = this.queue.shift();
      if (task) {
        this.activeCount++;
        void task();
      }
    }
  }
}
