export const DEFAULT_WORKERS = 10;

/**
 * Fixed-size pool for handler calls and body drains. Tasks beyond `size`
 * wait in FIFO order, so a busy server queues work instead of fanning out.
 * A slot stays occupied until the task's promise settles.
 */
export class Executor {
  private running = 0;
  private readonly queue: (() => void)[] = [];

  constructor(readonly size: number = DEFAULT_WORKERS) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Executor size must be a positive integer, got ${size}`);
    }
  }

  get active(): number {
    return this.running;
  }

  get pending(): number {
    return this.queue.length;
  }

  run<T>(task: () => T | PromiseLike<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const start = (): void => {
        this.running++;
        void Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(() => {
            this.running--;
            this.queue.shift()?.();
          });
      };
      if (this.running < this.size) {
        start();
      } else {
        this.queue.push(start);
      }
    });
  }
}
