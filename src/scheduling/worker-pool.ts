/**
 * WorkerPool — bounded concurrency for task executions.
 *
 * `submit` waits for a free slot, starts the job and resolves as soon as it
 * is running; the job itself completes in the background. `drain` waits for
 * every running job.
 */

export interface WorkerPool {
  readonly concurrency: number;
  /** Number of jobs currently running. */
  readonly active: number;
  submit(job: () => Promise<void>): Promise<void>;
  drain(): Promise<void>;
}

export interface WorkerPoolOptions {
  concurrency: number;
  /** Receives anything a job throws. Jobs are expected to handle their own errors. */
  onError: (error: unknown) => void;
}

/** Create a worker pool with a fixed number of slots. */
export function createWorkerPool(options: WorkerPoolOptions): WorkerPool {
  const { concurrency, onError } = options;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Worker pool concurrency must be a positive integer, got ${concurrency}`);
  }

  let active = 0;
  const waiters: Array<() => void> = [];
  const running = new Set<Promise<void>>();

  const release = (): void => {
    active -= 1;
    waiters.shift()?.();
  };

  return {
    concurrency,

    get active(): number {
      return active;
    },

    async submit(job: () => Promise<void>): Promise<void> {
      while (active >= concurrency) {
        await new Promise<void>((resolve) => {
          waiters.push(resolve);
        });
      }

      active += 1;
      const execution = (async (): Promise<void> => {
        try {
          await job();
        } catch (error) {
          onError(error);
        } finally {
          release();
        }
      })();

      running.add(execution);
      void execution.finally(() => running.delete(execution));
    },

    async drain(): Promise<void> {
      while (running.size > 0) {
        await Promise.all(running);
      }
    },
  };
}
