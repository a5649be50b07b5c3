import { ConfigurationError } from '../errors';

/**
 * Outcome of one pooled job, in the shape of `Promise.allSettled`.
 */
export type JobSettlement<T> =
  | { status: 'fulfilled'; value: T }
  | { status: 'rejected'; reason: unknown };

export type Job<T> = () => Promise<T>;

export function assertPoolSize(capacity: number): void {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new ConfigurationError(`Pool size must be a positive integer, got ${capacity}`);
  }
}

/**
 * Runs jobs with at most `capacity` in flight.
 *
 * Jobs are admitted in submission order as workers free up; they may finish
 * in any order. `run()` resolves once every job has settled and never
 * rejects because of a job.
 */
export class WorkerPool {
  readonly capacity: number;
  private activeCount = 0;
  private peakActiveCount = 0;

  constructor(capacity: number) {
    assertPoolSize(capacity);
    this.capacity = capacity;
  }

  /** Jobs currently in flight. */
  get active(): number {
    return this.activeCount;
  }

  /** Highest number of jobs in flight at once since construction. */
  get peakActive(): number {
    return this.peakActiveCount;
  }

  async run<T>(jobs: readonly Job<T>[]): Promise<JobSettlement<T>[]> {
    const settlements: JobSettlement<T>[] = [];
    let cursor = 0;

    const worker = async (): Promise<void> => {
      while (cursor < jobs.length) {
        const index = cursor++;
        const job = jobs[index];
        if (!job) {
          continue;
        }

        this.activeCount++;
        this.peakActiveCount = Math.max(this.peakActiveCount, this.activeCount);
        try {
          settlements[index] = { status: 'fulfilled', value: await job() };
        } catch (reason) {
          settlements[index] = { status: 'rejected', reason };
        } finally {
          this.activeCount--;
        }
      }
    };

    const workerCount = Math.min(this.capacity, jobs.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    return settlements;
  }
}
