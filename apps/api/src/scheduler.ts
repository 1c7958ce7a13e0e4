import schedule from 'node-schedule';
import type { Job } from 'node-schedule';
import { errorContext, type Logger } from './logger.js';

export interface ReminderScheduler {
  /**
   * Registers a one-shot job. Returns false, without registering anything,
   * when `runAt` is not in the future.
   */
  scheduleAt(runAt: Date, name: string, task: () => Promise<void>): boolean;
  pendingCount(): number;
  shutdown(): Promise<void>;
}

/** In-memory date jobs. Nothing survives a restart. */
export class NodeScheduleScheduler implements ReminderScheduler {
  private readonly jobs = new Set<Job>();

  constructor(
    private readonly logger: Logger,
    private readonly now: () => number = Date.now
  ) {}

  scheduleAt(runAt: Date, name: string, task: () => Promise<void>): boolean {
    if (runAt.getTime() <= this.now()) return false;

    const job: Job | null = schedule.scheduleJob(name, runAt, () => {
      if (job) this.jobs.delete(job);
      void this.run(name, task);
    });
    // node-schedule also answers null for dates it considers past.
    if (!job) return false;

    this.jobs.add(job);
    return true;
  }

  pendingCount() {
    return this.jobs.size;
  }

  async shutdown() {
    for (const job of this.jobs) job.cancel();
    this.jobs.clear();
  }

  private async run(name: string, task: () => Promise<void>) {
    try {
      await task();
    } catch (err) {
      this.logger.error({ job: name, err: errorContext(err) }, 'scheduler:job-failed');
    }
  }
}
