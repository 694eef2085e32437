import { z } from 'zod';
import { Result, runBatch } from '../job';
import type { Job, JobHandlers, RawResult } from '../job';
import { CompletionSignal } from '../utils/completionSignal';
import type { Logger } from '../utils/logger';
import { parseDriverOptions } from './driver';
import type { Driver, DriverConfig, DriverContext } from './driver';

export const BASIC_DRIVER = 'basic';

const basicDriverOptionsSchema = z.object({
  type: z.literal(BASIC_DRIVER),
}).strict();

/**
 * Runs every batch inside the current process, one job after the other.
 * Only one batch runs at a time; callbacks run once the whole batch is done,
 * and the batch counts as active until they have.
 */
export class BasicDriver implements Driver {
  public static fromConfig(config: DriverConfig, context: DriverContext): BasicDriver {
    parseDriverOptions(basicDriverOptionsSchema, config);
    return new BasicDriver(context.handlers, context.logger);
  }

  private runningBatches = 0;
  private activeBatches = 0;
  private finished = new CompletionSignal();

  constructor(private handlers: JobHandlers, private logger: Logger) {}

  public async runJobs(jobs: Job[]): Promise<void> {
    if (jobs.length === 0) { return; }
    while (this.isSaturated()) {
      await this.waitSaturated();
    }

    this.runningBatches++;
    this.activeBatches++;
    try {
      let results: RawResult[];
      try {
        results = await runBatch(jobs.map((job) => job.toRaw()), this.handlers);
      } finally {
        this.runningBatches--;
        this.finished.notify();
      }

      for (const [index, job] of jobs.entries()) {
        await this.deliver(job, Result.fromRaw(results[index], job.id));
      }
    } finally {
      this.activeBatches--;
      this.finished.notify();
    }
  }

  public isBusy(): boolean {
    return this.activeBatches > 0;
  }

  public isSaturated(): boolean {
    return this.runningBatches > 0;
  }

  public inJob(): boolean {
    return false;
  }

  public async yield(): Promise<void> {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }

  public async waitOne(): Promise<void> {
    const activeBatches = this.activeBatches;
    if (activeBatches === 0) { return; }
    await this.finished.waitUntil(() => this.activeBatches < activeBatches);
  }

  public async waitAll(): Promise<void> {
    await this.finished.waitUntil(() => !this.isBusy());
  }

  public async waitSaturated(): Promise<void> {
    await this.finished.waitUntil(() => !this.isSaturated());
  }

  public async shutdown(): Promise<void> {
    await this.waitAll();
  }

  private async deliver(job: Job, result: Result): Promise<void> {
    try {
      await job.runCallback(result);
    } catch (e) {
      this.logger.error(`Callback for job ${job.name} (${job.id}) failed`, e);
    }
  }
}
