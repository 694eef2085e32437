import { z } from 'zod';
import { InvalidDriverOptionsError, MissingResultError } from '../errors';
import { failedResult, loadJobHandlers, Result, runBatch } from '../job';
import type { Job, JobHandlers, RawResult } from '../job';
import { CompletionSignal } from '../utils/completionSignal';
import type { Logger } from '../utils/logger';
import { parseDriverOptions } from './driver';
import type { Driver, DriverConfig, DriverContext } from './driver';
import { isJobProcess } from './pool';
import type { ProcessPool } from './pool';
import { WorkerpoolProcessPool } from './pool/workerpool';
import { workerIds } from './workerIds';
import type { WorkerIdSequence } from './workerIds';

export const FORK_POOL_DRIVER = 'forkPool';
export const FORK_POOL_DRIVER_DEFAULT_MAX_WORKERS = 10;
export const FORK_POOL_DRIVER_DEFAULT_WAIT_SLEEP_IN_SECONDS = 1;

const JOBS_MODULE_REQUIRED = 'jobsModule is required when maxWorkers is above 0';

const forkPoolDriverOptionsSchema = z.object({
  type: z.literal(FORK_POOL_DRIVER),
  maxWorkers: z.number().int().nonnegative().default(FORK_POOL_DRIVER_DEFAULT_MAX_WORKERS),
  waitSleep: z.number().nonnegative().default(FORK_POOL_DRIVER_DEFAULT_WAIT_SLEEP_IN_SECONDS),
  jobsModule: z.string().min(1).optional(),
  workerScript: z.string().min(1).optional(),
  execArgv: z.array(z.string()).optional(),
}).strict().refine((options) => options.maxWorkers === 0 || options.jobsModule !== undefined, {
  message: JOBS_MODULE_REQUIRED,
  path: ['jobsModule'],
});

export type ForkPoolDriverOptions = z.output<typeof forkPoolDriverOptionsSchema>;

/**
 * Runs each batch of jobs in a forked child process taken from a process pool.
 *
 * The pool does all the forking and reaping; this driver only correlates a
 * batch with its results through a worker id. With `maxWorkers` set to 0
 * nothing is forked and batches run inline in the current process.
 */
export class ForkPoolDriver implements Driver {
  public static fromConfig(config: DriverConfig, context: DriverContext): ForkPoolDriver {
    const options = parseDriverOptions(forkPoolDriverOptionsSchema, config);
    const pool = options.maxWorkers > 0
      ? new WorkerpoolProcessPool({ maxWorkers: options.maxWorkers, workerScript: options.workerScript, execArgv: options.execArgv })
      : null;
    return new ForkPoolDriver(options, pool, context);
  }

  private workerJobs = new Map<string, Job[]>();
  private finished: CompletionSignal;
  private inlineBatches = 0;
  private forking: { pool: ProcessPool; jobsModule: string } | null;

  constructor(
    private options: ForkPoolDriverOptions,
    private pool: ProcessPool | null,
    private context: DriverContext,
    private ids: WorkerIdSequence = workerIds,
  ) {
    if (pool && !options.jobsModule) {
      throw new InvalidDriverOptionsError(FORK_POOL_DRIVER, [`jobsModule: ${JOBS_MODULE_REQUIRED}`]);
    }
    this.forking = pool && options.jobsModule ? { pool, jobsModule: options.jobsModule } : null;
    this.finished = new CompletionSignal(options.waitSleep * 1000);
  }

  private get logger(): Logger {
    return this.context.logger;
  }

  public get maxWorkers(): number {
    return this.options.maxWorkers;
  }

  public async runJobs(jobs: Job[]): Promise<void> {
    if (jobs.length === 0) { return; }
    const forking = this.forking;
    if (!forking) {
      await this.runInline(jobs);
      return;
    }
    while (this.isSaturated()) {
      await this.waitSaturated();
    }

    const id = this.ids.next();
    this.workerJobs.set(id, jobs);
    this.logger.debug(`Starting ${id} with ${jobs.length} job(s)`);

    // Not awaiting: the batch completes in the child and reports through the finish callback
    forking.pool.exec(forking.jobsModule, id, jobs.map((job) => job.toRaw())).then(
      async (results) => this.finish(id, results),
      async (error: unknown) => {
        this.logger.warn(`${id} failed`, error);
        await this.finish(id, jobs.map(() => failedResult(error)));
      },
    ).catch((error: unknown) => this.logger.error(`Finish callback for ${id} failed`, error));
  }

  /**
   * A batch stays busy until its callbacks have run, after the pool has freed its slot
   */
  public isBusy(): boolean {
    return this.runningTasks() > 0 || this.workerJobs.size > 0;
  }

  public isSaturated(): boolean {
    if (!this.pool) { return false; }
    return this.pool.runningTasks() >= this.pool.maxWorkers;
  }

  public inJob(): boolean {
    return isJobProcess();
  }

  public async yield(): Promise<void> {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }

  public async waitOne(): Promise<void> {
    const activeBatches = this.workerJobs.size;
    if (activeBatches === 0) { return; }
    await this.finished.waitUntil(() => this.workerJobs.size < activeBatches);
  }

  public async waitAll(): Promise<void> {
    await this.finished.waitUntil(() => !this.isBusy() && this.workerJobs.size === 0);
  }

  public async waitSaturated(): Promise<void> {
    if (!this.isSaturated()) { return; }
    await this.finished.waitUntil(() => !this.isSaturated());
  }

  public async shutdown(): Promise<void> {
    if (this.inJob()) { return; }
    await this.waitAll();
    if (this.pool) {
      await this.pool.terminate();
    }
  }

  private runningTasks(): number {
    return this.pool ? this.pool.runningTasks() : this.inlineBatches;
  }

  private async runInline(jobs: Job[]): Promise<void> {
    const id = this.ids.next();
    this.workerJobs.set(id, jobs);
    this.inlineBatches++;
    let results: RawResult[];
    try {
      results = await runBatch(jobs.map((job) => job.toRaw()), await this.inlineHandlers());
    } catch (e) {
      results = jobs.map(() => failedResult(e));
    } finally {
      this.inlineBatches--;
    }
    await this.finish(id, results);
  }

  private async inlineHandlers(): Promise<JobHandlers> {
    return this.options.jobsModule ? loadJobHandlers(this.options.jobsModule) : this.context.handlers;
  }

  /**
   * Called once per batch when its child is done, with the child's raw results
   */
  private async finish(id: string, rawResults: RawResult[]): Promise<void> {
    const jobs = this.workerJobs.get(id) || [];
    this.logger.debug(`${id} finished with ${rawResults.length} result(s)`);

    try {
      for (const [index, job] of jobs.entries()) {
        const raw = index < rawResults.length ? rawResults[index] : failedResult(new MissingResultError(id, job.id));
        try {
          await job.runCallback(Result.fromRaw(raw, job.id));
        } catch (e) {
          this.logger.error(`Callback for job ${job.name} (${job.id}) failed`, e);
        }
      }
    } finally {
      this.workerJobs.delete(id);
      this.finished.notify();
    }
  }
}
