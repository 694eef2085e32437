import { runBatch } from 'src/job';
import type { JobHandlers, RawJob, RawResult } from 'src/job';
import type { ProcessPool } from 'src/driver/pool';

export interface FakeExecution {
  readonly jobsModule: string;
  readonly workerId: string;
  readonly jobs: RawJob[];
  complete(results: RawResult[]): void;
  fail(error: Error): void;
}

/**
 * In process stand-in for a forked process pool. Batches stay running until a test completes or fails them.
 */
export class FakeProcessPool implements ProcessPool {
  public readonly executions: FakeExecution[] = [];
  public terminated = false;
  private running = new Set<FakeExecution>();

  constructor(public readonly maxWorkers: number = 2) {}

  public runningTasks(): number {
    return this.running.size;
  }

  public exec(jobsModule: string, workerId: string, jobs: RawJob[]): Promise<RawResult[]> {
    return new Promise((resolve, reject) => {
      const execution: FakeExecution = {
        jobsModule,
        workerId,
        jobs,
        complete: (results) => {
          this.running.delete(execution);
          resolve(results);
        },
        fail: (error) => {
          this.running.delete(execution);
          reject(error);
        },
      };
      this.executions.push(execution);
      this.running.add(execution);
    });
  }

  public async terminate(): Promise<void> {
    this.terminated = true;
  }

  /**
   * Run the batch's jobs in this process, the way a child would, and complete it
   */
  public async runInProcess(index: number, handlers: JobHandlers): Promise<void> {
    const execution = this.executions[index];
    execution.complete(await runBatch(execution.jobs, handlers));
  }
}
