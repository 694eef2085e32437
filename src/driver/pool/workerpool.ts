import * as path from 'path';
import * as workerpool from 'workerpool';
import { rawResultsSchema } from '../../job';
import type { RawJob, RawResult } from '../../job';
import type { ProcessPool } from './index';

export const DEFAULT_WORKER_SCRIPT = path.join(__dirname, 'worker.js');

export interface WorkerpoolProcessPoolOptions {
  maxWorkers: number;
  workerScript?: string;
  execArgv?: string[];
}

/**
 * Process pool backed by workerpool running its workers as forked child processes
 */
export class WorkerpoolProcessPool implements ProcessPool {
  public readonly maxWorkers: number;
  private pool: ReturnType<typeof workerpool.pool>;

  constructor(options: WorkerpoolProcessPoolOptions) {
    this.maxWorkers = options.maxWorkers;
    this.pool = workerpool.pool(options.workerScript || DEFAULT_WORKER_SCRIPT, {
      workerType: 'process',
      maxWorkers: options.maxWorkers,
      forkOpts: options.execArgv ? { execArgv: [...process.execArgv, ...options.execArgv] } : undefined,
    });
  }

  public runningTasks(): number {
    const stats = this.pool.stats();
    return stats.activeTasks + stats.pendingTasks;
  }

  public async exec(jobsModule: string, workerId: string, jobs: RawJob[]): Promise<RawResult[]> {
    const reply: unknown = await this.pool.exec('runJobs', [jobsModule, workerId, jobs]);
    return rawResultsSchema.parse(reply);
  }

  public async terminate(): Promise<void> {
    await this.pool.terminate();
  }
}
