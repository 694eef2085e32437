import type { RawJob, RawResult } from '../../job';

export interface ProcessPool {
  /**
   * The maximum number of child processes the pool forks
   */
  readonly maxWorkers: number;

  /**
   * Batches currently running in a child or waiting for one
   */
  runningTasks(): number;

  /**
   * Run a batch of jobs in a child process
   * @param jobsModule module the child loads its job handlers from
   * @param workerId id correlating the batch with its results
   * @param jobs jobs to run serially in the child
   * @returns one raw result per job, in the order of `jobs`
   */
  exec(jobsModule: string, workerId: string, jobs: RawJob[]): Promise<RawResult[]>;

  /**
   * Stop all child processes
   */
  terminate(): Promise<void>;
}

let jobProcess = false;

/**
 * Marks whether the current process is a child that runs jobs
 */
export function setJobProcess(value: boolean): void {
  jobProcess = value;
}

export function isJobProcess(): boolean {
  return jobProcess;
}
