import * as workerpool from 'workerpool';
import { loadJobHandlers, rawJobsSchema, runBatch } from '../../job';
import type { RawResult } from '../../job';
import { setJobProcess } from './index';

// Entry point of the forked children. The parent sends each batch through workerpool.
setJobProcess(true);

async function runJobs(jobsModule: string, workerId: string, jobs: unknown): Promise<RawResult[]> {
  const handlers = await loadJobHandlers(jobsModule);
  return runBatch(rawJobsSchema.parse(jobs), handlers);
}

workerpool.worker({ runJobs });
