import { z } from 'zod';
import { UnknownJobError } from '../errors';
import type { RawJob } from './job';
import { failedResult } from './result';
import type { RawResult } from './result';

export type JobHandler = (args: unknown) => unknown;

export interface JobHandlers {
  readonly [name: string]: JobHandler;
}

export const rawJobsSchema = z.array(z.object({
  id: z.string(),
  name: z.string(),
  args: z.unknown(),
}));

export async function runJob(job: RawJob, handlers: JobHandlers): Promise<RawResult> {
  const handler = Object.prototype.hasOwnProperty.call(handlers, job.name) ? handlers[job.name] : undefined;
  if (!handler) {
    return failedResult(new UnknownJobError(job.name));
  }
  try {
    const data = await handler(job.args);
    return { success: true, data: data === undefined ? null : data };
  } catch (e) {
    return failedResult(e);
  }
}

export async function runBatch(jobs: RawJob[], handlers: JobHandlers): Promise<RawResult[]> {
  const results: RawResult[] = [];
  // Jobs of a batch run one after the other, never concurrently
  for (const job of jobs) {
    results.push(await runJob(job, handlers));
  }
  return results;
}
