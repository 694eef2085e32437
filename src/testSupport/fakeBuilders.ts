import * as Factory from 'factory.ts';
import { makeJob } from 'src/job';
import type { Job, RawJob, RawResult, Result } from 'src/job';
import casual = require('casual');

export const rawJobFactory = Factory.Sync.makeFactory<RawJob>({
  id: Factory.each(() => casual.uuid),
  name: 'sum',
  args: [1, 2],
});

export const rawResultFactory = Factory.Sync.makeFactory<RawResult>({
  success: true,
  data: Factory.each(() => casual.integer(0, 1000)),
});

export interface RecordingJob {
  job: Job;
  results: Result[];
}

/**
 * A job whose callback records every result it receives
 */
export function makeRecordingJob(name: string = 'sum', args: unknown = [1, 2]): RecordingJob {
  const results: Result[] = [];
  const job = makeJob(name, args, (result) => { results.push(result); });
  return { job, results };
}
