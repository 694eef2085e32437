import { z } from 'zod';
import { InvalidDriverOptionsError } from '../errors';
import type { Job, JobHandlers } from '../job';
import type { Logger } from '../utils/logger';

export interface DriverConfig {
  readonly type: string;
  readonly [option: string]: unknown;
}

export interface DriverContext {
  handlers: JobHandlers;
  logger: Logger;
}

export type DriverFactory = (config: DriverConfig, context: DriverContext) => Driver;

export interface Driver {
  /**
   * Run the jobs together as a single batch. Waits while the driver is saturated
   */
  runJobs(jobs: Job[]): Promise<void>;

  isBusy(): boolean;
  isSaturated(): boolean;

  /**
   * @returns true when called from inside a running job
   */
  inJob(): boolean;

  /**
   * Give finished batches a chance to deliver their results
   */
  yield(): Promise<void>;

  /**
   * Wait until there is one less active batch than when the wait started
   */
  waitOne(): Promise<void>;

  waitAll(): Promise<void>;

  /**
   * Wait until there is at least one free slot for a batch
   */
  waitSaturated(): Promise<void>;

  /**
   * Wait for in flight batches and release the driver's resources
   */
  shutdown(): Promise<void>;
}

export function parseDriverOptions<Schema extends z.ZodTypeAny>(schema: Schema, config: DriverConfig): z.output<Schema> {
  const parsed = schema.safeParse(config);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`);
    throw new InvalidDriverOptionsError(config.type, issues);
  }
  return parsed.data;
}
