import uuid = require('uuid');
import type { Result } from './result';

export interface RawJob {
  readonly id: string;
  readonly name: string;
  readonly args: unknown;
}

export type JobCallback = (result: Result) => void | Promise<void>;

export class Job {
  constructor(
    public readonly id: string,
    public readonly name: string,
    public readonly args: unknown,
    private readonly callback: JobCallback | null = null,
  ) {}

  public toRaw(): RawJob {
    return { id: this.id, name: this.name, args: this.args };
  }

  public async runCallback(result: Result): Promise<void> {
    if (this.callback) {
      await this.callback(result);
    }
  }
}

export function makeJob(name: string, args: unknown = null, callback?: JobCallback): Job {
  return new Job(uuid.v4(), name, args, callback || null);
}
