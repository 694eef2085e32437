import { BASIC_DRIVER, BasicDriver, FORK_POOL_DRIVER, ForkPoolDriver, isJobProcess } from './driver';
import type { Driver, DriverConfig, DriverFactory } from './driver';
import { DriverAlreadyRegisteredError, DriverNotRegisteredError, InvalidBatchSizeError } from './errors';
import { makeJob } from './job';
import type { Job, JobCallback, JobHandlers } from './job';
import { makeConsoleLogger } from './utils/logger';
import type { Logger } from './utils/logger';
import { Registry } from './utils/registry';

export const FORKLIFT_DEFAULT_BATCH_SIZE = 1;

export interface Forklift {
  readonly batchSize: number;
  readonly pendingJobs: number;
  readonly registeredDrivers: string[];

  registerDriver(options: RegisterDriverOptions): void;

  /**
   * Queue a job. The pending batch is handed to the driver once it holds `batchSize` jobs
   * @param name name of a job handler
   * @param args JSON serializable arguments passed to the handler
   * @param callback invoked with the job's result
   * @returns the job id
   */
  submit(name: string, args?: unknown, callback?: JobCallback): Promise<string>;

  /**
   * Hand any pending jobs to the driver without waiting for a full batch
   */
  flush(): Promise<void>;

  isBusy(): boolean;
  isSaturated(): boolean;
  inJob(): boolean;
  yield(): Promise<void>;
  waitOne(): Promise<void>;
  waitAll(): Promise<void>;
  waitSaturated(): Promise<void>;
  shutdown(): Promise<void>;
}

export interface RegisterDriverOptions {
  name: string;
  factory: DriverFactory;
}

/**
 * @param driver driver selection and its options, defaults to the in-process basic driver
 * @param jobs job handlers available to drivers that run jobs in this process
 * @param batchSize how many jobs are handed to the driver together
 */
export interface ForkliftOptions {
  driver?: DriverConfig;
  jobs?: JobHandlers;
  batchSize?: number;
  logger?: Logger;
}

export function makeForklift(options: ForkliftOptions = {}): Forklift {
  return new ForkliftImp(options);
}

class ForkliftImp implements Forklift {
  private drivers = new Registry<DriverFactory>();
  private pending: Job[] = [];
  private activeDriver: Driver | null = null;
  private readonly driverConfig: DriverConfig;
  private readonly handlers: JobHandlers;
  private readonly logger: Logger;

  public readonly batchSize: number;

  constructor(options: ForkliftOptions) {
    this.driverConfig = options.driver || { type: BASIC_DRIVER };
    this.handlers = options.jobs || {};
    this.logger = options.logger || makeConsoleLogger();
    this.batchSize = options.batchSize === undefined ? FORKLIFT_DEFAULT_BATCH_SIZE : options.batchSize;
    if (!Number.isInteger(this.batchSize) || this.batchSize < 1) {
      throw new InvalidBatchSizeError(this.batchSize);
    }

    this.registerDriver({ name: BASIC_DRIVER, factory: BasicDriver.fromConfig });
    this.registerDriver({ name: FORK_POOL_DRIVER, factory: ForkPoolDriver.fromConfig });
  }

  get pendingJobs(): number {
    return this.pending.length;
  }

  get registeredDrivers(): string[] {
    return this.drivers.allNames();
  }

  public registerDriver(options: RegisterDriverOptions): void {
    if (!this.drivers.register(options.name, () => options.factory)) {
      throw new DriverAlreadyRegisteredError(options.name);
    }
  }

  public async submit(name: string, args: unknown = null, callback?: JobCallback): Promise<string> {
    const job = makeJob(name, args, callback);
    this.pending.push(job);
    if (this.pending.length >= this.batchSize) {
      await this.flush();
    }
    return job.id;
  }

  public async flush(): Promise<void> {
    if (this.pending.length === 0) { return; }
    const driver = this.driver;
    const batch = this.pending;
    this.pending = [];
    await driver.runJobs(batch);
  }

  public isBusy(): boolean {
    return this.pending.length > 0 || this.driver.isBusy();
  }

  public isSaturated(): boolean {
    return this.driver.isSaturated();
  }

  public inJob(): boolean {
    return this.driver.inJob();
  }

  public async yield(): Promise<void> {
    await this.driver.yield();
  }

  public async waitOne(): Promise<void> {
    await this.driver.waitOne();
  }

  public async waitAll(): Promise<void> {
    await this.flush();
    await this.driver.waitAll();
  }

  public async waitSaturated(): Promise<void> {
    await this.driver.waitSaturated();
  }

  public async shutdown(): Promise<void> {
    if (this.activeDriver ? this.activeDriver.inJob() : isJobProcess()) { return; }
    if (!this.activeDriver && this.pending.length === 0) { return; }
    await this.flush();
    await this.driver.shutdown();
  }

  /**
   * The driver is only built on first use, so drivers registered after construction can be selected
   */
  private get driver(): Driver {
    if (!this.activeDriver) {
      const factory = this.drivers.get(this.driverConfig.type);
      if (!factory) {
        throw new DriverNotRegisteredError(this.driverConfig.type);
      }
      this.activeDriver = factory(this.driverConfig, { handlers: this.handlers, logger: this.logger });
      this.logger.debug(`Using driver ${this.driverConfig.type}`);
    }
    return this.activeDriver;
  }
}
