export class DriverAlreadyRegisteredError extends Error {
  constructor(driverName: string) {
    super(`Driver ${driverName} already registered`);
  }
}

export class DriverNotRegisteredError extends Error {
  constructor(driverName: string) {
    super(`Driver ${driverName} is not registered`);
  }
}

export class InvalidDriverOptionsError extends Error {
  constructor(driverName: string, public readonly issues: string[]) {
    super(`Invalid options for driver ${driverName}: ${issues.join('; ')}`);
  }
}

export class InvalidBatchSizeError extends Error {
  constructor(batchSize: number) {
    super(`Batch size must be a positive integer, got ${batchSize}`);
  }
}

export class UnknownJobError extends Error {
  constructor(jobName: string) {
    super(`Unknown job '${jobName}'`);
  }
}

export class InvalidJobsModuleError extends Error {
  constructor(modulePath: string, reason: string) {
    super(`Jobs module '${modulePath}' is invalid: ${reason}`);
  }
}

export class MissingResultError extends Error {
  constructor(workerId: string, jobId: string) {
    super(`Worker ${workerId} returned no result for job ${jobId}`);
  }
}
