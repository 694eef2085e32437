export const WORKER_ID_MAX = 4_000_000_000;

export class WorkerIdSequence {
  constructor(private lastId: number = 0, private readonly maxId: number = WORKER_ID_MAX) {}

  public next(): string {
    this.lastId++;
    if (this.lastId > this.maxId) {
      this.lastId = 1;
    }
    return `worker-${this.lastId}`;
  }
}

// Shared by every driver in the process so ids stay unique across drivers
export const workerIds = new WorkerIdSequence();
