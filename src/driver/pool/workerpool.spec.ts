import { expect, makeRecordingJob, rawJobFactory, sinonTypeProxy } from '@test';
import * as path from 'path';
import { ForkPoolDriver, WorkerIdSequence } from 'src/driver';
import { DEFAULT_WORKER_SCRIPT, WorkerpoolProcessPool } from 'src/driver/pool/workerpool';
import type { Logger } from 'src/utils/logger';

describe('Workerpool process pool', function() {
  let sut!: WorkerpoolProcessPool;

  beforeEach(function() {
    sut = new WorkerpoolProcessPool({ maxWorkers: 3 });
  });

  afterEach(async function() {
    await sut.terminate();
  });

  it('should fork children from the compiled worker entry beside it', function() {
    expect(path.basename(DEFAULT_WORKER_SCRIPT)).to.equal('worker.js');
    expect(path.dirname(DEFAULT_WORKER_SCRIPT)).to.equal(__dirname);
  });

  it('should expose its maximum number of workers', function() {
    expect(sut.maxWorkers).to.equal(3);
  });

  it('should have no running tasks before any batch', function() {
    expect(sut.runningTasks()).to.equal(0);
  });

  describe('with forked children', function() {
    this.timeout(20000);

    const fixtures = path.join(__dirname, '..', '..', 'testSupport', 'fixtures');
    const jobsModule = path.join(fixtures, 'jobs.ts');
    const execArgv = ['--import', 'tsx'];
    let pool!: WorkerpoolProcessPool;

    afterEach(async function() {
      await pool.terminate();
    });

    it('should run the batch in a child and return its results in order', async function() {
      pool = new WorkerpoolProcessPool({ maxWorkers: 1, workerScript: path.join(__dirname, 'worker.ts'), execArgv });

      const running = pool.exec(jobsModule, 'worker-1', [
        rawJobFactory.build({ name: 'sum', args: [1, 2] }),
        rawJobFactory.build({ name: 'fail', args: 1 }),
        rawJobFactory.build({ name: 'inJob', args: null }),
      ]);
      expect(pool.runningTasks()).to.equal(1);
      const results = await running;

      expect(results).to.have.lengthOf(3);
      expect(results[0]).to.eql({ success: true, data: 3 });
      expect(results[1].success).to.be.false;
      expect(results[1].error).to.include({ name: 'Error', message: 'failed with 1' });
      expect(results[2]).to.eql({ success: true, data: true });
      expect(pool.runningTasks()).to.equal(0);
    });

    it('should fail every job of a batch whose child replies with something else than results', async function() {
      pool = new WorkerpoolProcessPool({ maxWorkers: 1, workerScript: path.join(fixtures, 'malformedWorker.ts'), execArgv });
      const driver = new ForkPoolDriver(
        { type: 'forkPool', maxWorkers: 1, waitSleep: 1, jobsModule },
        pool,
        { handlers: {}, logger: sinonTypeProxy<Logger>() },
        new WorkerIdSequence(),
      );
      const first = makeRecordingJob('sum', [1, 2]);
      const second = makeRecordingJob('echo', 'hello');

      await driver.runJobs([first.job, second.job]);
      await driver.waitAll();

      for (const { job, results } of [first, second]) {
        expect(results).to.have.lengthOf(1);
        expect(results[0]).to.include({ jobId: job.id, success: false, data: null });
        expect(results[0].error).to.include({ name: 'ZodError' });
      }
    });
  });
});
