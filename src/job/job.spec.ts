import { expect } from '@test';
import * as Sinon from 'sinon';
import { failedResult, Job, makeJob, Result, serializeError } from 'src/job';

describe('Job', function() {
  it('should create jobs with unique ids', function() {
    const first = makeJob('sum', [1, 2]);
    const second = makeJob('sum', [1, 2]);

    expect(first.id).to.not.equal(second.id);
    expect(first.id).to.match(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });

  it('should default the arguments to null', function() {
    expect(makeJob('nothing').args).to.be.null;
  });

  it('should only carry id, name and arguments in its raw form', function() {
    const job = new Job('job-1', 'sum', [1, 2], () => undefined);

    expect(job.toRaw()).to.eql({ id: 'job-1', name: 'sum', args: [1, 2] });
  });

  it('should pass the result to its callback', async function() {
    const callback = Sinon.stub().resolves();
    const job = new Job('job-1', 'sum', [1, 2], callback);
    const result = new Result('job-1', true, 3, null);

    await job.runCallback(result);

    expect(callback).to.have.been.calledOnceWithExactly(result);
  });

  it('should ignore results when it has no callback', async function() {
    const job = makeJob('sum', [1, 2]);

    await expect(job.runCallback(new Result(job.id, true, 3, null))).to.eventually.be.fulfilled;
  });

  it('should surface errors thrown by its callback', async function() {
    const job = makeJob('sum', [1, 2], () => { throw new Error('callback failed'); });

    await expect(job.runCallback(new Result(job.id, true, 3, null))).to.eventually.be.rejectedWith('callback failed');
  });
});

describe('Result', function() {
  it('should rehydrate a successful raw result with the job id', function() {
    const result = Result.fromRaw({ success: true, data: { total: 3 } }, 'job-1');

    expect(result).to.be.an.instanceOf(Result);
    expect(result).to.include({ jobId: 'job-1', success: true, error: null });
    expect(result.data).to.eql({ total: 3 });
  });

  it('should rehydrate a failed raw result with its error', function() {
    const result = Result.fromRaw({ success: false, error: { name: 'TypeError', message: 'bad input' } }, 'job-2');

    expect(result.success).to.be.false;
    expect(result.data).to.be.null;
    expect(result.error).to.eql({ name: 'TypeError', message: 'bad input' });
  });
});

describe('serializeError', function() {
  it('should keep name, message and stack of errors', function() {
    const error = new RangeError('out of range');

    expect(serializeError(error)).to.eql({ name: 'RangeError', message: 'out of range', stack: error.stack });
  });

  it('should stringify values that are not errors', function() {
    expect(serializeError('plain failure')).to.eql({ name: 'Error', message: 'plain failure' });
    expect(serializeError(42)).to.eql({ name: 'Error', message: '42' });
  });

  it('should build failed raw results', function() {
    expect(failedResult('nope')).to.eql({ success: false, error: { name: 'Error', message: 'nope' } });
  });
});
