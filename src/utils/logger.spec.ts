import { expect } from '@test';
import * as Sinon from 'sinon';
import { makeConsoleLogger } from 'src/utils/logger';

describe('Console logger', function() {
  let sandbox!: Sinon.SinonSandbox;

  beforeEach(function() {
    sandbox = Sinon.createSandbox();
    sandbox.stub(console, 'debug');
    sandbox.stub(console, 'info');
    sandbox.stub(console, 'error');
  });

  afterEach(function() {
    sandbox.restore();
  });

  it('should prefix messages and pass details through', function() {
    const error = new Error('boom');

    makeConsoleLogger('lift').error('worker-1 failed', error);

    expect(console.error).to.have.been.calledOnceWithExactly('[lift] worker-1 failed', error);
  });

  it('should drop messages below the configured level', function() {
    const sut = makeConsoleLogger('lift', 'info');

    sut.debug('hidden');
    sut.info('shown');

    expect(console.debug).to.not.have.been.called;
    expect(console.info).to.have.been.calledOnceWithExactly('[lift] shown');
  });

  it('should log nothing when silent', function() {
    const sut = makeConsoleLogger('lift', 'silent');

    sut.error('hidden');

    expect(console.error).to.not.have.been.called;
  });
});
