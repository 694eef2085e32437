import { expect } from '@test';
import * as path from 'path';
import { InvalidJobsModuleError } from 'src/errors';
import { loadJobHandlers } from 'src/job';

describe('Job handlers module loading', function() {
  const fixtures = path.join(__dirname, '..', 'testSupport', 'fixtures');

  it('should load the handlers a module exports as `jobs`', async function() {
    const handlers = await loadJobHandlers(path.join(fixtures, 'jobs.ts'));

    expect(Object.keys(handlers)).to.have.members(['sum', 'echo', 'fail', 'nothing', 'inJob']);
    expect(await handlers.sum([4, 5])).to.equal(9);
  });

  it('should return the same handlers for repeated loads of a module', async function() {
    const modulePath = path.join(fixtures, 'jobs.ts');

    const first = await loadJobHandlers(modulePath);
    const second = await loadJobHandlers(modulePath);

    expect(first).to.equal(second);
  });

  it('should reject modules exporting values that are not functions', async function() {
    await expect(loadJobHandlers(path.join(fixtures, 'invalidJobs.ts')))
      .to.eventually.be.rejectedWith(InvalidJobsModuleError, 'export \'sum\' is not a function');
  });

  it('should reject modules that cannot be loaded', async function() {
    await expect(loadJobHandlers(path.join(fixtures, 'doesNotExist.ts')))
      .to.eventually.be.rejectedWith(InvalidJobsModuleError);
  });
});
