import * as chai from 'chai';
import chaiAsPromised from 'chai-as-promised';
import sinonChai from 'sinon-chai';
import * as Sinon from 'sinon';

chai.use(chaiAsPromised);
chai.use(sinonChai);

export const expect = chai.expect;

export * from './fakeBuilders';
export * from './fakeProcessPool';

export function sinonTypeProxy<T>(overrides: Partial<T> = {}): Sinon.SinonStubbedInstance<T> {
  return typeProxy(() => Sinon.stub(), overrides) as Sinon.SinonStubbedInstance<T>;
}

function typeProxy(makeDefault: () => unknown, overrides: object): unknown {
  const stubs: { [key: string | symbol]: unknown } = { ...overrides };
  return new Proxy(stubs, {
    get(target, p) {
      if (!(p in target)) {
        target[p] = makeDefault();
      }
      return target[p];
    },
  });
}

export function nextTurn(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
