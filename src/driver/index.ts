export * from './driver';
export * from './basic';
export * from './forkPool';
export * from './workerIds';
export { isJobProcess } from './pool';
export type { ProcessPool } from './pool';
export { WorkerpoolProcessPool } from './pool/workerpool';
export type { WorkerpoolProcessPoolOptions } from './pool/workerpool';
