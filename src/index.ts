export * from './errors';
export * from './forklift';
export * from './job';
export * from './driver';
export * from './utils/logger';
