export * from './job';
export * from './result';
export * from './runner';
export * from './handlers';
