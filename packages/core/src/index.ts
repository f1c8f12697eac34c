export * from './candidates';
export * from './commandInvoker';
export * from './datetime';
export * from './errors';
export * from './linkInsertion';
export * from './logger';
export * from './noteCreation';
export * from './noteNormalizer';
export * from './noteQueries';
export * from './notebook';
export * from './queryComposer';
export * from './session';
export * from './types';
