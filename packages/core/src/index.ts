export * from './types';
export * from './errors';
export * from './constants';
export * from './utils';
export * from './dialect';
export * from './query';
