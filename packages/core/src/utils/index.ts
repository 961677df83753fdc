export * from './validation';
export * from './logger';
