export * from './types';
export * from './semaphore';
export * from './registry';
export * from './executor';
export * from './builder';
export * from './transaction';
