export * from './types';
export * from './memoryCache';
export * from './noopCache';
export * from './cacheChain';
export * from './cacheManager';
export * from './policy';
export * from './interceptors';
export * from './smartCache';
export * from './warmer';
export * from './factory';
