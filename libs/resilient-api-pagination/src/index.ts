export * from './listResponse';
export * from './iterator';
