export * from './card';
export * from './intent';
export * from './errors';
export * from './services';
