export * from './types.js';
export * from './errors.js';
export * from './profiles.js';
export * from './utils.js';
export * from './logger.js';
