export * from './errors/index.js';
export * from './utils/index.js';
export * from './logger/index.js';
export * from './tools/index.js';
export * from './filesystem/index.js';
