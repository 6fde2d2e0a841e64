export * from './constants/index.js';
export * from './lib/parsing.js';
export * from './lib/validation.js';
