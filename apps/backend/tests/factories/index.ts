export * from './imageFactory.js';
