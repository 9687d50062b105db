export * from './primitives.js';
export * from './match.js';
