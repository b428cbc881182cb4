export * from './types.js';
export * from './access.js';
export { equals } from './equal.js';
