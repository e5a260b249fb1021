export * from './source.js';
export * from './target.js';
export * from './result.js';
