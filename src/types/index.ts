export type * from './step-result.js';
export type * from './selector.js';
export type * from './extraction.js';
export * from './workflow.js';
