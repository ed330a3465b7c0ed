export * from './in-memory-site.js';
export * from './fakes.js';
export * from './workspace.js';
