export * from './deployment.js';
export * from './collaborators.js';
