export * from './types.js';
export * from './poller.js';
export * from './checkpoint.js';
export * from './propagation.js';
export * from './deployment-orchestrator.js';
