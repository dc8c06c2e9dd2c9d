export * from './types.js';
export * from './cloudformation-generator.js';
export * from './template-engine.js';
export * from './sample-site.js';
