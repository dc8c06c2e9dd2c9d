// Library entry point for the static site deployer
export * from './types/index.js';
export * from './errors/index.js';
export * from './config/index.js';
export * from './templates/index.js';
export * from './provisioning/index.js';
export * from './orchestration/index.js';
export { Logger, createLogger } from './utils/logger.js';
export type { LogSink, LoggerOptions } from './utils/logger.js';
export { createProgram } from './cli/program.js';
