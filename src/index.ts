export * from './errors.js';
export * from './config/index.js';
export * from './telemetry/logger.js';
export * from './storage/index.js';
export * from './embedding/index.js';
export * from './search/index.js';
export * from './ingest/index.js';
export * from './context/index.js';
export * from './clustering/index.js';
export * from './values/index.js';
export { AsyncSemaphore, withTimeout } from './utils/async.js';
export { createAppContext } from './app/context.js';
export type { AppContext, AppContextOptions } from './app/context.js';
