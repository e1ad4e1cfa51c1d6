export { pathExists, movePath, removeRunDirectory } from './fs-helpers.js';
export { runPool, type PoolResult, type RunPoolOptions } from './worker-pool.js';
export { ensureRemoteReady } from './preflight.js';
