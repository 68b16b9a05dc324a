export * from './db.js';
export * from './env.js';
export * from './github.js';
export * from './logger.js';
export * from './memory-store.js';
export * from './queue.js';
export * from './schemas.js';
export * from './store.js';
export * from './types.js';
