export * from './client.js';
export * from './fixer.js';
export * from './jsonrpc.js';
export * from './types.js';
