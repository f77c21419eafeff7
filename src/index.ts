/**
 * keytrie - Prefix tree over key sequences, and a JSON configuration
 * loader that uses it to filter key paths.
 */

export * from './trie/index.js';
export * from './config/index.js';
export { createLogger } from './logger.js';
export { environment, parseEnvironment, LOG_LEVELS } from './environment.js';
export type { Environment } from './environment.js';
