/**
 * In-memory implementations (no filesystem required).
 */

export { MemoryConfigStore } from './config_store/memory';
