import type { ObjectStore } from './interfaces';
import { StoreConfig, loadStoreConfigFromEnv } from './types';
import { FileObjectStore } from './backends/file';
import { SQLiteObjectStore } from './backends/sqlite';

/**
 * Create the object store for a configuration. Call once per process and pass
 * the result to whatever needs storage.
 */
export function makeStore(config: StoreConfig): ObjectStore {
  switch (config.backend) {
    case 'FILE':
      return new FileObjectStore({ filePath: config.path });
    case 'SQLITE':
      return new SQLiteObjectStore({ dbPath: config.path });
    default: {
      // TypeScript exhaustiveness check (should never reach here)
      const _exhaustive: never = config.backend;
      throw new Error(`Unexpected backend: ${_exhaustive}`);
    }
  }
}

/**
 * Factory function to create the store from environment configuration.
 * Reads HEARTH_STORE_BACKEND and HEARTH_STORE_PATH.
 */
export function makeStoreFromEnv(env = process.env): ObjectStore {
  return makeStore(loadStoreConfigFromEnv(env));
}

/**
 * Log storage configuration once at startup
 */
export function logStoreConfig(config: StoreConfig): void {
  console.log(`📦 Storage Backend: ${config.backend}`);
  console.log(`📂 Storage Path: ${config.path}`);
}
