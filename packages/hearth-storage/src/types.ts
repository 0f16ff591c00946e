export type StoreBackend = 'FILE' | 'SQLITE';

export class StoreMisconfiguredError extends Error {
  code = 'STORE_MISCONFIGURED' as const;
  constructor(message: string) {
    super(message);
    this.name = 'StoreMisconfiguredError';
  }
}

export interface StoreConfig {
  backend: StoreBackend;
  path: string; // FILE: snapshot file, SQLITE: db file path
}

export const DEFAULT_STORE_PATHS: Record<StoreBackend, string> = {
  FILE: '.hearth/objects.json',
  SQLITE: '.hearth/hearth.db'
};

export function loadStoreConfigFromEnv(env = process.env): StoreConfig {
  const backendRaw = (env.HEARTH_STORE_BACKEND || 'FILE').trim().toUpperCase();

  if (backendRaw !== 'FILE' && backendRaw !== 'SQLITE') {
    throw new StoreMisconfiguredError(`Invalid HEARTH_STORE_BACKEND: ${backendRaw} (expected FILE|SQLITE).`);
  }
  const backend: StoreBackend = backendRaw;
  const path = (env.HEARTH_STORE_PATH || '').trim() || DEFAULT_STORE_PATHS[backend];

  return { backend, path };
}
