import type { PolicyDetail } from '../policy/detail.js';

/**
 * `unloaded` until the first load; afterwards `empty` or `loaded` depending on
 * whether any entry exists. Only `unloaded` triggers backing-store I/O.
 */
export type CacheState = 'unloaded' | 'empty' | 'loaded';

export type PolicyDetailMap = ReadonlyMap<string, PolicyDetail>;

/** Shared object store the cache is mirrored to between runs. */
export interface RemoteCacheTarget {
  readonly name: string;
  /** Resolves to `null` when the key does not exist. */
  read(key: string): Promise<Uint8Array | null>;
  /** Idempotent. */
  ensureContainer(): Promise<void>;
  write(key: string, body: Uint8Array): Promise<void>;
}

export interface CacheStoreOptions {
  localPath: string;
  remote?: RemoteCacheTarget;
  cacheKey?: string;
}
