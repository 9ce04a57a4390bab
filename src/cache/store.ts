/**
 * Persisted policy-detail cache.
 *
 * The whole mapping is written to a local JSON file on every save and, when a
 * remote target is configured, uploaded from that file. Loads come from the
 * remote target when there is one, otherwise from the local file. The backing
 * store is read at most once per CacheStore instance.
 *
 * Concurrent writers sharing a remote target are not reconciled; the last save
 * wins.
 */
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { CacheLoadError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { CACHE_FORMAT_VERSION, CacheFileSchema } from '../shared/schemas.js';
import type { CacheFile } from '../shared/schemas.js';
import type { PolicyDetail } from '../policy/detail.js';
import type { CacheState, CacheStoreOptions, PolicyDetailMap, RemoteCacheTarget } from './types.js';

export const CACHE_OBJECT_KEY = 'policy_cache.json';

export function serializeCache(entries: PolicyDetailMap): Uint8Array {
  const file: CacheFile = {
    format: CACHE_FORMAT_VERSION,
    entries: Object.fromEntries(entries),
  };
  return Buffer.from(JSON.stringify(file), 'utf8');
}

/**
 * Decode a cache file. Empty input is an empty cache; a file written under a
 * different format number is discarded so the cache gets rebuilt.
 */
export function deserializeCache(bytes: Uint8Array, location: string): Map<string, PolicyDetail> {
  const raw = Buffer.from(bytes).toString('utf8');
  if (raw.trim().length === 0) return new Map();

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new CacheLoadError(location, 'not valid JSON', err);
  }

  const result = CacheFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new CacheLoadError(location, result.error.issues[0]?.message ?? 'invalid cache file', result.error);
  }
  if (result.data.format !== CACHE_FORMAT_VERSION) {
    logger.warn('Discarding policy cache written in another format', {
      location,
      format: result.data.format,
      expected: CACHE_FORMAT_VERSION,
    });
    return new Map();
  }

  const entries = new Map<string, PolicyDetail>();
  for (const [identifier, detail] of Object.entries(result.data.entries)) {
    entries.set(identifier, Object.freeze(detail));
  }
  return entries;
}

export class CacheStore {
  readonly localPath: string;
  readonly cacheKey: string;
  private readonly remote: RemoteCacheTarget | undefined;
  private readonly mapping = new Map<string, PolicyDetail>();
  private _state: CacheState = 'unloaded';

  constructor(options: CacheStoreOptions) {
    this.localPath = options.localPath;
    this.remote = options.remote;
    this.cacheKey = options.cacheKey ?? CACHE_OBJECT_KEY;
  }

  get state(): CacheState {
    return this._state;
  }

  get size(): number {
    return this.mapping.size;
  }

  get remoteName(): string | undefined {
    return this.remote?.name;
  }

  async load(): Promise<PolicyDetailMap> {
    if (this._state !== 'unloaded') return this.mapping;

    const loaded = this.remote ? await this.loadRemote(this.remote) : this.loadLocal();
    for (const [identifier, detail] of loaded) {
      this.mapping.set(identifier, detail);
    }
    this._state = this.mapping.size > 0 ? 'loaded' : 'empty';
    logger.debug('Policy cache loaded', { entries: this.mapping.size, state: this._state });
    return this.mapping;
  }

  has(identifier: string): boolean {
    return this.mapping.has(identifier);
  }

  get(identifier: string): PolicyDetail | undefined {
    return this.mapping.get(identifier);
  }

  /** Current in-memory mapping; does not trigger a load. */
  entries(): PolicyDetailMap {
    return this.mapping;
  }

  /** Stores a detail and returns the stored (frozen) record. */
  insert(identifier: string, detail: PolicyDetail): PolicyDetail {
    this.requireLoaded('insert into');
    if (this.mapping.has(identifier)) {
      throw new Error(`Policy cache already holds an entry for ${identifier}`);
    }
    const stored = Object.isFrozen(detail) ? detail : Object.freeze({ ...detail });
    this.mapping.set(identifier, stored);
    this._state = 'loaded';
    return stored;
  }

  async save(): Promise<void> {
    this.requireLoaded('save');
    const dir = dirname(this.localPath);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
    writeFileSync(this.localPath, serializeCache(this.mapping));
    logger.debug('Policy cache written', { path: this.localPath, entries: this.mapping.size });

    if (this.remote) {
      await this.remote.ensureContainer();
      await this.remote.write(this.cacheKey, readFileSync(this.localPath));
      logger.debug('Policy cache uploaded', { bucket: this.remote.name, key: this.cacheKey });
    }
  }

  // the backing store must be read before the first write
  private requireLoaded(action: string): void {
    if (this._state === 'unloaded') {
      throw new Error(`Cannot ${action} the policy cache before it is loaded`);
    }
  }

  private async loadRemote(remote: RemoteCacheTarget): Promise<Map<string, PolicyDetail>> {
    const location = `${remote.name}/${this.cacheKey}`;
    let bytes: Uint8Array | null;
    try {
      bytes = await remote.read(this.cacheKey);
    } catch (err) {
      throw new CacheLoadError(location, errorMessage(err), err);
    }
    if (bytes === null) {
      logger.info('No remote policy cache yet, starting empty', { location });
      return new Map();
    }
    return deserializeCache(bytes, location);
  }

  private loadLocal(): Map<string, PolicyDetail> {
    if (!existsSync(this.localPath)) return new Map();
    return deserializeCache(readFileSync(this.localPath), this.localPath);
  }
}
