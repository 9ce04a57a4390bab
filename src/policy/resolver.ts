import { logger } from '../shared/logger.js';
import type { PolicySource } from '../aws/iam-source.js';
import type { CacheStore } from '../cache/store.js';
import { createPolicyDetail } from './detail.js';
import type { PolicyDetail } from './detail.js';
import type { PolicyIdentity } from './identity.js';

export interface ResolverStats {
  hits: number;
  fetches: number;
}

/**
 * Looks up policy details at most once per ARN for the lifetime of the cache.
 *
 * Policy details are not part of the authorization-details listing, which
 * repeats the same ARNs across many identities. They are fetched here on first
 * sight and written through to the cache before returning.
 */
export class PolicyDetailResolver {
  private readonly _stats: ResolverStats = { hits: 0, fetches: 0 };

  constructor(
    private readonly store: CacheStore,
    private readonly source: PolicySource,
  ) {}

  get stats(): Readonly<ResolverStats> {
    return { ...this._stats };
  }

  async resolve(identity: PolicyIdentity): Promise<PolicyDetail> {
    const cache = await this.store.load();
    const cached = cache.get(identity.identifier);
    if (cached) {
      this._stats.hits++;
      return cached;
    }

    const descriptor = await this.source.getDescriptor(identity.identifier);
    const document = await this.source.getDocument(identity.identifier, descriptor.currentVersionId);
    const detail = this.store.insert(identity.identifier, createPolicyDetail(descriptor, document));
    await this.store.save();
    this._stats.fetches++;
    logger.info('Resolved policy', {
      arn: identity.identifier,
      version: detail.versionId,
      provenance: identity.provenance,
    });
    return detail;
  }

  /** Resolves one at a time; the cache assumes a single writer. */
  async resolveAll(identities: Iterable<PolicyIdentity>): Promise<Map<string, PolicyDetail>> {
    const results = new Map<string, PolicyDetail>();
    for (const identity of identities) {
      if (results.has(identity.identifier)) continue;
      results.set(identity.identifier, await this.resolve(identity));
    }
    return results;
  }
}
