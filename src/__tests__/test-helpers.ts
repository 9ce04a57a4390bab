import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { PolicySource } from '../aws/iam-source.js';
import type { RemoteCacheTarget } from '../cache/types.js';
import { createPolicyDetail } from '../policy/detail.js';
import type { PolicyDescriptor, PolicyDetail } from '../policy/detail.js';

export interface TempDir {
  dir: string;
  cachePath: string;
  cleanup: () => void;
}

export function createTempDir(): TempDir {
  const dir = mkdtempSync(join(tmpdir(), 'policy-ledger-'));
  return {
    dir,
    cachePath: join(dir, 'policy_cache.json'),
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}

export function sampleDetail(name: string, versionId = 'v1'): PolicyDetail {
  return createPolicyDetail(
    { name, currentVersionId: versionId, description: `${name} policy` },
    { Version: '2012-10-17', Statement: [{ Effect: 'Allow', Action: 's3:GetObject', Resource: '*' }] },
  );
}

/** In-memory object store with call counters. */
export class MemoryCacheTarget implements RemoteCacheTarget {
  readonly name = 'test-bucket';
  readonly objects = new Map<string, Uint8Array>();
  reads = 0;
  ensureCalls = 0;
  writes = 0;
  readError: Error | null = null;

  async read(key: string): Promise<Uint8Array | null> {
    this.reads++;
    if (this.readError) throw this.readError;
    return this.objects.get(key) ?? null;
  }

  async ensureContainer(): Promise<void> {
    this.ensureCalls++;
  }

  async write(key: string, body: Uint8Array): Promise<void> {
    this.writes++;
    this.objects.set(key, Uint8Array.from(body));
  }
}

/** Policy source backed by a fixed table, counting every remote call. */
export class FakePolicySource implements PolicySource {
  descriptorCalls: string[] = [];
  documentCalls: Array<{ identifier: string; versionId: string }> = [];
  failWith: Error | null = null;

  constructor(
    private readonly policies: Record<string, { descriptor: PolicyDescriptor; document: unknown }>,
  ) {}

  async getDescriptor(identifier: string): Promise<PolicyDescriptor> {
    this.descriptorCalls.push(identifier);
    if (this.failWith) throw this.failWith;
    const policy = this.policies[identifier];
    if (!policy) throw new Error(`NoSuchEntity: ${identifier}`);
    return policy.descriptor;
  }

  async getDocument(identifier: string, versionId: string): Promise<unknown> {
    this.documentCalls.push({ identifier, versionId });
    const policy = this.policies[identifier];
    if (!policy) throw new Error(`NoSuchEntity: ${identifier}`);
    return policy.document;
  }
}
