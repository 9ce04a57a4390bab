import type { Command } from 'commander';
import { loadLedgerConfig } from '../config/config.js';
import type { ConfigOverrides, LedgerConfig } from '../config/types.js';
import { CacheStore } from '../cache/store.js';
import { S3CacheTarget } from '../cache/s3-target.js';
import { IamPolicySource } from '../aws/iam-source.js';
import type { PolicySource } from '../aws/iam-source.js';
import { PolicyDetailResolver } from '../policy/resolver.js';
import { setLogLevel } from '../shared/logger.js';

export interface LedgerContext {
  config: LedgerConfig;
  store: CacheStore;
  resolver: PolicyDetailResolver;
}

function stringOption(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/** Collect the program-level flags visible from a subcommand. */
export function globalOverrides(command: Command): ConfigOverrides {
  const opts: Record<string, unknown> = command.optsWithGlobals();
  const overrides: ConfigOverrides = {};
  const configPath = stringOption(opts['config']);
  const cachePath = stringOption(opts['cachePath']);
  const bucket = stringOption(opts['bucket']);
  const region = stringOption(opts['region']);
  if (configPath) overrides.configPath = configPath;
  if (cachePath) overrides.cachePath = cachePath;
  if (bucket) overrides.bucket = bucket;
  if (region) overrides.region = region;
  return overrides;
}

export interface OpenLedgerOptions {
  source?: PolicySource;
  env?: Readonly<Record<string, string | undefined>>;
  cwd?: string;
}

/**
 * Build the cache and resolver for one process. Region and profile go to the
 * SDK clients through their config.
 */
export function openLedger(overrides: ConfigOverrides, options: OpenLedgerOptions = {}): LedgerContext {
  const config = loadLedgerConfig(overrides, options.env, options.cwd);
  setLogLevel(config.logLevel);
  const { region, profile } = config.aws;

  const remote = config.cache.bucket
    ? new S3CacheTarget({ bucket: config.cache.bucket, region, profile })
    : undefined;
  const store = new CacheStore({
    localPath: config.cache.path,
    cacheKey: config.cache.key,
    ...(remote ? { remote } : {}),
  });
  const resolver = new PolicyDetailResolver(
    store,
    options.source ?? new IamPolicySource(undefined, { region, profile }),
  );
  return { config, store, resolver };
}
