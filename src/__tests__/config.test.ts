import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { dump } from 'js-yaml';
import { DEFAULT_CONFIG_FILE, loadLedgerConfig } from '../config/config.js';
import { createTempDir } from './test-helpers.js';
import type { TempDir } from './test-helpers.js';

describe('loadLedgerConfig', () => {
  let tmp: TempDir;

  beforeEach(() => {
    tmp = createTempDir();
  });

  afterEach(() => {
    tmp.cleanup();
  });

  function writeConfig(content: unknown, name = DEFAULT_CONFIG_FILE): string {
    const path = join(tmp.dir, name);
    writeFileSync(path, dump(content), 'utf8');
    return path;
  }

  it('defaults to a local cache file in the working directory', () => {
    const config = loadLedgerConfig({}, {}, tmp.dir);
    expect(config).toEqual({
      cache: { path: join(tmp.dir, 'policy_cache.json'), key: 'policy_cache.json' },
      aws: {},
      logLevel: 'info',
    });
    expect('bucket' in config.cache).toBe(false);
  });

  it('reads the default config file when present', () => {
    writeConfig({
      cache: { path: 'state/cache.json', bucket: 'audit-cache', key: 'audits/cache.json' },
      aws: { region: 'eu-west-1', profile: 'audit' },
      log_level: 'debug',
    });
    const config = loadLedgerConfig({}, {}, tmp.dir);
    expect(config).toEqual({
      cache: {
        path: join(tmp.dir, 'state', 'cache.json'),
        bucket: 'audit-cache',
        key: 'audits/cache.json',
      },
      aws: { region: 'eu-west-1', profile: 'audit' },
      logLevel: 'debug',
    });
  });

  it('lets the environment override the file', () => {
    writeConfig({ cache: { bucket: 'from-file' }, aws: { region: 'eu-west-1' } });
    const config = loadLedgerConfig(
      {},
      {
        POLICY_LEDGER_BUCKET: 'from-env',
        POLICY_LEDGER_CACHE_PATH: '/var/cache/policies.json',
        AWS_REGION: 'us-west-2',
        POLICY_LEDGER_LOG_LEVEL: 'warn',
      },
      tmp.dir,
    );
    expect(config.cache.bucket).toBe('from-env');
    expect(config.cache.path).toBe('/var/cache/policies.json');
    expect(config.aws.region).toBe('us-west-2');
    expect(config.logLevel).toBe('warn');
  });

  it('lets explicit overrides win over everything', () => {
    const config = loadLedgerConfig(
      { bucket: 'from-flag', region: 'ap-south-1', cachePath: 'flag.json' },
      { POLICY_LEDGER_BUCKET: 'from-env', AWS_REGION: 'us-west-2' },
      tmp.dir,
    );
    expect(config.cache.bucket).toBe('from-flag');
    expect(config.aws.region).toBe('ap-south-1');
    expect(config.cache.path).toBe(join(tmp.dir, 'flag.json'));
  });

  it('ignores empty environment values and unknown log levels', () => {
    const config = loadLedgerConfig({}, { POLICY_LEDGER_BUCKET: '  ', POLICY_LEDGER_LOG_LEVEL: 'loud' }, tmp.dir);
    expect(config.cache.bucket).toBeUndefined();
    expect(config.logLevel).toBe('info');
  });

  it('reads an explicitly named config file', () => {
    writeConfig({ cache: { bucket: 'named' } }, 'audit.yaml');
    const config = loadLedgerConfig({ configPath: 'audit.yaml' }, {}, tmp.dir);
    expect(config.cache.bucket).toBe('named');
  });

  it('fails when an explicitly named config file is missing', () => {
    expect(() => loadLedgerConfig({ configPath: 'missing.yaml' }, {}, tmp.dir)).toThrow(
      `Config file not found: ${join(tmp.dir, 'missing.yaml')}`,
    );
  });

  it('accepts an empty config file', () => {
    writeFileSync(join(tmp.dir, DEFAULT_CONFIG_FILE), '', 'utf8');
    expect(loadLedgerConfig({}, {}, tmp.dir).logLevel).toBe('info');
  });

  it('rejects a config file of the wrong shape', () => {
    writeConfig({ cache: { bucket: 42 } });
    expect(() => loadLedgerConfig({}, {}, tmp.dir)).toThrow(/Invalid config .* at cache\.bucket/);
  });
});
