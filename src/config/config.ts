import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { load } from 'js-yaml';
import { isLogLevel } from '../shared/logger.js';
import { LedgerConfigSchema } from '../shared/schemas.js';
import type { LedgerConfigFile } from '../shared/schemas.js';
import { CACHE_OBJECT_KEY } from '../cache/store.js';
import type { ConfigOverrides, LedgerConfig } from './types.js';

export const DEFAULT_CONFIG_FILE = 'policy-ledger.yaml';

type Env = Readonly<Record<string, string | undefined>>;

export function readConfigFile(configPath: string): LedgerConfigFile {
  const parsed = load(readFileSync(configPath, 'utf8'));
  // an empty YAML document loads as undefined
  const result = LedgerConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new Error(`Invalid config ${configPath}${where}: ${issue?.message ?? 'unknown error'}`);
  }
  return result.data;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim().length > 0 ? value : undefined;
}

/**
 * Resolve configuration: defaults, then the YAML file, then environment, then
 * explicit overrides (CLI flags).
 */
export function loadLedgerConfig(
  overrides: ConfigOverrides = {},
  env: Env = process.env,
  cwd: string = process.cwd(),
): LedgerConfig {
  let file: LedgerConfigFile = {};
  if (overrides.configPath) {
    const configPath = resolve(cwd, overrides.configPath);
    if (!existsSync(configPath)) throw new Error(`Config file not found: ${configPath}`);
    file = readConfigFile(configPath);
  } else {
    const defaultPath = resolve(cwd, DEFAULT_CONFIG_FILE);
    if (existsSync(defaultPath)) file = readConfigFile(defaultPath);
  }

  const envLevel = nonEmpty(env['POLICY_LEDGER_LOG_LEVEL']);
  const cachePath =
    overrides.cachePath ??
    nonEmpty(env['POLICY_LEDGER_CACHE_PATH']) ??
    file.cache?.path ??
    CACHE_OBJECT_KEY;
  const bucket = overrides.bucket ?? nonEmpty(env['POLICY_LEDGER_BUCKET']) ?? file.cache?.bucket;
  const region = overrides.region ?? nonEmpty(env['AWS_REGION']) ?? file.aws?.region;
  const profile = nonEmpty(env['AWS_PROFILE']) ?? file.aws?.profile;

  return {
    cache: {
      path: resolve(cwd, cachePath),
      key: file.cache?.key ?? CACHE_OBJECT_KEY,
      ...(bucket ? { bucket } : {}),
    },
    aws: {
      ...(region ? { region } : {}),
      ...(profile ? { profile } : {}),
    },
    logLevel: isLogLevel(envLevel) ? envLevel : file.log_level ?? 'info',
  };
}
