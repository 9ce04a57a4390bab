import type { LogLevel } from '../shared/logger.js';

export interface LedgerConfig {
  cache: {
    path: string;   // local cache file, always written
    bucket?: string; // S3 bucket; absent means local-file mode
    key: string;    // object key inside the bucket
  };
  aws: {
    region?: string;
    profile?: string;
  };
  logLevel: LogLevel;
}

export interface ConfigOverrides {
  configPath?: string;
  cachePath?: string;
  bucket?: string;
  region?: string;
}
