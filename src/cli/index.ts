#!/usr/bin/env node
import { Command } from 'commander';
import { registerResolveCommand } from './commands/resolve.js';
import { registerCacheCommand } from './commands/cache.js';

const program = new Command();

program
  .name('policy-ledger')
  .description('policy-ledger – cached IAM policy lookups for account audits')
  .version('0.1.0')
  .option('-c, --config <path>', 'YAML config file (default: ./policy-ledger.yaml when present)')
  .option('--cache-path <path>', 'Local cache file')
  .option('--bucket <name>', 'S3 bucket to mirror the cache to')
  .option('--region <region>', 'AWS region');

registerResolveCommand(program);
registerCacheCommand(program);

program.parseAsync(process.argv).catch((err: Error) => {
  console.error('Error:', err.message);
  process.exit(1);
});
