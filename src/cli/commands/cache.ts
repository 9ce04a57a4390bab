import type { Command } from 'commander';
import { globalOverrides, openLedger } from '../cli-shared.js';
import { formatDetailLines } from '../format.js';

export function registerCacheCommand(program: Command): void {
  const cache = program.command('cache').description('Inspect the policy detail cache (no IAM calls)');

  cache
    .command('list')
    .description('List cached policy ARNs')
    .action(async (_opts: unknown, command: Command) => {
      const { store } = openLedger(globalOverrides(command));
      const entries = await store.load();
      console.log(`Cached policies (${entries.size}):`);
      if (entries.size === 0) {
        console.log('  (none)');
        return;
      }
      for (const [arn, detail] of [...entries].sort(([a], [b]) => a.localeCompare(b))) {
        console.log(`  - ${arn} (${detail.name} ${detail.versionId})`);
      }
    });

  cache
    .command('show <arn>')
    .description('Show one cached policy')
    .option('--text', 'Print the policy document', false)
    .action(async (arn: string, opts: { text?: boolean }, command: Command) => {
      const { store } = openLedger(globalOverrides(command));
      const detail = (await store.load()).get(arn);
      if (!detail) {
        throw new Error(`Policy not cached: ${arn}`);
      }
      console.log(formatDetailLines(arn, detail, { showText: opts.text === true }).join('\n'));
    });
}
