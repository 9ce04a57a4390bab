import type { Command } from 'commander';
import { globalOverrides, openLedger } from '../cli-shared.js';
import { formatDetailLines } from '../format.js';
import { PolicyIdentity } from '../../policy/identity.js';

interface ResolveOptions {
  kind: string;
  text?: boolean;
}

export function registerResolveCommand(program: Command): void {
  program
    .command('resolve <arn...>')
    .description('Resolve policy ARNs to their name, version and document, fetching only uncached ones')
    .option('--kind <kind>', 'Attachment kind: Group, User, Inline or Role', 'User')
    .option('--text', 'Print the policy document', false)
    .action(async (arns: string[], opts: ResolveOptions, command: Command) => {
      // construct every identity first so a bad --kind fails before any remote call
      const identities = arns.map((arn) => new PolicyIdentity(arn, opts.kind));
      const { store, resolver } = openLedger(globalOverrides(command));
      const location = store.remoteName ? `s3://${store.remoteName}/${store.cacheKey}` : store.localPath;

      for (const identity of identities) {
        const detail = await resolver.resolve(identity);
        const lines = formatDetailLines(identity.displayForm, detail, {
          provenance: identity.provenance,
          attachmentKind: identity.attachmentKind,
          showText: opts.text === true,
        });
        console.log(lines.join('\n'));
        console.log();
      }

      const { hits, fetches } = resolver.stats;
      console.log(`Resolved ${identities.length} ARN(s): ${fetches} fetched, ${hits} from cache (${location})`);
    });
}
