import type { PolicyDetail } from '../policy/detail.js';
import { unflattenDocumentText } from '../policy/detail.js';

export interface DetailLineOptions {
  provenance?: string;
  attachmentKind?: string;
  showText?: boolean;
}

export function formatDetailLines(
  identifier: string,
  detail: PolicyDetail,
  opts: DetailLineOptions = {},
): string[] {
  const lines = [identifier, `  Name: ${detail.name}`, `  Version: ${detail.versionId}`];
  if (opts.attachmentKind) lines.push(`  Attached via: ${opts.attachmentKind}`);
  if (opts.provenance) lines.push(`  Provenance: ${opts.provenance}`);
  lines.push(`  Hash: ${detail.contentHash}`);
  if (detail.description) lines.push(`  Description: ${detail.description}`);
  if (opts.showText) {
    lines.push('  Document:');
    for (const line of unflattenDocumentText(detail.documentText).split('\n')) {
      lines.push(`    ${line}`);
    }
  }
  return lines;
}
