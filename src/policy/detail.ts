import { sha256Hex } from '../shared/redact.js';

/** Replaces newlines in pretty-printed documents so they render on one flat line. */
export const LINE_BREAK_MARKER = '<br>';

/** The mutable pointer record of a policy, as opposed to its versioned document. */
export interface PolicyDescriptor {
  name: string;
  currentVersionId: string;
  description?: string;
}

export interface PolicyDetail {
  readonly name: string;
  readonly versionId: string;
  readonly description: string;
  readonly documentText: string;
  /** Digest of `documentText`; for display and external dedup, never a cache key. */
  readonly contentHash: string;
}

export function formatPolicyDocument(document: unknown): string {
  const pretty = JSON.stringify(document, null, 2) ?? 'null';
  return pretty.split('\n').join(LINE_BREAK_MARKER);
}

export function hashDocumentText(documentText: string): string {
  return sha256Hex(documentText);
}

/** Inverse of the flattening, for terminals that can show real newlines. */
export function unflattenDocumentText(documentText: string): string {
  return documentText.split(LINE_BREAK_MARKER).join('\n');
}

export function createPolicyDetail(descriptor: PolicyDescriptor, document: unknown): PolicyDetail {
  const documentText = formatPolicyDocument(document);
  return Object.freeze({
    name: descriptor.name,
    versionId: descriptor.currentVersionId,
    description: descriptor.description ?? '',
    documentText,
    contentHash: hashDocumentText(documentText),
  });
}
