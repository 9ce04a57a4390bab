/**
 * Error taxonomy. Remote API failures are deliberately absent: they propagate
 * as whatever the SDK threw.
 */
export abstract class PolicyLedgerError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A policy reference was built with an attachment kind outside the fixed set. */
export class InvalidAttachmentKindError extends PolicyLedgerError {
  readonly attachmentKind: string;

  constructor(attachmentKind: string) {
    super(
      `Invalid attachment kind '${attachmentKind}' when creating policy identity`,
      'INVALID_ATTACHMENT_KIND',
    );
    this.attachmentKind = attachmentKind;
  }
}

/** The persisted cache exists but could not be read or decoded. */
export class CacheLoadError extends PolicyLedgerError {
  readonly location: string;

  constructor(location: string, reason: string, cause?: unknown) {
    super(`Failed to load policy cache from ${location}: ${reason}`, 'CACHE_LOAD_FAILED', { cause });
    this.location = location;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
