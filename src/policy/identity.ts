import { InvalidAttachmentKindError } from '../shared/errors.js';

export const ATTACHMENT_KINDS = ['Group', 'User', 'Inline', 'Role'] as const;

export type AttachmentKind = (typeof ATTACHMENT_KINDS)[number];

export type PolicyProvenance = 'system-managed' | 'custom';

/** ARNs of the policies AWS itself provides start with this. */
export const SYSTEM_MANAGED_PREFIX = 'arn:aws:iam::aws:policy';

const KNOWN_KINDS: readonly string[] = ATTACHMENT_KINDS;

export function isAttachmentKind(value: string): value is AttachmentKind {
  return KNOWN_KINDS.includes(value);
}

/**
 * A reference to an IAM policy found while walking an account: the policy ARN
 * plus how it reaches the identity that holds it.
 *
 * One instance exists per attachment discovered; two instances naming the same
 * ARN are the same policy as far as caching is concerned.
 */
export class PolicyIdentity {
  readonly identifier: string;
  readonly attachmentKind: AttachmentKind;
  /** The ARN with `:` and `/` stripped, usable as a CSS selector / element id. */
  readonly sanitizedForm: string;
  readonly provenance: PolicyProvenance;

  constructor(identifier: string, attachmentKind: string) {
    if (!isAttachmentKind(attachmentKind)) {
      throw new InvalidAttachmentKindError(attachmentKind);
    }
    this.identifier = identifier;
    this.attachmentKind = attachmentKind;
    this.sanitizedForm = identifier.replace(/[:/]/g, '');
    this.provenance = identifier.startsWith(SYSTEM_MANAGED_PREFIX) ? 'system-managed' : 'custom';
  }

  get displayForm(): string {
    return this.identifier;
  }

  get systemManaged(): boolean {
    return this.provenance === 'system-managed';
  }

  equals(other: PolicyIdentity): boolean {
    return this.identifier === other.identifier;
  }

  toString(): string {
    return this.identifier;
  }
}
