import { createHash } from 'node:crypto';

// AWS credential shapes that must never reach a log line
const SECRET_PATTERNS = [
  /\b(?:AKIA|ASIA)[A-Z0-9]{16}\b/g,
  /aws_secret_access_key['":=\s]+['"]?[A-Za-z0-9/+=]{40}['"]?/gi,
  /aws_session_token['":=\s]+['"]?[A-Za-z0-9/+=]{16,}['"]?/gi,
  /x-amz-security-token['":=\s]+['"]?\S+['"]?/gi,
  /authorization:\s*\S+/gi,
];

/**
 * Redact potential credential values from a string for safe logging.
 */
export function redact(input: string): string {
  let output = input;
  for (const pattern of SECRET_PATTERNS) {
    output = output.replace(pattern, '[REDACTED]');
  }
  return output;
}

/**
 * SHA-256 hex digest of a string.
 */
export function sha256Hex(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('hex');
}
