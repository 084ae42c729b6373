import { createHash } from 'crypto';

/**
 * SHA-256 hex digest of raw content. Identifies image payloads regardless of
 * the URL or alt text they were referenced with.
 */
export function contentHash(input: string | Buffer): string {
  return createHash('sha256').update(input).digest('hex');
}
