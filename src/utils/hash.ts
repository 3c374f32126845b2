/**
 * navindex - Content Fingerprints
 * @module utils/hash
 */

import { createHash } from 'node:crypto';

/**
 * sha-256 hex digest of raw file bytes
 */
export function fingerprint(content: Uint8Array | string): string {
  return createHash('sha256').update(content).digest('hex');
}
