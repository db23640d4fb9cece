import { sha256 } from '@noble/hashes/sha256';

import { bytesToUnpaddedBase64 } from './encoding.js';

/**
 * OpenSSH-style fingerprint of a public-key wire blob, e.g.
 * `SHA256:uNiVztksCsDhcc0u9e8BujQXVUpKZIDTMczCvj3tD2s`.
 */
export function fingerprintSha256(publicKeyBlob: Uint8Array): string {
  if (!(publicKeyBlob instanceof Uint8Array) || publicKeyBlob.length === 0) {
    throw new TypeError('publicKeyBlob must be a non-empty Uint8Array');
  }
  return `SHA256:${bytesToUnpaddedBase64(sha256(publicKeyBlob))}`;
}
