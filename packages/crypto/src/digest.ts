import { sha256 } from '@noble/hashes/sha256';

/** SHA-256 of the raw request body; this is what a request signature covers. */
export function payloadDigest(payload: Uint8Array): Uint8Array {
  return sha256(payload);
}
