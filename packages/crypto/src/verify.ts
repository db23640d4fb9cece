import type { AuthErrorCode } from '@clipwire/shared-contracts';

import { payloadDigest } from './digest.js';
import { decodeBase64Strict } from './encoding.js';
import { SignatureFormatError } from './errors.js';
import type { PublicKey } from './keys.js';
import type { SshSignature } from './types.js';
import { decodeSshSignature } from './signature.js';

export type VerifyResult =
  | { valid: true }
  | { valid: false; errorCode: AuthErrorCode; message: string };

/**
 * Checks a base64 SSH signature header against SHA-256(payload).
 */
export function verifyPayloadSignature(
  publicKey: PublicKey,
  payload: Uint8Array,
  signatureBase64: string,
): VerifyResult {
  const wire = decodeBase64Strict(signatureBase64.trim());
  if (!wire) {
    return {
      valid: false,
      errorCode: 'INVALID_SIGNATURE_ENCODING',
      message: 'Signature header is not valid base64',
    };
  }

  let signature: SshSignature;
  try {
    signature = decodeSshSignature(wire);
  } catch (error) {
    if (!(error instanceof SignatureFormatError)) throw error;
    return { valid: false, errorCode: 'INVALID_SIGNATURE_FORMAT', message: error.message };
  }

  if (!publicKey.verify(payloadDigest(payload), signature)) {
    return {
      valid: false,
      errorCode: 'SIGNATURE_VERIFICATION_FAILED',
      message: 'Signature verification failed',
    };
  }
  return { valid: true };
}
