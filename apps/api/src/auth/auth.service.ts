/**
 * @file auth.service.ts
 * @description Request signature verification against the trusted keys
 */
import { Inject, Injectable } from '@nestjs/common';
import { type TrustStore, type VerifyResult, verifyPayloadSignature } from '@clipwire/crypto';

import { TRUST_STORE } from '../context/tokens.js';

export type SignedRequest = {
  fingerprint: string;
  signature: string;
  payload: Buffer;
};

@Injectable()
export class AuthService {
  constructor(@Inject(TRUST_STORE) private readonly trustStore: TrustStore) {}

  verifyRequest(request: SignedRequest): VerifyResult {
    const publicKey = this.trustStore.get(request.fingerprint);
    if (!publicKey) {
      return {
        valid: false,
        errorCode: 'UNKNOWN_PUBLIC_KEY',
        message: `Public key ${request.fingerprint} is not authorized`,
      };
    }
    return verifyPayloadSignature(publicKey, request.payload, request.signature);
  }
}
