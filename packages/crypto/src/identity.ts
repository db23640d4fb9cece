import { readFile } from 'node:fs/promises';

import type { ParsedKey } from 'ssh2';

import { payloadDigest } from './digest.js';
import { KeyParseError, SigningError } from './errors.js';
import { type PublicKey, parsePrivateKey, parsePublicKey } from './keys.js';
import {
  ecdsaDerToSshBlob,
  encodeSshSignature,
  lookupSignatureAlgorithm,
  signingFormatFor,
} from './signature.js';

export type SigningIdentityOptions = {
  passphrase?: string;
  /** Where the key came from, used in error messages. */
  source?: string;
};

/**
 * A private key able to sign request payloads. Immutable once loaded.
 */
export class SigningIdentity {
  private readonly publicKeyValue: PublicKey;

  private constructor(
    private readonly privateKey: ParsedKey,
    readonly source: string | undefined,
  ) {
    const blob = privateKey.getPublicSSH().toString('base64');
    this.publicKeyValue = parsePublicKey(`${privateKey.type} ${blob} ${privateKey.comment ?? ''}`);
  }

  static fromPrivateKey(data: string | Buffer, options: SigningIdentityOptions = {}): SigningIdentity {
    try {
      return new SigningIdentity(parsePrivateKey(data, options.passphrase), options.source);
    } catch (error) {
      if (error instanceof KeyParseError && options.source) {
        throw new KeyParseError(`Cannot parse private key ${options.source}: ${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }
  }

  static async fromFile(path: string, passphrase?: string): Promise<SigningIdentity> {
    const data = await readFile(path);
    return SigningIdentity.fromPrivateKey(data, { passphrase, source: path });
  }

  /**
   * Signs SHA-256(payload) and returns the SSH signature wire encoding.
   */
  sign(payload: Uint8Array): Buffer {
    const format = signingFormatFor(this.privateKey.type);
    const algorithm = lookupSignatureAlgorithm(format);
    if (!algorithm) {
      throw new SigningError(`No signature algorithm for ${format}`);
    }

    const digest = Buffer.from(payloadDigest(payload));
    const result: unknown = this.privateKey.sign(digest, algorithm.hash ?? undefined);
    if (result instanceof Error) {
      throw new SigningError(result.message, { cause: result });
    }
    if (!Buffer.isBuffer(result)) {
      throw new SigningError(`Signing with ${format} produced no signature`);
    }

    const blob = algorithm.blobEncoding === 'ecdsa-mpint' ? ecdsaDerToSshBlob(result) : result;
    return encodeSshSignature({ format, blob });
  }

  signBase64(payload: Uint8Array): string {
    return this.sign(payload).toString('base64');
  }

  fingerprint(): string {
    return this.publicKeyValue.fingerprint;
  }

  publicKey(): PublicKey {
    return this.publicKeyValue;
  }

  /** The line `key-add` expects on the server side. */
  authorizedKey(): string {
    return this.publicKeyValue.toAuthorizedKey();
  }
}
