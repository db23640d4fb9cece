import { utils, type ParsedKey } from 'ssh2';

import { KeyParseError, SignatureFormatError } from './errors.js';
import { fingerprintSha256 } from './fingerprint.js';
import { ecdsaSshBlobToDer, lookupSignatureAlgorithm } from './signature.js';
import type { GeneratedKeyPair, SshSignature } from './types.js';

function isParsedKey(value: unknown): value is ParsedKey {
  return (
    typeof value === 'object' &&
    value !== null &&
    'getPublicSSH' in value &&
    typeof value.getPublicSSH === 'function'
  );
}

/**
 * ssh2 reports failure as a returned Error, and multi-key OpenSSH files as an
 * array; this yields the first key or throws.
 */
export function parseSshKey(data: string | Buffer, passphrase?: string): ParsedKey {
  const result: unknown = utils.parseKey(data, passphrase);
  if (result instanceof Error) {
    throw new KeyParseError(result.message, { cause: result });
  }
  const key: unknown = Array.isArray(result) ? result[0] : result;
  if (!isParsedKey(key)) {
    throw new KeyParseError('No key found in input');
  }
  return key;
}

export class PublicKey {
  private fingerprintCache: string | undefined;

  constructor(
    private readonly parsed: ParsedKey,
    readonly comment: string,
  ) {}

  get type(): string {
    return this.parsed.type;
  }

  get blob(): Buffer {
    return this.parsed.getPublicSSH();
  }

  get fingerprint(): string {
    this.fingerprintCache ??= fingerprintSha256(this.blob);
    return this.fingerprintCache;
  }

  /**
   * Checks an SSH signature over `data`. A signature whose format does not
   * belong to this key's type is rejected, as is anything ssh2 cannot verify.
   */
  verify(data: Uint8Array, signature: SshSignature): boolean {
    const algorithm = lookupSignatureAlgorithm(signature.format);
    if (!algorithm || algorithm.keyType !== this.type) return false;

    let blob: Buffer;
    try {
      blob =
        algorithm.blobEncoding === 'ecdsa-mpint' ? ecdsaSshBlobToDer(signature.blob) : signature.blob;
    } catch (error) {
      if (error instanceof SignatureFormatError) return false;
      throw error;
    }

    const result: unknown = this.parsed.verify(Buffer.from(data), blob, algorithm.hash ?? undefined);
    return result === true;
  }

  /** `<type> <base64-blob> [comment]`, the authorized_keys form. */
  toAuthorizedKey(): string {
    const line = `${this.type} ${this.blob.toString('base64')}`;
    return this.comment ? `${line} ${this.comment}` : line;
  }
}

const KEY_TYPE_PREFIX = /^(ssh-|ecdsa-sha2-|sk-)/;

/**
 * Drops a leading authorized_keys options field (`from="…",no-pty …`).
 * Options may hold quoted whitespace and `\"` escapes. They are not enforced.
 */
function stripKeyOptions(line: string): string {
  if (KEY_TYPE_PREFIX.test(line) || line.startsWith('-----')) return line;
  let quoted = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line.charAt(i);
    if (quoted && ch === '\\') {
      i++;
    } else if (ch === '"') {
      quoted = !quoted;
    } else if (!quoted && /\s/.test(ch)) {
      return line.slice(i).trim();
    }
  }
  return line;
}

export function parsePublicKey(line: string): PublicKey {
  const trimmed = stripKeyOptions(line.trim());
  if (trimmed.length === 0) {
    throw new KeyParseError('Empty public key');
  }
  const parsed = parseSshKey(trimmed);
  if (parsed.isPrivateKey()) {
    throw new KeyParseError('Expected a public key, got a private key');
  }
  const comment = trimmed.split(/\s+/).slice(2).join(' ');
  return new PublicKey(parsed, comment);
}

/** Parses an OpenSSH or PEM private key. */
export function parsePrivateKey(data: string | Buffer, passphrase?: string): ParsedKey {
  const parsed = parseSshKey(data, passphrase);
  if (!parsed.isPrivateKey()) {
    throw new KeyParseError('Expected a private key, got a public key');
  }
  return parsed;
}

/** New ed25519 pair, both halves in OpenSSH text form. */
export function generateKeyPair(comment: string): GeneratedKeyPair {
  const pair = utils.generateKeyPairSync('ed25519', { comment });
  return { publicKey: pair.public, privateKey: pair.private };
}
