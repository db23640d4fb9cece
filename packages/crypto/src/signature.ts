import { encodeSshString, SshWireReader } from './encoding.js';
import { SignatureFormatError } from './errors.js';
import type { SignatureAlgorithm, SshSignature } from './types.js';

export const SIGNATURE_ALGORITHMS: Readonly<Record<string, SignatureAlgorithm>> = {
  'ssh-ed25519': { keyType: 'ssh-ed25519', hash: null, blobEncoding: 'raw' },
  'ssh-rsa': { keyType: 'ssh-rsa', hash: 'sha1', blobEncoding: 'raw' },
  'rsa-sha2-256': { keyType: 'ssh-rsa', hash: 'sha256', blobEncoding: 'raw' },
  'rsa-sha2-512': { keyType: 'ssh-rsa', hash: 'sha512', blobEncoding: 'raw' },
  'ecdsa-sha2-nistp256': { keyType: 'ecdsa-sha2-nistp256', hash: 'sha256', blobEncoding: 'ecdsa-mpint' },
  'ecdsa-sha2-nistp384': { keyType: 'ecdsa-sha2-nistp384', hash: 'sha384', blobEncoding: 'ecdsa-mpint' },
  'ecdsa-sha2-nistp521': { keyType: 'ecdsa-sha2-nistp521', hash: 'sha512', blobEncoding: 'ecdsa-mpint' },
};

export function lookupSignatureAlgorithm(format: string): SignatureAlgorithm | undefined {
  return Object.prototype.hasOwnProperty.call(SIGNATURE_ALGORITHMS, format)
    ? SIGNATURE_ALGORITHMS[format]
    : undefined;
}

/** Format used when signing with a key of the given type. */
export function signingFormatFor(keyType: string): string {
  if (keyType === 'ssh-rsa') return 'rsa-sha2-256';
  if (lookupSignatureAlgorithm(keyType)) return keyType;
  throw new SignatureFormatError(`Unsupported key type for signing: ${keyType}`);
}

export function encodeSshSignature(signature: SshSignature): Buffer {
  return Buffer.concat([encodeSshString(signature.format), encodeSshString(signature.blob)]);
}

export function decodeSshSignature(bytes: Uint8Array): SshSignature {
  const reader = new SshWireReader(bytes);
  const format = reader.readString();
  const blob = reader.readString();
  if (!format || !blob) {
    throw new SignatureFormatError('Truncated SSH signature');
  }
  if (reader.remaining !== 0) {
    throw new SignatureFormatError('Trailing bytes after SSH signature');
  }
  const name = format.toString('utf8');
  if (!/^[\x21-\x7e]+$/.test(name)) {
    throw new SignatureFormatError('Invalid signature format name');
  }
  if (blob.length === 0) {
    throw new SignatureFormatError('Empty signature blob');
  }
  return { format: name, blob };
}

function derLength(length: number): Buffer {
  if (length < 0x80) return Buffer.from([length]);
  if (length <= 0xff) return Buffer.from([0x81, length]);
  return Buffer.from([0x82, length >> 8, length & 0xff]);
}

function derInteger(value: Buffer): Buffer {
  return Buffer.concat([Buffer.from([0x02]), derLength(value.length), value]);
}

/** SSH ECDSA blob (`mpint r || mpint s`) to the DER form Node's crypto verifies. */
export function ecdsaSshBlobToDer(blob: Uint8Array): Buffer {
  const reader = new SshWireReader(blob);
  const r = reader.readString();
  const s = reader.readString();
  if (!r || !s || r.length === 0 || s.length === 0 || reader.remaining !== 0) {
    throw new SignatureFormatError('Malformed ECDSA signature blob');
  }
  const body = Buffer.concat([derInteger(r), derInteger(s)]);
  return Buffer.concat([Buffer.from([0x30]), derLength(body.length), body]);
}

type DerCursor = { bytes: Buffer; offset: number };

function readDerLength(cursor: DerCursor): number {
  const first = cursor.bytes[cursor.offset++];
  if (first === undefined) throw new SignatureFormatError('Truncated DER length');
  if (first < 0x80) return first;
  const count = first & 0x7f;
  if (count === 0 || count > 2) throw new SignatureFormatError('Unsupported DER length');
  let length = 0;
  for (let i = 0; i < count; i++) {
    const byte = cursor.bytes[cursor.offset++];
    if (byte === undefined) throw new SignatureFormatError('Truncated DER length');
    length = (length << 8) | byte;
  }
  return length;
}

function readDerInteger(cursor: DerCursor): Buffer {
  if (cursor.bytes[cursor.offset++] !== 0x02) {
    throw new SignatureFormatError('Expected DER INTEGER');
  }
  const length = readDerLength(cursor);
  const end = cursor.offset + length;
  if (length === 0 || end > cursor.bytes.length) {
    throw new SignatureFormatError('Truncated DER INTEGER');
  }
  const value = cursor.bytes.subarray(cursor.offset, end);
  cursor.offset = end;
  return Buffer.from(value);
}

/** DER `SEQUENCE { r, s }` from Node's crypto to the SSH ECDSA blob. */
export function ecdsaDerToSshBlob(der: Uint8Array): Buffer {
  const cursor: DerCursor = { bytes: Buffer.from(der), offset: 0 };
  if (cursor.bytes[cursor.offset++] !== 0x30) {
    throw new SignatureFormatError('Expected DER SEQUENCE');
  }
  readDerLength(cursor);
  const r = readDerInteger(cursor);
  const s = readDerInteger(cursor);
  return Buffer.concat([encodeSshString(r), encodeSshString(s)]);
}
