import { createHash, generateKeyPairSync as generateNodeKeyPair } from 'node:crypto';

import { utils } from 'ssh2';

import {
  KeyParseError,
  SigningIdentity,
  decodeSshSignature,
  encodeSshSignature,
  verifyPayloadSignature,
} from '../index.js';

function newOpenSshKey(type: 'ed25519' | 'rsa' | 'ecdsa'): string {
  if (type === 'rsa') return utils.generateKeyPairSync('rsa', { bits: 2048, comment: 'rsa@test' }).private;
  if (type === 'ecdsa') return utils.generateKeyPairSync('ecdsa', { bits: 256, comment: 'ecdsa@test' }).private;
  return utils.generateKeyPairSync('ed25519', { comment: 'ed25519@test' }).private;
}

const payload = Buffer.from('hello from the other machine\n', 'utf8');

describe.each([
  ['ed25519', 'ssh-ed25519', 'ssh-ed25519'],
  ['rsa', 'ssh-rsa', 'rsa-sha2-256'],
  ['ecdsa', 'ecdsa-sha2-nistp256', 'ecdsa-sha2-nistp256'],
] as const)('SigningIdentity (%s)', (type, keyType, signatureFormat) => {
  const identity = SigningIdentity.fromPrivateKey(newOpenSshKey(type));

  it('exposes the public key type and an OpenSSH fingerprint', () => {
    const blob = identity.publicKey().blob;
    const expected = `SHA256:${createHash('sha256').update(blob).digest('base64').replace(/=+$/, '')}`;

    expect(identity.publicKey().type).toBe(keyType);
    expect(identity.fingerprint()).toBe(expected);
    expect(identity.fingerprint()).toHaveLength('SHA256:'.length + 43);
  });

  it(`signs with format ${signatureFormat}`, () => {
    const signature = decodeSshSignature(identity.sign(payload));
    expect(signature.format).toBe(signatureFormat);
    expect(signature.blob.length).toBeGreaterThan(0);
  });

  it('produces signatures the public key accepts', () => {
    const result = verifyPayloadSignature(identity.publicKey(), payload, identity.signBase64(payload));
    expect(result).toEqual({ valid: true });
  });

  it('signs an empty payload', () => {
    const empty = Buffer.alloc(0);
    expect(verifyPayloadSignature(identity.publicKey(), empty, identity.signBase64(empty))).toEqual({
      valid: true,
    });
  });

  it('rejects a signature over different bytes', () => {
    const signature = identity.signBase64(payload);
    const tampered = Buffer.from(payload);
    tampered[0] = tampered[0] === 0x41 ? 0x42 : 0x41;

    const result = verifyPayloadSignature(identity.publicKey(), tampered, signature);
    expect(result).toEqual({
      valid: false,
      errorCode: 'SIGNATURE_VERIFICATION_FAILED',
      message: 'Signature verification failed',
    });
  });

  it('authorizedKey() round-trips through the public key line', () => {
    const line = identity.authorizedKey();
    expect(line.startsWith(`${keyType} `)).toBe(true);
    expect(line.endsWith(` ${type}@test`)).toBe(true);
  });
});

describe('verifyPayloadSignature', () => {
  const identity = SigningIdentity.fromPrivateKey(newOpenSshKey('ed25519'));
  const other = SigningIdentity.fromPrivateKey(newOpenSshKey('ed25519'));

  it('rejects a signature made by another key', () => {
    const result = verifyPayloadSignature(identity.publicKey(), payload, other.signBase64(payload));
    expect(result.valid).toBe(false);
    expect(result.valid ? undefined : result.errorCode).toBe('SIGNATURE_VERIFICATION_FAILED');
  });

  it('reports non-base64 headers as an encoding error', () => {
    const result = verifyPayloadSignature(identity.publicKey(), payload, 'not base64!');
    expect(result.valid ? undefined : result.errorCode).toBe('INVALID_SIGNATURE_ENCODING');
  });

  it('reports base64 that is not an SSH signature as a format error', () => {
    const result = verifyPayloadSignature(identity.publicKey(), payload, 'AAAA');
    expect(result.valid ? undefined : result.errorCode).toBe('INVALID_SIGNATURE_FORMAT');
  });

  it('fails verification when the format does not belong to the key type', () => {
    const signature = decodeSshSignature(identity.sign(payload));
    const relabelled = encodeSshSignature({ format: 'rsa-sha2-256', blob: signature.blob });

    const result = verifyPayloadSignature(identity.publicKey(), payload, relabelled.toString('base64'));
    expect(result.valid ? undefined : result.errorCode).toBe('SIGNATURE_VERIFICATION_FAILED');
  });
});

describe('SigningIdentity loading', () => {
  it('accepts a PEM (PKCS#1) RSA private key', () => {
    const { privateKey } = generateNodeKeyPair('rsa', {
      modulusLength: 2048,
      publicKeyEncoding: { type: 'spki', format: 'pem' },
      privateKeyEncoding: { type: 'pkcs1', format: 'pem' },
    });
    const identity = SigningIdentity.fromPrivateKey(privateKey);

    expect(identity.publicKey().type).toBe('ssh-rsa');
    expect(verifyPayloadSignature(identity.publicKey(), payload, identity.signBase64(payload))).toEqual({
      valid: true,
    });
  });

  it('throws KeyParseError for garbage and names the source', () => {
    expect(() => SigningIdentity.fromPrivateKey('garbage', { source: '/tmp/id_test' })).toThrow(KeyParseError);
    expect(() => SigningIdentity.fromPrivateKey('garbage', { source: '/tmp/id_test' })).toThrow(
      /\/tmp\/id_test/,
    );
  });

  it('refuses a public key where a private key is expected', () => {
    const pair = utils.generateKeyPairSync('ed25519');
    expect(() => SigningIdentity.fromPrivateKey(pair.public)).toThrow(KeyParseError);
  });
});
