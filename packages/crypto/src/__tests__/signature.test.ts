import { SignatureFormatError, decodeSshSignature, encodeSshSignature, signingFormatFor } from '../index.js';
import { ecdsaDerToSshBlob, ecdsaSshBlobToDer } from '../signature.js';

describe('SSH signature codec', () => {
  it('encodes format and blob as length-prefixed strings', () => {
    const wire = encodeSshSignature({ format: 'ssh-ed25519', blob: Buffer.from([1, 2, 3]) });
    expect(wire.toString('hex')).toBe(
      '0000000b' + Buffer.from('ssh-ed25519').toString('hex') + '00000003' + '010203',
    );
  });

  it('decodes what it encodes', () => {
    const blob = Buffer.from('abcdef', 'hex');
    const decoded = decodeSshSignature(encodeSshSignature({ format: 'rsa-sha2-256', blob }));
    expect(decoded.format).toBe('rsa-sha2-256');
    expect(decoded.blob.equals(blob)).toBe(true);
  });

  it('rejects truncated input', () => {
    const wire = encodeSshSignature({ format: 'ssh-ed25519', blob: Buffer.alloc(64, 7) });
    expect(() => decodeSshSignature(wire.subarray(0, wire.length - 1))).toThrow(SignatureFormatError);
    expect(() => decodeSshSignature(Buffer.from([0, 0]))).toThrow(SignatureFormatError);
  });

  it('rejects trailing bytes', () => {
    const wire = encodeSshSignature({ format: 'ssh-ed25519', blob: Buffer.alloc(64, 7) });
    expect(() => decodeSshSignature(Buffer.concat([wire, Buffer.from([0])]))).toThrow(
      'Trailing bytes after SSH signature',
    );
  });

  it('rejects an empty blob', () => {
    expect(() =>
      decodeSshSignature(encodeSshSignature({ format: 'ssh-ed25519', blob: Buffer.alloc(0) })),
    ).toThrow('Empty signature blob');
  });

  it('picks rsa-sha2-256 for RSA keys', () => {
    expect(signingFormatFor('ssh-rsa')).toBe('rsa-sha2-256');
    expect(signingFormatFor('ssh-ed25519')).toBe('ssh-ed25519');
    expect(() => signingFormatFor('ssh-dss')).toThrow(SignatureFormatError);
  });
});

describe('ECDSA blob conversion', () => {
  // r = 0xff01 has its high bit set, so both encodings carry a leading zero byte.
  const der = Buffer.from('3009' + '020300ff01' + '02027f02', 'hex');
  const ssh = Buffer.from('00000003' + '00ff01' + '00000002' + '7f02', 'hex');

  it('converts DER to mpint r || mpint s', () => {
    expect(ecdsaDerToSshBlob(der).equals(ssh)).toBe(true);
  });

  it('converts mpint r || mpint s to DER', () => {
    expect(ecdsaSshBlobToDer(ssh).equals(der)).toBe(true);
  });

  it('rejects malformed blobs', () => {
    expect(() => ecdsaSshBlobToDer(Buffer.from('00000003ff', 'hex'))).toThrow(SignatureFormatError);
    expect(() => ecdsaDerToSshBlob(Buffer.from('3100', 'hex'))).toThrow(SignatureFormatError);
  });
});
