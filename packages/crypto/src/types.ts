/** SSH signature wire structure: `string format || string blob`. */
export type SshSignature = {
  format: string;
  blob: Buffer;
};

export type HashName = 'sha1' | 'sha256' | 'sha384' | 'sha512';

export type SignatureAlgorithm = {
  keyType: string;
  hash: HashName | null;
  blobEncoding: 'raw' | 'ecdsa-mpint';
};

export type GeneratedKeyPair = {
  publicKey: string;
  privateKey: string;
};
