export type { GeneratedKeyPair, HashName, SignatureAlgorithm, SshSignature } from './types.js';
export { KeyParseError, SignatureFormatError, SigningError, isMissingFileError } from './errors.js';
export { payloadDigest } from './digest.js';
export { fingerprintSha256 } from './fingerprint.js';
export { decodeBase64Strict } from './encoding.js';
export {
  SIGNATURE_ALGORITHMS,
  decodeSshSignature,
  encodeSshSignature,
  signingFormatFor,
} from './signature.js';
export { PublicKey, generateKeyPair, parsePrivateKey, parsePublicKey } from './keys.js';
export { SigningIdentity, type SigningIdentityOptions } from './identity.js';
export { verifyPayloadSignature, type VerifyResult } from './verify.js';
export { TrustStore, appendAuthorizedKey } from './trust-store.js';
