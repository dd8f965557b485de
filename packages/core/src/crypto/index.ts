export type { KeyId, Signature, KeyType, SignatureScheme, PublicKeyJson, Signer, Verifier } from './crypto.types';
export { compareKeyIds } from './crypto.types';
export type { HashAlgorithm } from './hash';
export { HashValue, HASH_ALGORITHMS, isHashAlgorithm, calculateHash, calculateHashes, hashMatches } from './hash';
export { PublicKey, PrivateKey } from './keys';
