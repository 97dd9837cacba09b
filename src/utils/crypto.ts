// src/utils/crypto.ts

import { sha256 } from '@noble/hashes/sha2.js';
import { bytesToHex, hexToBytes } from '@noble/hashes/utils.js';
import * as secp256k1 from '@noble/secp256k1';
import { type ClaimMessage, hashClaimMessage } from './canonical';
import { PoolError, PoolErrorCode } from './errors';

export const SIGNATURE_LENGTH = 65;

/**
 * Hash function plus verification primitive. Injected so the verifier can be
 * exercised without a particular curve library.
 */
export interface SignatureScheme {
  readonly name: string;
  digest(message: Uint8Array): Uint8Array;
  verify(digest: Uint8Array, signature: Uint8Array, publicKey: Uint8Array): boolean;
}

export type SignatureInput = Uint8Array | string;

const stripHexPrefix = (value: string): string =>
  value.startsWith('0x') || value.startsWith('0X') ? value.slice(2) : value;

export const bytesEqual = (a: Uint8Array, b: Uint8Array): boolean => {
  if (a.length !== b.length) return false;
  let diff = 0;
  for (let i = 0; i < a.length; i++) {
    diff |= a[i] ^ b[i];
  }
  return diff === 0;
};

/** Returns null for anything that is not exactly 65 bytes of signature. */
export const decodeSignature = (signature: SignatureInput): Uint8Array | null => {
  if (typeof signature !== 'string') {
    return signature.length === SIGNATURE_LENGTH ? signature : null;
  }
  const hex = stripHexPrefix(signature);
  if (hex.length !== SIGNATURE_LENGTH * 2 || !/^[0-9a-fA-F]*$/.test(hex)) {
    return null;
  }
  return hexToBytes(hex);
};

export const encodeSignature = (signature: Uint8Array): string => bytesToHex(signature);

/** Normalizes a compressed or uncompressed key to its 33-byte form. */
export const normalizePublicKey = (publicKey: SignatureInput): Uint8Array => {
  try {
    const hex = typeof publicKey === 'string' ? stripHexPrefix(publicKey) : bytesToHex(publicKey);
    return secp256k1.ProjectivePoint.fromHex(hex).toRawBytes(true);
  } catch (error) {
    throw new PoolError(
      PoolErrorCode.InvalidFormat,
      `Invalid trusted public key: ${error instanceof Error ? error.message : String(error)}`,
      'publicKey'
    );
  }
};

/**
 * secp256k1 with a recoverable signature: r || s || recovery id.
 * The key is recovered from the digest and compared with the trusted key.
 */
export const secp256k1Scheme: SignatureScheme = {
  name: 'secp256k1-sha256-recoverable',

  digest: (message) => sha256(message),

  verify: (digest, signature, publicKey) => {
    if (signature.length !== SIGNATURE_LENGTH) return false;
    const recovery = signature[64];
    if (recovery > 3) return false;
    try {
      const recovered = secp256k1.Signature.fromCompact(signature.subarray(0, 64))
        .addRecoveryBit(recovery)
        .recoverPublicKey(digest)
        .toRawBytes(true);
      return bytesEqual(recovered, publicKey);
    } catch {
      // r or s out of range, or no point for this recovery id
      return false;
    }
  },
};

export class SignatureVerifier {
  private readonly trustedKey: Uint8Array;

  constructor(
    trustedPublicKey: SignatureInput,
    private readonly scheme: SignatureScheme = secp256k1Scheme
  ) {
    this.trustedKey = normalizePublicKey(trustedPublicKey);
  }

  get schemeName(): string {
    return this.scheme.name;
  }

  get trustedPublicKeyHex(): string {
    return bytesToHex(this.trustedKey);
  }

  digest(message: ClaimMessage): Uint8Array {
    return hashClaimMessage(message, (bytes) => this.scheme.digest(bytes));
  }

  verify(hash: Uint8Array, signature: SignatureInput): boolean {
    const decoded = decodeSignature(signature);
    if (!decoded) return false;
    return this.scheme.verify(hash, decoded, this.trustedKey);
  }

  /** Canonicalizes then verifies. Malformed identities throw INVALID_FORMAT. */
  verifyMessage(message: ClaimMessage, signature: SignatureInput): boolean {
    return this.verify(this.digest(message), signature);
  }

  assertSigned(message: ClaimMessage, signature: SignatureInput): void {
    if (!this.verifyMessage(message, signature)) {
      throw new PoolError(
        PoolErrorCode.InvalidSignature,
        'Signature does not match the trusted signer',
        'signature'
      );
    }
  }
}
