// src/services/signing-authority.ts
//
// Off-chain counterpart of the verifier: signs claim and refund messages with
// the private half of a pool's trusted key. Used by tests and local tooling.

import { hmac } from '@noble/hashes/hmac.js';
import { sha256 } from '@noble/hashes/sha2.js';
import { bytesToHex, hexToBytes } from '@noble/hashes/utils.js';
import * as secp256k1 from '@noble/secp256k1';
import type { ClaimMessage } from '../utils/canonical';
import { hashClaimMessage } from '../utils/canonical';
import { PoolError, PoolErrorCode } from '../utils/errors';

// Deterministic (RFC 6979) signing needs a synchronous HMAC
secp256k1.etc.hmacSha256Sync ??= (key, ...messages) =>
  hmac(sha256, key, secp256k1.etc.concatBytes(...messages));

export class SigningAuthority {
  private readonly privateKey: Uint8Array;
  readonly publicKey: Uint8Array;

  constructor(privateKeyHex: string) {
    const hex = privateKeyHex.startsWith('0x') ? privateKeyHex.slice(2) : privateKeyHex;
    if (!/^[0-9a-fA-F]{64}$/.test(hex)) {
      throw new PoolError(PoolErrorCode.InvalidFormat, 'Private key must be 32 bytes of hex', 'privateKey');
    }
    this.privateKey = hexToBytes(hex);
    this.publicKey = secp256k1.getPublicKey(this.privateKey, true);
  }

  static random(): SigningAuthority {
    return new SigningAuthority(bytesToHex(secp256k1.utils.randomPrivateKey()));
  }

  get publicKeyHex(): string {
    return bytesToHex(this.publicKey);
  }

  signDigest(digest: Uint8Array): Uint8Array {
    const signature = secp256k1.sign(digest, this.privateKey);
    const out = new Uint8Array(65);
    out.set(signature.toCompactRawBytes(), 0);
    out[64] = signature.recovery;
    return out;
  }

  /** Returns the 65-byte signature as 130 hex characters. */
  sign(message: ClaimMessage): string {
    return bytesToHex(this.signDigest(hashClaimMessage(message, sha256)));
  }
}
