// src/utils/canonical.ts
//
// Byte layout of a claim/refund message:
//
//   "SCEP" 0x01
//   0x01 amount     u128 BE
//   0x02 recipient  u16 BE length + utf-8
//   0x03 pool       u16 BE length + utf-8
//   0x04 depositId  u128 BE   | 0x00 when absent

import type { Identity } from '../types/pool';
import { validateIdentity, validateUint } from './validation';

export interface ClaimMessage {
  readonly amount: bigint;
  readonly recipient: Identity;
  readonly pool: Identity;
  readonly depositId?: bigint;
}

const DOMAIN_TAG = new TextEncoder().encode('SCEP');
const FORMAT_VERSION = 0x01;

const FieldTag = {
  Absent: 0x00,
  Amount: 0x01,
  Recipient: 0x02,
  Pool: 0x03,
  DepositId: 0x04,
} as const;

const encodeUint128 = (value: bigint): Uint8Array => {
  const out = new Uint8Array(16);
  let rest = value;
  for (let i = 15; i >= 0; i--) {
    out[i] = Number(rest & 0xffn);
    rest >>= 8n;
  }
  return out;
};

const encodeText = (value: string): Uint8Array => {
  const bytes = new TextEncoder().encode(value);
  const out = new Uint8Array(2 + bytes.length);
  out[0] = (bytes.length >> 8) & 0xff;
  out[1] = bytes.length & 0xff;
  out.set(bytes, 2);
  return out;
};

const concat = (parts: readonly Uint8Array[]): Uint8Array => {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
};

export const encodeClaimMessage = (message: ClaimMessage): Uint8Array => {
  const amount = validateUint(message.amount, 'amount');
  const recipient = validateIdentity(message.recipient, 'recipient');
  const pool = validateIdentity(message.pool, 'pool');

  const parts: Uint8Array[] = [
    DOMAIN_TAG,
    Uint8Array.of(FORMAT_VERSION),
    Uint8Array.of(FieldTag.Amount),
    encodeUint128(amount),
    Uint8Array.of(FieldTag.Recipient),
    encodeText(recipient),
    Uint8Array.of(FieldTag.Pool),
    encodeText(pool),
  ];

  if (message.depositId === undefined) {
    parts.push(Uint8Array.of(FieldTag.Absent));
  } else {
    parts.push(Uint8Array.of(FieldTag.DepositId), encodeUint128(validateUint(message.depositId, 'depositId')));
  }

  return concat(parts);
};

export const hashClaimMessage = (
  message: ClaimMessage,
  digest: (bytes: Uint8Array) => Uint8Array
): Uint8Array => digest(encodeClaimMessage(message));
