// src/core/membership-ledger.ts

import type { Identity, Membership } from '../types/pool';
import { PoolError, PoolErrorCode } from '../utils/errors';

export class MembershipLedger {
  private members = new Map<Identity, Membership>();

  get size(): number {
    return this.members.size;
  }

  has(participant: Identity): boolean {
    return this.members.has(participant);
  }

  get(participant: Identity): Membership | undefined {
    return this.members.get(participant);
  }

  participants(): Identity[] {
    return Array.from(this.members.keys());
  }

  assertNotMember(participant: Identity): void {
    if (this.members.has(participant)) {
      throw new PoolError(PoolErrorCode.AlreadyJoined, `${participant} has already joined`, 'participant');
    }
  }

  require(participant: Identity): Membership {
    const membership = this.members.get(participant);
    if (!membership) {
      throw new PoolError(PoolErrorCode.NotJoined, `${participant} has not joined`, 'participant');
    }
    return membership;
  }

  add(membership: Membership): void {
    this.assertNotMember(membership.participant);
    this.members.set(membership.participant, membership);
  }

  remove(participant: Identity): Membership {
    const membership = this.require(participant);
    this.members.delete(participant);
    return membership;
  }
}
