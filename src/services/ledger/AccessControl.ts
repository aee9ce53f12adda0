// src/services/ledger/AccessControl.ts

import { StateConflictError } from '@/lib/api/errors';
import type { Identity } from '@/types/models';
import { assertIdentity } from './validation';

/**
 * Owner and moderator role table. Each ledger holds its own instance.
 */
export class AccessControl {
    readonly owner: Identity;
    private moderators = new Set<Identity>();

    constructor(owner: Identity) {
        this.owner = assertIdentity(owner, 'Owner');
        this.moderators.add(owner);
    }

    isOwner(identity: Identity): boolean {
        return identity === this.owner;
    }

    isModerator(identity: Identity): boolean {
        return this.moderators.has(identity);
    }

    canModerate(identity: Identity): boolean {
        return this.isOwner(identity) || this.isModerator(identity);
    }

    listModerators(): Identity[] {
        return [...this.moderators];
    }

    assertCanGrant(target: Identity): void {
        if (this.moderators.has(target)) {
            throw new StateConflictError('User is already a moderator', 'ALREADY_MODERATOR');
        }
    }

    assertCanRevoke(target: Identity): void {
        if (this.isOwner(target)) {
            throw new StateConflictError('Cannot revoke the owner', 'OWNER_NOT_REVOCABLE');
        }
        if (!this.moderators.has(target)) {
            throw new StateConflictError('User is not a moderator', 'NOT_MODERATOR');
        }
    }

    grant(target: Identity): void {
        this.assertCanGrant(target);
        this.moderators.add(target);
    }

    revoke(target: Identity): void {
        this.assertCanRevoke(target);
        this.moderators.delete(target);
    }
}
