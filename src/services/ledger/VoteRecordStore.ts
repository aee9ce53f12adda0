// src/services/ledger/VoteRecordStore.ts

import { StateConflictError } from '@/lib/api/errors';
import {
    EMPTY_VOTE_RECORD,
    getVoteId,
    getVoteState,
    type Identity,
    type VoteRecord,
    type VoteState,
    type VoteTargetType,
} from '@/types/models';

/**
 * Per (voter, item) state machine: unvoted -> voted -> revoked.
 * Revoked is terminal; any other transition throws and leaves the record alone.
 */
export class VoteRecordStore {
    private records = new Map<string, VoteRecord>();

    get(voter: Identity, targetType: VoteTargetType, targetId: number): VoteRecord {
        const record = this.records.get(getVoteId(voter, targetId, targetType));
        return record ? { ...record } : { ...EMPTY_VOTE_RECORD };
    }

    stateOf(voter: Identity, targetType: VoteTargetType, targetId: number): VoteState {
        return getVoteState(this.get(voter, targetType, targetId));
    }

    /**
     * Check that the pair may vote, without writing anything
     */
    assertCanClaim(voter: Identity, targetType: VoteTargetType, targetId: number): void {
        const state = this.stateOf(voter, targetType, targetId);
        if (state === 'voted') {
            throw new StateConflictError(`Already voted on this ${targetType}`, 'ALREADY_VOTED');
        }
        if (state === 'revoked') {
            throw new StateConflictError(`Vote on this ${targetType} was revoked and cannot be cast again`, 'VOTE_REVOKED');
        }
    }

    /**
     * unvoted -> voted
     */
    claim(voter: Identity, targetType: VoteTargetType, targetId: number, isUpvote: boolean): void {
        this.assertCanClaim(voter, targetType, targetId);
        this.records.set(getVoteId(voter, targetId, targetType), {
            hasVoted: true,
            isUpvote,
            hasRevoked: false,
        });
    }

    assertCanRelease(voter: Identity, targetType: VoteTargetType, targetId: number): void {
        const state = this.stateOf(voter, targetType, targetId);
        if (state === 'unvoted') {
            throw new StateConflictError(`No vote to revoke on this ${targetType}`, 'NOT_VOTED');
        }
        if (state === 'revoked') {
            throw new StateConflictError(`Vote on this ${targetType} was already revoked`, 'VOTE_REVOKED');
        }
    }

    /**
     * voted -> revoked. Returns the polarity of the revoked vote.
     */
    release(voter: Identity, targetType: VoteTargetType, targetId: number): boolean {
        this.assertCanRelease(voter, targetType, targetId);
        const key = getVoteId(voter, targetId, targetType);
        const { isUpvote } = this.get(voter, targetType, targetId);
        this.records.set(key, { hasVoted: false, isUpvote, hasRevoked: true });
        return isUpvote;
    }
}
