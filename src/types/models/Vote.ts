// src/types/models/Vote.ts

import type { Identity } from './Account';

/**
 * Vote value as sent by clients
 */
export type VoteValue = 1 | -1;

/**
 * Vote target type. Posts and comments use separate vote namespaces.
 */
export type VoteTargetType = 'post' | 'comment';

/**
 * Per (voter, item) vote state.
 * isUpvote keeps the polarity after revocation so the reversal is known.
 */
export interface VoteRecord {
    hasVoted: boolean;
    isUpvote: boolean;
    hasRevoked: boolean;
}

export type VoteState = 'unvoted' | 'voted' | 'revoked';

export const EMPTY_VOTE_RECORD: Readonly<VoteRecord> = Object.freeze({
    hasVoted: false,
    isUpvote: false,
    hasRevoked: false,
});

/**
 * Composite key for vote lookup
 */
export function getVoteId(voter: Identity, targetId: number, targetType: VoteTargetType): string {
    return `${voter}_${targetType}_${targetId}`;
}

export function getVoteState(record: VoteRecord): VoteState {
    if (record.hasRevoked) return 'revoked';
    return record.hasVoted ? 'voted' : 'unvoted';
}
