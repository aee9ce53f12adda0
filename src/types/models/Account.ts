// src/types/models/Account.ts

/**
 * Caller identity as handed to the ledger (a Firebase uid at the HTTP boundary)
 */
export type Identity = string;

export const MIN_REP = -1_000_000;
export const MAX_REP = 1_000_000;

/**
 * Reputation deltas applied by ledger transitions
 */
export const REPUTATION_DELTAS = {
    postCreated: 10,
    postRemoved: -10,
    commentCreated: 5,
    commentRemoved: -5,
    upvoteReceived: 2,
    downvoteReceived: -1,
} as const;

/**
 * Account bookkeeping, created lazily on the first mutation affecting an identity
 */
export interface Account {
    id: Identity;
    reputation: number;
    postCount: number; // items created, never decremented
    commentCount: number;
    createdAt: string;
}

/**
 * Account projection returned by userStats
 */
export interface UserStats {
    identity: Identity;
    reputation: number;
    isModerator: boolean;
    postCount: number;
    commentCount: number;
}

/**
 * Default values for new accounts
 */
export const DEFAULT_ACCOUNT: Omit<Account, 'id' | 'createdAt'> = {
    reputation: 0,
    postCount: 0,
    commentCount: 0,
};
