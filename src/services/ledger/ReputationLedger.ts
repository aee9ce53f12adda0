// src/services/ledger/ReputationLedger.ts

import { ValidationError } from '@/lib/api/errors';
import { DEFAULT_ACCOUNT, MAX_REP, MIN_REP, type Account, type Identity } from '@/types/models';
import { assertIdentity } from './validation';

/**
 * Saturating add into [MIN_REP, MAX_REP]
 */
export function clampReputation(value: number): number {
    return Math.min(MAX_REP, Math.max(MIN_REP, value));
}

/**
 * Identity -> account mapping. The only place reputation scores change.
 */
export class ReputationLedger {
    private accounts = new Map<Identity, Account>();

    constructor(private readonly now: () => string = () => new Date().toISOString()) {}

    get(identity: Identity): Account | undefined {
        return this.accounts.get(identity);
    }

    reputationOf(identity: Identity): number {
        return this.accounts.get(identity)?.reputation ?? 0;
    }

    /**
     * Get the account, creating it on first use
     */
    touch(identity: Identity): Account {
        assertIdentity(identity);
        let account = this.accounts.get(identity);
        if (!account) {
            account = { id: identity, ...DEFAULT_ACCOUNT, createdAt: this.now() };
            this.accounts.set(identity, account);
        }
        return account;
    }

    /**
     * Add delta and clamp. Overflow pins the score at the bound, it is not an error.
     * Returns the resulting reputation.
     */
    adjust(identity: Identity, delta: number): number {
        assertIdentity(identity);
        if (!Number.isSafeInteger(delta)) {
            throw new ValidationError('Reputation delta must be an integer');
        }
        const account = this.touch(identity);
        account.reputation = clampReputation(account.reputation + delta);
        return account.reputation;
    }

    recordPost(identity: Identity): void {
        this.touch(identity).postCount += 1;
    }

    recordComment(identity: Identity): void {
        this.touch(identity).commentCount += 1;
    }
}
