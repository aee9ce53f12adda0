// src/services/ledger/ReentrancyGuard.ts

import { ReentrancyError } from '@/lib/api/errors';

/**
 * Per-ledger lock around public mutating entry points
 */
export class ReentrancyGuard {
    private entered = false;

    run<T>(operation: string, fn: () => T): T {
        if (this.entered) {
            throw new ReentrancyError(`Re-entrant call to ${operation} rejected`);
        }
        this.entered = true;
        try {
            return fn();
        } finally {
            this.entered = false;
        }
    }
}
