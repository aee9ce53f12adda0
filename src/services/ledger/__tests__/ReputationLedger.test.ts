// src/services/ledger/__tests__/ReputationLedger.test.ts

import { ValidationError } from '@/lib/api/errors';
import { MAX_REP, MIN_REP } from '@/types/models';
import { ReputationLedger, clampReputation } from '../ReputationLedger';
import { mulberry32 } from '@/test/random';

const NOW = '2026-01-01T00:00:00.000Z';

describe('ReputationLedger', () => {
    let ledger: ReputationLedger;

    beforeEach(() => {
        ledger = new ReputationLedger(() => NOW);
    });

    test('adjust adds the delta and returns the result', () => {
        expect(ledger.adjust('alice', 10)).toBe(10);
        expect(ledger.adjust('alice', -3)).toBe(7);
        expect(ledger.reputationOf('alice')).toBe(7);
    });

    test('accounts are created lazily', () => {
        expect(ledger.get('alice')).toBeUndefined();
        expect(ledger.reputationOf('alice')).toBe(0);

        ledger.adjust('alice', 2);

        expect(ledger.get('alice')).toEqual({
            id: 'alice',
            reputation: 2,
            postCount: 0,
            commentCount: 0,
            createdAt: NOW,
        });
    });

    test('saturates at the upper bound', () => {
        expect(ledger.adjust('alice', 999_995)).toBe(999_995);
        expect(ledger.adjust('alice', 10)).toBe(MAX_REP);
        expect(ledger.adjust('alice', MAX_REP)).toBe(MAX_REP);
        expect(ledger.adjust('alice', -1)).toBe(999_999);
    });

    test('saturates at the lower bound', () => {
        expect(ledger.adjust('bob', -2_000_000)).toBe(MIN_REP);
        expect(ledger.adjust('bob', -1)).toBe(MIN_REP);
        expect(ledger.adjust('bob', 2)).toBe(-999_998);
    });

    test('rejects the zero identity', () => {
        expect(() => ledger.adjust('', 5)).toThrow(ValidationError);
        expect(() => ledger.adjust('   ', 5)).toThrow(ValidationError);
        expect(ledger.get('')).toBeUndefined();
    });

    test('rejects a non-integer delta without creating the account', () => {
        expect(() => ledger.adjust('carol', 1.5)).toThrow(ValidationError);
        expect(() => ledger.adjust('carol', Number.NaN)).toThrow(ValidationError);
        expect(ledger.get('carol')).toBeUndefined();
    });

    test('counts posts and comments', () => {
        ledger.recordPost('alice');
        ledger.recordPost('alice');
        ledger.recordComment('alice');

        expect(ledger.get('alice')).toMatchObject({ postCount: 2, commentCount: 1, reputation: 0 });
    });

    test('reputation stays within bounds for any delta sequence', () => {
        const random = mulberry32(42);
        for (let i = 0; i < 2000; i++) {
            const magnitude = random() < 0.1 ? 3_000_000 : 50_000;
            const delta = Math.round((random() * 2 - 1) * magnitude);
            const value = ledger.adjust('dave', delta);
            expect(value).toBeGreaterThanOrEqual(MIN_REP);
            expect(value).toBeLessThanOrEqual(MAX_REP);
        }
    });
});

describe('clampReputation', () => {
    test('pins values outside the bounds', () => {
        expect(clampReputation(1_000_001)).toBe(MAX_REP);
        expect(clampReputation(-1_000_001)).toBe(MIN_REP);
        expect(clampReputation(0)).toBe(0);
    });
});
