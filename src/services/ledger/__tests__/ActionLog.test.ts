// src/services/ledger/__tests__/ActionLog.test.ts

import type { ActionInput } from '@/types/models';
import { InMemoryActionLog } from '../ActionLog';

const NOW = '2026-01-01T00:00:00.000Z';

function input(itemId: number): ActionInput {
    return {
        kind: 'PostAction',
        targetType: 'post',
        itemId,
        actor: 'alice',
        subject: 'alice',
        label: 'created',
        reputation: 10,
    };
}

describe('InMemoryActionLog', () => {
    let log: InMemoryActionLog;

    beforeEach(() => {
        log = new InMemoryActionLog(() => NOW);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    test('assigns sequence numbers from 1', () => {
        const first = log.append(input(1));
        const second = log.append(input(2));

        expect(first).toEqual({ ...input(1), seq: 1, createdAt: NOW });
        expect(second.seq).toBe(2);
        expect(log.size).toBe(2);
        expect(Object.isFrozen(first)).toBe(true);
    });

    test('list pages by sequence number', () => {
        for (let i = 1; i <= 5; i++) log.append(input(i));

        expect(log.list(0, 2).map((r) => r.seq)).toEqual([1, 2]);
        expect(log.list(2, 2).map((r) => r.seq)).toEqual([3, 4]);
        expect(log.list(4, 10).map((r) => r.seq)).toEqual([5]);
        expect(log.list(5, 10)).toEqual([]);
    });

    test('subscribers receive each record until they unsubscribe', () => {
        const seen: number[] = [];
        const unsubscribe = log.subscribe((record) => seen.push(record.seq));

        log.append(input(1));
        unsubscribe();
        log.append(input(2));

        expect(seen).toEqual([1]);
    });

    test('a failing subscriber is logged and does not stop the others', () => {
        const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        const seen: number[] = [];
        log.subscribe(() => {
            throw new Error('consumer down');
        });
        log.subscribe((record) => seen.push(record.seq));

        const record = log.append(input(1));

        expect(record.seq).toBe(1);
        expect(seen).toEqual([1]);
        expect(errorSpy).toHaveBeenCalledTimes(1);
        expect(errorSpy.mock.calls[0][0]).toBe('Action listener failed for seq 1:');
    });
});
