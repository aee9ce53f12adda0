// src/services/ledger/ActionLog.ts

import type { ActionInput, ActionRecord } from '@/types/models';

export type ActionListener = (record: ActionRecord) => void;

/**
 * Read side of the notification channel
 */
export interface ActionSource {
    subscribe(listener: ActionListener): () => void;
}

/**
 * Append-only notification channel. One record per successful mutation.
 */
export interface ActionLog extends ActionSource {
    append(input: ActionInput): ActionRecord;
    list(afterSeq: number, limit: number): ActionRecord[];
    readonly size: number;
}

export class InMemoryActionLog implements ActionLog {
    private records: ActionRecord[] = [];
    private listeners = new Set<ActionListener>();

    constructor(private readonly now: () => string = () => new Date().toISOString()) {}

    get size(): number {
        return this.records.length;
    }

    append(input: ActionInput): ActionRecord {
        const record: ActionRecord = Object.freeze({
            ...input,
            seq: this.records.length + 1,
            createdAt: this.now(),
        });
        this.records.push(record);
        this.dispatch(record);
        return record;
    }

    /**
     * Records with seq > afterSeq, oldest first
     */
    list(afterSeq: number, limit: number): ActionRecord[] {
        const start = Math.max(0, Math.floor(afterSeq));
        return this.records.slice(start, start + limit);
    }

    subscribe(listener: ActionListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    // Listener errors are logged, never rethrown
    private dispatch(record: ActionRecord): void {
        for (const listener of this.listeners) {
            try {
                listener(record);
            } catch (error) {
                console.error(`Action listener failed for seq ${record.seq}:`, error);
            }
        }
    }
}
