// src/services/actions/FirestoreActionMirror.ts

import type { DocumentData } from 'firebase-admin/firestore';
import type { ActionRecord } from '@/types/models';
import type { ActionSource } from '@/services/ledger';

/**
 * The part of Firestore the mirror writes through
 */
export interface MirrorTarget {
    collection(path: string): {
        doc(id: string): {
            set(data: DocumentData): Promise<unknown>;
        };
    };
}

/**
 * Copies every action record into a Firestore collection for external indexers.
 * Document id is the record's sequence number, so a retried write is idempotent.
 */
export class FirestoreActionMirror {
    private pending = new Set<Promise<void>>();
    private unsubscribe: (() => void) | null = null;

    constructor(
        private readonly db: MirrorTarget,
        private readonly collectionName: string = 'actions'
    ) {}

    /**
     * Subscribe to an action source. Returns a function that detaches the mirror.
     */
    attach(source: ActionSource): () => void {
        this.detach();
        this.unsubscribe = source.subscribe((record) => this.mirror(record));
        return () => this.detach();
    }

    detach(): void {
        this.unsubscribe?.();
        this.unsubscribe = null;
    }

    /**
     * Wait for in-flight writes
     */
    async flush(): Promise<void> {
        await Promise.all([...this.pending]);
    }

    private mirror(record: ActionRecord): void {
        const write: Promise<void> = this.db
            .collection(this.collectionName)
            .doc(String(record.seq))
            .set({ ...record })
            .then(() => undefined)
            .catch((error: unknown) => {
                console.error(`Failed to mirror action ${record.seq}:`, error);
            })
            .finally(() => {
                this.pending.delete(write);
            });
        this.pending.add(write);
    }
}
