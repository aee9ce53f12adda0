// src/lib/ledger/index.ts

import { getConfig } from '@/lib/config';
import { getAdminDb } from '@/lib/firebase/admin';
import { ContentLedger } from '@/services/ledger';
import { FirestoreActionMirror } from '@/services/actions';

let ledger: ContentLedger | undefined;
let mirror: FirestoreActionMirror | undefined;

/**
 * Process-wide ledger, built once from configuration
 */
export function getLedger(): ContentLedger {
    if (!ledger) {
        const config = getConfig();
        ledger = new ContentLedger({ owner: config.LEDGER_OWNER_ID });

        if (config.ACTION_MIRROR_ENABLED) {
            mirror = new FirestoreActionMirror(getAdminDb(), config.ACTION_MIRROR_COLLECTION);
            mirror.attach(ledger);
        }
    }
    return ledger;
}

/**
 * Wait for mirrored action writes; a no-op when the mirror is off
 */
export async function flushActions(): Promise<void> {
    await mirror?.flush();
}

/**
 * Drop the singleton (tests)
 */
export function resetLedger(): void {
    mirror?.detach();
    mirror = undefined;
    ledger = undefined;
}
