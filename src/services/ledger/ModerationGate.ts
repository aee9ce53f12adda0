// src/services/ledger/ModerationGate.ts

import { AuthorizationError } from '@/lib/api/errors';
import type { ActionRecord, Identity } from '@/types/models';
import { AccessControl } from './AccessControl';
import type { ActionLog } from './ActionLog';
import type { ReputationLedger } from './ReputationLedger';
import { assertIdentity } from './validation';

/**
 * Owner/moderator checks and role management
 */
export class ModerationGate {
    constructor(
        readonly access: AccessControl,
        private readonly reputation: ReputationLedger,
        private readonly log: ActionLog
    ) {}

    assertOwner(caller: Identity): void {
        if (!this.access.isOwner(caller)) {
            throw new AuthorizationError('Only the owner can manage moderators');
        }
    }

    assertModerator(caller: Identity): void {
        if (!this.access.canModerate(caller)) {
            throw new AuthorizationError('Only moderators can remove content');
        }
    }

    setModerator(caller: Identity, target: Identity, grant: boolean): ActionRecord {
        assertIdentity(caller, 'Caller');
        this.assertOwner(caller);
        assertIdentity(target, 'Target user');

        if (grant) {
            this.access.grant(target);
        } else {
            this.access.revoke(target);
        }

        return this.log.append({
            kind: 'ModeratorChanged',
            targetType: null,
            itemId: null,
            actor: caller,
            subject: target,
            label: grant ? 'granted' : 'revoked',
            reputation: this.reputation.reputationOf(target),
        });
    }
}
