// src/types/models/Action.ts

import type { Identity } from './Account';
import type { VoteTargetType } from './Vote';

/**
 * Action kinds emitted on the notification channel
 */
export type ActionKind = 'PostAction' | 'CommentAction' | 'VoteAction' | 'ModeratorChanged';

/**
 * One record per successful mutation. Append-only.
 */
export interface ActionRecord {
    seq: number;
    kind: ActionKind;
    targetType: VoteTargetType | null;
    itemId: number | null;
    actor: Identity;
    // identity whose reputation is reported (author, or moderator target)
    subject: Identity;
    label: string; // action label, or the reason of a moderator removal
    reputation: number;
    createdAt: string;
}

export type ActionInput = Omit<ActionRecord, 'seq' | 'createdAt'>;
