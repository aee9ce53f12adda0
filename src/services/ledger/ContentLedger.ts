// src/services/ledger/ContentLedger.ts

import { AuthorizationError, InactiveError, StateConflictError, ValidationError } from '@/lib/api/errors';
import {
    MAX_COMMENT_BYTES,
    MAX_POST_BYTES,
    REPUTATION_DELTAS,
    type ActionRecord,
    type Comment,
    type CommentView,
    type Identity,
    type Post,
    type PostDetails,
    type PostView,
    type UserStats,
    type VoteRecord,
    type VoteTargetType,
} from '@/types/models';
import { AccessControl } from './AccessControl';
import { InMemoryActionLog, type ActionListener, type ActionLog, type ActionSource } from './ActionLog';
import { ContentStore, type ContentItem } from './ContentStore';
import { ModerationGate } from './ModerationGate';
import { QueryFacade, type LedgerTotals } from './QueryFacade';
import { ReentrancyGuard } from './ReentrancyGuard';
import { ReputationLedger } from './ReputationLedger';
import { VoteRecordStore } from './VoteRecordStore';
import { assertContent, assertIdentity } from './validation';

export interface ContentLedgerOptions {
    /** Deployer identity; becomes owner and first moderator */
    owner: Identity;
    /** Role table, for callers that manage it themselves */
    access?: AccessControl;
    log?: ActionLog;
    /** Account table, for restoring existing reputation */
    reputation?: ReputationLedger;
    now?: () => string;
}

export interface VoteOutcome {
    targetType: VoteTargetType;
    itemId: number;
    votes: number;
    authorReputation: number;
    record: VoteRecord;
    action: ActionRecord;
}

export interface RemovalOutcome {
    targetType: VoteTargetType;
    itemId: number;
    authorReputation: number;
    action: ActionRecord;
}

const MAX_REASON_LENGTH = 500;

const ACTION_KIND = {
    post: 'PostAction',
    comment: 'CommentAction',
} as const;

const REMOVAL_DELTA: Record<VoteTargetType, number> = {
    post: REPUTATION_DELTAS.postRemoved,
    comment: REPUTATION_DELTAS.commentRemoved,
};

function copyPost(post: Post): Post {
    return { ...post, commentIds: [...post.commentIds] };
}

/**
 * Ledger entry point. Every mutating method runs under the re-entrancy lock,
 * validates before its first write, and appends exactly one action record.
 */
export class ContentLedger implements ActionSource {
    private readonly access: AccessControl;
    private readonly log: ActionLog;
    private readonly now: () => string;
    private readonly reputation: ReputationLedger;
    private readonly votes = new VoteRecordStore();
    private readonly content = new ContentStore();
    private readonly guard = new ReentrancyGuard();
    private readonly gate: ModerationGate;
    private readonly queries: QueryFacade;

    constructor(options: ContentLedgerOptions) {
        this.now = options.now ?? (() => new Date().toISOString());
        this.access = options.access ?? new AccessControl(options.owner);
        if (!this.access.isOwner(options.owner)) {
            throw new ValidationError('Role table belongs to a different owner');
        }
        this.log = options.log ?? new InMemoryActionLog(this.now);
        this.reputation = options.reputation ?? new ReputationLedger(this.now);
        this.gate = new ModerationGate(this.access, this.reputation, this.log);
        this.queries = new QueryFacade(this.content, this.votes, this.reputation, this.access, this.log);
    }

    get owner(): Identity {
        return this.access.owner;
    }

    listModerators(): Identity[] {
        return this.access.listModerators();
    }

    /**
     * Number of action records appended so far
     */
    get actionCount(): number {
        return this.log.size;
    }

    subscribe(listener: ActionListener): () => void {
        return this.log.subscribe(listener);
    }

    // ------------------------------------------------------------------
    // Content
    // ------------------------------------------------------------------

    createPost(caller: Identity, content: string): Post {
        return this.guard.run('createPost', () => {
            assertIdentity(caller, 'Author');
            assertContent(content, MAX_POST_BYTES, 'Post');

            const post = this.content.insertPost(caller, content, this.now());
            this.reputation.recordPost(caller);
            const reputation = this.reputation.adjust(caller, REPUTATION_DELTAS.postCreated);
            this.log.append({
                kind: 'PostAction',
                targetType: 'post',
                itemId: post.id,
                actor: caller,
                subject: caller,
                label: 'created',
                reputation,
            });
            return copyPost(post);
        });
    }

    createComment(caller: Identity, postId: number, content: string): Comment {
        return this.guard.run('createComment', () => {
            assertIdentity(caller, 'Author');
            assertContent(content, MAX_COMMENT_BYTES, 'Comment');
            const post = this.content.requirePost(postId, { active: true });
            this.content.assertCommentCapacity(post);

            const comment = this.content.insertComment(post, caller, content, this.now());
            this.reputation.recordComment(caller);
            const reputation = this.reputation.adjust(caller, REPUTATION_DELTAS.commentCreated);
            this.log.append({
                kind: 'CommentAction',
                targetType: 'comment',
                itemId: comment.id,
                actor: caller,
                subject: caller,
                label: 'created',
                reputation,
            });
            return { ...comment };
        });
    }

    /**
     * Self-service removal. Takes back the creation reputation.
     */
    removeContent(caller: Identity, targetType: VoteTargetType, id: number): RemovalOutcome {
        return this.guard.run('removeContent', () => {
            assertIdentity(caller, 'Caller');
            const item = this.content.require(targetType, id, { active: false });
            if (item.author !== caller) {
                throw new AuthorizationError(`You can only remove your own ${targetType}`);
            }
            if (item.status !== 'active') {
                throw new InactiveError(targetType === 'post' ? 'Post' : 'Comment');
            }

            this.content.tombstone(item, { removedAt: this.now(), removedBy: caller });
            const reputation = this.reputation.adjust(caller, REMOVAL_DELTA[targetType]);
            const action = this.log.append({
                kind: ACTION_KIND[targetType],
                targetType,
                itemId: id,
                actor: caller,
                subject: caller,
                label: 'removed',
                reputation,
            });
            return { targetType, itemId: id, authorReputation: reputation, action };
        });
    }

    /**
     * Moderated takedown. Leaves the author's reputation alone and logs the reason.
     */
    adminRemove(caller: Identity, targetType: VoteTargetType, id: number, reason: string): RemovalOutcome {
        return this.guard.run('adminRemove', () => {
            assertIdentity(caller, 'Caller');
            this.gate.assertModerator(caller);
            const trimmed = reason.trim();
            if (trimmed.length === 0 || trimmed.length > MAX_REASON_LENGTH) {
                throw new ValidationError(`Removal reason must be 1-${MAX_REASON_LENGTH} characters`);
            }
            const item = this.content.require(targetType, id, { active: true });

            this.content.tombstone(item, {
                removedAt: this.now(),
                removedBy: caller,
                removedReason: trimmed,
            });
            const reputation = this.reputation.reputationOf(item.author);
            const action = this.log.append({
                kind: ACTION_KIND[targetType],
                targetType,
                itemId: id,
                actor: caller,
                subject: item.author,
                label: trimmed,
                reputation,
            });
            return { targetType, itemId: id, authorReputation: reputation, action };
        });
    }

    // ------------------------------------------------------------------
    // Votes
    // ------------------------------------------------------------------

    vote(caller: Identity, targetType: VoteTargetType, id: number, isUpvote: boolean): VoteOutcome {
        return this.guard.run('vote', () => {
            assertIdentity(caller, 'Voter');
            const item = this.content.require(targetType, id, { active: true });
            if (item.author === caller) {
                throw new StateConflictError(`You cannot vote on your own ${targetType}`, 'SELF_VOTE');
            }

            // claim before any tally or reputation effect
            this.votes.claim(caller, targetType, id, isUpvote);

            this.content.applyVote(item, isUpvote ? 1 : -1);
            const delta = isUpvote ? REPUTATION_DELTAS.upvoteReceived : REPUTATION_DELTAS.downvoteReceived;
            const reputation = this.reputation.adjust(item.author, delta);
            const action = this.log.append({
                kind: 'VoteAction',
                targetType,
                itemId: id,
                actor: caller,
                subject: item.author,
                label: isUpvote ? 'upvote' : 'downvote',
                reputation,
            });
            return this.voteOutcome(caller, targetType, item, reputation, action);
        });
    }

    /**
     * voted -> revoked, then undo the vote's tally and reputation effect
     */
    revokeVote(caller: Identity, targetType: VoteTargetType, id: number): VoteOutcome {
        return this.guard.run('revokeVote', () => {
            assertIdentity(caller, 'Voter');
            const item = this.content.require(targetType, id, { active: true });

            const wasUpvote = this.votes.release(caller, targetType, id);

            this.content.applyVote(item, wasUpvote ? -1 : 1);
            const delta = wasUpvote ? -REPUTATION_DELTAS.upvoteReceived : -REPUTATION_DELTAS.downvoteReceived;
            const reputation = this.reputation.adjust(item.author, delta);
            const action = this.log.append({
                kind: 'VoteAction',
                targetType,
                itemId: id,
                actor: caller,
                subject: item.author,
                label: 'revoke',
                reputation,
            });
            return this.voteOutcome(caller, targetType, item, reputation, action);
        });
    }

    // ------------------------------------------------------------------
    // Moderation
    // ------------------------------------------------------------------

    setModerator(caller: Identity, target: Identity, grant: boolean): ActionRecord {
        return this.guard.run('setModerator', () => this.gate.setModerator(caller, target, grant));
    }

    // ------------------------------------------------------------------
    // Queries
    // ------------------------------------------------------------------

    feed(startId: number, batchSize: number, viewer: Identity | null = null): PostView[] {
        return this.queries.feed(startId, batchSize, viewer);
    }

    postDetails(postId: number, commentStart: number, commentBatch: number, viewer: Identity | null = null): PostDetails {
        return this.queries.postDetails(postId, commentStart, commentBatch, viewer);
    }

    commentDetails(commentId: number, viewer: Identity | null = null): CommentView {
        return this.queries.commentDetails(commentId, viewer);
    }

    userStats(identity: Identity): UserStats {
        return this.queries.userStats(identity);
    }

    totals(): LedgerTotals {
        return this.queries.totals();
    }

    actions(afterSeq: number, limit: number): ActionRecord[] {
        return this.queries.actions(afterSeq, limit);
    }

    voteRecord(voter: Identity, targetType: VoteTargetType, id: number): VoteRecord {
        return this.votes.get(voter, targetType, id);
    }

    private voteOutcome(
        caller: Identity,
        targetType: VoteTargetType,
        item: ContentItem,
        authorReputation: number,
        action: ActionRecord
    ): VoteOutcome {
        return {
            targetType,
            itemId: item.id,
            votes: item.votes,
            authorReputation,
            record: this.votes.get(caller, targetType, item.id),
            action,
        };
    }
}
