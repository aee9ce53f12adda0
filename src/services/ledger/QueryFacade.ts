// src/services/ledger/QueryFacade.ts

import {
    EMPTY_VOTE_RECORD,
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
import { NotFoundError } from '@/lib/api/errors';
import type { AccessControl } from './AccessControl';
import type { ActionLog } from './ActionLog';
import type { ContentStore } from './ContentStore';
import type { ReputationLedger } from './ReputationLedger';
import type { VoteRecordStore } from './VoteRecordStore';
import { assertBatch, assertIdentity, assertIndex } from './validation';

export interface LedgerTotals {
    totalPosts: number;
    totalComments: number;
}

/**
 * Read-only projections. Nothing here mutates a store.
 */
export class QueryFacade {
    constructor(
        private readonly content: ContentStore,
        private readonly votes: VoteRecordStore,
        private readonly reputation: ReputationLedger,
        private readonly access: AccessControl,
        private readonly log: ActionLog
    ) {}

    /**
     * Active posts with ids in [startId, startId + batchSize), clipped to the max id
     */
    feed(startId: number, batchSize: number, viewer: Identity | null): PostView[] {
        assertIndex(startId, 'startId');
        assertBatch(batchSize, 'batchSize');

        const maxId = this.content.totalPosts;
        if (startId > maxId) return [];

        const endId = Math.min(startId + batchSize - 1, maxId);
        const views: PostView[] = [];
        for (let id = startId; id <= endId; id++) {
            const post = this.content.findPost(id);
            if (post && post.status === 'active') {
                views.push(this.toPostView(post, viewer));
            }
        }
        return views;
    }

    /**
     * Post (active or removed) with a slice of its comment index
     */
    postDetails(
        postId: number,
        commentStart: number,
        commentBatch: number,
        viewer: Identity | null
    ): PostDetails {
        assertIndex(commentStart, 'commentStart');
        assertBatch(commentBatch, 'commentBatch', true);

        const post = this.content.requirePost(postId, { active: false });
        const view = this.toPostView(post, viewer);
        const ids = post.commentIds;

        if (ids.length === 0 || commentStart >= ids.length) {
            return { post: view, comments: [], hasMore: false };
        }

        const comments = ids
            .slice(commentStart, commentStart + commentBatch)
            .map((id) => this.content.findComment(id))
            .filter((comment): comment is Comment => comment !== undefined && comment.status === 'active')
            .map((comment) => this.toCommentView(comment, viewer));

        return {
            post: view,
            comments,
            hasMore: commentStart + commentBatch < ids.length,
        };
    }

    commentDetails(commentId: number, viewer: Identity | null): CommentView {
        const comment = this.content.findComment(commentId);
        if (!comment) {
            throw new NotFoundError('Comment');
        }
        return this.toCommentView(comment, viewer);
    }

    userStats(identity: Identity): UserStats {
        assertIdentity(identity);
        const account = this.reputation.get(identity);
        return {
            identity,
            reputation: account?.reputation ?? 0,
            isModerator: this.access.isModerator(identity),
            postCount: account?.postCount ?? 0,
            commentCount: account?.commentCount ?? 0,
        };
    }

    totals(): LedgerTotals {
        return {
            totalPosts: this.content.totalPosts,
            totalComments: this.content.totalComments,
        };
    }

    actions(afterSeq: number, limit: number): ActionRecord[] {
        assertIndex(afterSeq, 'after');
        assertBatch(limit, 'limit');
        return this.log.list(afterSeq, limit);
    }

    private viewerVote(viewer: Identity | null, targetType: VoteTargetType, targetId: number): VoteRecord {
        if (!viewer) return { ...EMPTY_VOTE_RECORD };
        return this.votes.get(viewer, targetType, targetId);
    }

    private toPostView(post: Post, viewer: Identity | null): PostView {
        return {
            id: post.id,
            author: post.author,
            authorReputation: this.reputation.reputationOf(post.author),
            content: post.content,
            votes: post.votes,
            status: post.status,
            commentCount: post.commentIds.length,
            viewerVote: this.viewerVote(viewer, 'post', post.id),
            createdAt: post.createdAt,
        };
    }

    private toCommentView(comment: Comment, viewer: Identity | null): CommentView {
        return {
            id: comment.id,
            postId: comment.postId,
            author: comment.author,
            authorReputation: this.reputation.reputationOf(comment.author),
            content: comment.content,
            votes: comment.votes,
            status: comment.status,
            viewerVote: this.viewerVote(viewer, 'comment', comment.id),
            createdAt: comment.createdAt,
        };
    }
}
