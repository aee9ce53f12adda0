// src/types/models/Post.ts

import type { Identity } from './Account';
import type { CommentView } from './Comment';
import type { VoteRecord } from './Vote';

/**
 * Content lifecycle. Removal is a tombstone and never reverts.
 */
export type ContentStatus = 'active' | 'removed';

export const MAX_POST_BYTES = 10_000;
export const MAX_COMMENTS = 1000;

/**
 * Core post model
 */
export interface Post {
    id: number;
    author: Identity;
    content: string;
    votes: number; // live upvotes - live downvotes
    status: ContentStatus;
    commentIds: number[]; // append-only, removed comments included
    createdAt: string;

    // Moderation
    removedAt?: string;
    removedBy?: Identity;
    removedReason?: string;
}

/**
 * Post enriched for display
 */
export interface PostView {
    id: number;
    author: Identity;
    authorReputation: number;
    content: string;
    votes: number;
    status: ContentStatus;
    commentCount: number;
    viewerVote: VoteRecord;
    createdAt: string;
}

/**
 * Post with a page of its comments
 */
export interface PostDetails {
    post: PostView;
    comments: CommentView[];
    hasMore: boolean;
}
