// src/types/models/Comment.ts

import type { Identity } from './Account';
import type { ContentStatus } from './Post';
import type { VoteRecord } from './Vote';

export const MAX_COMMENT_BYTES = 5_000;

/**
 * Comment on a post
 */
export interface Comment {
    id: number;
    postId: number;
    author: Identity;
    content: string;
    votes: number;
    status: ContentStatus;
    createdAt: string;

    // Moderation
    removedAt?: string;
    removedBy?: Identity;
    removedReason?: string;
}

/**
 * Comment enriched for display
 */
export interface CommentView {
    id: number;
    postId: number;
    author: Identity;
    authorReputation: number;
    content: string;
    votes: number;
    status: ContentStatus;
    viewerVote: VoteRecord;
    createdAt: string;
}
