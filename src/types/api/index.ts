// src/types/api/index.ts

import { z } from 'zod';
import { MAX_BATCH } from '@/services/ledger';

// Byte limits are enforced by the ledger; these only bound the character count.

// ============================================
// Content Schemas
// ============================================

export const createPostSchema = z.object({
    content: z.string().min(1, 'Content is required').max(10000),
});

export type CreatePostRequest = z.infer<typeof createPostSchema>;

export const createCommentSchema = z.object({
    postId: z.number().int().min(1, 'Post ID is required'),
    content: z.string().min(1, 'Content is required').max(5000),
});

export type CreateCommentRequest = z.infer<typeof createCommentSchema>;

export const voteSchema = z.object({
    value: z.union([z.literal(1), z.literal(-1)]),
});

export type VoteRequest = z.infer<typeof voteSchema>;

// ============================================
// Moderation Schemas
// ============================================

export const adminRemoveSchema = z.object({
    targetType: z.enum(['post', 'comment']),
    targetId: z.number().int().min(1),
    reason: z.string().trim().min(1, 'Removal reason is required').max(500),
});

export type AdminRemoveRequest = z.infer<typeof adminRemoveSchema>;

export const addModeratorSchema = z.object({
    userId: z.string().trim().min(1, 'User ID is required'),
});

export type AddModeratorRequest = z.infer<typeof addModeratorSchema>;

// ============================================
// Query Schemas
// ============================================

export const feedQuerySchema = z.object({
    startId: z.coerce.number().int().min(0).optional().default(1),
    batchSize: z.coerce.number().int().min(1).max(MAX_BATCH).optional().default(20),
});

export type FeedQueryParams = z.infer<typeof feedQuerySchema>;

export const postDetailsQuerySchema = z.object({
    commentStart: z.coerce.number().int().min(0).optional().default(0),
    commentBatch: z.coerce.number().int().min(0).max(MAX_BATCH).optional().default(20),
});

export type PostDetailsQueryParams = z.infer<typeof postDetailsQuerySchema>;

export const commentListQuerySchema = z.object({
    start: z.coerce.number().int().min(0).optional().default(0),
    limit: z.coerce.number().int().min(1).max(MAX_BATCH).optional().default(20),
});

export type CommentListQueryParams = z.infer<typeof commentListQuerySchema>;

export const actionsQuerySchema = z.object({
    after: z.coerce.number().int().min(0).optional().default(0),
    limit: z.coerce.number().int().min(1).max(MAX_BATCH).optional().default(50),
});

export type ActionsQueryParams = z.infer<typeof actionsQuerySchema>;
