// src/app/api/posts/route.ts

import { NextRequest } from 'next/server';
import { withAuth, ApiResponse } from '@/lib/api';
import { flushActions, getLedger } from '@/lib/ledger';
import { createPostSchema } from '@/types/api';

/**
 * POST /api/posts
 * Create a new post
 */
export async function POST(req: NextRequest) {
    return withAuth(req, {
        action: 'create_post',
        bodySchema: createPostSchema,
        handler: async ({ uid, body }) => {
            const post = getLedger().createPost(uid, body.content);
            await flushActions();
            return ApiResponse.created(post);
        },
    });
}
