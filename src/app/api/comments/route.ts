// src/app/api/comments/route.ts

import { NextRequest } from 'next/server';
import { withAuth, ApiResponse } from '@/lib/api';
import { flushActions, getLedger } from '@/lib/ledger';
import { createCommentSchema } from '@/types/api';

/**
 * POST /api/comments
 * Comment on an active post
 */
export async function POST(req: NextRequest) {
    return withAuth(req, {
        action: 'create_comment',
        bodySchema: createCommentSchema,
        handler: async ({ uid, body }) => {
            const comment = getLedger().createComment(uid, body.postId, body.content);
            await flushActions();
            return ApiResponse.created(comment);
        },
    });
}
