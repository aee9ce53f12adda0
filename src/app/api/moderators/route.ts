// src/app/api/moderators/route.ts

import { NextRequest } from 'next/server';
import { withAuth, withoutAuth, ApiResponse } from '@/lib/api';
import { flushActions, getLedger } from '@/lib/ledger';
import { addModeratorSchema } from '@/types/api';

/**
 * GET /api/moderators
 * List moderators (the owner included)
 */
export async function GET(req: NextRequest) {
    return withoutAuth(req, {
        action: 'list_moderators',
        handler: () => {
            const ledger = getLedger();
            return ApiResponse.success({
                owner: ledger.owner,
                moderators: ledger.listModerators(),
            });
        },
    });
}

/**
 * POST /api/moderators
 * Grant moderator status. Owner only.
 */
export async function POST(req: NextRequest) {
    return withAuth(req, {
        action: 'add_moderator',
        bodySchema: addModeratorSchema,
        handler: async ({ uid, body }) => {
            getLedger().setModerator(uid, body.userId, true);

            await flushActions();
            return ApiResponse.created({
                message: 'Moderator added successfully',
                userId: body.userId,
            });
        },
    });
}
