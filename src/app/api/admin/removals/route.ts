// src/app/api/admin/removals/route.ts

import { NextRequest } from 'next/server';
import { withAuth, ApiResponse } from '@/lib/api';
import { flushActions, getLedger } from '@/lib/ledger';
import { adminRemoveSchema } from '@/types/api';

/**
 * POST /api/admin/removals
 * Moderator takedown of a post or comment. Author reputation is not touched.
 */
export async function POST(req: NextRequest) {
    return withAuth(req, {
        action: 'admin_remove',
        bodySchema: adminRemoveSchema,
        handler: async ({ uid, body }) => {
            const { targetType, targetId, reason } = body;
            const result = getLedger().adminRemove(uid, targetType, targetId, reason);

            await flushActions();
            return ApiResponse.success({
                message: 'Content removed by moderator',
                targetType,
                targetId,
                reason: result.action.label,
            });
        },
    });
}
