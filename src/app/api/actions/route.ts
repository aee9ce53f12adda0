// src/app/api/actions/route.ts

import { NextRequest } from 'next/server';
import { withoutAuth, parseQuery, ApiResponse } from '@/lib/api';
import { getLedger } from '@/lib/ledger';
import { actionsQuerySchema } from '@/types/api';

/**
 * GET /api/actions
 * Page of the action log, records with seq > after
 */
export async function GET(req: NextRequest) {
    return withoutAuth(req, {
        action: 'read_actions',
        handler: ({ query }) => {
            const { after, limit } = parseQuery(query, actionsQuerySchema);
            const ledger = getLedger();
            const records = ledger.actions(after, limit);
            const last = records.length > 0 ? records[records.length - 1].seq : after;
            const hasMore = last < ledger.actionCount;

            return ApiResponse.paginated(records, {
                limit,
                hasMore,
                nextCursor: hasMore ? last : undefined,
            });
        },
    });
}
