// src/app/api/feed/route.ts

import { NextRequest } from 'next/server';
import { withoutAuth, parseQuery, ApiResponse } from '@/lib/api';
import { getLedger } from '@/lib/ledger';
import { feedQuerySchema } from '@/types/api';

/**
 * GET /api/feed
 * Active posts with ids in [startId, startId + batchSize)
 * The viewer's vote state is included when a token is sent
 */
export async function GET(req: NextRequest) {
    return withoutAuth(req, {
        action: 'read_feed',
        handler: ({ uid, query }) => {
            const { startId, batchSize } = parseQuery(query, feedQuerySchema);
            const ledger = getLedger();
            const posts = ledger.feed(startId, batchSize, uid);
            const { totalPosts } = ledger.totals();
            const nextStart = startId + batchSize;
            const hasMore = nextStart <= totalPosts;

            return ApiResponse.paginated(posts, {
                limit: batchSize,
                hasMore,
                nextCursor: hasMore ? nextStart : undefined,
            });
        },
    });
}
