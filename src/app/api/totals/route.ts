// src/app/api/totals/route.ts

import { NextRequest } from 'next/server';
import { withoutAuth, ApiResponse } from '@/lib/api';
import { getLedger } from '@/lib/ledger';

/**
 * GET /api/totals
 */
export async function GET(req: NextRequest) {
    return withoutAuth(req, {
        action: 'read_totals',
        handler: () => ApiResponse.success(getLedger().totals()),
    });
}
