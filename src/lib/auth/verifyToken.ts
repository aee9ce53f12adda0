// src/lib/auth/verifyToken.ts

import { getAdminAuth } from '@/lib/firebase/admin';
import { AuthenticationError } from '@/lib/api/errors';

/**
 * Verified caller
 */
export interface VerifiedCaller {
    uid: string;
    claims: Record<string, unknown>;
}

/**
 * Verify Firebase ID token and get user claims
 */
export async function verifyToken(idToken: string): Promise<VerifiedCaller> {
    try {
        const decodedToken = await getAdminAuth().verifyIdToken(idToken);
        return {
            uid: decodedToken.uid,
            claims: { ...decodedToken },
        };
    } catch (error) {
        console.error('Token verification failed:', error);
        throw new AuthenticationError('Invalid ID token');
    }
}
