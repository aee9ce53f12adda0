// src/lib/firebase/admin.ts

import { initializeApp, getApps, cert, App } from 'firebase-admin/app';
import { getAuth, Auth } from 'firebase-admin/auth';
import { getFirestore, Firestore } from 'firebase-admin/firestore';
import { getConfig } from '@/lib/config';

let adminApp: App | undefined;
let adminAuth: Auth | undefined;
let adminDb: Firestore | undefined;

/**
 * Initialize Firebase Admin SDK
 * Uses service account credentials from configuration
 */
function initializeFirebaseAdmin(): App {
    const apps = getApps();

    if (apps.length > 0) {
        return apps[0];
    }

    const { FIREBASE_SERVICE_ACCOUNT, FIREBASE_PROJECT_ID } = getConfig();

    if (!FIREBASE_SERVICE_ACCOUNT) {
        throw new Error('FIREBASE_SERVICE_ACCOUNT environment variable is not set');
    }

    let serviceAccount: Parameters<typeof cert>[0];
    try {
        serviceAccount = JSON.parse(FIREBASE_SERVICE_ACCOUNT);
    } catch {
        throw new Error('FIREBASE_SERVICE_ACCOUNT is not valid JSON');
    }

    const app = initializeApp({
        credential: cert(serviceAccount),
        projectId: FIREBASE_PROJECT_ID,
    });

    getFirestore(app).settings({
        ignoreUndefinedProperties: true,
    });

    return app;
}

/**
 * Get Firebase Admin App instance
 */
export function getAdminApp(): App {
    if (!adminApp) {
        adminApp = initializeFirebaseAdmin();
    }
    return adminApp;
}

/**
 * Get Firebase Admin Auth instance
 */
export function getAdminAuth(): Auth {
    if (!adminAuth) {
        adminAuth = getAuth(getAdminApp());
    }
    return adminAuth;
}

/**
 * Get Firebase Admin Firestore instance
 */
export function getAdminDb(): Firestore {
    if (!adminDb) {
        adminDb = getFirestore(getAdminApp());
    }
    return adminDb;
}
