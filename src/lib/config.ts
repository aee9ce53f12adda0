// src/lib/config.ts

import { z } from 'zod';

const emptyToUndefined = (value: unknown) => (value === '' ? undefined : value);

const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    LEDGER_OWNER_ID: z.string().trim().min(1, 'LEDGER_OWNER_ID is required'),
    ACTION_MIRROR_ENABLED: z.preprocess((value) => value === 'true', z.boolean()).default(false),
    ACTION_MIRROR_COLLECTION: z.string().min(1).default('actions'),
    FIREBASE_SERVICE_ACCOUNT: z.preprocess(emptyToUndefined, z.string().optional()),
    FIREBASE_PROJECT_ID: z.preprocess(emptyToUndefined, z.string().optional()),
});

export type AppConfig = z.infer<typeof envSchema>;

/**
 * Parse configuration from an environment map
 */
export function parseConfig(env: Record<string, string | undefined>): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new Error(`Invalid configuration: ${issues.join('; ')}`);
    }
    if (parsed.data.ACTION_MIRROR_ENABLED && !parsed.data.FIREBASE_SERVICE_ACCOUNT) {
        throw new Error('Invalid configuration: ACTION_MIRROR_ENABLED requires FIREBASE_SERVICE_ACCOUNT');
    }
    return parsed.data;
}

let cached: AppConfig | undefined;

export function getConfig(): AppConfig {
    if (!cached) {
        cached = parseConfig(process.env);
    }
    return cached;
}

export function resetConfig(): void {
    cached = undefined;
}
