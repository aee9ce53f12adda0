// src/lib/__tests__/config.test.ts

import { getConfig, parseConfig, resetConfig } from '@/lib/config';

describe('parseConfig', () => {
    test('applies defaults', () => {
        expect(parseConfig({ LEDGER_OWNER_ID: 'owner' })).toEqual({
            NODE_ENV: 'development',
            LEDGER_OWNER_ID: 'owner',
            ACTION_MIRROR_ENABLED: false,
            ACTION_MIRROR_COLLECTION: 'actions',
            FIREBASE_SERVICE_ACCOUNT: undefined,
            FIREBASE_PROJECT_ID: undefined,
        });
    });

    test('requires an owner', () => {
        expect(() => parseConfig({})).toThrow('Invalid configuration: LEDGER_OWNER_ID');
        expect(() => parseConfig({ LEDGER_OWNER_ID: '  ' })).toThrow(
            'Invalid configuration: LEDGER_OWNER_ID: LEDGER_OWNER_ID is required'
        );
    });

    test('treats empty optional values as unset', () => {
        const config = parseConfig({
            LEDGER_OWNER_ID: 'owner',
            FIREBASE_SERVICE_ACCOUNT: '',
            FIREBASE_PROJECT_ID: '',
        });

        expect(config.FIREBASE_SERVICE_ACCOUNT).toBeUndefined();
        expect(config.FIREBASE_PROJECT_ID).toBeUndefined();
    });

    test('the mirror needs a service account', () => {
        expect(() => parseConfig({ LEDGER_OWNER_ID: 'owner', ACTION_MIRROR_ENABLED: 'true' })).toThrow(
            'Invalid configuration: ACTION_MIRROR_ENABLED requires FIREBASE_SERVICE_ACCOUNT'
        );

        const config = parseConfig({
            LEDGER_OWNER_ID: 'owner',
            ACTION_MIRROR_ENABLED: 'true',
            ACTION_MIRROR_COLLECTION: 'ledger-actions',
            FIREBASE_SERVICE_ACCOUNT: '{"project_id":"test-project"}',
        });

        expect(config.ACTION_MIRROR_ENABLED).toBe(true);
        expect(config.ACTION_MIRROR_COLLECTION).toBe('ledger-actions');
    });

    test('only the literal "true" enables the mirror', () => {
        expect(parseConfig({ LEDGER_OWNER_ID: 'owner', ACTION_MIRROR_ENABLED: '1' }).ACTION_MIRROR_ENABLED).toBe(false);
    });
});

describe('getConfig', () => {
    const original = process.env.LEDGER_OWNER_ID;

    afterEach(() => {
        if (original === undefined) {
            delete process.env.LEDGER_OWNER_ID;
        } else {
            process.env.LEDGER_OWNER_ID = original;
        }
        resetConfig();
    });

    test('reads process.env once until reset', () => {
        process.env.LEDGER_OWNER_ID = 'first-owner';
        resetConfig();
        expect(getConfig().LEDGER_OWNER_ID).toBe('first-owner');

        process.env.LEDGER_OWNER_ID = 'second-owner';
        expect(getConfig().LEDGER_OWNER_ID).toBe('first-owner');

        resetConfig();
        expect(getConfig().LEDGER_OWNER_ID).toBe('second-owner');
    });
});
