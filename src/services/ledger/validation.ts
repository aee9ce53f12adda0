// src/services/ledger/validation.ts

import { ValidationError } from '@/lib/api/errors';
import type { Identity } from '@/types/models';

const encoder = new TextEncoder();

export const MAX_BATCH = 100;

/**
 * UTF-8 length of a content payload
 */
export function byteLength(content: string): number {
    return encoder.encode(content).length;
}

/**
 * Reject the zero identity (empty or blank)
 */
export function assertIdentity(identity: Identity | null | undefined, label: string = 'Identity'): Identity {
    if (typeof identity !== 'string' || identity.trim().length === 0) {
        throw new ValidationError(`${label} is required`);
    }
    return identity;
}

export function assertContent(content: string, maxBytes: number, label: string): void {
    const size = byteLength(content);
    if (size === 0) {
        throw new ValidationError(`${label} content is required`);
    }
    if (size > maxBytes) {
        throw new ValidationError(`${label} content exceeds ${maxBytes} bytes`, { size, maxBytes });
    }
}

export function assertIndex(value: number, label: string): void {
    if (!Number.isSafeInteger(value) || value < 0) {
        throw new ValidationError(`${label} must be a non-negative integer`);
    }
}

/**
 * Batch sizes are capped regardless of what the caller asks for
 */
export function assertBatch(size: number, label: string, allowEmpty: boolean = false): void {
    const min = allowEmpty ? 0 : 1;
    if (!Number.isSafeInteger(size) || size < min || size > MAX_BATCH) {
        throw new ValidationError(`${label} must be between ${min} and ${MAX_BATCH}`);
    }
}
