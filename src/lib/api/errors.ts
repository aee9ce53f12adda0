// src/lib/api/errors.ts

/**
 * Base error class. Every ledger rejection is an ApiError so callers
 * (and the HTTP layer) can branch on `code`.
 */
export class ApiError extends Error {
    public readonly statusCode: number;
    public readonly code: string;
    public readonly details?: unknown;

    constructor(message: string, statusCode: number, code: string, details?: unknown) {
        super(message);
        this.name = 'ApiError';
        this.statusCode = statusCode;
        this.code = code;
        this.details = details;
    }
}

/**
 * 400 Bad Request - Malformed input (content length, zero identity, batch size)
 */
export class ValidationError extends ApiError {
    constructor(message: string = 'Validation failed', details?: unknown) {
        super(message, 400, 'VALIDATION_ERROR', details);
        this.name = 'ValidationError';
    }
}

/**
 * 401 Unauthorized - Missing or invalid authentication
 */
export class AuthenticationError extends ApiError {
    constructor(message: string = 'Authentication required') {
        super(message, 401, 'AUTHENTICATION_ERROR');
        this.name = 'AuthenticationError';
    }
}

/**
 * 403 Forbidden - Authenticated but not authorized
 */
export class AuthorizationError extends ApiError {
    constructor(message: string = 'Access denied', details?: unknown) {
        super(message, 403, 'AUTHORIZATION_ERROR', details);
        this.name = 'AuthorizationError';
    }
}

/**
 * 404 Not Found - Id was never assigned
 */
export class NotFoundError extends ApiError {
    constructor(resource: string = 'Resource') {
        super(`${resource} not found`, 404, 'NOT_FOUND');
        this.name = 'NotFoundError';
    }
}

/**
 * 409 Conflict - Vote/revoke state machine violation, self-vote, role conflict
 */
export class StateConflictError extends ApiError {
    constructor(message: string = 'State conflict', code: string = 'STATE_CONFLICT') {
        super(message, 409, code);
        this.name = 'StateConflictError';
    }
}

/**
 * 409 Conflict - Mutating call entered while another one is in progress
 */
export class ReentrancyError extends StateConflictError {
    constructor(message: string = 'Re-entrant call rejected') {
        super(message, 'REENTRANT_CALL');
        this.name = 'ReentrancyError';
    }
}

/**
 * 410 Gone - Id exists but the item has been removed
 */
export class InactiveError extends ApiError {
    constructor(resource: string = 'Resource') {
        super(`${resource} has been removed`, 410, 'INACTIVE');
        this.name = 'InactiveError';
    }
}

/**
 * 500 Internal Server Error
 */
export class InternalError extends ApiError {
    constructor(message: string = 'Internal server error') {
        super(message, 500, 'INTERNAL_ERROR');
        this.name = 'InternalError';
    }
}
