// src/lib/api/base.ts

import { NextRequest } from 'next/server';
import { z, ZodSchema, ZodType, ZodTypeDef } from 'zod';
import { verifyToken } from '@/lib/auth';
import { ApiResponse } from './response';
import { ApiError, AuthenticationError, InternalError, ValidationError } from './errors';

/**
 * Authenticated handler context
 */
export interface AuthContext {
    /** Verified uid, or null for an anonymous caller on an optional-auth route */
    uid: string | null;
    claims: Record<string, unknown>;
}

/**
 * Handler context with parsed body
 */
export interface HandlerContext<T = unknown> extends AuthContext {
    body: T;
    params: Record<string, string>;
    query: URLSearchParams;
    request: NextRequest;
}

/**
 * Handler options
 */
export interface HandlerOptions<TBody = unknown> {
    /** Operation name, used in error logs */
    action: string;
    /** Zod schema for body validation */
    bodySchema?: ZodSchema<TBody>;
    /** Whether authentication is required (default: true) */
    requireAuth?: boolean;
    /** The handler function */
    handler: (ctx: HandlerContext<TBody>) => Promise<Response> | Response;
}

/**
 * Authenticated context: uid is always present
 */
export interface RequiredAuthContext<T = unknown> extends HandlerContext<T> {
    uid: string;
}

/**
 * Extract Bearer token from Authorization header
 */
export function extractToken(req: NextRequest): string | null {
    const authHeader = req.headers.get('authorization') || '';
    const match = authHeader.match(/^Bearer (.+)$/);
    return match ? match[1] : null;
}

/**
 * Parse and validate request body
 */
async function parseBody<T>(req: NextRequest, schema?: ZodSchema<T>): Promise<T | undefined> {
    const contentType = req.headers.get('content-type');
    if (!contentType?.includes('application/json')) {
        if (schema) {
            throw new ValidationError('Expected a JSON request body');
        }
        return undefined;
    }

    let body: unknown;
    try {
        body = await req.json();
    } catch (error) {
        if (error instanceof SyntaxError) {
            throw new ValidationError('Invalid JSON in request body');
        }
        throw error;
    }

    if (!schema) return undefined;

    const result = schema.safeParse(body);
    if (!result.success) {
        throw new ValidationError('Validation failed', result.error.flatten());
    }
    return result.data;
}

/**
 * Parse query parameters with a zod schema
 */
export function parseQuery<T>(query: URLSearchParams, schema: ZodType<T, ZodTypeDef, unknown>): T {
    const result = schema.safeParse(Object.fromEntries(query.entries()));
    if (!result.success) {
        throw new ValidationError('Invalid query parameters', result.error.flatten());
    }
    return result.data;
}

/**
 * Route id parameter as a positive integer
 */
export const idParamSchema = z.coerce.number().int().min(1);

export function parseId(value: string | undefined, resource: string): number {
    const result = idParamSchema.safeParse(value);
    if (!result.success) {
        throw new ValidationError(`Invalid ${resource} id`);
    }
    return result.data;
}

/**
 * Main request handler
 */
async function handleRequest<TBody>(
    req: NextRequest,
    options: HandlerOptions<TBody>,
    routeParams: Record<string, string> = {}
): Promise<Response> {
    const { action, bodySchema, requireAuth = true, handler } = options;

    try {
        const idToken = extractToken(req);

        if (requireAuth && !idToken) {
            throw new AuthenticationError('Missing Authorization Bearer token');
        }

        // Optional-auth routes still verify a token when one is sent
        const caller = idToken ? await verifyToken(idToken) : null;

        let body: TBody | undefined;
        if (['POST', 'PATCH', 'PUT'].includes(req.method || '')) {
            body = await parseBody(req, bodySchema);
        }

        const ctx: HandlerContext<TBody> = {
            uid: caller?.uid ?? null,
            claims: caller?.claims ?? {},
            body: body as TBody,
            params: routeParams,
            query: new URL(req.url).searchParams,
            request: req,
        };

        return await handler(ctx);
    } catch (error) {
        return handleError(action, error);
    }
}

/**
 * Handle errors and return appropriate responses
 */
function handleError(action: string, error: unknown): Response {
    if (error instanceof ApiError) {
        return ApiResponse.fromError(error);
    }

    console.error(`Unhandled error in ${action}:`, error);
    return ApiResponse.fromError(new InternalError());
}

/**
 * Create an authenticated API handler
 */
export function withAuth<TBody = unknown>(
    req: NextRequest,
    options: Omit<HandlerOptions<TBody>, 'requireAuth' | 'handler'> & {
        handler: (ctx: RequiredAuthContext<TBody>) => Promise<Response> | Response;
    },
    routeParams?: Record<string, string>
): Promise<Response> {
    const { handler, ...rest } = options;
    return handleRequest(
        req,
        {
            ...rest,
            requireAuth: true,
            handler: (ctx) => {
                if (!ctx.uid) {
                    throw new AuthenticationError();
                }
                return handler({ ...ctx, uid: ctx.uid });
            },
        },
        routeParams
    );
}

/**
 * Create a handler where authentication is optional
 */
export function withoutAuth<TBody = unknown>(
    req: NextRequest,
    options: Omit<HandlerOptions<TBody>, 'requireAuth'>,
    routeParams?: Record<string, string>
): Promise<Response> {
    return handleRequest(req, { ...options, requireAuth: false }, routeParams);
}
