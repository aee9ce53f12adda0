// src/lib/api/response.ts

import { NextResponse } from 'next/server';
import { ApiError } from './errors';

/**
 * Pagination metadata
 */
export interface PaginationMeta {
    limit: number;
    hasMore: boolean;
    nextCursor?: number;
}

/**
 * Standard API response structure
 */
export interface ApiSuccessResponse<T> {
    success: true;
    data: T;
}

export interface ApiErrorResponseType {
    success: false;
    error: string;
    code: string;
    details?: unknown;
}

export interface ApiPaginatedResponse<T> {
    success: true;
    data: T[];
    pagination: PaginationMeta;
}

/**
 * API Response helper class
 */
export class ApiResponse {
    /**
     * Success response with data
     */
    static success<T>(data: T, status: number = 200): NextResponse {
        return NextResponse.json(
            {
                success: true,
                data,
            } satisfies ApiSuccessResponse<T>,
            { status }
        );
    }

    /**
     * Created response (201)
     */
    static created<T>(data: T): NextResponse {
        return ApiResponse.success(data, 201);
    }

    /**
     * Paginated response
     */
    static paginated<T>(data: T[], pagination: PaginationMeta, status: number = 200): NextResponse {
        return NextResponse.json(
            {
                success: true,
                data,
                pagination,
            } satisfies ApiPaginatedResponse<T>,
            { status }
        );
    }

    /**
     * Error response
     */
    static error(
        message: string,
        status: number = 500,
        code: string = 'ERROR',
        details?: unknown
    ): NextResponse {
        return NextResponse.json(
            {
                success: false,
                error: message,
                code,
                details,
            } satisfies ApiErrorResponseType,
            { status }
        );
    }

    /**
     * Create error response from ApiError
     */
    static fromError(error: ApiError): NextResponse {
        return ApiResponse.error(error.message, error.statusCode, error.code, error.details);
    }
}
