// src/lib/api/index.ts

export { withAuth, withoutAuth, extractToken, parseQuery, parseId, idParamSchema } from './base';

export type { AuthContext, HandlerContext, HandlerOptions, RequiredAuthContext } from './base';

export { ApiResponse } from './response';

export type {
    PaginationMeta,
    ApiSuccessResponse,
    ApiErrorResponseType,
    ApiPaginatedResponse,
} from './response';

export {
    ApiError,
    ValidationError,
    AuthenticationError,
    AuthorizationError,
    NotFoundError,
    StateConflictError,
    ReentrancyError,
    InactiveError,
    InternalError,
} from './errors';
