/**
 * API Infrastructure Exports
 */

export type {
  APIError,
  APIResponse,
  EntryView,
  SessionStateView,
  QueueRangeView
} from './types';

export { REQUEST_LIMITS, HTTP_STATUS, API_ERROR_CODES } from './types';

export {
  createRequestValidationMiddleware,
  createErrorHandlingMiddleware,
  createSecurityHeadersMiddleware,
  registerAPIMiddleware
} from './middleware';

export { registerAPIRoutes, toEntryView, toSessionStateView } from './routes';
