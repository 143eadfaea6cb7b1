/**
 * API Middleware Components
 *
 * Request validation, security headers and the central error handler for
 * everything under /api.
 */

import { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { APIError, HTTP_STATUS, API_ERROR_CODES, REQUEST_LIMITS } from './types';

function sendError(reply: FastifyReply, statusCode: number, error: APIError): void {
  const timestamp = new Date().toISOString();
  void reply.code(statusCode).send({
    success: false,
    error: { ...error, timestamp },
    timestamp
  });
}

/**
 * Rejects oversized bodies and non-JSON writes
 */
export function createRequestValidationMiddleware() {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    const contentLength = request.headers['content-length'];
    if (contentLength) {
      const size = parseInt(contentLength, 10);
      const limit = getRequestSizeLimit(request.url);

      if (size > limit) {
        sendError(reply, HTTP_STATUS.BAD_REQUEST, {
          code: API_ERROR_CODES.INVALID_REQUEST,
          message: `Request too large. Maximum size: ${limit} bytes`,
          details: { size, limit }
        });
        return reply;
      }
    }

    if (['POST', 'PUT', 'PATCH', 'DELETE'].includes(request.method)) {
      const contentType = request.headers['content-type'];
      if (contentType && !contentType.includes('application/json')) {
        sendError(reply, HTTP_STATUS.BAD_REQUEST, {
          code: API_ERROR_CODES.INVALID_REQUEST,
          message: 'Content-Type must be application/json',
          details: { received: contentType }
        });
        return reply;
      }
    }
    return undefined;
  };
}

/**
 * Maps thrown errors to the API envelope
 */
export function createErrorHandlingMiddleware() {
  return (error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
    if (error.code === 'FST_ERR_CTP_INVALID_MEDIA_TYPE') {
      sendError(reply, HTTP_STATUS.BAD_REQUEST, {
        code: API_ERROR_CODES.INVALID_REQUEST,
        message: 'Content-Type must be application/json'
      });
      return;
    }

    if (error.message.includes('JSON') || error.code === 'FST_ERR_CTP_EMPTY_JSON_BODY') {
      sendError(reply, HTTP_STATUS.BAD_REQUEST, {
        code: API_ERROR_CODES.INVALID_JSON,
        message: 'Invalid JSON in request body'
      });
      return;
    }

    if (error.validation) {
      sendError(reply, HTTP_STATUS.BAD_REQUEST, {
        code: API_ERROR_CODES.VALIDATION_FAILED,
        message: 'Request validation failed',
        details: error.message
      });
      return;
    }

    request.log.error({ err: error, url: request.url, method: request.method }, 'API error');
    sendError(reply, HTTP_STATUS.INTERNAL_SERVER_ERROR, {
      code: API_ERROR_CODES.INTERNAL_ERROR,
      message: 'Internal server error'
    });
  };
}

/**
 * Adds security headers to all API responses
 */
export function createSecurityHeadersMiddleware() {
  return async (_request: FastifyRequest, reply: FastifyReply) => {
    reply.header('X-Content-Type-Options', 'nosniff');
    reply.header('X-Frame-Options', 'DENY');
    reply.header('Referrer-Policy', 'strict-origin-when-cross-origin');

    // API responses reflect live queue state
    reply.header('Cache-Control', 'no-store, no-cache, must-revalidate');
  };
}

function getRequestSizeLimit(url: string): number {
  if (url.endsWith('/load')) {
    return REQUEST_LIMITS.LOAD;
  }
  return REQUEST_LIMITS.DEFAULT;
}

/**
 * Register all API middleware with a Fastify instance
 */
export function registerAPIMiddleware(fastify: FastifyInstance): void {
  fastify.addHook('onRequest', createSecurityHeadersMiddleware());
  fastify.addHook('preHandler', createRequestValidationMiddleware());
  fastify.setErrorHandler(createErrorHandlingMiddleware());
}
