/**
 * API Types and Interfaces
 *
 * Request/response shapes for the REST API. Request bodies are typed loosely
 * and checked field by field in the handlers.
 */

import { RouteGenericInterface } from 'fastify';
import { RepeatMode } from '@trackline/shared';
import { PlaybackStatus } from '../../../domain/playback';
import { LoaderStats } from '../../../domain/loading';
import { Notice } from '../NoticeBoard';

/**
 * Standard API error response format
 */
export interface APIError {
  code: string;
  message: string;
  details?: unknown;
  suggestion?: string | undefined;
  timestamp?: string;
}

/**
 * Standard API response envelope
 */
export interface APIResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: APIError;
  timestamp: string;
}

/**
 * Request size limits for different endpoints
 */
export const REQUEST_LIMITS = {
  DEFAULT: 1024 * 1024,
  LOAD: 10 * 1024
} as const;

/**
 * HTTP status codes used by the API
 */
export const HTTP_STATUS = {
  OK: 200,
  ACCEPTED: 202,
  BAD_REQUEST: 400,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  CONFLICT: 409,
  TOO_MANY_REQUESTS: 429,
  INTERNAL_SERVER_ERROR: 500
} as const;

/**
 * API error codes
 */
export const API_ERROR_CODES = {
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  INVALID_JSON: 'INVALID_JSON',
  INVALID_REQUEST: 'INVALID_REQUEST',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  NOT_FOUND: 'NOT_FOUND'
} as const;

export interface SessionParams {
  sessionId: string;
}

export interface EntryView {
  entryId: number;
  identifier: string;
  title: string;
  author: string;
  uri: string | null;
  durationMs: number;
  isStream: boolean;
  isPriority: boolean;
  requester: { id: string; name: string };
}

export interface SessionStateView {
  sessionId: string;
  status: PlaybackStatus;
  currentEntry: EntryView | null;
  repeatMode: RepeatMode;
  shuffle: boolean;
  queueSize: number;
  queueDurationMs: number;
  streams: number;
  loader: LoaderStats;
}

export interface QueueRangeView {
  entries: EntryView[];
  start: number;
  end: number;
  total: number;
}

// Session state
export interface SessionStateRouteInterface extends RouteGenericInterface {
  Params: SessionParams;
  Reply: APIResponse<SessionStateView>;
}

export interface CloseSessionRouteInterface extends RouteGenericInterface {
  Params: SessionParams;
  Reply: APIResponse<{ closed: true }>;
}

// Queue range
export interface QueueRangeQuery {
  start?: string;
  end?: string;
}

export interface QueueRangeRouteInterface extends RouteGenericInterface {
  Params: SessionParams;
  Querystring: QueueRangeQuery;
  Reply: APIResponse<QueueRangeView>;
}

// Load request
export interface LoadTrackBody {
  identifier?: unknown;
  user?: { id?: unknown; name?: unknown } | null;
  priority?: unknown;
  quiet?: unknown;
  positionMs?: unknown;
}

export interface LoadTrackView {
  accepted: true;
  pending: number;
}

export interface LoadTrackRouteInterface extends RouteGenericInterface {
  Params: SessionParams;
  Body: LoadTrackBody | null;
  Reply: APIResponse<LoadTrackView>;
}

// Entry removal
export interface RemoveEntriesBody {
  userId?: unknown;
  entryIds?: unknown;
}

export interface RemoveEntriesRouteInterface extends RouteGenericInterface {
  Params: SessionParams;
  Body: RemoveEntriesBody | null;
  Reply: APIResponse<{ removed: number }>;
}

// Player actions
export interface PlayerActionView {
  action: 'skip' | 'pause' | 'resume' | 'reshuffle';
  state: SessionStateView;
}

export interface PlayerActionRouteInterface extends RouteGenericInterface {
  Params: SessionParams;
  Reply: APIResponse<PlayerActionView>;
}

// Queue modes
export interface ModeBody {
  repeat?: unknown;
  shuffle?: unknown;
}

export interface ModeRouteInterface extends RouteGenericInterface {
  Params: SessionParams;
  Body: ModeBody | null;
  Reply: APIResponse<SessionStateView>;
}

// Notices
export interface NoticesRouteInterface extends RouteGenericInterface {
  Params: SessionParams;
  Querystring: { since?: string };
  Reply: APIResponse<{ notices: Notice[] }>;
}
