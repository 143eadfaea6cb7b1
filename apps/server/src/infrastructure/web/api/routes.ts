/**
 * API Route Registration
 *
 * Registers the session, queue, loading and notice routes under `/api`.
 */

import { FastifyInstance, FastifyReply } from 'fastify';
import {
  ErrorFactory,
  LoadRequestError,
  QueueEntry,
  User,
  isRepeatMode,
  RepeatMode
} from '@trackline/shared';
import {
  APIError,
  APIResponse,
  HTTP_STATUS,
  API_ERROR_CODES,
  EntryView,
  SessionStateView,
  SessionStateRouteInterface,
  CloseSessionRouteInterface,
  QueueRangeRouteInterface,
  LoadTrackRouteInterface,
  RemoveEntriesRouteInterface,
  PlayerActionRouteInterface,
  PlayerActionView,
  ModeRouteInterface,
  ModeBody,
  LoadTrackBody,
  RemoveEntriesBody,
  NoticesRouteInterface
} from './types';
import { registerAPIMiddleware } from './middleware';
import { HTTPServerDependencies } from '../HTTPServer';
import { LoadRequestFactory } from '../../../application/LoadRequest';
import { Session } from '../../../application/SessionRegistry';
import { PlaybackErrorFactory, PlaybackError } from '../../../domain/playback';

const DEFAULT_PAGE_SIZE = 20;
const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

const LOAD_ERROR_FIELDS: Record<LoadRequestError, string> = {
  INVALID_IDENTIFIER: 'identifier',
  INVALID_REQUESTER: 'user',
  INVALID_POSITION: 'positionMs'
};

function now(): string {
  return new Date().toISOString();
}

function ok<T>(data: T): APIResponse<T> {
  return { success: true, data, timestamp: now() };
}

function fail(reply: FastifyReply, statusCode: number, error: APIError): APIResponse<never> {
  void reply.code(statusCode);
  return { success: false, error: { ...error, timestamp: now() }, timestamp: now() };
}

function validationFailed(reply: FastifyReply, field: string, message: string): APIResponse<never> {
  return fail(reply, HTTP_STATUS.BAD_REQUEST, {
    code: API_ERROR_CODES.VALIDATION_FAILED,
    message,
    details: { field }
  });
}

function sessionNotFound(reply: FastifyReply, sessionId: string): APIResponse<never> {
  const details = PlaybackErrorFactory.createPlaybackError('SESSION_NOT_FOUND', { sessionId });
  return fail(reply, HTTP_STATUS.NOT_FOUND, {
    code: details.code,
    message: details.message,
    suggestion: details.suggestion
  });
}

function playbackConflict(reply: FastifyReply, error: PlaybackError): APIResponse<never> {
  const details = PlaybackErrorFactory.createPlaybackError(error);
  return fail(reply, HTTP_STATUS.CONFLICT, {
    code: details.code,
    message: details.message,
    suggestion: details.suggestion
  });
}

function parseIndex(raw: string | undefined, fallback: number): number | null {
  if (raw === undefined || raw === '') {
    return fallback;
  }
  return /^\d+$/.test(raw) ? Number(raw) : null;
}

export function toEntryView(entry: QueueEntry): EntryView {
  return {
    entryId: entry.entryId,
    identifier: entry.track.identifier,
    title: entry.track.title,
    author: entry.track.author,
    uri: entry.track.uri ?? null,
    durationMs: entry.effectiveDurationMs,
    isStream: entry.isStream,
    isPriority: entry.isPriority,
    requester: { id: entry.requester.id, name: entry.requester.name }
  };
}

export function toSessionStateView(session: Session): SessionStateView {
  const state = session.player.getState();
  return {
    sessionId: state.sessionId,
    status: state.status,
    currentEntry: state.currentEntry ? toEntryView(state.currentEntry) : null,
    repeatMode: state.repeatMode,
    shuffle: state.shuffle,
    queueSize: state.queueSize,
    queueDurationMs: state.queueDurationMs,
    streams: state.streams,
    loader: session.loader.getStats()
  };
}

/**
 * Register all API routes with the Fastify instance
 */
export async function registerAPIRoutes(
  fastify: FastifyInstance,
  dependencies: HTTPServerDependencies
): Promise<void> {
  const { registry, notices, rateLimiter } = dependencies;
  const startedAt = Date.now();

  await fastify.register(
    async (api) => {
      registerAPIMiddleware(api);

      // Session ids are checked once for every session route
      api.addHook('preHandler', async (request, reply) => {
        const params = request.params;
        if (params && typeof params === 'object' && 'sessionId' in params) {
          const sessionId = params.sessionId;
          if (typeof sessionId !== 'string' || !SESSION_ID_PATTERN.test(sessionId)) {
            return reply.code(HTTP_STATUS.BAD_REQUEST).send(
              validationFailed(reply, 'sessionId', 'Session id must be 1-64 letters, digits, - or _')
            );
          }
        }
        return undefined;
      });

      api.get('/status', async () =>
        ok({
          status: 'operational',
          uptimeMs: Date.now() - startedAt,
          sessions: registry.size(),
          playing: registry.playingCount()
        })
      );

      api.get<SessionStateRouteInterface>('/sessions/:sessionId', async (request, reply) => {
        const session = registry.get(request.params.sessionId);
        if (!session) {
          return sessionNotFound(reply, request.params.sessionId);
        }
        return ok(toSessionStateView(session));
      });

      api.delete<CloseSessionRouteInterface>('/sessions/:sessionId', async (request, reply) => {
        const sessionId = request.params.sessionId;
        if (!(await registry.close(sessionId))) {
          return sessionNotFound(reply, sessionId);
        }
        notices.clear(sessionId);
        return ok({ closed: true as const });
      });

      api.get<QueueRangeRouteInterface>('/sessions/:sessionId/queue', async (request, reply) => {
        const session = registry.get(request.params.sessionId);
        if (!session) {
          return sessionNotFound(reply, request.params.sessionId);
        }

        const start = parseIndex(request.query.start, 0);
        const end = start === null ? null : parseIndex(request.query.end, start + DEFAULT_PAGE_SIZE);
        if (start === null || end === null) {
          const details = ErrorFactory.createQueueError('INVALID_RANGE');
          return fail(reply, HTTP_STATUS.BAD_REQUEST, {
            code: details.code,
            message: details.message,
            suggestion: details.suggestion
          });
        }

        const entries = session.queue.getTracksInRange(start, end);
        return ok({
          entries: entries.map(toEntryView),
          start: Math.min(start, end),
          end: Math.max(start, end),
          total: session.queue.size()
        });
      });

      api.post<LoadTrackRouteInterface>('/sessions/:sessionId/load', async (request, reply) => {
        const body: LoadTrackBody = request.body ?? {};
        const { priority, quiet, positionMs } = body;
        const sessionId = request.params.sessionId;

        if (priority !== undefined && typeof priority !== 'boolean') {
          return validationFailed(reply, 'priority', 'priority must be a boolean');
        }
        if (quiet !== undefined && typeof quiet !== 'boolean') {
          return validationFailed(reply, 'quiet', 'quiet must be a boolean');
        }
        if (positionMs !== undefined && typeof positionMs !== 'number') {
          return validationFailed(reply, 'positionMs', 'positionMs must be a number');
        }

        const user: { id?: unknown; name?: unknown } = body.user ?? {};
        const requester: User = {
          id: typeof user.id === 'string' ? user.id.trim() : '',
          name: typeof user.name === 'string' ? user.name.trim() : ''
        };
        const requestResult = LoadRequestFactory.create({
          identifier: typeof body.identifier === 'string' ? body.identifier : '',
          requester,
          sink: notices.sinkFor(sessionId, requester),
          isPriority: priority,
          isQuiet: quiet,
          positionMs
        });
        if (!requestResult.success) {
          const details = ErrorFactory.createLoadRequestError(requestResult.error);
          return validationFailed(reply, LOAD_ERROR_FIELDS[requestResult.error], details.message);
        }

        const session = registry.getOrCreate(sessionId);
        const submitted = await session.loader.submit(requestResult.value);
        if (!submitted.success) {
          const retryAfterMs = rateLimiter.getTimeUntilReset(requester);
          const details = ErrorFactory.createRateLimitError(submitted.error, retryAfterMs);
          void reply.header('Retry-After', Math.max(1, Math.ceil(retryAfterMs / 1000)).toString());
          return fail(reply, HTTP_STATUS.TOO_MANY_REQUESTS, {
            code: details.code,
            message: details.message,
            details: details.context,
            suggestion: details.suggestion
          });
        }

        void reply.code(HTTP_STATUS.ACCEPTED);
        return ok({ accepted: true as const, pending: session.loader.getStats().pending });
      });

      api.delete<RemoveEntriesRouteInterface>('/sessions/:sessionId/queue', async (request, reply) => {
        const session = registry.get(request.params.sessionId);
        if (!session) {
          return sessionNotFound(reply, request.params.sessionId);
        }

        const body: RemoveEntriesBody = request.body ?? {};
        const userId = typeof body.userId === 'string' ? body.userId.trim() : '';
        if (!userId) {
          return validationFailed(reply, 'userId', 'userId must be a non-empty string');
        }

        const rawIds: unknown = body.entryIds;
        if (!Array.isArray(rawIds) || rawIds.length === 0) {
          return validationFailed(reply, 'entryIds', 'entryIds must be a non-empty array of integers');
        }
        const entryIds: number[] = [];
        for (const id of rawIds) {
          if (typeof id !== 'number' || !Number.isInteger(id)) {
            return validationFailed(reply, 'entryIds', 'entryIds must be a non-empty array of integers');
          }
          entryIds.push(id);
        }

        if (!session.queue.isUserTrackOwner(userId, entryIds)) {
          const details = ErrorFactory.createQueueError('NOT_ENTRY_OWNER', { userId });
          return fail(reply, HTTP_STATUS.FORBIDDEN, {
            code: details.code,
            message: details.message,
            suggestion: details.suggestion
          });
        }

        const before = session.queue.size();
        session.queue.removeAllById(entryIds);
        return ok({ removed: before - session.queue.size() });
      });

      const actions: Record<
        PlayerActionView['action'],
        (session: Session) => Promise<PlaybackError | null>
      > = {
        skip: async (session) => {
          const result = await session.player.skip();
          return result.success ? null : result.error;
        },
        pause: async (session) => {
          const result = await session.player.pause();
          return result.success ? null : result.error;
        },
        resume: async (session) => {
          const result = await session.player.resume();
          return result.success ? null : result.error;
        },
        reshuffle: async (session) => {
          session.queue.reshuffle();
          return null;
        }
      };

      for (const action of ['skip', 'pause', 'resume', 'reshuffle'] as const) {
        api.post<PlayerActionRouteInterface>(`/sessions/:sessionId/${action}`, async (request, reply) => {
          const session = registry.get(request.params.sessionId);
          if (!session) {
            return sessionNotFound(reply, request.params.sessionId);
          }

          const error = await actions[action](session);
          if (error !== null) {
            return playbackConflict(reply, error);
          }
          return ok({ action, state: toSessionStateView(session) });
        });
      }

      api.put<ModeRouteInterface>('/sessions/:sessionId/mode', async (request, reply) => {
        const session = registry.get(request.params.sessionId);
        if (!session) {
          return sessionNotFound(reply, request.params.sessionId);
        }

        const { repeat: rawRepeat, shuffle }: ModeBody = request.body ?? {};
        let repeat: RepeatMode | undefined;
        if (rawRepeat !== undefined) {
          const normalized = typeof rawRepeat === 'string' ? rawRepeat.toUpperCase() : rawRepeat;
          if (!isRepeatMode(normalized)) {
            return validationFailed(reply, 'repeat', 'repeat must be one of NONE, SINGLE, ALL');
          }
          repeat = normalized;
        }
        if (shuffle !== undefined && typeof shuffle !== 'boolean') {
          return validationFailed(reply, 'shuffle', 'shuffle must be a boolean');
        }

        if (repeat !== undefined) {
          session.player.setRepeatMode(repeat);
        }
        if (shuffle !== undefined) {
          session.player.setShuffle(shuffle);
        }
        return ok(toSessionStateView(session));
      });

      api.get<NoticesRouteInterface>('/sessions/:sessionId/notices', async (request, reply) => {
        const since = parseIndex(request.query.since, 0);
        if (since === null) {
          return validationFailed(reply, 'since', 'since must be a non-negative integer');
        }
        return ok({ notices: notices.list(request.params.sessionId, since) });
      });
    },
    { prefix: '/api' }
  );
}
