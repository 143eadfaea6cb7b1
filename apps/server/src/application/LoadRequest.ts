import { LoadRequestError, Result, User } from '@trackline/shared';
import { IReplySink, LoadRequest } from '../domain/loading';

export interface LoadRequestCreateData {
  identifier: string;
  requester: User;
  sink: IReplySink;
  isPriority?: boolean | undefined;
  isQuiet?: boolean | undefined;
  positionMs?: number | undefined;
}

function normalizeRequester(requester: User | undefined): User | null {
  const id = typeof requester?.id === 'string' ? requester.id.trim() : '';
  const name = typeof requester?.name === 'string' ? requester.name.trim() : '';
  return id && name ? { id, name } : null;
}

/**
 * Builds immutable load requests. Identifier and requester fields are trimmed.
 */
export class LoadRequestFactory {
  static create(data: LoadRequestCreateData): Result<LoadRequest, LoadRequestError> {
    const identifier = typeof data.identifier === 'string' ? data.identifier.trim() : '';
    if (!identifier) {
      return { success: false, error: 'INVALID_IDENTIFIER' };
    }

    const requester = normalizeRequester(data.requester);
    if (requester === null) {
      return { success: false, error: 'INVALID_REQUESTER' };
    }

    const positionMs = data.positionMs ?? 0;
    if (!Number.isInteger(positionMs) || positionMs < 0) {
      return { success: false, error: 'INVALID_POSITION' };
    }

    const request: LoadRequest = Object.freeze({
      identifier,
      requester,
      isPriority: data.isPriority ?? false,
      isQuiet: data.isQuiet ?? false,
      positionMs,
      sink: data.sink
    });

    return { success: true, value: request };
  }
}
