import { ErrorFactory, TrackValidator } from '@trackline/shared';
import { IResolver, LoadOutcome } from '../../domain/loading';

const SUPPORTED_PROTOCOLS = ['http:', 'https:'];

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * Resolves plain http(s) links to a single stream. Anything that is not a URL
 * is reported as no match; other URL schemes fail as unsupported.
 */
export class DirectLinkResolver implements IResolver {
  async resolve(identifier: string): Promise<LoadOutcome> {
    const trimmed = identifier.trim();
    if (!trimmed || /\s/.test(trimmed)) {
      return { type: 'NO_MATCHES' };
    }

    let url: URL;
    try {
      url = new URL(trimmed);
    } catch {
      return { type: 'NO_MATCHES' };
    }

    if (!SUPPORTED_PROTOCOLS.includes(url.protocol)) {
      return {
        type: 'LOAD_FAILED',
        severity: 'COMMON',
        message: `Links using ${url.protocol.replace(/:$/, '')} are not supported`
      };
    }

    const lastSegment = url.pathname.split('/').filter((segment) => segment.length > 0).pop();
    const title = lastSegment ? decodeSegment(lastSegment) : url.hostname;

    const track = TrackValidator.create({
      identifier: url.href,
      title,
      author: url.hostname,
      uri: url.href,
      isStream: true
    });

    if (!track.success) {
      return {
        type: 'LOAD_FAILED',
        severity: 'COMMON',
        message: ErrorFactory.createTrackError(track.error, { identifier: url.href }).message
      };
    }

    return { type: 'TRACK_LOADED', track: track.value };
  }
}
