/**
 * Notices sent back to requesters while loading.
 * Anything that came from a user or a remote source is escaped first.
 */

import { escapeAndDefuse } from '@trackline/shared';

function quote(identifier: string): string {
  return '`' + escapeAndDefuse(identifier).replace(/`/g, "'") + '`';
}

function bold(text: string): string {
  return `**${escapeAndDefuse(text)}**`;
}

export class LoadMessages {
  static trackQueued(title: string): string {
    return `${bold(title)} has been added to the queue.`;
  }

  static trackQueuedFirst(title: string): string {
    return `${bold(title)} has been added to the front of the queue.`;
  }

  static trackPlaying(title: string): string {
    return `${bold(title)} will now play.`;
  }

  static playlistQueued(count: number, name: string): string {
    return `Found and added \`${count}\` songs from playlist ${bold(name)}.`;
  }

  static noMatches(identifier: string): string {
    return `No audio could be found for ${quote(identifier)}.`;
  }

  static commonError(identifier: string, message: string): string {
    return `Error occurred when loading info for ${quote(identifier)}:\n${escapeAndDefuse(message)}`;
  }

  static suspiciousError(identifier: string): string {
    return `Suspicious error when loading info for ${quote(identifier)}. Sorry about that, it has been reported.`;
  }

  static upstreamBlocked(identifier: string): string {
    return `Error occurred when loading info for ${quote(identifier)}.\nThe source may be blocking us at the moment, please try again later.`;
  }

  static queueLimitReached(limit: number): string {
    return `You can't add tracks to a queue holding ${limit} or more tracks!`;
  }

  static playlistTooLarge(count: number, limit: number): string {
    return `The playlist's ${count} tracks won't fit: the queue is limited to ${limit} tracks.`;
  }

  static announcePlaylist(name: string, totalTracks: number): string {
    return `About to load playlist ${bold(name)} with up to \`${totalTracks}\` tracks. This may take a while, please be patient.`;
  }

  static rateLimited(timeUntilResetMs: number): string {
    const seconds = Math.max(1, Math.ceil(timeUntilResetMs / 1000));
    return `You are loading playlists too quickly. Try again in ${seconds} seconds.`;
  }
}
