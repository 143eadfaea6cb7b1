import { User, escapeAndDefuse } from '@trackline/shared';
import { IReplySink } from '../../domain/loading';

export interface Notice {
  readonly id: number;
  readonly sessionId: string;
  readonly requesterId: string;
  readonly text: string;
  readonly timestamp: string;
}

/**
 * Recent notices per session, for clients that poll instead of chatting.
 * Only the newest `historySize` notices of each session are kept.
 */
export class NoticeBoard {
  private readonly notices = new Map<string, Notice[]>();
  private nextId = 1;

  constructor(private readonly historySize = 50) {}

  post(sessionId: string, requester: User, text: string): Notice {
    const notice: Notice = {
      id: this.nextId++,
      sessionId,
      requesterId: requester.id,
      text,
      timestamp: new Date().toISOString()
    };

    const history = this.notices.get(sessionId) ?? [];
    history.push(notice);
    if (history.length > this.historySize) {
      history.splice(0, history.length - this.historySize);
    }
    this.notices.set(sessionId, history);
    return notice;
  }

  /**
   * Notices of a session, oldest first, optionally only those after `sinceId`
   */
  list(sessionId: string, sinceId = 0): Notice[] {
    return (this.notices.get(sessionId) ?? []).filter((notice) => notice.id > sinceId);
  }

  clear(sessionId: string): void {
    this.notices.delete(sessionId);
  }

  sinkFor(sessionId: string, requester: User): IReplySink {
    return {
      reply: (text: string): void => {
        this.post(sessionId, requester, text);
      },
      replyWithRequesterName: (text: string): void => {
        this.post(sessionId, requester, `${escapeAndDefuse(requester.name)}: ${text}`);
      }
    };
  }
}
