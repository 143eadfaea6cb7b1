import { User, UserRateData, RequestRecord } from '@trackline/shared';
import { CollectionMetadata, LoadRequest, ICollectionImporter, IRateLimiter } from '../domain/loading';
import { createLogger, Logger } from '../infrastructure/logging';

export interface CollectionRateLimitOptions {
  /** Slow-collection items a requester may load per window */
  maxItems: number;
  windowMs: number;
}

export const DEFAULT_RATE_LIMIT_OPTIONS: CollectionRateLimitOptions = {
  maxItems: 1000,
  windowMs: 10 * 60 * 1000
};

/**
 * Sliding-window limiter for slow-loading collections.
 * Each load is weighted by its item count. A requester with nothing in the
 * window may always load one collection, however large.
 */
export class CollectionRateLimiter implements IRateLimiter {
  private readonly userRateData = new Map<string, UserRateData>();
  private readonly options: CollectionRateLimitOptions;
  private readonly log: Logger;

  constructor(
    private readonly importers: readonly ICollectionImporter[] = [],
    options: Partial<CollectionRateLimitOptions> = {},
    logger?: Logger
  ) {
    this.options = { ...DEFAULT_RATE_LIMIT_OPTIONS, ...options };
    this.log = logger ?? createLogger('rate-limiter');
  }

  /**
   * First importer that recognises the identifier wins
   */
  async collectionMetadata(identifier: string): Promise<CollectionMetadata | null> {
    for (const importer of this.importers) {
      const metadata = await importer.getCollectionMetadata(identifier);
      if (metadata !== null) {
        return metadata;
      }
    }
    return null;
  }

  isRateLimited(request: LoadRequest, collection: CollectionMetadata, itemCount: number): boolean {
    const user = request.requester;
    if (!this.canUserLoad(user, itemCount)) {
      this.log.info(
        { user: user.id, collection: collection.name, items: itemCount },
        'Rate limited a collection load'
      );
      return true;
    }

    this.recordRequest(user, request.identifier, itemCount);
    return false;
  }

  canUserLoad(user: User, weight: number): boolean {
    this.cleanupExpiredWindows();
    const used = this.getUsedItems(user);
    return used === 0 || used + weight <= this.options.maxItems;
  }

  recordRequest(user: User, identifier: string, weight: number): void {
    const record: RequestRecord = {
      timestamp: new Date(),
      identifier,
      weight: Math.max(0, weight)
    };

    this.userRateData.set(user.id, {
      userId: user.id,
      requests: [...this.getValidRequestsInWindow(user.id), record]
    });
  }

  /**
   * Milliseconds until the oldest load in the window expires
   */
  getTimeUntilReset(user: User): number {
    const validRequests = this.getValidRequestsInWindow(user.id);
    if (validRequests.length === 0) {
      return 0;
    }

    const windowEnd = validRequests[0].timestamp.getTime() + this.options.windowMs;
    return Math.max(0, windowEnd - Date.now());
  }

  getRemainingItems(user: User): number {
    this.cleanupExpiredWindows();
    return Math.max(0, this.options.maxItems - this.getUsedItems(user));
  }

  private getUsedItems(user: User): number {
    return this.getValidRequestsInWindow(user.id).reduce((sum, record) => sum + record.weight, 0);
  }

  private getValidRequestsInWindow(userId: string): readonly RequestRecord[] {
    const requests = this.userRateData.get(userId)?.requests ?? [];
    const cutoff = Date.now() - this.options.windowMs;
    return requests.filter((record) => record.timestamp.getTime() > cutoff);
  }

  private cleanupExpiredWindows(): void {
    const cutoff = Date.now() - this.options.windowMs;

    for (const [userId, rateData] of this.userRateData.entries()) {
      const validRequests = rateData.requests.filter((record) => record.timestamp.getTime() > cutoff);

      if (validRequests.length === 0) {
        this.userRateData.delete(userId);
      } else if (validRequests.length !== rateData.requests.length) {
        this.userRateData.set(userId, { userId, requests: validRequests });
      }
    }
  }
}
