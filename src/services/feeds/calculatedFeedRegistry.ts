import {
  AlreadyExistsError,
  InvalidCategoryError,
  NotFoundError
} from '../../middleware/errorHandler';
import { EnumerableMap, EnumerableMapSnapshot } from './enumerableMap';
import { isCalculatedFeedId, normalizeFeedId } from './feedId';
import { CalculatedFeed, CalculatedFeedInfo, FeedId } from './feedTypes';

export type CalculatedFeedChange =
  | { type: 'added'; feedId: FeedId; feed: CalculatedFeed }
  | { type: 'replaced'; feedId: FeedId; previous: CalculatedFeed; feed: CalculatedFeed }
  | { type: 'removed'; feedId: FeedId };

/**
 * Calculated feed ids mapped to the contracts that compute them.
 * Mutations are not atomic on their own: callers snapshot and restore around them.
 */
export class CalculatedFeedRegistry {
  private readonly feeds = new EnumerableMap<CalculatedFeed>();

  get(feedId: FeedId): CalculatedFeed | undefined {
    return this.feeds.get(feedId);
  }

  /** 1-based list position, 0 when the id is not registered. */
  positionOf(feedId: FeedId): number {
    return this.feeds.positionOf(feedId);
  }

  list(): FeedId[] {
    return this.feeds.keyList();
  }

  describe(): CalculatedFeedInfo[] {
    return this.feeds.entryList().map(([feedId, feed]) => ({ feedId, address: feed.address }));
  }

  async add(feeds: CalculatedFeed[]): Promise<CalculatedFeedChange[]> {
    const changes: CalculatedFeedChange[] = [];
    for (const feed of feeds) {
      const feedId = normalizeFeedId(await feed.feedId());
      if (!isCalculatedFeedId(feedId)) {
        throw new InvalidCategoryError(feedId);
      }
      if (this.feeds.has(feedId)) {
        throw new AlreadyExistsError(feedId);
      }
      this.feeds.set(feedId, feed);
      changes.push({ type: 'added', feedId, feed });
    }
    return changes;
  }

  async replace(feeds: CalculatedFeed[]): Promise<CalculatedFeedChange[]> {
    const changes: CalculatedFeedChange[] = [];
    for (const feed of feeds) {
      const feedId = normalizeFeedId(await feed.feedId());
      const previous = this.feeds.get(feedId);
      if (!previous) {
        throw new NotFoundError('calculated feed does not exist', { feedId });
      }
      this.feeds.set(feedId, feed);
      changes.push({ type: 'replaced', feedId, previous, feed });
    }
    return changes;
  }

  remove(feedIds: FeedId[]): CalculatedFeedChange[] {
    const changes: CalculatedFeedChange[] = [];
    feedIds.forEach((rawFeedId, i) => {
      const feedId = normalizeFeedId(rawFeedId, `feedIds[${i}]`);
      if (this.feeds.delete(feedId) === undefined) {
        throw new NotFoundError('calculated feed does not exist', { feedId });
      }
      changes.push({ type: 'removed', feedId });
    });
    return changes;
  }

  snapshot(): EnumerableMapSnapshot<CalculatedFeed> {
    return this.feeds.snapshot();
  }

  restore(snapshot: EnumerableMapSnapshot<CalculatedFeed>): void {
    this.feeds.restore(snapshot);
  }
}
