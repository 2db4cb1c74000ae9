import {
  AliasNotFoundError,
  ArrayLengthMismatchError,
  SameIdentifierError
} from '../../middleware/errorHandler';
import { EnumerableMap, EnumerableMapSnapshot } from './enumerableMap';
import { ZERO_FEED_ID, isZeroFeedId, normalizeFeedId } from './feedId';
import { FeedId, FeedIdChange } from './feedTypes';

/**
 * Renames feed ids without breaking callers that still use the old id.
 * Resolution is a single hop: with a -> b and b -> c, `resolve(a)` is b.
 */
export class FeedIdAliasTable {
  private readonly changes = new EnumerableMap<FeedId>();

  resolve(feedId: FeedId): FeedId {
    return this.changes.get(feedId) ?? feedId;
  }

  resolveAll(feedIds: FeedId[]): FeedId[] {
    return feedIds.map(feedId => this.resolve(feedId));
  }

  getAlias(oldFeedId: FeedId): FeedId {
    return this.changes.get(oldFeedId) ?? ZERO_FEED_ID;
  }

  /** 1-based position of the old id in the changed list, 0 when absent. */
  positionOf(oldFeedId: FeedId): number {
    return this.changes.positionOf(oldFeedId);
  }

  listChanged(): FeedId[] {
    return this.changes.keyList();
  }

  listChanges(): FeedIdChange[] {
    return this.changes.entryList().map(([oldFeedId, newFeedId]) => ({ oldFeedId, newFeedId }));
  }

  /**
   * Applies the pairs in order. A zero new id removes the existing alias.
   * Not atomic on its own: callers snapshot and restore around it.
   */
  change(oldFeedIds: FeedId[], newFeedIds: FeedId[]): FeedIdChange[] {
    if (oldFeedIds.length !== newFeedIds.length) {
      throw new ArrayLengthMismatchError(oldFeedIds.length, newFeedIds.length);
    }

    const applied: FeedIdChange[] = [];
    for (let i = 0; i < oldFeedIds.length; i++) {
      const oldFeedId = normalizeFeedId(oldFeedIds[i], `oldFeedIds[${i}]`);
      const newFeedId = normalizeFeedId(newFeedIds[i], `newFeedIds[${i}]`);
      if (oldFeedId === newFeedId) {
        throw new SameIdentifierError(oldFeedId);
      }

      if (isZeroFeedId(newFeedId)) {
        if (this.changes.delete(oldFeedId) === undefined) {
          throw new AliasNotFoundError(oldFeedId);
        }
      } else {
        this.changes.set(oldFeedId, newFeedId);
      }
      applied.push({ oldFeedId, newFeedId });
    }
    return applied;
  }

  snapshot(): EnumerableMapSnapshot<FeedId> {
    return this.changes.snapshot();
  }

  restore(snapshot: EnumerableMapSnapshot<FeedId>): void {
    this.changes.restore(snapshot);
  }
}
