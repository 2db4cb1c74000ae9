import { CalculatedFeedNotSupportedError } from '../../middleware/errorHandler';
import { CalculatedFeedRegistry } from './calculatedFeedRegistry';
import { isCalculatedFeedId, normalizeFeedId } from './feedId';
import { FeedIdAliasTable } from './feedIdAliasTable';
import { partitionFeedIds } from './feedResolver';
import { FeedId, FeeSchedule, IndexedFeedSource } from './feedTypes';

/**
 * Quotes the fee for a request. Calculated feeds price themselves, the
 * index-addressed subset is priced by the fee schedule in one call.
 */
export class FeeAggregator {
  constructor(
    private readonly aliases: FeedIdAliasTable,
    private readonly calculatedFeeds: CalculatedFeedRegistry,
    private readonly indexedSource: IndexedFeedSource,
    private readonly feeSchedule: FeeSchedule
  ) {}

  async feeForOne(feedId: FeedId): Promise<bigint> {
    const resolved = this.aliases.resolve(normalizeFeedId(feedId));

    if (isCalculatedFeedId(resolved)) {
      const feed = this.calculatedFeeds.get(resolved);
      if (!feed) {
        throw new CalculatedFeedNotSupportedError(resolved);
      }
      return feed.calculateFee();
    }

    // rejects for ids the source does not know
    await this.indexedSource.idToIndex(resolved);
    return this.feeSchedule.feeForIds([resolved]);
  }

  async feeForMany(feedIds: FeedId[]): Promise<bigint> {
    const partition = await partitionFeedIds(feedIds, this.aliases, this.calculatedFeeds, this.indexedSource);

    let fee = 0n;
    for (const { feed } of partition.calculated) {
      fee += await feed.calculateFee();
    }
    if (partition.indexedFeedIds.length > 0) {
      fee += await this.feeSchedule.feeForIds(partition.indexedFeedIds);
    }
    return fee;
  }

  async feeForIndex(index: number): Promise<bigint> {
    return this.feeSchedule.feeForIndices([index]);
  }

  async feeForIndices(indices: number[]): Promise<bigint> {
    return this.feeSchedule.feeForIndices(indices);
  }
}
