import { CalculatedFeedNotSupportedError, ChainError } from '../../middleware/errorHandler';
import { logger } from '../../utils/logger';
import { CalculatedFeedRegistry } from './calculatedFeedRegistry';
import { isCalculatedFeedId, normalizeFeedId } from './feedId';
import { FeedIdAliasTable } from './feedIdAliasTable';
import { CalculatedFeed, FeedId, FeedValue, FeedValues, IndexedFeedSource } from './feedTypes';
import { ValueLedger } from './valueLedger';

export interface CalculatedSlot {
  position: number;
  feedId: FeedId;
  feed: CalculatedFeed;
}

/**
 * A request split by origin. Both subsets keep the relative order in which
 * their ids appear in the request.
 */
export interface FeedPartition {
  feedIds: FeedId[];
  calculated: CalculatedSlot[];
  indexedFeedIds: FeedId[];
  indices: number[];
}

/**
 * Resolves aliases and splits the ids into calculated and index-addressed
 * subsets. Rejects when a calculated id has no registered contract, or with
 * the source's own error when an index-addressed id is not configured.
 */
export async function partitionFeedIds(
  feedIds: FeedId[],
  aliases: FeedIdAliasTable,
  calculatedFeeds: CalculatedFeedRegistry,
  indexedSource: IndexedFeedSource
): Promise<FeedPartition> {
  const resolved = feedIds.map((feedId, i) => aliases.resolve(normalizeFeedId(feedId, `feedIds[${i}]`)));
  const partition: FeedPartition = { feedIds: resolved, calculated: [], indexedFeedIds: [], indices: [] };

  for (let position = 0; position < resolved.length; position++) {
    const feedId = resolved[position];
    if (isCalculatedFeedId(feedId)) {
      const feed = calculatedFeeds.get(feedId);
      if (!feed) {
        throw new CalculatedFeedNotSupportedError(feedId);
      }
      partition.calculated.push({ position, feedId, feed });
    } else {
      partition.indexedFeedIds.push(feedId);
    }
  }

  for (const feedId of partition.indexedFeedIds) {
    partition.indices.push(await indexedSource.idToIndex(feedId));
  }
  return partition;
}

export class FeedResolver {
  constructor(
    private readonly aliases: FeedIdAliasTable,
    private readonly calculatedFeeds: CalculatedFeedRegistry,
    private readonly indexedSource: IndexedFeedSource,
    private readonly ledger: ValueLedger
  ) {}

  async resolveOne(feedId: FeedId, value: bigint): Promise<FeedValue> {
    const resolved = this.aliases.resolve(normalizeFeedId(feedId));

    if (isCalculatedFeedId(resolved)) {
      const feed = this.calculatedFeeds.get(resolved);
      if (!feed) {
        throw new CalculatedFeedNotSupportedError(resolved);
      }
      return feed.fetchOne(this.ledger.forward(value, 'calculated', resolved));
    }

    const index = await this.indexedSource.idToIndex(resolved);
    return this.fetchByIndex(index, value);
  }

  async resolveMany(feedIds: FeedId[], value: bigint): Promise<FeedValues> {
    const partition = await partitionFeedIds(feedIds, this.aliases, this.calculatedFeeds, this.indexedSource);

    if (partition.calculated.length === 0) {
      return this.fetchByIndices(partition.indices, value);
    }

    const count = partition.feedIds.length;
    const values = new Array<bigint>(count).fill(0n);
    const decimals = new Array<number>(count).fill(0);
    const isCalculated = new Array<boolean>(count).fill(false);
    let timestamp = 0n;

    for (const { position, feedId, feed } of partition.calculated) {
      const fee = await feed.calculateFee();
      const result = await feed.fetchOne(this.ledger.forward(fee, 'calculated', feedId));
      values[position] = result.value;
      decimals[position] = result.decimals;
      timestamp = result.timestamp;
      isCalculated[position] = true;
    }

    if (partition.indices.length > 0) {
      // The index-addressed batch receives whatever value is left after the calculated fees
      const batch = await this.fetchChecked(partition.indices, this.ledger.forwardAll('indexed'));
      let next = 0;
      for (let position = 0; position < count; position++) {
        if (!isCalculated[position]) {
          values[position] = batch.values[next];
          decimals[position] = batch.decimals[next];
          next++;
        }
      }
      // TODO: decide whether mixed batches should reject differing source timestamps; today the last writer wins
      timestamp = batch.timestamp;
    }

    logger.debug('Resolved mixed feed batch', {
      requested: count,
      calculated: partition.calculated.length,
      indexed: partition.indices.length
    });

    return { values, decimals, timestamp };
  }

  async fetchByIndex(index: number, value: bigint): Promise<FeedValue> {
    const batch = await this.fetchByIndices([index], value);
    return { value: batch.values[0], decimals: batch.decimals[0], timestamp: batch.timestamp };
  }

  async fetchByIndices(indices: number[], value: bigint): Promise<FeedValues> {
    return this.fetchChecked(indices, this.ledger.forward(value, 'indexed'));
  }

  private async fetchChecked(indices: number[], forwarded: bigint): Promise<FeedValues> {
    const batch = await this.indexedSource.fetchBatch(indices, forwarded);
    if (batch.values.length !== indices.length || batch.decimals.length !== indices.length) {
      throw new ChainError('indexed feed source returned a malformed batch', {
        requested: indices.length,
        values: batch.values.length,
        decimals: batch.decimals.length
      });
    }
    return batch;
  }
}
