import { ethers } from 'ethers';
import { NotFoundError } from '../../middleware/errorHandler';
import { ZERO_FEED_ID, encodeFeedId } from '../../services/feeds/feedId';
import {
  CalculatedFeed,
  FeedId,
  FeedValue,
  FeedValues,
  FeeSchedule,
  Hash32,
  IndexedFeedSource,
  RootPublisher
} from '../../services/feeds/feedTypes';

export const GOVERNANCE = '0x' + '1'.repeat(40);
export const STRANGER = '0x' + '9'.repeat(40);

export const BTC_USD = encodeFeedId({ category: 1, name: 'BTC/USD' });
export const ETH_USD = encodeFeedId({ category: 1, name: 'ETH/USD' });
export const XRP_USD = encodeFeedId({ category: 1, name: 'XRP/USD' });
export const SFLR_USD = encodeFeedId({ category: 32, name: 'SFLR/USD' });
export const WFLR_USD = encodeFeedId({ category: 33, name: 'WFLR/USD' });

export interface FakeIndexedFeed {
  feedId: FeedId;
  value: bigint;
  decimals: number;
}

/**
 * In-memory fast update source. Index i serves feeds[i]; removed slots
 * report the zero feed id.
 */
export class FakeIndexedFeedSource implements IndexedFeedSource {
  readonly fetches: Array<{ indices: number[]; value: bigint }> = [];
  readonly lookups: FeedId[] = [];
  failNextFetch = false;

  private readonly feeds: Array<FakeIndexedFeed | undefined>;

  constructor(feeds: FakeIndexedFeed[], public timestamp: bigint = 1700000000n) {
    this.feeds = [...feeds];
  }

  removeAt(index: number): void {
    this.feeds[index] = undefined;
  }

  async idToIndex(feedId: FeedId): Promise<number> {
    this.lookups.push(feedId);
    const index = this.feeds.findIndex(feed => feed?.feedId === feedId);
    if (index < 0) {
      throw new NotFoundError('feed does not exist', { feedId });
    }
    return index;
  }

  async indexToId(index: number): Promise<FeedId> {
    return this.feeds[index]?.feedId ?? ZERO_FEED_ID;
  }

  async listIds(): Promise<FeedId[]> {
    return this.feeds.map(feed => feed?.feedId ?? ZERO_FEED_ID);
  }

  async fetchBatch(indices: number[], value: bigint): Promise<FeedValues> {
    this.fetches.push({ indices: [...indices], value });
    if (this.failNextFetch) {
      this.failNextFetch = false;
      throw new Error('fast updater unavailable');
    }
    const feeds = indices.map(index => {
      const feed = this.feeds[index];
      if (!feed) {
        throw new NotFoundError('feed does not exist', { index });
      }
      return feed;
    });
    return {
      values: feeds.map(feed => feed.value),
      decimals: feeds.map(feed => feed.decimals),
      timestamp: this.timestamp
    };
  }
}

/**
 * Calculated feed that charges a fixed fee and rejects underpayment the way
 * the contract reverts.
 */
export class FakeCalculatedFeed implements CalculatedFeed {
  readonly payments: bigint[] = [];

  constructor(
    readonly address: string,
    private readonly id: FeedId,
    public fee: bigint,
    public current: FeedValue
  ) {}

  async feedId(): Promise<FeedId> {
    return this.id;
  }

  async calculateFee(): Promise<bigint> {
    return this.fee;
  }

  async fetchOne(value: bigint): Promise<FeedValue> {
    if (value < this.fee) {
      throw new Error('too low fee');
    }
    this.payments.push(value);
    return { ...this.current };
  }
}

export class FakeFeeSchedule implements FeeSchedule {
  readonly idQuotes: FeedId[][] = [];
  readonly indexQuotes: number[][] = [];

  constructor(
    private readonly feeById: Map<FeedId, bigint> = new Map(),
    private readonly feeByIndex: Map<number, bigint> = new Map()
  ) {}

  async feeForIds(feedIds: FeedId[]): Promise<bigint> {
    this.idQuotes.push([...feedIds]);
    return feedIds.reduce((sum, feedId) => sum + (this.feeById.get(feedId) ?? 0n), 0n);
  }

  async feeForIndices(indices: number[]): Promise<bigint> {
    this.indexQuotes.push([...indices]);
    return indices.reduce((sum, index) => sum + (this.feeByIndex.get(index) ?? 0n), 0n);
  }
}

export class FakeRootPublisher implements RootPublisher {
  private readonly roots = new Map<string, Hash32>();

  setRoot(protocolId: number, votingRoundId: number, root: Hash32): void {
    this.roots.set(`${protocolId}:${votingRoundId}`, root);
  }

  async rootFor(protocolId: number, votingRoundId: number): Promise<Hash32> {
    return this.roots.get(`${protocolId}:${votingRoundId}`) ?? ethers.ZeroHash;
  }
}

export function calculatedFeedAddress(n: number): string {
  return ethers.getAddress('0x' + n.toString(16).padStart(40, 'c'));
}
