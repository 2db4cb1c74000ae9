import { UnauthorizedError, ValidationError } from '../../middleware/errorHandler';
import { logger } from '../../utils/logger';
import { PaymentJournal, PaymentOperation } from '../paymentJournal';
import { CalculatedFeedChange, CalculatedFeedRegistry } from './calculatedFeedRegistry';
import { toWei, toWeiBatch } from './decimals';
import { FeeAggregator } from './feeAggregator';
import { isZeroFeedId, normalizeFeedId } from './feedId';
import { FeedIdAliasTable } from './feedIdAliasTable';
import { FeedResolver } from './feedResolver';
import {
  AuthorizationGate,
  CalculatedFeed,
  CalculatedFeedInfo,
  FeedDataWithProof,
  FeedId,
  FeedIdChange,
  FeedValue,
  FeedValueInWei,
  FeedValues,
  FeedValuesInWei,
  FeeSchedule,
  IndexedFeedSource,
  RootPublisher
} from './feedTypes';
import { OperationQueue } from './operationQueue';
import { ProofVerifier } from './proofVerifier';
import { RegistryEvent, RegistryEventBus } from './registryEvents';
import { ValueLedger } from './valueLedger';

export interface FeedRegistryOptions {
  indexedSource: IndexedFeedSource;
  feeSchedule: FeeSchedule;
  rootPublisher: RootPublisher;
  authorizationGate: AuthorizationGate;
  protocolId: number;
  paymentJournal?: PaymentJournal;
  events?: RegistryEventBus;
}

interface PaymentRequest {
  feedIds?: FeedId[];
  indices?: number[];
}

function toRegistryEvent(change: CalculatedFeedChange): RegistryEvent {
  switch (change.type) {
    case 'added':
      return {
        name: 'CalculatedFeedAdded',
        data: { feedId: change.feedId, calculatedFeed: change.feed.address }
      };
    case 'replaced':
      return {
        name: 'CalculatedFeedReplaced',
        data: {
          feedId: change.feedId,
          oldCalculatedFeed: change.previous.address,
          newCalculatedFeed: change.feed.address
        }
      };
    case 'removed':
      return { name: 'CalculatedFeedRemoved', data: { feedId: change.feedId } };
  }
}

/**
 * Public face of the registry: unified lookup and payable fetch across
 * index-addressed and calculated feeds, fee quotes, governance-gated
 * registry changes and proof verification.
 *
 * Every operation runs alone, in call order. Governance changes are all or
 * nothing and publish their events only once committed; a failed fetch
 * restores the transferable balance it was credited with.
 */
export class FeedRegistryService {
  readonly events: RegistryEventBus;
  readonly payments: PaymentJournal;

  private readonly aliases = new FeedIdAliasTable();
  private readonly calculatedFeeds = new CalculatedFeedRegistry();
  private readonly ledger = new ValueLedger();
  private readonly queue = new OperationQueue();

  private readonly indexedSource: IndexedFeedSource;
  private readonly authorizationGate: AuthorizationGate;
  private readonly resolver: FeedResolver;
  private readonly feeAggregator: FeeAggregator;
  private readonly proofVerifier: ProofVerifier;

  constructor(options: FeedRegistryOptions) {
    this.indexedSource = options.indexedSource;
    this.authorizationGate = options.authorizationGate;
    this.events = options.events ?? new RegistryEventBus();
    this.payments = options.paymentJournal ?? new PaymentJournal();
    this.resolver = new FeedResolver(this.aliases, this.calculatedFeeds, this.indexedSource, this.ledger);
    this.feeAggregator = new FeeAggregator(this.aliases, this.calculatedFeeds, this.indexedSource, options.feeSchedule);
    this.proofVerifier = new ProofVerifier(options.rootPublisher, options.protocolId);

    logger.info('Feed registry initialized', { protocolId: options.protocolId });
  }

  // ── Enumeration and lookup ──

  getSupportedFeedIds(): Promise<FeedId[]> {
    return this.queue.run(async () => {
      const indexed = await this.indexedSource.listIds();
      return [
        ...indexed.map(feedId => feedId.toLowerCase()).filter(feedId => !isZeroFeedId(feedId)),
        ...this.calculatedFeeds.list()
      ];
    });
  }

  getFeedIdChanges(): Promise<FeedIdChange[]> {
    return this.queue.run(async () => this.aliases.listChanges());
  }

  getFeedId(index: number): Promise<FeedId> {
    return this.queue.run(async () => this.indexedSource.indexToId(index));
  }

  getFeedIndex(feedId: FeedId): Promise<number> {
    return this.queue.run(async () => this.indexedSource.idToIndex(this.aliases.resolve(normalizeFeedId(feedId))));
  }

  getCalculatedFeedContract(feedId: FeedId): Promise<CalculatedFeed | undefined> {
    return this.queue.run(async () => this.calculatedFeeds.get(normalizeFeedId(feedId)));
  }

  getCalculatedFeedIds(): Promise<FeedId[]> {
    return this.queue.run(async () => this.calculatedFeeds.list());
  }

  getCalculatedFeeds(): Promise<CalculatedFeedInfo[]> {
    return this.queue.run(async () => this.calculatedFeeds.describe());
  }

  // ── Payable fetch ──

  getFeedById(feedId: FeedId, value: bigint = 0n): Promise<FeedValue> {
    return this.pay('getFeedById', { feedIds: [feedId] }, value, () => this.resolver.resolveOne(feedId, value));
  }

  getFeedsById(feedIds: FeedId[], value: bigint = 0n): Promise<FeedValues> {
    return this.pay('getFeedsById', { feedIds }, value, () => this.resolver.resolveMany(feedIds, value));
  }

  getFeedByIdInWei(feedId: FeedId, value: bigint = 0n): Promise<FeedValueInWei> {
    return this.pay('getFeedByIdInWei', { feedIds: [feedId] }, value, async () => {
      const feed = await this.resolver.resolveOne(feedId, value);
      return { value: toWei(feed.value, feed.decimals), timestamp: feed.timestamp };
    });
  }

  getFeedsByIdInWei(feedIds: FeedId[], value: bigint = 0n): Promise<FeedValuesInWei> {
    return this.pay('getFeedsByIdInWei', { feedIds }, value, async () => {
      const feeds = await this.resolver.resolveMany(feedIds, value);
      return { values: toWeiBatch(feeds.values, feeds.decimals), timestamp: feeds.timestamp };
    });
  }

  getFeedByIndex(index: number, value: bigint = 0n): Promise<FeedValue> {
    return this.pay('getFeedByIndex', { indices: [index] }, value, () => this.resolver.fetchByIndex(index, value));
  }

  getFeedsByIndex(indices: number[], value: bigint = 0n): Promise<FeedValues> {
    return this.pay('getFeedsByIndex', { indices }, value, () => this.resolver.fetchByIndices(indices, value));
  }

  getFeedByIndexInWei(index: number, value: bigint = 0n): Promise<FeedValueInWei> {
    return this.pay('getFeedByIndexInWei', { indices: [index] }, value, async () => {
      const feed = await this.resolver.fetchByIndex(index, value);
      return { value: toWei(feed.value, feed.decimals), timestamp: feed.timestamp };
    });
  }

  getFeedsByIndexInWei(indices: number[], value: bigint = 0n): Promise<FeedValuesInWei> {
    return this.pay('getFeedsByIndexInWei', { indices }, value, async () => {
      const feeds = await this.resolver.fetchByIndices(indices, value);
      return { values: toWeiBatch(feeds.values, feeds.decimals), timestamp: feeds.timestamp };
    });
  }

  // ── Fee quotes ──

  calculateFeeById(feedId: FeedId): Promise<bigint> {
    return this.queue.run(() => this.feeAggregator.feeForOne(feedId));
  }

  calculateFeeByIds(feedIds: FeedId[]): Promise<bigint> {
    return this.queue.run(() => this.feeAggregator.feeForMany(feedIds));
  }

  calculateFeeByIndex(index: number): Promise<bigint> {
    return this.queue.run(() => this.feeAggregator.feeForIndex(index));
  }

  calculateFeeByIndices(indices: number[]): Promise<bigint> {
    return this.queue.run(() => this.feeAggregator.feeForIndices(indices));
  }

  // ── Governance ──

  changeFeedIds(caller: string, oldFeedIds: FeedId[], newFeedIds: FeedId[]): Promise<void> {
    return this.govern(caller, 'changeFeedIds', async () =>
      this.aliases.change(oldFeedIds, newFeedIds).map((change): RegistryEvent => ({
        name: 'FeedIdChanged',
        data: change
      }))
    );
  }

  addCalculatedFeeds(caller: string, feeds: CalculatedFeed[]): Promise<void> {
    return this.govern(caller, 'addCalculatedFeeds', async () =>
      (await this.calculatedFeeds.add(feeds)).map(toRegistryEvent)
    );
  }

  replaceCalculatedFeeds(caller: string, feeds: CalculatedFeed[]): Promise<void> {
    return this.govern(caller, 'replaceCalculatedFeeds', async () =>
      (await this.calculatedFeeds.replace(feeds)).map(toRegistryEvent)
    );
  }

  removeCalculatedFeeds(caller: string, feedIds: FeedId[]): Promise<void> {
    return this.govern(caller, 'removeCalculatedFeeds', async () =>
      this.calculatedFeeds.remove(feedIds).map(toRegistryEvent)
    );
  }

  // ── Proofs ──

  verifyFeedData(feedData: FeedDataWithProof): Promise<true> {
    return this.queue.run(() => this.proofVerifier.verify(feedData));
  }

  private pay<T>(
    operation: PaymentOperation,
    request: PaymentRequest,
    value: bigint,
    fetch: () => Promise<T>
  ): Promise<T> {
    return this.queue.run(async () => {
      if (value < 0n) {
        throw new ValidationError('value must not be negative', 'value');
      }
      const snapshot = this.ledger.snapshot();
      this.ledger.credit(value);
      try {
        const result = await fetch();
        this.payments.record({
          operation,
          ...request,
          valueReceived: value,
          forwarded: this.ledger.takeForwards()
        });
        return result;
      } catch (error) {
        this.ledger.restore(snapshot);
        logger.warn('Feed fetch aborted', {
          operation,
          ...request,
          value,
          error: error instanceof Error ? error.message : String(error)
        });
        throw error;
      }
    });
  }

  private govern(caller: string, action: string, apply: () => Promise<RegistryEvent[]>): Promise<void> {
    return this.queue.run(async () => {
      if (!(await this.authorizationGate.isAuthorized(caller))) {
        throw new UnauthorizedError(caller);
      }

      const aliasSnapshot = this.aliases.snapshot();
      const feedSnapshot = this.calculatedFeeds.snapshot();
      let events: RegistryEvent[];
      try {
        events = await apply();
      } catch (error) {
        this.aliases.restore(aliasSnapshot);
        this.calculatedFeeds.restore(feedSnapshot);
        logger.warn('Registry change rolled back', {
          action,
          caller,
          error: error instanceof Error ? error.message : String(error)
        });
        throw error;
      }

      logger.info('Registry change committed', { action, caller, events: events.length });
      this.events.publish(events);
    });
  }
}
