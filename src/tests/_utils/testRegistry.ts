import { AllowListAuthorizationGate } from '../../services/feeds/authorization';
import { FeedRegistryService } from '../../services/feeds/feedRegistryService';
import { PaymentJournal } from '../../services/paymentJournal';
import {
  BTC_USD,
  ETH_USD,
  FakeCalculatedFeed,
  FakeFeeSchedule,
  FakeIndexedFeedSource,
  FakeRootPublisher,
  GOVERNANCE,
  SFLR_USD,
  XRP_USD,
  calculatedFeedAddress
} from './fakeCollaborators';

export const PROTOCOL_ID = 100;

export interface TestRegistry {
  registry: FeedRegistryService;
  source: FakeIndexedFeedSource;
  feeSchedule: FakeFeeSchedule;
  rootPublisher: FakeRootPublisher;
  sflr: FakeCalculatedFeed;
}

/**
 * Registry over three index-addressed feeds (BTC, ETH, XRP at 0, 1, 2)
 * with SFLR/USD registered as a calculated feed.
 */
export async function createTestRegistry(): Promise<TestRegistry> {
  const source = new FakeIndexedFeedSource([
    { feedId: BTC_USD, value: 6500000n, decimals: 2 },
    { feedId: ETH_USD, value: 250000n, decimals: 2 },
    { feedId: XRP_USD, value: 5000n, decimals: 4 }
  ]);
  const feeSchedule = new FakeFeeSchedule(
    new Map([[BTC_USD, 12n], [ETH_USD, 5n], [XRP_USD, 9n]]),
    new Map([[0, 12n], [1, 5n], [2, 9n]])
  );
  const rootPublisher = new FakeRootPublisher();
  const sflr = new FakeCalculatedFeed(calculatedFeedAddress(1), SFLR_USD, 8n, {
    value: 123456n,
    decimals: 4,
    timestamp: 1700000100n
  });

  const registry = new FeedRegistryService({
    indexedSource: source,
    feeSchedule,
    rootPublisher,
    authorizationGate: new AllowListAuthorizationGate([GOVERNANCE]),
    protocolId: PROTOCOL_ID,
    paymentJournal: new PaymentJournal(10)
  });
  await registry.addCalculatedFeeds(GOVERNANCE, [sflr]);

  return { registry, source, feeSchedule, rootPublisher, sflr };
}
