import { RegistryEvent, RegistryEventBus } from '../../services/feeds/registryEvents';
import { BTC_USD, ETH_USD, SFLR_USD } from '../_utils/fakeCollaborators';

describe('RegistryEventBus', () => {
  let bus: RegistryEventBus;

  beforeEach(() => {
    bus = new RegistryEventBus();
  });

  it('should deliver events by name and to catch-all subscribers', () => {
    const changed: string[] = [];
    const all: RegistryEvent[] = [];
    bus.onRegistryEvent('FeedIdChanged', data => changed.push(data.newFeedId));
    bus.onAny(event => all.push(event));

    bus.publish([
      { name: 'FeedIdChanged', data: { oldFeedId: BTC_USD, newFeedId: ETH_USD } },
      { name: 'CalculatedFeedRemoved', data: { feedId: SFLR_USD } }
    ]);

    expect(changed).toEqual([ETH_USD]);
    expect(all.map(event => event.name)).toEqual(['FeedIdChanged', 'CalculatedFeedRemoved']);
  });

  it('should stop delivering after unsubscribing', () => {
    const received: string[] = [];
    const unsubscribe = bus.onRegistryEvent('CalculatedFeedRemoved', data => received.push(data.feedId));

    unsubscribe();
    bus.publish([{ name: 'CalculatedFeedRemoved', data: { feedId: SFLR_USD } }]);

    expect(received).toEqual([]);
    expect(bus.listenerCount('CalculatedFeedRemoved')).toBe(0);
  });
});
