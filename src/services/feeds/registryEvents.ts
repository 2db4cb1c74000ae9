import { EventEmitter } from 'events';
import { FeedId } from './feedTypes';

export interface FeedIdChangedEvent {
  oldFeedId: FeedId;
  newFeedId: FeedId;
}

export interface CalculatedFeedAddedEvent {
  feedId: FeedId;
  calculatedFeed: string;
}

export interface CalculatedFeedReplacedEvent {
  feedId: FeedId;
  oldCalculatedFeed: string;
  newCalculatedFeed: string;
}

export interface CalculatedFeedRemovedEvent {
  feedId: FeedId;
}

export type RegistryEvent =
  | { name: 'FeedIdChanged'; data: FeedIdChangedEvent }
  | { name: 'CalculatedFeedAdded'; data: CalculatedFeedAddedEvent }
  | { name: 'CalculatedFeedReplaced'; data: CalculatedFeedReplacedEvent }
  | { name: 'CalculatedFeedRemoved'; data: CalculatedFeedRemovedEvent };

type EventData<N extends RegistryEvent['name']> = Extract<RegistryEvent, { name: N }>['data'];

/**
 * In-process notifications for committed registry mutations.
 */
export class RegistryEventBus extends EventEmitter {
  constructor() {
    super();
    this.setMaxListeners(64);
  }

  // ── Emission ──

  publish(events: RegistryEvent[]): void {
    for (const event of events) {
      this.emit(event.name, event.data);
      this.emit('registry-event', event);
    }
  }

  // ── Subscriptions (return unsubscribe fn) ──

  onRegistryEvent<N extends RegistryEvent['name']>(name: N, cb: (data: EventData<N>) => void): () => void {
    this.on(name, cb);
    return () => this.off(name, cb);
  }

  onAny(cb: (event: RegistryEvent) => void): () => void {
    this.on('registry-event', cb);
    return () => this.off('registry-event', cb);
  }
}
