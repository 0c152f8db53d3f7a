// Shared builders for broker tests

import type {
  BrokerEvent, ClientRequestEvent, MarketUpdateEvent, RegulatoryAnnouncementEvent,
  SequencedEvent, TradingOpportunityEvent,
} from '../types/broker-events.js';
import type { Message } from '../types/coordination.js';
import type { DecisionFunction, DecisionInput, OpinionDraft } from '../types/decision.js';
import type { Role } from '../types/roles.js';

export function clientRequest(
  id: string,
  fields: Partial<Omit<ClientRequestEvent, 'id' | 'type'>> = {},
): ClientRequestEvent {
  return { id, type: 'client_request', request_type: 'general', content: '', ...fields };
}

export function marketUpdate(
  id: string,
  data: Partial<MarketUpdateEvent['data']> = {},
): MarketUpdateEvent {
  return {
    id,
    type: 'market_update',
    content: 'market move',
    data: { securities: [], market_sentiment: 'neutral', sector_performance: {}, ...data },
  };
}

export function regulatoryAnnouncement(id: string, keyChanges: string[]): RegulatoryAnnouncementEvent {
  return {
    id,
    type: 'regulatory_announcement',
    content: 'rule change',
    data: { effective_date: '2027-01-01', key_changes: keyChanges },
  };
}

export function tradingOpportunity(
  id: string,
  data: Partial<TradingOpportunityEvent['data']> = {},
): TradingOpportunityEvent {
  return {
    id,
    type: 'trading_opportunity',
    content: 'block available',
    data: {
      symbol: 'ACME',
      current_price: 100,
      bid_ask_spread: 0.1,
      market_depth: { bids: [{ price: 99.95, quantity: 500 }], asks: [{ price: 100.05, quantity: 300 }] },
      ...data,
    },
  };
}

export function sequenced(event: BrokerEvent, sequence = 1): SequencedEvent {
  return { ...event, sequence };
}

export function message(fields: Partial<Message> & Pick<Message, 'destination'>): Message {
  return {
    id: 'c1-m1',
    cycle: 1,
    eventId: 'e1',
    hop: 0,
    origin: 'gateway',
    topic: 'event',
    payload: {},
    ...fields,
  };
}

/** Decision input for calling a desk's `decide` directly. */
export function inputFor(
  role: Role,
  event: BrokerEvent,
  fields: { topic?: string; origin?: Message['origin']; payload?: Record<string, unknown>; state?: Record<string, unknown> } = {},
): DecisionInput {
  return {
    role,
    name: role,
    state: fields.state ?? {},
    event: sequenced(event),
    message: message({
      destination: role,
      eventId: event.id,
      topic: fields.topic ?? 'event',
      origin: fields.origin ?? 'gateway',
      payload: fields.payload ?? {},
    }),
  };
}

/** Opines `payload` on the external event and ignores everything else. */
export function opinesOnEvent(payload: Record<string, unknown>, extras: Omit<OpinionDraft, 'payload'> = {}): DecisionFunction {
  return ({ message: m }) => (m.topic === 'event' ? { opinion: { payload, ...extras } } : {});
}

export const abortSignal: AbortSignal = new AbortController().signal;
