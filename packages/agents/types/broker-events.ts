// External events entering the brokerage, as validated by schemas/events.ts

import type { z } from 'zod';
import type {
  BrokerEventSchema,
  ClientRequestEventSchema,
  MarketUpdateEventSchema,
  RegulatoryAnnouncementEventSchema,
  TradingOpportunityEventSchema,
  RequestTypeSchema,
  ScenarioSchema,
} from '../schemas/events.js';

export type ClientRequestEvent = z.infer<typeof ClientRequestEventSchema>;
export type MarketUpdateEvent = z.infer<typeof MarketUpdateEventSchema>;
export type RegulatoryAnnouncementEvent = z.infer<typeof RegulatoryAnnouncementEventSchema>;
export type TradingOpportunityEvent = z.infer<typeof TradingOpportunityEventSchema>;
export type RequestType = z.infer<typeof RequestTypeSchema>;

export type BrokerEvent = z.infer<typeof BrokerEventSchema>;
export type BrokerEventType = BrokerEvent['type'];

export type Scenario = z.infer<typeof ScenarioSchema>;

/** An event once the broker has accepted it: frozen and stamped with its arrival order. */
export type SequencedEvent = Readonly<BrokerEvent> & { readonly sequence: number };
