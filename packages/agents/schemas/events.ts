// External event schemas — what the market, clients and regulators send the broker

import { z } from 'zod';
import { ROLES } from '../types/roles.js';

export const RoleSchema = z.enum(ROLES);

export const SenderSchema = z.object({
  name: z.string().min(1).describe('Counterparty name'),
  type: z.string().min(1).describe('Counterparty type, e.g. corporate, financial_institutions'),
  attributes: z.record(z.unknown()).optional().describe('Free-form counterparty attributes'),
});

const EnvelopeSchema = z.object({
  id: z.string().min(1).describe('Event id, unique within a scenario'),
  description: z.string().optional(),
  content: z.string().describe('Free-text body of the event'),
  sender: SenderSchema.optional(),
  target_roles: z.array(RoleSchema).min(1).optional()
    .describe('Explicit routing override; replaces the subscription table'),
  timestamp: z.string().optional(),
});

export const RequestTypeSchema = z.enum([
  'investment_banking',
  'trading',
  'research',
  'wealth_management',
  'asset_management',
  'general',
]);

export const ClientRequestEventSchema = EnvelopeSchema.extend({
  type: z.literal('client_request'),
  request_type: RequestTypeSchema,
  data: z.record(z.unknown()).optional(),
});

const SecuritySchema = z.object({
  symbol: z.string().min(1),
  price: z.number(),
  price_change: z.number().optional(),
  volume_change: z.number().optional(),
});

export const MarketUpdateEventSchema = EnvelopeSchema.extend({
  type: z.literal('market_update'),
  data: z.object({
    securities: z.array(SecuritySchema),
    market_sentiment: z.enum(['positive', 'neutral', 'negative']),
    sector_performance: z.record(z.number()),
  }),
});

export const RegulatoryAnnouncementEventSchema = EnvelopeSchema.extend({
  type: z.literal('regulatory_announcement'),
  data: z.object({
    effective_date: z.string().min(1),
    key_changes: z.array(z.string()),
  }),
});

const DepthLevelSchema = z.object({
  price: z.number(),
  quantity: z.number().nonnegative(),
});

export const TradingOpportunityEventSchema = EnvelopeSchema.extend({
  type: z.literal('trading_opportunity'),
  data: z.object({
    symbol: z.string().min(1),
    current_price: z.number().positive(),
    bid_ask_spread: z.number().nonnegative(),
    market_depth: z.object({
      bids: z.array(DepthLevelSchema),
      asks: z.array(DepthLevelSchema),
    }),
  }),
});

export const BrokerEventSchema = z.discriminatedUnion('type', [
  ClientRequestEventSchema,
  MarketUpdateEventSchema,
  RegulatoryAnnouncementEventSchema,
  TradingOpportunityEventSchema,
]);

export const ScenarioSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  num_cycles: z.number().int().positive().optional(),
  events: z.array(BrokerEventSchema),
});
