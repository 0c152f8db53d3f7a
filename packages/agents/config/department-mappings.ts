// Department mappings — default topology, event subscriptions, primary owners and priorities
// Every table here can be overridden through BrokerSettings; these are the house defaults.

import { ROLES, type Role } from '../types/roles.js';
import type { BrokerEvent, BrokerEventType, RequestType } from '../types/broker-events.js';

export interface EdgeSpec {
  from: Role;
  to: Role;
  bidirectional?: boolean;
}

// Executive reaches everyone; compliance oversees every business desk;
// research feeds the client-facing desks and deal teams; peers talk among themselves.
export const DEFAULT_EDGES: EdgeSpec[] = [
  { from: 'executive', to: 'investment_banking', bidirectional: true },
  { from: 'executive', to: 'sales_trading', bidirectional: true },
  { from: 'executive', to: 'research', bidirectional: true },
  { from: 'executive', to: 'wealth_management', bidirectional: true },
  { from: 'executive', to: 'asset_management', bidirectional: true },
  { from: 'executive', to: 'risk_compliance', bidirectional: true },
  { from: 'risk_compliance', to: 'investment_banking', bidirectional: true },
  { from: 'risk_compliance', to: 'sales_trading', bidirectional: true },
  { from: 'risk_compliance', to: 'wealth_management', bidirectional: true },
  { from: 'risk_compliance', to: 'asset_management', bidirectional: true },
  { from: 'research', to: 'sales_trading', bidirectional: true },
  { from: 'research', to: 'asset_management', bidirectional: true },
  { from: 'research', to: 'wealth_management', bidirectional: true },
  { from: 'research', to: 'investment_banking', bidirectional: true },
  { from: 'investment_banking', to: 'sales_trading', bidirectional: true },
  { from: 'investment_banking', to: 'asset_management', bidirectional: true },
  { from: 'sales_trading', to: 'asset_management', bidirectional: true },
  { from: 'wealth_management', to: 'asset_management', bidirectional: true },
];

/** `'keywords'` routes by classifying the request text with ROUTING_KEYWORDS. */
export type ClientRequestRoute = Role[] | 'keywords';

export interface SubscriptionTable {
  client_request: Record<RequestType, ClientRequestRoute>;
  market_update: Role[];
  regulatory_announcement: Role[];
  trading_opportunity: Role[];
}

export const DEFAULT_SUBSCRIPTIONS: SubscriptionTable = {
  client_request: {
    investment_banking: ['investment_banking'],
    trading: ['sales_trading'],
    research: ['research'],
    wealth_management: ['wealth_management'],
    asset_management: ['asset_management'],
    general: 'keywords',
  },
  market_update: ['sales_trading', 'research', 'risk_compliance'],
  regulatory_announcement: ['risk_compliance'],
  trading_opportunity: ['research', 'sales_trading', 'risk_compliance'],
};

export const ROUTING_KEYWORDS: Record<Role, string[]> = {
  investment_banking: ['ipo', 'listing', 'underwrit', 'merger', 'acquisition', 'bond issu'],
  sales_trading: ['trade', 'buy', 'sell', 'order', 'quote', 'liquidity'],
  research: ['research', 'report', 'rating', 'outlook', 'forecast'],
  wealth_management: ['wealth', 'retirement', 'estate', 'family office', 'financial plan'],
  asset_management: ['fund', 'mandate', 'portfolio', 'etf'],
  risk_compliance: ['risk', 'compliance', 'audit', 'kyc', 'sanction'],
  executive: ['strategy', 'partnership', 'board'],
};

/**
 * Score every role by keyword hits in `text`; the best score wins and ties all win.
 * Returns an empty list when nothing matches.
 */
export function classifyByKeywords(text: string, keywords: Record<Role, string[]> = ROUTING_KEYWORDS): Role[] {
  const lowered = text.toLowerCase();
  let best = 0;
  const scores: Array<[Role, number]> = [];

  for (const role of ROLES) {
    const score = keywords[role].filter(w => lowered.includes(w)).length;
    if (score > 0) scores.push([role, score]);
    if (score > best) best = score;
  }

  return best === 0 ? [] : scores.filter(([, s]) => s === best).map(([role]) => role);
}

const CLIENT_REQUEST_OWNERS: Record<RequestType, Role | null> = {
  investment_banking: 'investment_banking',
  trading: 'sales_trading',
  research: 'research',
  wealth_management: 'wealth_management',
  asset_management: 'asset_management',
  general: null,
};

const EVENT_OWNERS: Record<Exclude<BrokerEventType, 'client_request'>, Role> = {
  market_update: 'research',
  regulatory_announcement: 'risk_compliance',
  trading_opportunity: 'sales_trading',
};

/** The department that owns the business decision for an event, if any. */
export function primaryOwnerOf(event: BrokerEvent): Role | null {
  if (event.type === 'client_request') return CLIENT_REQUEST_OWNERS[event.request_type];
  return EVENT_OWNERS[event.type];
}

export const DEFAULT_ROLE_PRIORITY: Record<Role, number> = {
  executive: 3,
  investment_banking: 1,
  sales_trading: 1,
  research: 1,
  wealth_management: 1,
  asset_management: 1,
  risk_compliance: 1,
};

export const DEFAULT_PRIMARY_OWNER_PRIORITY = 2;
export const DEFAULT_HOP_LIMIT = 3;
export const DEFAULT_DECISION_TIMEOUT_MS = 30_000;
