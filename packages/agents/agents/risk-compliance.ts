// Risk & Compliance — counterparty screening, regulatory change, exposure limits
// The only desk whose blocking opinions veto a decision.

import type { BrokerEvent, SequencedEvent } from '../types/broker-events.js';
import type { Message } from '../types/coordination.js';
import type { DecisionInput, DecisionOutput } from '../types/decision.js';
import { BaseDepartment, listOf } from './base-department.js';

export const DRAWDOWN_THRESHOLD = -0.05;
export const MAX_SPREAD_RATIO = 0.02;
/** Rule changes at or above this count are briefed to the executive committee. */
export const BRIEFING_THRESHOLD = 3;

export interface ScreeningResult {
  cleared: boolean;
  reason?: string;
}

/** KYC and sanctions screen on the event's sender attributes. */
export function screenCounterparty(event: BrokerEvent): ScreeningResult {
  const attributes: Record<string, unknown> = event.sender?.attributes ?? {};
  if (attributes.sanctioned === true) return { cleared: false, reason: 'counterparty is on a sanctions list' };
  if (attributes.kyc_status === 'failed') return { cleared: false, reason: 'counterparty failed KYC' };
  return { cleared: true };
}

export class RiskComplianceDesk extends BaseDepartment {
  constructor() {
    super('risk_compliance');
  }

  protected onEvent(event: SequencedEvent, input: DecisionInput): DecisionOutput {
    switch (event.type) {
      case 'client_request':
        return this.review(event);

      case 'regulatory_announcement': {
        const { effective_date, key_changes } = event.data;
        const update = { effective_date, changes: key_changes.length };
        const policies = listOf(input.state, 'policies');
        return this.opine(
          { action: 'update_policies', ...update },
          { confidence: 0.9 },
          {
            messages: key_changes.length >= BRIEFING_THRESHOLD
              ? [{ to: 'executive', topic: 'briefing', payload: { event_id: event.id, ...update } }]
              : [],
            state: { policies: [...policies, { event_id: event.id, ...update }] },
          },
        );
      }

      case 'market_update': {
        const decliners = event.data.securities
          .filter(s => (s.price_change ?? 0) <= DRAWDOWN_THRESHOLD)
          .map(s => s.symbol);
        if (event.data.market_sentiment === 'negative' || decliners.length > 0) {
          return this.opine({ action: 'reduce_exposure', symbols: decliners }, { confidence: 0.7 });
        }
        return this.opine({ action: 'maintain_limits' }, { confidence: 0.6 });
      }

      case 'trading_opportunity': {
        const ratio = event.data.bid_ask_spread / event.data.current_price;
        if (ratio > MAX_SPREAD_RATIO) {
          return this.opine(
            { action: 'reject', reason: 'bid-ask spread exceeds limit' },
            { blocking: true, confidence: 0.9 },
          );
        }
        return this.opine({ action: 'approve' }, { confidence: 0.7 });
      }
    }
  }

  protected onMessage(message: Message, input: DecisionInput): DecisionOutput {
    if (message.topic !== 'request_review') return super.onMessage(message, input);

    const reviews = listOf(input.state, 'reviews');
    const result = this.review(input.event);
    return {
      ...result,
      state: { reviews: [...reviews, { event_id: input.event.id, requested_by: message.origin, cleared: !result.opinion?.blocking }] },
    };
  }

  private review(event: BrokerEvent): DecisionOutput {
    const screening = screenCounterparty(event);
    if (!screening.cleared) {
      return this.opine(
        { action: 'decline', reason: screening.reason },
        { blocking: true, confidence: 0.95, rationale: screening.reason },
      );
    }
    return this.opine({ action: 'approve' }, { confidence: 0.8 });
  }
}
