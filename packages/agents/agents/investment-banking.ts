// Investment Banking — mandate intake for IPOs, bond issues, M&A and financing advisory
// Pulls in research and compliance on equity deals, sales & trading on bond distribution.

import { z } from 'zod';
import type { ClientRequestEvent, SequencedEvent } from '../types/broker-events.js';
import type { OutgoingMessage } from '../types/coordination.js';
import type { DecisionInput, DecisionOutput } from '../types/decision.js';
import { BaseDepartment, listOf, mentions } from './base-department.js';

export const DEAL_TYPES = ['ipo', 'bond', 'ma', 'financing'] as const;
export type DealType = typeof DEAL_TYPES[number];

const DEAL_KEYWORDS: Array<[DealType, string[]]> = [
  ['ipo', ['ipo', 'initial public offering', 'listing']],
  ['bond', ['bond', 'debt issu', 'notes offering']],
  ['ma', ['merger', 'acquisition', 'acquire', 'takeover']],
];

const DealDataSchema = z.object({ deal_type: z.enum(DEAL_TYPES).optional() }).passthrough();

/** Explicit `data.deal_type` wins; otherwise the first keyword family found in the request text. */
export function classifyDeal(event: ClientRequestEvent): DealType {
  const parsed = DealDataSchema.safeParse(event.data ?? {});
  if (parsed.success && parsed.data.deal_type) return parsed.data.deal_type;
  const match = DEAL_KEYWORDS.find(([, words]) => mentions(event.content, words));
  return match ? match[0] : 'financing';
}

export class InvestmentBankingDesk extends BaseDepartment {
  constructor() {
    super('investment_banking');
  }

  protected onEvent(event: SequencedEvent, input: DecisionInput): DecisionOutput {
    if (event.type === 'client_request') return this.takeMandate(event, input);

    if (event.type === 'market_update') {
      const action = event.data.market_sentiment === 'negative' ? 'delay_issuance' : 'proceed_pipeline';
      return this.opine({ action, sentiment: event.data.market_sentiment }, { confidence: 0.6 });
    }
    return {};
  }

  private takeMandate(event: ClientRequestEvent, input: DecisionInput): DecisionOutput {
    const dealType = classifyDeal(event);
    const client = event.sender?.name ?? 'client';
    const brief = { deal_type: dealType, client };

    const messages: OutgoingMessage[] = [];
    switch (dealType) {
      case 'ipo':
        messages.push(
          { to: 'research', topic: 'research_support', payload: brief },
          { to: 'risk_compliance', topic: 'request_review', payload: brief },
        );
        break;
      case 'bond':
        messages.push(
          { to: 'sales_trading', topic: 'prepare_distribution', payload: brief },
          { to: 'risk_compliance', topic: 'request_review', payload: brief },
        );
        break;
      case 'ma':
        messages.push({ to: 'research', topic: 'research_support', payload: brief });
        break;
      case 'financing':
        messages.push({ to: 'asset_management', topic: 'financing_support', payload: brief });
        break;
    }

    const deals = listOf(input.state, 'deals');
    return this.opine(
      { action: 'accept_mandate', ...brief },
      { confidence: 0.8, rationale: `${dealType} mandate for ${client}` },
      { messages, state: { deals: [...deals, { event_id: event.id, ...brief, status: 'in_progress' }] } },
    );
  }
}
