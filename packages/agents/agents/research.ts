// Research — sector outlooks from market updates, published to every connected desk

import { z } from 'zod';
import type { SequencedEvent } from '../types/broker-events.js';
import type { Message } from '../types/coordination.js';
import type { DecisionInput, DecisionOutput } from '../types/decision.js';
import { BaseDepartment, listOf } from './base-department.js';

export type Outlook = 'overweight' | 'neutral' | 'underweight';
export const OutlookSchema = z.enum(['overweight', 'neutral', 'underweight']);

/** Average sector move beyond ±1% tilts the house view. */
export const OUTLOOK_BAND = 0.01;

export function sectorOutlook(performance: Readonly<Record<string, number>>): Outlook {
  const moves = Object.values(performance);
  if (moves.length === 0) return 'neutral';
  const average = moves.reduce((sum, m) => sum + m, 0) / moves.length;
  if (average > OUTLOOK_BAND) return 'overweight';
  if (average < -OUTLOOK_BAND) return 'underweight';
  return 'neutral';
}

export class ResearchDesk extends BaseDepartment {
  constructor() {
    super('research');
  }

  protected onEvent(event: SequencedEvent, input: DecisionInput): DecisionOutput {
    switch (event.type) {
      case 'market_update': {
        const outlook = sectorOutlook(event.data.sector_performance);
        return this.opine(
          { action: 'publish_outlook', outlook },
          { confidence: 0.7 },
          {
            messages: [{ to: 'broadcast', topic: 'research_note', payload: { outlook } }],
            state: { outlook },
          },
        );
      }

      case 'trading_opportunity': {
        const outlook = OutlookSchema.catch('neutral').parse(input.state.outlook);
        const action = outlook === 'underweight' ? 'pass' : 'execute';
        return this.opine({ action, symbol: event.data.symbol }, { confidence: 0.5, rationale: `house view ${outlook}` });
      }

      case 'client_request':
        return this.opine({ action: 'deliver_report' }, { confidence: 0.6 });

      case 'regulatory_announcement':
        return {};
    }
  }

  protected onMessage(message: Message, input: DecisionInput): DecisionOutput {
    if (message.topic !== 'research_support') return super.onMessage(message, input);
    const coverage = listOf(input.state, 'coverage');
    return { state: { coverage: [...coverage, { event_id: input.event.id, requested_by: message.origin }] } };
  }
}
