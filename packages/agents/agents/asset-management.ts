// Asset Management — fund mandates and financing support for deal teams

import { z } from 'zod';
import type { SequencedEvent } from '../types/broker-events.js';
import type { Message } from '../types/coordination.js';
import type { DecisionInput, DecisionOutput } from '../types/decision.js';
import { BaseDepartment, listOf } from './base-department.js';
import { OutlookSchema } from './research.js';

const MandateSchema = z.object({
  strategy: z.string().min(1).catch('balanced'),
});

export class AssetManagementDesk extends BaseDepartment {
  constructor() {
    super('asset_management');
  }

  protected onEvent(event: SequencedEvent, input: DecisionInput): DecisionOutput {
    if (event.type !== 'client_request') return {};

    const { strategy } = MandateSchema.parse(event.data ?? {});
    const mandates = listOf(input.state, 'mandates');
    return this.opine(
      { action: 'launch_mandate', strategy },
      { confidence: 0.7 },
      {
        messages: [{ to: 'risk_compliance', topic: 'request_review', payload: { strategy } }],
        state: { mandates: [...mandates, { event_id: event.id, strategy }] },
      },
    );
  }

  protected onMessage(message: Message, input: DecisionInput): DecisionOutput {
    switch (message.topic) {
      case 'financing_support': {
        const financing = listOf(input.state, 'financing');
        return { state: { financing: [...financing, { event_id: input.event.id, ...message.payload }] } };
      }
      case 'research_note': {
        const notes = listOf(input.state, 'notes');
        return { state: { notes: [...notes, OutlookSchema.catch('neutral').parse(message.payload.outlook)] } };
      }
      default:
        return super.onMessage(message, input);
    }
  }
}
