// Wealth Management — model allocations by client risk tolerance

import { z } from 'zod';
import type { SequencedEvent } from '../types/broker-events.js';
import type { Message } from '../types/coordination.js';
import type { DecisionInput, DecisionOutput } from '../types/decision.js';
import { BaseDepartment, listOf } from './base-department.js';
import { OutlookSchema } from './research.js';

export const MODEL_ALLOCATIONS = {
  low: { profile: 'conservative', equity: 0.3, bonds: 0.6, cash: 0.1 },
  medium: { profile: 'balanced', equity: 0.6, bonds: 0.35, cash: 0.05 },
  high: { profile: 'growth', equity: 0.8, bonds: 0.15, cash: 0.05 },
} as const;

const ClientProfileSchema = z.object({
  risk_tolerance: z.enum(['low', 'medium', 'high']).catch('medium'),
});

export class WealthManagementDesk extends BaseDepartment {
  constructor() {
    super('wealth_management');
  }

  protected onEvent(event: SequencedEvent, input: DecisionInput): DecisionOutput {
    if (event.type !== 'client_request') return {};

    const { risk_tolerance } = ClientProfileSchema.parse(event.data ?? {});
    const { profile, ...allocation } = MODEL_ALLOCATIONS[risk_tolerance];
    const clients = listOf(input.state, 'clients');
    return this.opine(
      { action: 'propose_allocation', profile, allocation },
      { confidence: 0.7 },
      { state: { clients: [...clients, { event_id: event.id, client: event.sender?.name ?? 'client', profile }] } },
    );
  }

  protected onMessage(message: Message, input: DecisionInput): DecisionOutput {
    if (message.topic !== 'research_note') return super.onMessage(message, input);
    const outlook = OutlookSchema.catch('neutral').parse(message.payload.outlook);
    const notes = listOf(input.state, 'notes');
    return { state: { notes: [...notes, outlook] } };
  }
}
