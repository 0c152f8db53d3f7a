// Executive Committee — arbitrates escalated conflicts and collects briefings
// Arbitration sides with the most conservative contender: compliance, then research,
// then the event's owner, then the first contender in role order.

import { z } from 'zod';
import type { Role } from '../types/roles.js';
import type { SequencedEvent } from '../types/broker-events.js';
import type { Message } from '../types/coordination.js';
import type { DecisionInput, DecisionOutput } from '../types/decision.js';
import { RoleSchema } from '../schemas/events.js';
import { BaseDepartment, listOf } from './base-department.js';

const EscalationSchema = z.object({
  owner: RoleSchema.nullable(),
  contenders: z.array(z.object({
    role: RoleSchema,
    payload: z.record(z.unknown()),
  })).min(1),
});

export type EscalationPayload = z.infer<typeof EscalationSchema>;

const CONSERVATIVE_ORDER: readonly Role[] = ['risk_compliance', 'research'];

export function arbitrate(escalation: EscalationPayload): EscalationPayload['contenders'][number] {
  const { owner, contenders } = escalation;
  for (const role of CONSERVATIVE_ORDER) {
    const pick = contenders.find(c => c.role === role);
    if (pick) return pick;
  }
  return contenders.find(c => c.role === owner) ?? contenders[0];
}

export class ExecutiveDesk extends BaseDepartment {
  constructor() {
    super('executive');
  }

  protected onEvent(event: SequencedEvent): DecisionOutput {
    if (event.type === 'client_request') {
      return this.opine({ action: 'review_strategy' }, { confidence: 0.6 });
    }
    return {};
  }

  protected onEscalation(message: Message, input: DecisionInput): DecisionOutput {
    const parsed = EscalationSchema.safeParse(message.payload);
    if (!parsed.success) {
      throw new Error(`malformed escalation: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }

    const pick = arbitrate(parsed.data);
    const rulings = listOf(input.state, 'rulings');
    return this.opine(
      pick.payload,
      { confidence: 0.9, rationale: `sided with ${pick.role}` },
      { state: { rulings: [...rulings, { event_id: input.event.id, sided_with: pick.role }] } },
    );
  }

  protected onMessage(message: Message, input: DecisionInput): DecisionOutput {
    if (message.topic !== 'briefing') return super.onMessage(message, input);
    const briefings = listOf(input.state, 'briefings');
    return { state: { briefings: [...briefings, { from: message.origin, ...message.payload }] } };
  }
}
