// Base department desk — rule-engine decision functions for the built-in departments
// Every desk extends this class; the SubAgent only ever sees `decide`.

import { z } from 'zod';
import type { Role } from '../types/roles.js';
import { ROLE_DESCRIPTIONS } from '../types/roles.js';
import type { SequencedEvent } from '../types/broker-events.js';
import type { Message, OutgoingMessage } from '../types/coordination.js';
import type { AgentState, DecisionFunction, DecisionInput, DecisionOutput, OpinionDraft } from '../types/decision.js';

const ListSchema = z.array(z.unknown()).catch([]);
const CounterSchema = z.record(z.number()).catch({});

/** Entries stored under `key` in a desk's state, or an empty list. */
export function listOf(state: AgentState, key: string): unknown[] {
  return ListSchema.parse(state[key]);
}

export function countersOf(state: AgentState, key: string): Record<string, number> {
  return CounterSchema.parse(state[key]);
}

export function mentions(text: string, words: readonly string[]): boolean {
  const lowered = text.toLowerCase();
  return words.some(w => lowered.includes(w));
}

export abstract class BaseDepartment {
  readonly role: Role;
  readonly description: string;

  constructor(role: Role) {
    this.role = role;
    this.description = ROLE_DESCRIPTIONS[role];
  }

  readonly decide: DecisionFunction = (input) => this.dispatch(input);

  protected dispatch(input: DecisionInput): DecisionOutput {
    const { message, event } = input;
    if (message.topic === 'event') return this.onEvent(event, input);
    if (message.topic === 'escalation') return this.onEscalation(message, input);
    return this.onMessage(message, input);
  }

  /** React to an external event routed to this desk (hop 0). */
  protected abstract onEvent(event: SequencedEvent, input: DecisionInput): DecisionOutput;

  protected onEscalation(_message: Message, _input: DecisionInput): DecisionOutput {
    return {};
  }

  /** Internal follow-ups; by default only counted per topic. */
  protected onMessage(message: Message, input: DecisionInput): DecisionOutput {
    const received = countersOf(input.state, 'received');
    return { state: { received: { ...received, [message.topic]: (received[message.topic] ?? 0) + 1 } } };
  }

  protected opine(
    payload: Record<string, unknown>,
    extras: Omit<OpinionDraft, 'payload'> = {},
    more: { messages?: OutgoingMessage[]; state?: Record<string, unknown> } = {},
  ): DecisionOutput {
    return { opinion: { payload, ...extras }, ...more };
  }
}
