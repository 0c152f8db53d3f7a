// Decision Function — the injected capability each department wraps
// Could be a rule engine, a language model call or a test double; the core only sees this contract.

import type { Role } from './roles.js';
import type { SequencedEvent } from './broker-events.js';
import type { Message, OutgoingMessage } from './coordination.js';

export type AgentState = Readonly<Record<string, unknown>>;

export interface DecisionInput {
  readonly role: Role;
  readonly name: string;
  /** Full accumulated state of the calling department (frozen copy). */
  readonly state: AgentState;
  readonly message: Message;
  readonly event: SequencedEvent;
}

export interface OpinionDraft {
  readonly payload: Record<string, unknown>;
  readonly confidence?: number;
  readonly blocking?: boolean;
  readonly rationale?: string;
}

export interface DecisionOutput {
  readonly opinion?: OpinionDraft;
  readonly messages?: OutgoingMessage[];
  /** Keys to merge into the department's state after this call. */
  readonly state?: Record<string, unknown>;
}

export type DecisionFunction = (
  input: DecisionInput,
  signal: AbortSignal,
) => Promise<DecisionOutput> | DecisionOutput;
