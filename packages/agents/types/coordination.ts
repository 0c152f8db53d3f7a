// Coordination model — messages, opinions and decisions exchanged inside one cycle

import type { Role } from './roles.js';
import type { SequencedEvent } from './broker-events.js';

export type MessageOrigin = Role | 'gateway' | 'coordinator';
export type MessageDestination = Role | 'broadcast';
export type DeliveryStatus = 'pending' | 'delivered' | 'dropped';

export type MessageTopic =
  | 'event'           // translated external event (hop 0)
  | 'escalation'      // coordinator → executive during conflict resolution
  | (string & {});    // department-defined follow-ups, e.g. 'request_review'

export interface Message {
  readonly id: string;
  readonly cycle: number;
  readonly eventId: string;
  readonly hop: number;
  readonly origin: MessageOrigin;
  readonly destination: MessageDestination;
  readonly topic: MessageTopic;
  readonly payload: Record<string, unknown>;
}

/** A follow-up a department asks the network to send on its behalf. */
export interface OutgoingMessage {
  readonly to: MessageDestination;
  readonly topic: string;
  readonly payload: Record<string, unknown>;
}

export interface Opinion {
  readonly role: Role;
  readonly eventId: string;
  readonly cycle: number;
  readonly hop: number;
  readonly payload: Record<string, unknown>;
  readonly confidence: number;     // 0-1, informational only
  readonly blocking: boolean;      // honoured only for risk_compliance
  readonly rationale?: string;
}

export interface DecisionFailure {
  readonly role: Role;
  readonly eventId: string;
  readonly cycle: number;
  readonly hop: number;
  readonly failed: true;
  readonly reason: string;
}

export type DropReason = 'HopLimitExceeded' | 'RouteRejected' | 'UnknownRecipient';

export interface DroppedMessage {
  readonly message: Message;
  readonly reason: DropReason;
}

interface DecisionBase {
  readonly eventId: string;
  readonly cycle: number;
  /** Primary-owner role of the event's business type, if it has one. */
  readonly owner: Role | null;
}

export type Decision =
  | DecisionBase & { readonly outcome: 'consensus'; readonly payload: Record<string, unknown>; readonly roles: Role[] }
  | DecisionBase & { readonly outcome: 'veto'; readonly opinion: Opinion }
  | DecisionBase & { readonly outcome: 'priority'; readonly opinion: Opinion; readonly score: number }
  | DecisionBase & { readonly outcome: 'escalated'; readonly opinion: Opinion; readonly contenders: Opinion[] }
  | DecisionBase & { readonly outcome: 'unresolved'; readonly reason: string; readonly contenders: Opinion[] }
  | DecisionBase & { readonly outcome: 'no_action'; readonly reason: string }
  | DecisionBase & { readonly outcome: 'aborted'; readonly reason: string };

export type DecisionOutcome = Decision['outcome'];

export const DECISION_OUTCOMES = [
  'consensus', 'veto', 'priority', 'escalated', 'unresolved', 'no_action', 'aborted',
] as const satisfies readonly DecisionOutcome[];

export interface TraceRecord {
  readonly cycle: number;
  /** Replay pass of the scenario this cycle belongs to (1-based; 0 for ad-hoc cycles). */
  readonly pass: number;
  readonly event: SequencedEvent;
  readonly opinions: Opinion[];
  readonly failures: DecisionFailure[];
  readonly dropped: DroppedMessage[];
  readonly decision: Decision;
}

export function isDecisionFailure(value: Opinion | DecisionFailure): value is DecisionFailure {
  return 'failed' in value && value.failed === true;
}
