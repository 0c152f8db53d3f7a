// Internal network — routes external events to subscribed departments and carries
// department follow-ups along topology edges, with a per-event hop limit.
// The network is the only component that changes a message's delivery status.
// Message ids and the status ledger are scoped to the current cycle; only history spans cycles.

import type { Role } from '../types/roles.js';
import type { SequencedEvent } from '../types/broker-events.js';
import type {
  DeliveryStatus, DroppedMessage, DropReason, Message, MessageDestination,
  MessageOrigin, OutgoingMessage,
} from '../types/coordination.js';
import type { EventBus } from '../types/events.js';
import {
  DEFAULT_HOP_LIMIT, DEFAULT_SUBSCRIPTIONS, ROUTING_KEYWORDS, classifyByKeywords,
  type SubscriptionTable,
} from '../config/department-mappings.js';
import type { Topology } from './topology.js';
import { ConfigurationError } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface InternalNetworkOptions {
  hopLimit?: number;
  subscriptions?: SubscriptionTable;
  keywords?: Record<Role, string[]>;
  logger?: Logger;
  eventBus?: EventBus;
}

export interface ForwardResult {
  accepted: Message[];
  dropped: DroppedMessage[];
}

export interface DeliveryResult {
  recipients: Role[];
  dropped?: DroppedMessage;
}

export interface CommunicationRecord {
  readonly messageId: string;
  readonly cycle: number;
  readonly from: MessageOrigin;
  readonly to: Role;
  readonly topic: string;
}

export interface CommunicationStats {
  totalDeliveries: number;
  totalDropped: number;
  byRole: Record<string, { outgoing: number; incoming: number }>;
  byEdge: Record<string, number>;
}

export class InternalNetwork {
  readonly topology: Topology;
  readonly hopLimit: number;
  private readonly subscriptions: SubscriptionTable;
  private readonly keywords: Record<Role, string[]>;
  private readonly logger: Logger;
  private readonly eventBus?: EventBus;

  private readonly ledger = new Map<string, DeliveryStatus>();
  private history: CommunicationRecord[] = [];
  private droppedCount = 0;
  private currentCycle = 0;
  private messageCount = 0;

  constructor(topology: Topology, options: InternalNetworkOptions = {}) {
    const hopLimit = options.hopLimit ?? DEFAULT_HOP_LIMIT;
    if (!Number.isInteger(hopLimit) || hopLimit < 1) {
      throw new ConfigurationError('Invalid hop limit', [`hop limit must be a positive integer, got ${hopLimit}`]);
    }
    this.topology = topology;
    this.hopLimit = hopLimit;
    this.subscriptions = options.subscriptions ?? DEFAULT_SUBSCRIPTIONS;
    this.keywords = options.keywords ?? ROUTING_KEYWORDS;
    this.logger = options.logger ?? silentLogger;
    this.eventBus = options.eventBus;
  }

  /** Roles subscribed to `event`, restricted to the roster, in canonical order. */
  subscribers(event: SequencedEvent): Role[] {
    let roles: Role[];
    if (event.target_roles) {
      roles = [...event.target_roles];
    } else if (event.type === 'client_request') {
      const route = this.subscriptions.client_request[event.request_type];
      roles = route === 'keywords' ? classifyByKeywords(event.content, this.keywords) : [...route];
    } else {
      roles = [...this.subscriptions[event.type]];
    }
    return this.topology.roles.filter(r => roles.includes(r));
  }

  /** Translate an external event into hop-0 messages, one per subscribed department. */
  route(event: SequencedEvent, cycle: number): Message[] {
    return this.subscribers(event).map(role =>
      this.createMessage({
        cycle,
        eventId: event.id,
        hop: 0,
        origin: 'gateway',
        destination: role,
        topic: 'event',
        payload: {},
      }),
    );
  }

  /** Hand the executive an escalation outside the hop budget of the original event. */
  escalate(cycle: number, eventId: string, payload: Record<string, unknown>): Message {
    return this.createMessage({
      cycle,
      eventId,
      hop: 0,
      origin: 'coordinator',
      destination: 'executive',
      topic: 'escalation',
      payload,
    });
  }

  /**
   * Wrap a department's follow-ups as messages one hop further than `parent`.
   * Anything that would reach the hop limit is dropped here.
   */
  forward(parent: Message, sender: Role, outgoing: readonly OutgoingMessage[]): ForwardResult {
    const result: ForwardResult = { accepted: [], dropped: [] };
    const hop = parent.hop + 1;

    for (const out of outgoing) {
      const message = this.createMessage({
        cycle: parent.cycle,
        eventId: parent.eventId,
        hop,
        origin: sender,
        destination: out.to,
        topic: out.topic,
        payload: out.payload,
      });

      if (hop >= this.hopLimit) {
        result.dropped.push(this.drop(message, 'HopLimitExceeded'));
      } else {
        result.accepted.push(message);
      }
    }
    return result;
  }

  /** Resolve the recipients of `message` and mark it delivered, or dropped when it has none. */
  deliver(message: Message): DeliveryResult {
    const recipients = this.recipientsOf(message);
    if (typeof recipients === 'string') {
      return { recipients: [], dropped: this.drop(message, recipients) };
    }

    this.ledger.set(message.id, 'delivered');
    for (const to of recipients) {
      this.history.push({ messageId: message.id, cycle: message.cycle, from: message.origin, to, topic: message.topic });
      this.eventBus?.emit({
        type: 'MessageDelivered',
        cycle: message.cycle,
        sourceContext: 'InternalNetwork',
        payload: { messageId: message.id, from: message.origin, to, topic: message.topic, hop: message.hop },
      });
    }
    return { recipients };
  }

  /** Delivery status of a message of the current cycle. */
  status(messageId: string): DeliveryStatus | undefined {
    return this.ledger.get(messageId);
  }

  /** Shortest communication path between two departments. */
  path(from: Role, to: Role): Role[] {
    return this.topology.path(from, to);
  }

  /** The `topN` departments most often on shortest paths between others. Ties keep role order. */
  centralRoles(topN = 3): Array<{ role: Role; centrality: number }> {
    return [...this.topology.betweenness()]
      .map(([role, centrality]) => ({ role, centrality }))
      .sort((a, b) => b.centrality - a.centrality)
      .slice(0, topN);
  }

  getHistory(filter?: { cycle?: number; role?: Role }): CommunicationRecord[] {
    let results = [...this.history];
    if (filter?.cycle !== undefined) {
      const cycle = filter.cycle;
      results = results.filter(r => r.cycle === cycle);
    }
    if (filter?.role) {
      const role = filter.role;
      results = results.filter(r => r.from === role || r.to === role);
    }
    return results;
  }

  get ledgerSize(): number {
    return this.ledger.size;
  }

  stats(): CommunicationStats {
    const byRole: CommunicationStats['byRole'] = {};
    const byEdge: CommunicationStats['byEdge'] = {};
    for (const role of this.topology.roles) byRole[role] = { outgoing: 0, incoming: 0 };

    for (const record of this.history) {
      const sender = byRole[record.from];
      if (sender) sender.outgoing++;
      const receiver = byRole[record.to];
      if (receiver) receiver.incoming++;
      const key = `${record.from}->${record.to}`;
      byEdge[key] = (byEdge[key] ?? 0) + 1;
    }

    return {
      totalDeliveries: this.history.length,
      totalDropped: this.droppedCount,
      byRole,
      byEdge,
    };
  }

  /** Forget delivery history. Statuses of the current cycle stay available. */
  clearHistory(): void {
    this.history = [];
  }

  private recipientsOf(message: Message): Role[] | DropReason {
    const { origin, destination } = message;

    if (destination === 'broadcast') {
      if (origin === 'gateway' || origin === 'coordinator') return [...this.topology.roles];
      return this.topology.successors(origin).filter(r => r !== origin);
    }
    if (!this.topology.has(destination)) return 'UnknownRecipient';
    if (origin === 'gateway' || origin === 'coordinator') return [destination];
    return this.topology.hasEdge(origin, destination) ? [destination] : 'RouteRejected';
  }

  private drop(message: Message, reason: DropReason): DroppedMessage {
    this.ledger.set(message.id, 'dropped');
    this.droppedCount++;
    this.logger.warn(`${reason}: message dropped`, {
      messageId: message.id,
      from: message.origin,
      to: message.destination,
      topic: message.topic,
      hop: message.hop,
      hopLimit: this.hopLimit,
    });
    this.eventBus?.emit({
      type: 'MessageDropped',
      cycle: message.cycle,
      sourceContext: 'InternalNetwork',
      payload: { messageId: message.id, reason },
    });
    return { message, reason };
  }

  private createMessage(fields: {
    cycle: number;
    eventId: string;
    hop: number;
    origin: MessageOrigin;
    destination: MessageDestination;
    topic: string;
    payload: Record<string, unknown>;
  }): Message {
    if (fields.cycle !== this.currentCycle) {
      this.currentCycle = fields.cycle;
      this.messageCount = 0;
      this.ledger.clear();
    }
    const n = ++this.messageCount;
    const message: Message = Object.freeze({ id: `c${fields.cycle}-m${n}`, ...fields });
    this.ledger.set(message.id, 'pending');
    return message;
  }
}
