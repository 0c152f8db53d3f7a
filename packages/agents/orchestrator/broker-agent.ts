// BrokerAgent — the composite agent that owns every department and runs one cycle per event
//
// Cycle: route → breadth-first delivery by hop level → resolve → (one escalation round) → trace → push
// Departments in the same level may decide concurrently; their outputs are re-read in FIFO
// order before the next level is built, so the trace never depends on scheduling.

import { SubAgent, type ReceiveResult } from '../agents/sub-agent.js';
import type { Role } from '../types/roles.js';
import { isRole } from '../types/roles.js';
import type { BrokerEvent, SequencedEvent } from '../types/broker-events.js';
import type {
  Decision, DecisionFailure, DroppedMessage, Message, Opinion, TraceRecord,
} from '../types/coordination.js';
import type { DecisionFunction } from '../types/decision.js';
import { DOMAIN_EVENT_TYPES, SimpleEventBus, type EventBus } from '../types/events.js';
import {
  DEFAULT_EDGES, DEFAULT_SUBSCRIPTIONS, primaryOwnerOf, type EdgeSpec, type SubscriptionTable,
} from '../config/department-mappings.js';
import { Topology } from '../collaboration/topology.js';
import { InternalNetwork, type CommunicationStats } from '../collaboration/internal-network.js';
import { ConflictResolver } from './conflict-resolver.js';
import { Trace, type TraceSummary } from './trace.js';
import type { ExternalGateway } from '../bridge/external-gateway.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface DepartmentConfig {
  role: Role;
  name?: string;
  decide: DecisionFunction;
  initialState?: Record<string, unknown>;
  /** Overrides the broker-wide decision timeout for this department. */
  decisionTimeoutMs?: number;
}

export interface BrokerAgentConfig {
  name?: string;
  departments: DepartmentConfig[];
  /** Defaults to the house topology restricted to the roster. */
  edges?: EdgeSpec[];
  hopLimit?: number;
  subscriptions?: SubscriptionTable;
  keywords?: Record<Role, string[]>;
  rolePriority?: Partial<Record<Role, number>>;
  primaryOwnerPriority?: number;
  decisionTimeoutMs?: number;
  /** Run decision calls of different departments in one hop level concurrently. Default: true */
  concurrentDelivery?: boolean;
  gateway?: ExternalGateway;
  logger?: Logger;
  onEvent?: (event: { type: string; cycle: number; payload: unknown }) => void;
}

export interface RunCycleOptions {
  signal?: AbortSignal;
  /** Scenario pass the cycle belongs to; 0 for ad-hoc cycles. */
  pass?: number;
}

export interface BrokerStatus {
  name: string;
  cycles: number;
  roster: Role[];
  departments: Array<ReturnType<SubAgent['statusReport']> & { state: Record<string, unknown> }>;
  network: CommunicationStats;
  trace: TraceSummary;
}

interface CycleWork {
  opinions: Opinion[];
  failures: DecisionFailure[];
  dropped: DroppedMessage[];
}

export class BrokerAgent {
  readonly name: string;
  readonly network: InternalNetwork;
  readonly resolver: ConflictResolver;
  readonly trace = new Trace();
  private readonly agents = new Map<Role, SubAgent>();
  private readonly concurrentDelivery: boolean;
  private readonly gateway?: ExternalGateway;
  private readonly logger: Logger;
  private readonly eventBus: EventBus;
  private cycleCount = 0;

  constructor(config: BrokerAgentConfig) {
    this.name = config.name ?? 'Brokerage';
    this.logger = config.logger ?? createLogger('BrokerAgent');
    this.eventBus = new SimpleEventBus();
    this.concurrentDelivery = config.concurrentDelivery ?? true;
    this.gateway = config.gateway;

    if (config.departments.length === 0) {
      throw new ConfigurationError('Invalid roster', ['at least one department is required']);
    }
    const roster = config.departments.map(d => d.role);
    const edges = config.edges ?? DEFAULT_EDGES.filter(e => roster.includes(e.from) && roster.includes(e.to));
    const topology = Topology.build(roster, edges);

    const subscriptions = config.subscriptions ?? DEFAULT_SUBSCRIPTIONS;
    validateSubscriptions(subscriptions);

    this.resolver = new ConflictResolver({
      rolePriority: config.rolePriority,
      primaryOwnerPriority: config.primaryOwnerPriority,
    });
    this.network = new InternalNetwork(topology, {
      hopLimit: config.hopLimit,
      subscriptions,
      keywords: config.keywords,
      logger: this.logger.child('Network'),
      eventBus: this.eventBus,
    });

    const timeout = config.decisionTimeoutMs;
    if (timeout !== undefined && (!Number.isFinite(timeout) || timeout <= 0)) {
      throw new ConfigurationError('Invalid decision timeout', [`expected a positive number of ms, got ${timeout}`]);
    }
    for (const dept of config.departments) {
      this.agents.set(dept.role, new SubAgent({
        role: dept.role,
        name: dept.name,
        decide: dept.decide,
        decisionTimeoutMs: dept.decisionTimeoutMs ?? timeout,
        initialState: dept.initialState,
      }));
    }

    if (config.onEvent) {
      const handler = config.onEvent;
      for (const type of DOMAIN_EVENT_TYPES) {
        this.eventBus.on(type, (e) => handler({ type: e.type, cycle: e.cycle, payload: e.payload }));
      }
    }
  }

  get cycles(): number {
    return this.cycleCount;
  }

  get roster(): Role[] {
    return [...this.network.topology.roles];
  }

  getAgent(role: Role): SubAgent | undefined {
    return this.agents.get(role);
  }

  on(...args: Parameters<EventBus['on']>): void {
    this.eventBus.on(...args);
  }

  /**
   * Process one external event end to end and append its record to the trace.
   * Only configuration problems throw; everything else ends up in the decision.
   */
  async runCycle(event: BrokerEvent, options: RunCycleOptions = {}): Promise<Decision> {
    const cycle = ++this.cycleCount;
    const sequenced: SequencedEvent = Object.freeze({ ...event, sequence: cycle });
    const work: CycleWork = { opinions: [], failures: [], dropped: [] };
    const { signal } = options;

    this.emit('CycleStarted', cycle, { eventId: event.id, type: event.type });
    this.logger.debug('Cycle started', { cycle, eventId: event.id, type: event.type });

    const decision = await this.decide(sequenced, cycle, work, signal);

    const record: TraceRecord = {
      cycle,
      pass: options.pass ?? 0,
      event: sequenced,
      opinions: work.opinions,
      failures: work.failures,
      dropped: work.dropped,
      decision,
    };
    this.trace.append(record);

    if (decision.outcome === 'aborted') {
      this.emit('CycleAborted', cycle, { eventId: event.id, reason: decision.reason });
      this.logger.warn('Cycle aborted', { cycle, eventId: event.id });
      return decision;
    }

    this.emit(decision.outcome === 'unresolved' ? 'DecisionUnresolved' : 'DecisionReached', cycle, decision);
    this.emit('CycleCompleted', cycle, {
      eventId: event.id,
      outcome: decision.outcome,
      opinions: work.opinions.length,
      failures: work.failures.length,
      dropped: work.dropped.length,
    });
    this.logger.info(`Cycle ${cycle} decided: ${decision.outcome}`, { eventId: event.id, owner: decision.owner });

    await this.publish(decision, record);
    return decision;
  }

  status(): BrokerStatus {
    return {
      name: this.name,
      cycles: this.cycleCount,
      roster: this.roster,
      departments: [...this.agents.values()].map(agent => ({ ...agent.statusReport(), state: agent.snapshot() })),
      network: this.network.stats(),
      trace: this.trace.summary(),
    };
  }

  private async decide(
    event: SequencedEvent,
    cycle: number,
    work: CycleWork,
    signal: AbortSignal | undefined,
  ): Promise<Decision> {
    const initial = this.network.route(event, cycle);
    if (initial.length === 0) {
      return {
        eventId: event.id,
        cycle,
        owner: primaryOwnerOf(event),
        outcome: 'no_action',
        reason: `no department subscribed to ${event.type}`,
      };
    }

    const completed = await this.propagate(initial, event, work, signal);
    if (!completed) return this.aborted(event, cycle);

    const resolution = this.resolver.resolve(event, cycle, work.opinions, work.failures);
    if (resolution.kind === 'decided') return resolution.decision;

    const { contenders } = resolution;
    this.emit('ConflictEscalated', cycle, { eventId: event.id, contenders: contenders.map(c => c.role) });
    this.logger.info('Conflict escalated to executive', { cycle, eventId: event.id, contenders: contenders.map(c => c.role) });

    if (!this.agents.has('executive')) {
      return this.resolver.finalizeEscalation(event, cycle, contenders, undefined);
    }

    const escalation = this.network.escalate(cycle, event.id, {
      owner: resolution.owner,
      contenders: contenders.map(c => ({
        role: c.role,
        payload: c.payload,
        confidence: c.confidence,
        ...(c.rationale !== undefined ? { rationale: c.rationale } : {}),
      })),
    });
    const before = work.opinions.length;
    const finished = await this.propagate([escalation], event, work, signal);
    if (!finished) return this.aborted(event, cycle);

    const ruling = work.opinions
      .slice(before)
      .find(o => o.role === 'executive' && o.hop === 0);
    return this.resolver.finalizeEscalation(event, cycle, contenders, ruling);
  }

  /**
   * Deliver `initial` and every follow-up it causes, one hop level at a time.
   * Returns false when the signal fired at a level boundary.
   */
  private async propagate(
    initial: Message[],
    event: SequencedEvent,
    work: CycleWork,
    signal: AbortSignal | undefined,
  ): Promise<boolean> {
    let level = initial;
    while (level.length > 0) {
      if (signal?.aborted) return false;

      const deliveries: Array<{ agent: SubAgent; message: Message }> = [];
      for (const message of level) {
        const { recipients, dropped } = this.network.deliver(message);
        if (dropped) work.dropped.push(dropped);
        for (const role of recipients) {
          const agent = this.agents.get(role);
          if (agent) deliveries.push({ agent, message });
        }
      }

      const results = await this.execute(deliveries, event);
      const next: Message[] = [];
      results.forEach((result, idx) => {
        const { agent } = deliveries[idx];
        this.collect(agent.role, result, work);
        const { accepted, dropped } = this.network.forward(result.message, agent.role, result.outgoing);
        next.push(...accepted);
        work.dropped.push(...dropped);
      });
      level = next;
    }
    return true;
  }

  /**
   * Queue a level's deliveries in each department's inbox, drain the inboxes and
   * hand the results back in delivery order.
   */
  private async execute(
    deliveries: Array<{ agent: SubAgent; message: Message }>,
    event: SequencedEvent,
  ): Promise<ReceiveResult[]> {
    const recipients: SubAgent[] = [];
    for (const { agent, message } of deliveries) {
      if (!recipients.includes(agent)) recipients.push(agent);
      agent.enqueue(message, event);
    }

    const drained = new Map<SubAgent, ReceiveResult[]>();
    if (this.concurrentDelivery) {
      const batches = await Promise.all(recipients.map(agent => agent.drain()));
      recipients.forEach((agent, idx) => drained.set(agent, batches[idx]));
    } else {
      for (const agent of recipients) drained.set(agent, await agent.drain());
    }

    return deliveries.map(({ agent, message }) => {
      const result = drained.get(agent)?.shift();
      if (!result) throw new Error(`no result from ${agent.role} for message ${message.id}`);
      return result;
    });
  }

  private collect(role: Role, result: ReceiveResult, work: CycleWork): void {
    const { message } = result;
    if (result.failure) {
      work.failures.push(result.failure);
      this.emit('DecisionFailed', message.cycle, { role, messageId: message.id, reason: result.failure.reason });
      this.logger.warn(`${role} decision failed`, { cycle: message.cycle, messageId: message.id, reason: result.failure.reason });
      return;
    }
    if (result.opinion) {
      work.opinions.push(result.opinion);
      this.emit('OpinionRecorded', message.cycle, { role, messageId: message.id, hop: message.hop });
    }
  }

  private aborted(event: SequencedEvent, cycle: number): Decision {
    return {
      eventId: event.id,
      cycle,
      owner: primaryOwnerOf(event),
      outcome: 'aborted',
      reason: 'cycle cancelled at a hop-level boundary',
    };
  }

  private async publish(decision: Decision, record: TraceRecord): Promise<void> {
    if (!this.gateway) return;
    try {
      await this.gateway.push(decision, record);
      this.emit('DecisionPushed', record.cycle, { eventId: decision.eventId, outcome: decision.outcome });
    } catch (err) {
      const error = errorMessage(err);
      this.emit('GatewayPushFailed', record.cycle, { eventId: decision.eventId, error });
      this.logger.error('Gateway push failed', { cycle: record.cycle, eventId: decision.eventId, error });
    }
  }

  private emit(type: Parameters<EventBus['on']>[0], cycle: number, payload: unknown): void {
    this.eventBus.emit({ type, cycle, sourceContext: 'BrokerAgent', payload });
  }
}

function validateSubscriptions(table: SubscriptionTable): void {
  const issues: string[] = [];
  const check = (where: string, roles: readonly unknown[]): void => {
    for (const role of roles) {
      if (!isRole(role)) issues.push(`${where} subscribes unknown role "${String(role)}"`);
    }
  };
  for (const [requestType, route] of Object.entries(table.client_request)) {
    if (route !== 'keywords') check(`client_request.${requestType}`, route);
  }
  check('market_update', table.market_update);
  check('regulatory_announcement', table.regulatory_announcement);
  check('trading_opportunity', table.trading_opportunity);
  if (issues.length > 0) throw new ConfigurationError('Invalid subscription table', issues);
}
