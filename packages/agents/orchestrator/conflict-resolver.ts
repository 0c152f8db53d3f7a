// Conflict resolver — reconciles department opinions on one event into a single decision
//
// Order of precedence:
//   1. unanimous payloads            → consensus
//   2. blocking risk_compliance opinion → veto
//   3. unique top priority score     → priority
//   4. tie at the top                → escalate to the executive for one round
// Consensus and priority look at each role's latest opinion. A compliance block is
// never superseded: the first blocking risk_compliance opinion of the cycle stands.
// Confidence is carried along for reporting but never breaks a tie.

import { ROLES, type Role } from '../types/roles.js';
import type { BrokerEvent } from '../types/broker-events.js';
import type { Decision, DecisionFailure, Opinion } from '../types/coordination.js';
import {
  DEFAULT_PRIMARY_OWNER_PRIORITY, DEFAULT_ROLE_PRIORITY, primaryOwnerOf,
} from '../config/department-mappings.js';
import { payloadsEqual } from '../utils/stable-stringify.js';
import { ConfigurationError } from '../utils/errors.js';

export interface ConflictResolverConfig {
  rolePriority?: Partial<Record<Role, number>>;
  primaryOwnerPriority?: number;
}

export type Resolution =
  | { kind: 'decided'; decision: Decision }
  | { kind: 'escalate'; owner: Role | null; contenders: Opinion[] };

export class ConflictResolver {
  readonly rolePriority: Readonly<Record<Role, number>>;
  readonly primaryOwnerPriority: number;

  constructor(config: ConflictResolverConfig = {}) {
    const priority = { ...DEFAULT_ROLE_PRIORITY, ...config.rolePriority };
    const issues: string[] = [];
    for (const role of ROLES) {
      if (!Number.isFinite(priority[role])) issues.push(`priority for ${role} must be a finite number`);
    }
    const ownerPriority = config.primaryOwnerPriority ?? DEFAULT_PRIMARY_OWNER_PRIORITY;
    if (!Number.isFinite(ownerPriority)) issues.push('primary owner priority must be a finite number');
    if (issues.length > 0) throw new ConfigurationError('Invalid priority table', issues);

    this.rolePriority = Object.freeze(priority);
    this.primaryOwnerPriority = ownerPriority;
  }

  /** Priority of `role` for an event owned by `owner`. */
  score(role: Role, owner: Role | null): number {
    const base = this.rolePriority[role];
    return role === owner ? Math.max(base, this.primaryOwnerPriority) : base;
  }

  resolve(
    event: BrokerEvent,
    cycle: number,
    opinions: readonly Opinion[],
    failures: readonly DecisionFailure[] = [],
  ): Resolution {
    const owner = primaryOwnerOf(event);
    const base = { eventId: event.id, cycle, owner };
    const views = latestByRole(opinions);

    if (views.length === 0) {
      const decision: Decision = failures.length > 0
        ? { ...base, outcome: 'unresolved', reason: 'every responding department failed', contenders: [] }
        : { ...base, outcome: 'no_action', reason: 'no department produced an opinion' };
      return { kind: 'decided', decision };
    }

    const [first] = views;
    if (views.every(v => payloadsEqual(v.payload, first.payload))) {
      return {
        kind: 'decided',
        decision: { ...base, outcome: 'consensus', payload: first.payload, roles: views.map(v => v.role) },
      };
    }

    const veto = opinions.find(o => o.role === 'risk_compliance' && o.blocking);
    if (veto) {
      return { kind: 'decided', decision: { ...base, outcome: 'veto', opinion: veto } };
    }

    const scored = views.map(opinion => ({ opinion, score: this.score(opinion.role, owner) }));
    const top = Math.max(...scored.map(s => s.score));
    const leaders = scored.filter(s => s.score === top);
    const [leader] = leaders;

    if (leaders.every(l => payloadsEqual(l.opinion.payload, leader.opinion.payload))) {
      return {
        kind: 'decided',
        decision: { ...base, outcome: 'priority', opinion: leader.opinion, score: top },
      };
    }

    return { kind: 'escalate', owner, contenders: leaders.map(l => l.opinion) };
  }

  /**
   * Close an escalation: the executive's opinion supersedes the contenders.
   * Without one the decision is explicitly unresolved, never an arbitrary pick.
   */
  finalizeEscalation(
    event: BrokerEvent,
    cycle: number,
    contenders: readonly Opinion[],
    executiveOpinion: Opinion | undefined,
  ): Decision {
    const base = { eventId: event.id, cycle, owner: primaryOwnerOf(event) };
    if (!executiveOpinion) {
      return {
        ...base,
        outcome: 'unresolved',
        reason: 'executive produced no opinion during the escalation round',
        contenders: [...contenders],
      };
    }
    return { ...base, outcome: 'escalated', opinion: executiveOpinion, contenders: [...contenders] };
  }
}

/** Latest opinion per role, in canonical role order. Later hops supersede earlier ones. */
export function latestByRole(opinions: readonly Opinion[]): Opinion[] {
  const byRole = new Map<Role, Opinion>();
  for (const opinion of opinions) byRole.set(opinion.role, opinion);
  return ROLES.flatMap(role => {
    const opinion = byRole.get(role);
    return opinion ? [opinion] : [];
  });
}
