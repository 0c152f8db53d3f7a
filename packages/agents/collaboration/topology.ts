// Topology — directed graph over department roles, frozen once built
// Nodes live in an arena indexed by role; edges are an explicit adjacency list.

import { ROLES, isRole, type Role } from '../types/roles.js';
import type { EdgeSpec } from '../config/department-mappings.js';
import { ConfigurationError } from '../utils/errors.js';

export interface Edge {
  readonly from: Role;
  readonly to: Role;
}

export class Topology {
  readonly roles: readonly Role[];
  private readonly adjacency: ReadonlyMap<Role, readonly Role[]>;

  private constructor(roles: Role[], adjacency: Map<Role, Role[]>) {
    this.roles = Object.freeze(roles);
    this.adjacency = adjacency;
    Object.freeze(this);
  }

  /**
   * Build a topology for `roster` from an edge list.
   * Unknown roles, self-loops and edges touching roles outside the roster are fatal.
   */
  static build(roster: readonly Role[], edges: readonly EdgeSpec[]): Topology {
    const issues: string[] = [];
    const members = new Set<Role>();

    for (const role of roster) {
      if (!isRole(role)) issues.push(`unknown role "${String(role)}" in roster`);
      else if (members.has(role)) issues.push(`duplicate role "${role}" in roster`);
      else members.add(role);
    }

    // Arena in canonical role order so successor lists are deterministic
    const ordered = ROLES.filter(r => members.has(r));
    const adjacency = new Map<Role, Role[]>(ordered.map(r => [r, []]));

    const addEdge = (from: Role, to: Role): void => {
      const targets = adjacency.get(from);
      if (targets && !targets.includes(to)) targets.push(to);
    };

    edges.forEach((edge, idx) => {
      const where = `edge #${idx + 1} (${String(edge.from)} -> ${String(edge.to)})`;
      if (!isRole(edge.from) || !isRole(edge.to)) {
        issues.push(`${where} references an unknown role`);
        return;
      }
      if (edge.from === edge.to) {
        issues.push(`${where} is a self-loop`);
        return;
      }
      if (!members.has(edge.from) || !members.has(edge.to)) {
        issues.push(`${where} references a role outside the roster`);
        return;
      }
      addEdge(edge.from, edge.to);
      if (edge.bidirectional) addEdge(edge.to, edge.from);
    });

    if (issues.length > 0) throw new ConfigurationError('Invalid topology', issues);

    for (const targets of adjacency.values()) {
      targets.sort((a, b) => ROLES.indexOf(a) - ROLES.indexOf(b));
    }
    return new Topology(ordered, adjacency);
  }

  has(role: Role): boolean {
    return this.adjacency.has(role);
  }

  hasEdge(from: Role, to: Role): boolean {
    return this.adjacency.get(from)?.includes(to) ?? false;
  }

  /** One-hop successors of `role`, in canonical role order. */
  successors(role: Role): readonly Role[] {
    return this.adjacency.get(role) ?? [];
  }

  edges(): Edge[] {
    const out: Edge[] = [];
    for (const [from, targets] of this.adjacency) {
      for (const to of targets) out.push({ from, to });
    }
    return out;
  }

  /** Shortest directed path (breadth-first). Empty when unreachable. */
  path(from: Role, to: Role): Role[] {
    if (!this.has(from) || !this.has(to)) return [];
    if (from === to) return [from];

    const previous = new Map<Role, Role>();
    const queue: Role[] = [from];
    const seen = new Set<Role>([from]);

    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      for (const next of this.successors(current)) {
        if (seen.has(next)) continue;
        seen.add(next);
        previous.set(next, current);
        if (next === to) {
          const path: Role[] = [to];
          let step = previous.get(to);
          while (step !== undefined) {
            path.unshift(step);
            step = previous.get(step);
          }
          return path;
        }
        queue.push(next);
      }
    }
    return [];
  }

  /**
   * Normalized betweenness centrality of every role (Brandes), over directed
   * shortest paths. Scaled by 1 / ((n - 1)(n - 2)) once there are more than two roles.
   */
  betweenness(): Map<Role, number> {
    const centrality = new Map<Role, number>(this.roles.map(r => [r, 0]));

    for (const source of this.roles) {
      const stack: Role[] = [];
      const predecessors = new Map<Role, Role[]>(this.roles.map(r => [r, []]));
      const paths = new Map<Role, number>([[source, 1]]);
      const distance = new Map<Role, number>([[source, 0]]);
      const queue: Role[] = [source];

      while (queue.length > 0) {
        const current = queue.shift();
        if (current === undefined) break;
        stack.push(current);
        const d = distance.get(current) ?? 0;
        for (const next of this.successors(current)) {
          if (!distance.has(next)) {
            distance.set(next, d + 1);
            queue.push(next);
          }
          if (distance.get(next) === d + 1) {
            paths.set(next, (paths.get(next) ?? 0) + (paths.get(current) ?? 0));
            predecessors.get(next)?.push(current);
          }
        }
      }

      const dependency = new Map<Role, number>();
      while (stack.length > 0) {
        const node = stack.pop();
        if (node === undefined) break;
        const share = (1 + (dependency.get(node) ?? 0)) / (paths.get(node) ?? 1);
        for (const prev of predecessors.get(node) ?? []) {
          dependency.set(prev, (dependency.get(prev) ?? 0) + (paths.get(prev) ?? 0) * share);
        }
        if (node !== source) centrality.set(node, (centrality.get(node) ?? 0) + (dependency.get(node) ?? 0));
      }
    }

    const n = this.roles.length;
    if (n > 2) {
      const scale = 1 / ((n - 1) * (n - 2));
      for (const [role, value] of centrality) centrality.set(role, value * scale);
    }
    return centrality;
  }

  /** True when some role can reach itself again, i.e. peer edges form a cycle. */
  hasCycle(): boolean {
    return this.roles.some(role => this.successors(role).some(next => this.path(next, role).length > 0));
  }
}
