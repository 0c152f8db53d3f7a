import { describe, it, expect, beforeEach, vi } from 'vitest';
import { InternalNetwork } from '../collaboration/internal-network.js';
import { Topology } from '../collaboration/topology.js';
import { DEFAULT_EDGES } from '../config/department-mappings.js';
import { ROLES } from '../types/roles.js';
import { SimpleEventBus } from '../types/events.js';
import { clientRequest, marketUpdate, sequenced } from './helpers.js';

describe('InternalNetwork', () => {
  let network: InternalNetwork;

  beforeEach(() => {
    network = new InternalNetwork(Topology.build(ROLES, DEFAULT_EDGES), { hopLimit: 3 });
  });

  describe('route', () => {
    it('creates one hop-0 message per subscribed department', () => {
      const messages = network.route(sequenced(marketUpdate('m1')), 1);

      expect(messages.map(m => m.destination)).toEqual(['sales_trading', 'research', 'risk_compliance']);
      expect(messages.map(m => m.id)).toEqual(['c1-m1', 'c1-m2', 'c1-m3']);
      expect(messages.every(m => m.hop === 0 && m.origin === 'gateway' && m.topic === 'event')).toBe(true);
      expect(network.status('c1-m1')).toBe('pending');
    });

    it('honours an explicit target list', () => {
      const event = marketUpdate('m1');
      const messages = network.route(sequenced({ ...event, target_roles: ['executive', 'research'] }), 1);
      expect(messages.map(m => m.destination)).toEqual(['research', 'executive']);
    });

    it('routes general client requests by keyword', () => {
      const event = clientRequest('r1', { content: 'Please send your latest research report' });
      expect(network.subscribers(sequenced(event))).toEqual(['research']);
    });

    it('routes typed client requests to their desk', () => {
      const event = clientRequest('r1', { request_type: 'wealth_management', content: 'anything' });
      expect(network.subscribers(sequenced(event))).toEqual(['wealth_management']);
    });

    it('numbers messages per cycle', () => {
      network.route(sequenced(marketUpdate('m1')), 1);
      const second = network.route(sequenced(marketUpdate('m2')), 2);
      expect(second[0].id).toBe('c2-m1');
    });

    it('keeps delivery statuses for the current cycle only', () => {
      let last: string[] = [];
      for (let cycle = 1; cycle <= 1000; cycle++) {
        const messages = network.route(sequenced(marketUpdate(`m${cycle}`), cycle), cycle);
        for (const m of messages) network.deliver(m);
        network.clearHistory();
        last = messages.map(m => m.id);
      }

      expect(last).toEqual(['c1000-m1', 'c1000-m2', 'c1000-m3']);
      expect(network.ledgerSize).toBe(3);
      expect(network.status('c1000-m2')).toBe('delivered');
      expect(network.status('c999-m1')).toBeUndefined();
    });
  });

  describe('forward', () => {
    it('increments the hop count and drops at the hop limit', () => {
      const [root] = network.route(sequenced(clientRequest('r1', { request_type: 'research' })), 1);
      const hop1 = network.forward(root, 'research', [{ to: 'sales_trading', topic: 'ping', payload: {} }]);
      expect(hop1.accepted[0].hop).toBe(1);

      const hop2 = network.forward(hop1.accepted[0], 'sales_trading', [{ to: 'research', topic: 'ping', payload: {} }]);
      expect(hop2.accepted[0].hop).toBe(2);

      const hop3 = network.forward(hop2.accepted[0], 'research', [{ to: 'sales_trading', topic: 'ping', payload: {} }]);
      expect(hop3.accepted).toEqual([]);
      expect(hop3.dropped).toHaveLength(1);
      expect(hop3.dropped[0].reason).toBe('HopLimitExceeded');
      expect(network.status(hop3.dropped[0].message.id)).toBe('dropped');
    });

    it('keeps the cycle and event id of the parent', () => {
      const [root] = network.route(sequenced(clientRequest('r9', { request_type: 'research' })), 4);
      const { accepted } = network.forward(root, 'research', [{ to: 'executive', topic: 'note', payload: { a: 1 } }]);
      expect(accepted[0]).toMatchObject({ cycle: 4, eventId: 'r9', origin: 'research', destination: 'executive', payload: { a: 1 } });
    });
  });

  describe('deliver', () => {
    it('marks a routed message delivered', () => {
      const [root] = network.route(sequenced(marketUpdate('m1')), 1);
      expect(network.deliver(root)).toEqual({ recipients: ['sales_trading'] });
      expect(network.status(root.id)).toBe('delivered');
    });

    it('rejects a follow-up without a topology edge', () => {
      const [root] = network.route(sequenced(clientRequest('r1', { request_type: 'wealth_management' })), 1);
      const { accepted } = network.forward(root, 'wealth_management', [{ to: 'sales_trading', topic: 'x', payload: {} }]);

      const result = network.deliver(accepted[0]);
      expect(result.recipients).toEqual([]);
      expect(result.dropped?.reason).toBe('RouteRejected');
    });

    it('drops messages to roles outside the roster', () => {
      const small = new InternalNetwork(
        Topology.build(['sales_trading', 'research'], [{ from: 'research', to: 'sales_trading', bidirectional: true }]),
      );
      const [root] = small.route(sequenced(clientRequest('r1', { request_type: 'research' })), 1);
      const { accepted } = small.forward(root, 'research', [{ to: 'executive', topic: 'x', payload: {} }]);
      expect(small.deliver(accepted[0]).dropped?.reason).toBe('UnknownRecipient');
    });

    it('fans a department broadcast out to its successors', () => {
      const [root] = network.route(sequenced(clientRequest('r1', { request_type: 'research' })), 1);
      const { accepted } = network.forward(root, 'research', [{ to: 'broadcast', topic: 'note', payload: {} }]);
      expect(network.deliver(accepted[0]).recipients).toEqual([
        'investment_banking', 'sales_trading', 'wealth_management', 'asset_management', 'executive',
      ]);
    });

    it('emits delivery and drop events on the bus', () => {
      const bus = new SimpleEventBus();
      const delivered = vi.fn();
      const dropped = vi.fn();
      bus.on('MessageDelivered', delivered);
      bus.on('MessageDropped', dropped);
      const observed = new InternalNetwork(Topology.build(ROLES, DEFAULT_EDGES), { hopLimit: 1, eventBus: bus });

      const [root] = observed.route(sequenced(clientRequest('r1', { request_type: 'research' })), 1);
      observed.deliver(root);
      observed.forward(root, 'research', [{ to: 'executive', topic: 'x', payload: {} }]);

      expect(delivered).toHaveBeenCalledTimes(1);
      expect(dropped).toHaveBeenCalledTimes(1);
      expect(dropped.mock.calls[0][0].payload).toEqual({ messageId: 'c1-m2', reason: 'HopLimitExceeded' });
    });
  });

  describe('escalate', () => {
    it('addresses the executive at hop 0 from the coordinator', () => {
      const escalation = network.escalate(3, 'e1', { owner: null, contenders: [] });
      expect(escalation).toMatchObject({ id: 'c3-m1', hop: 0, origin: 'coordinator', destination: 'executive', topic: 'escalation' });
    });
  });

  describe('history and stats', () => {
    it('counts deliveries per role and per edge', () => {
      const [root] = network.route(sequenced(clientRequest('r1', { request_type: 'research' })), 1);
      network.deliver(root);
      const { accepted } = network.forward(root, 'research', [{ to: 'executive', topic: 'note', payload: {} }]);
      network.deliver(accepted[0]);

      const stats = network.stats();
      expect(stats.totalDeliveries).toBe(2);
      expect(stats.totalDropped).toBe(0);
      expect(stats.byRole.research).toEqual({ outgoing: 1, incoming: 1 });
      expect(stats.byEdge).toEqual({ 'gateway->research': 1, 'research->executive': 1 });
      expect(network.getHistory({ role: 'executive' })).toHaveLength(1);
      expect(network.getHistory({ cycle: 2 })).toEqual([]);
    });

    it('forgets history on clear', () => {
      const [root] = network.route(sequenced(marketUpdate('m1')), 1);
      network.deliver(root);
      network.clearHistory();
      expect(network.getHistory()).toEqual([]);
      expect(network.status(root.id)).toBe('delivered');
    });
  });

  it('ranks the most central departments', () => {
    const chain = new InternalNetwork(Topology.build(['research', 'wealth_management', 'asset_management'], [
      { from: 'research', to: 'wealth_management', bidirectional: true },
      { from: 'wealth_management', to: 'asset_management', bidirectional: true },
    ]));
    expect(chain.centralRoles(2)).toEqual([
      { role: 'wealth_management', centrality: 1 },
      { role: 'research', centrality: 0 },
    ]);
    expect(network.centralRoles()).toHaveLength(3);
  });

  it('rejects a non-positive hop limit', () => {
    expect(() => new InternalNetwork(Topology.build(ROLES, []), { hopLimit: 0 }))
      .toThrow('Invalid hop limit: hop limit must be a positive integer, got 0');
  });
});
