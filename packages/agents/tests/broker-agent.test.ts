import { describe, it, expect, vi } from 'vitest';
import { BrokerAgent, type DepartmentConfig } from '../orchestrator/broker-agent.js';
import { createDecisionFunction } from '../orchestrator/decision-factory.js';
import { QueueGateway } from '../bridge/external-gateway.js';
import { ROLES } from '../types/roles.js';
import type { DecisionFunction, DecisionOutput } from '../types/decision.js';
import { ConfigurationError } from '../utils/errors.js';
import { silentLogger } from '../utils/logger.js';
import { clientRequest, marketUpdate, opinesOnEvent } from './helpers.js';

const quiet: DecisionFunction = () => ({});

function broker(departments: DepartmentConfig[], extra: Partial<ConstructorParameters<typeof BrokerAgent>[0]> = {}): BrokerAgent {
  return new BrokerAgent({ departments, logger: silentLogger, ...extra });
}

function houseBroker(): BrokerAgent {
  return broker(ROLES.map(role => ({ role, decide: createDecisionFunction(role) })));
}

// "trade" and "fund" tie sales & trading with asset management
const tiedRequest = clientRequest('tie-1', { content: 'Can you trade the fund for me?' });

describe('BrokerAgent', () => {
  describe('construction', () => {
    it('requires at least one department', () => {
      expect(() => broker([])).toThrow(ConfigurationError);
    });

    it('restricts the default topology to the roster', () => {
      const agent = broker([{ role: 'research', decide: quiet }, { role: 'wealth_management', decide: quiet }]);
      expect(agent.roster).toEqual(['research', 'wealth_management']);
      expect(agent.network.topology.edges()).toEqual([
        { from: 'research', to: 'wealth_management' },
        { from: 'wealth_management', to: 'research' },
      ]);
    });

    it('rejects edges outside the roster', () => {
      expect(() => broker([{ role: 'research', decide: quiet }], { edges: [{ from: 'research', to: 'executive' }] }))
        .toThrow('Invalid topology');
    });

    it('rejects a non-positive decision timeout', () => {
      expect(() => broker([{ role: 'research', decide: quiet }], { decisionTimeoutMs: 0 }))
        .toThrow('Invalid decision timeout');
    });
  });

  describe('runCycle', () => {
    it('takes no action when no department subscribes', async () => {
      const agent = broker([{ role: 'executive', decide: quiet }]);
      const decision = await agent.runCycle(marketUpdate('m1'));

      expect(decision).toEqual({
        eventId: 'm1', cycle: 1, owner: 'research', outcome: 'no_action', reason: 'no department subscribed to market_update',
      });
      expect(agent.trace.length).toBe(1);
    });

    it('reaches consensus without involving the executive', async () => {
      const executive = vi.fn(quiet);
      const agent = broker([
        { role: 'sales_trading', decide: opinesOnEvent({ action: 'hold' }) },
        { role: 'research', decide: opinesOnEvent({ action: 'hold' }) },
        { role: 'executive', decide: executive },
      ]);

      const decision = await agent.runCycle(marketUpdate('m1'));
      expect(decision).toMatchObject({ outcome: 'consensus', payload: { action: 'hold' }, roles: ['sales_trading', 'research'] });
      expect(executive).not.toHaveBeenCalled();
      expect(agent.network.getHistory({ cycle: 1 }).map(r => r.topic)).toEqual(['event', 'event']);
    });

    it('stamps the event with its sequence number', async () => {
      const agent = broker([{ role: 'research', decide: quiet }]);
      await agent.runCycle(marketUpdate('m1'));
      await agent.runCycle(marketUpdate('m2'));
      expect(agent.trace.records.map(r => r.event.sequence)).toEqual([1, 2]);
      expect(agent.trace.records.map(r => r.pass)).toEqual([0, 0]);
      expect(Object.isFrozen(agent.trace.records[0].event)).toBe(true);
    });

    it('lets compliance veto', async () => {
      const agent = broker([
        { role: 'research', decide: opinesOnEvent({ action: 'buy' }) },
        { role: 'risk_compliance', decide: opinesOnEvent({ action: 'reject' }, { blocking: true }) },
      ]);
      const decision = await agent.runCycle(marketUpdate('m1'));
      expect(decision).toMatchObject({ outcome: 'veto', owner: 'research', opinion: { role: 'risk_compliance', payload: { action: 'reject' } } });
    });

    it('keeps the compliance veto when compliance later answers a review without blocking', async () => {
      const agent = broker([
        {
          role: 'investment_banking',
          decide: ({ message }) => message.topic === 'event'
            ? {
                opinion: { payload: { action: 'proceed' } },
                messages: [{ to: 'risk_compliance', topic: 'request_review', payload: {} }],
              }
            : {},
        },
        {
          role: 'risk_compliance',
          decide: ({ message }) => message.topic === 'event'
            ? { opinion: { payload: { action: 'decline' }, blocking: true } }
            : { opinion: { payload: { action: 'noted' } } },
        },
      ]);

      const decision = await agent.runCycle(clientRequest('ipo-9', {
        request_type: 'investment_banking',
        target_roles: ['investment_banking', 'risk_compliance'],
      }));
      expect(agent.trace.last?.opinions.map(o => [o.role, o.hop, o.blocking, o.payload])).toEqual([
        ['investment_banking', 0, false, { action: 'proceed' }],
        ['risk_compliance', 0, true, { action: 'decline' }],
        ['risk_compliance', 1, false, { action: 'noted' }],
      ]);
      expect(decision).toMatchObject({
        outcome: 'veto',
        owner: 'investment_banking',
        opinion: { role: 'risk_compliance', hop: 0, payload: { action: 'decline' } },
      });
    });

    it('escalates a tie and adopts the executive ruling', async () => {
      const escalations: unknown[] = [];
      const agent = broker([
        { role: 'sales_trading', decide: opinesOnEvent({ action: 'buy' }) },
        { role: 'asset_management', decide: opinesOnEvent({ action: 'hold' }) },
        {
          role: 'executive',
          decide: ({ message }) => {
            if (message.topic !== 'escalation') return {};
            escalations.push(message.payload);
            return { opinion: { payload: { action: 'hold' }, rationale: 'capital preservation' } };
          },
        },
      ]);

      const decision = await agent.runCycle(tiedRequest);
      expect(decision.outcome).toBe('escalated');
      expect(decision).toMatchObject({
        owner: null,
        opinion: { role: 'executive', hop: 0, payload: { action: 'hold' } },
        contenders: [{ role: 'sales_trading' }, { role: 'asset_management' }],
      });
      expect(escalations).toEqual([{
        owner: null,
        contenders: [
          { role: 'sales_trading', payload: { action: 'buy' }, confidence: 0.5 },
          { role: 'asset_management', payload: { action: 'hold' }, confidence: 0.5 },
        ],
      }]);
    });

    it('is unresolved when the executive stays silent on an escalation', async () => {
      const agent = broker([
        { role: 'sales_trading', decide: opinesOnEvent({ action: 'buy' }) },
        { role: 'asset_management', decide: opinesOnEvent({ action: 'hold' }) },
        { role: 'executive', decide: quiet },
      ]);
      const decision = await agent.runCycle(tiedRequest);
      expect(decision).toMatchObject({ outcome: 'unresolved', reason: 'executive produced no opinion during the escalation round' });
    });

    it('is unresolved when the executive times out on an escalation', async () => {
      let aborted = false;
      const agent = broker([
        { role: 'sales_trading', decide: opinesOnEvent({ action: 'buy' }) },
        { role: 'asset_management', decide: opinesOnEvent({ action: 'hold' }) },
        {
          role: 'executive',
          decisionTimeoutMs: 20,
          decide: ({ message }, signal) => message.topic !== 'escalation'
            ? {}
            : new Promise<DecisionOutput>((_, reject) => {
                signal.addEventListener('abort', () => {
                  aborted = true;
                  reject(new Error('ruling withdrawn'));
                });
              }),
        },
      ]);

      const decision = await agent.runCycle(tiedRequest);
      expect(decision).toMatchObject({
        outcome: 'unresolved',
        reason: 'executive produced no opinion during the escalation round',
        contenders: [{ role: 'sales_trading' }, { role: 'asset_management' }],
      });
      expect(agent.trace.last?.failures).toEqual([{
        role: 'executive', eventId: 'tie-1', cycle: 1, hop: 0, failed: true, reason: 'decision function timed out after 20ms',
      }]);
      expect(aborted).toBe(true);
    });

    it('is unresolved when there is no executive to escalate to', async () => {
      const agent = broker([
        { role: 'sales_trading', decide: opinesOnEvent({ action: 'buy' }) },
        { role: 'asset_management', decide: opinesOnEvent({ action: 'hold' }) },
      ]);
      const decision = await agent.runCycle(tiedRequest);
      expect(decision.outcome).toBe('unresolved');
    });

    it('records failures and decides on the remaining opinions', async () => {
      const agent = broker([
        { role: 'sales_trading', decide: () => { throw new Error('desk offline'); } },
        { role: 'research', decide: opinesOnEvent({ action: 'hold' }) },
      ]);
      const decision = await agent.runCycle(marketUpdate('m1'));

      expect(decision).toMatchObject({ outcome: 'consensus', roles: ['research'] });
      expect(agent.trace.last?.failures).toEqual([
        { role: 'sales_trading', eventId: 'm1', cycle: 1, hop: 0, failed: true, reason: 'desk offline' },
      ]);
      expect(agent.getAgent('sales_trading')?.statusReport().failures).toBe(1);
    });

    it('bounds follow-ups between peers by the hop limit', async () => {
      const ping = (to: 'research' | 'sales_trading'): DecisionFunction =>
        () => ({ messages: [{ to, topic: 'ping', payload: {} }] });
      const agent = broker([
        { role: 'sales_trading', decide: ping('research') },
        { role: 'research', decide: ping('sales_trading') },
      ], { hopLimit: 3 });

      const decision = await agent.runCycle({ ...marketUpdate('m1'), target_roles: ['research'] });
      const record = agent.trace.last;

      expect(decision.outcome).toBe('no_action');
      expect(agent.network.stats().totalDeliveries).toBe(3);
      expect(record?.dropped.map(d => [d.message.hop, d.reason])).toEqual([[3, 'HopLimitExceeded']]);
    });

    it('aborts at the next hop-level boundary', async () => {
      const controller = new AbortController();
      const gateway = new QueueGateway();
      const agent = broker([
        {
          role: 'research',
          decide: () => {
            controller.abort();
            return { opinion: { payload: { action: 'hold' } }, messages: [{ to: 'sales_trading', topic: 'note', payload: {} }] };
          },
        },
        { role: 'sales_trading', decide: opinesOnEvent({ action: 'buy' }) },
      ], { gateway });

      const decision = await agent.runCycle({ ...marketUpdate('m1'), target_roles: ['research'] }, { signal: controller.signal });

      expect(decision).toEqual({
        eventId: 'm1', cycle: 1, owner: 'research', outcome: 'aborted', reason: 'cycle cancelled at a hop-level boundary',
      });
      expect(agent.trace.last?.opinions).toHaveLength(1);
      expect(gateway.decisions).toEqual([]);
    });

    it('pushes decisions to the gateway', async () => {
      const gateway = new QueueGateway();
      const agent = broker([{ role: 'research', decide: opinesOnEvent({ action: 'hold' }) }], { gateway });
      const decision = await agent.runCycle(marketUpdate('m1'));
      expect(gateway.decisions).toEqual([decision]);
    });

    it('survives a gateway that fails to publish', async () => {
      const events: string[] = [];
      const agent = broker([{ role: 'research', decide: opinesOnEvent({ action: 'hold' }) }], {
        gateway: {
          pull: () => undefined,
          push: () => Promise.reject(new Error('downstream unavailable')),
        },
        onEvent: (e) => events.push(e.type),
      });

      const decision = await agent.runCycle(marketUpdate('m1'));
      expect(decision.outcome).toBe('consensus');
      expect(events).toContain('GatewayPushFailed');
      expect(events).not.toContain('DecisionPushed');
    });

    it('reports the same trace whether or not departments run concurrently', async () => {
      const sequential = broker(ROLES.map(role => ({ role, decide: createDecisionFunction(role) })), { concurrentDelivery: false });
      const concurrent = houseBroker();
      const event = marketUpdate('m1', { market_sentiment: 'negative', sector_performance: { energy: -0.03 } });

      await sequential.runCycle(event);
      await concurrent.runCycle(event);
      expect(JSON.stringify(sequential.trace)).toBe(JSON.stringify(concurrent.trace));
    });

    it('queues a level in each department inbox and drains it in arrival order', async () => {
      const seen: Array<{ from: string; pending: number | undefined }> = [];
      const notifies: DecisionFunction = ({ message }) =>
        message.topic === 'event' ? { messages: [{ to: 'research', topic: 'note', payload: {} }] } : {};

      const agent: BrokerAgent = broker([
        { role: 'investment_banking', decide: notifies },
        { role: 'sales_trading', decide: notifies },
        {
          role: 'research',
          decide: ({ message }) => {
            seen.push({ from: message.origin, pending: agent.getAgent('research')?.statusReport().pending });
            return {};
          },
        },
      ], {
        edges: [
          { from: 'investment_banking', to: 'research' },
          { from: 'sales_trading', to: 'research' },
        ],
      });

      await agent.runCycle({ ...marketUpdate('m1'), target_roles: ['investment_banking', 'sales_trading'] });
      expect(seen).toEqual([
        { from: 'investment_banking', pending: 1 },
        { from: 'sales_trading', pending: 0 },
      ]);
      expect(agent.getAgent('research')?.statusReport()).toMatchObject({ handled: 2, pending: 0 });
    });
  });

  describe('observability', () => {
    it('emits the cycle lifecycle in order', async () => {
      const events: string[] = [];
      const agent = broker([{ role: 'research', decide: opinesOnEvent({ action: 'hold' }) }], {
        onEvent: (e) => events.push(e.type),
      });
      await agent.runCycle(marketUpdate('m1'));
      expect(events).toEqual(['CycleStarted', 'MessageDelivered', 'OpinionRecorded', 'DecisionReached', 'CycleCompleted']);
    });

    it('reports department and network status', async () => {
      const agent = houseBroker();
      await agent.runCycle(marketUpdate('m1', { sector_performance: { technology: 0.05 } }));

      const status = agent.status();
      expect(status.name).toBe('Brokerage');
      expect(status.cycles).toBe(1);
      expect(status.trace.outcomes.priority).toBe(1);
      const research = status.departments.find(d => d.role === 'research');
      expect(research?.state).toEqual({ outlook: 'overweight' });
    });
  });
});
