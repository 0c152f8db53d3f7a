// Scenario runner — replays a list of external events through a broker for N passes
// and pulls live events from a gateway. One cycle per event; events never overlap.

import { z } from 'zod';
import { BrokerEventSchema, ScenarioSchema } from '../schemas/events.js';
import type { BrokerEvent } from '../types/broker-events.js';
import type { Decision } from '../types/coordination.js';
import type { BrokerAgent } from './broker-agent.js';
import type { Trace } from './trace.js';
import type { ExternalGateway } from '../bridge/external-gateway.js';
import { ConfigurationError } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface RunOptions {
  signal?: AbortSignal;
}

export interface LiveRunOptions extends RunOptions {
  /** Stop after this many events even if the gateway still has more. */
  maxEvents?: number;
}

/** A scenario whose events have not been validated yet. */
export interface ScenarioInput {
  name: string;
  description?: string;
  num_cycles?: number;
  events: readonly unknown[];
}

export interface RunWarning {
  cycle: number;
  eventId: string;
  kind: 'unresolved' | 'failures' | 'aborted';
  detail: string;
}

export class ScenarioRunner {
  private readonly broker: BrokerAgent;
  private readonly logger: Logger;
  private active?: AbortController;
  private readonly warningList: RunWarning[] = [];

  constructor(broker: BrokerAgent, options: { logger?: Logger } = {}) {
    this.broker = broker;
    this.logger = options.logger ?? createLogger('ScenarioRunner');
  }

  /** Warnings gathered since the runner was created. */
  get warnings(): readonly RunWarning[] {
    return this.warningList;
  }

  /** Request termination: the current cycle aborts at its next level boundary, nothing else starts. */
  stop(): void {
    this.active?.abort();
  }

  /**
   * Replay every event of `scenario` in order, `numCycles` times.
   * All events are validated before the first cycle; a bad event is fatal.
   * Returns the records appended by this run only.
   */
  async run(scenario: ScenarioInput | readonly unknown[], numCycles?: number, options: RunOptions = {}): Promise<Trace> {
    const { name, events, passes } = validateScenario(scenario, numCycles);
    const start = this.broker.trace.length;
    const { controller, release } = this.begin(options.signal);

    this.logger.info(`Running scenario "${name}"`, { events: events.length, passes });

    try {
      outer: for (let pass = 1; pass <= passes; pass++) {
        for (const event of events) {
          if (controller.signal.aborted) break outer;
          const decision = await this.broker.runCycle(event, { signal: controller.signal, pass });
          this.inspect(decision);
        }
      }
    } finally {
      release();
    }

    const trace = this.broker.trace.since(start);
    const summary = trace.summary();
    this.logger.info(`Scenario "${name}" finished`, { cycles: summary.cycles, outcomes: summary.outcomes });
    return trace;
  }

  /** Pull events from `gateway` until it runs dry, the limit is hit or the run is stopped. */
  async runLive(gateway: ExternalGateway, options: LiveRunOptions = {}): Promise<Trace> {
    const start = this.broker.trace.length;
    const { controller, release } = this.begin(options.signal);
    const limit = options.maxEvents ?? Number.POSITIVE_INFINITY;
    let processed = 0;

    try {
      while (processed < limit && !controller.signal.aborted) {
        const raw = await gateway.pull();
        if (raw === undefined) break;

        const parsed = BrokerEventSchema.safeParse(raw);
        if (!parsed.success) {
          // A malformed live event is skipped, unlike a scenario file which is rejected whole
          this.logger.warn('Rejected malformed event from gateway', { issues: formatIssues(parsed.error) });
          continue;
        }
        const decision = await this.broker.runCycle(parsed.data, { signal: controller.signal });
        this.inspect(decision);
        processed++;
      }
    } finally {
      release();
    }

    return this.broker.trace.since(start);
  }

  private inspect(decision: Decision): void {
    const record = this.broker.trace.last;
    if (!record) return;
    const base = { cycle: record.cycle, eventId: record.event.id };

    if (record.failures.length > 0) {
      this.warn({
        ...base,
        kind: 'failures',
        detail: record.failures.map(f => `${f.role}: ${f.reason}`).join('; '),
      });
    }
    if (decision.outcome === 'unresolved' || decision.outcome === 'aborted') {
      this.warn({ ...base, kind: decision.outcome, detail: decision.reason });
    }
  }

  private warn(warning: RunWarning): void {
    this.warningList.push(warning);
    this.logger.warn(`Cycle ${warning.cycle} ${warning.kind}`, { eventId: warning.eventId, detail: warning.detail });
  }

  /** One controller per run; it aborts on stop() or when the caller's signal does. */
  private begin(external: AbortSignal | undefined): { controller: AbortController; release: () => void } {
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    if (external?.aborted) controller.abort();
    external?.addEventListener('abort', onAbort, { once: true });
    this.active = controller;
    return {
      controller,
      release: () => {
        external?.removeEventListener('abort', onAbort);
        if (this.active === controller) this.active = undefined;
      },
    };
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
}

function validateScenario(
  scenario: ScenarioInput | readonly unknown[],
  numCycles: number | undefined,
): { name: string; events: BrokerEvent[]; passes: number } {
  const input = Array.isArray(scenario) ? { name: 'ad-hoc', events: scenario } : scenario;
  const parsed = ScenarioSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid scenario', formatIssues(parsed.error));
  }

  const passes = numCycles ?? parsed.data.num_cycles ?? 1;
  if (!Number.isInteger(passes) || passes < 1) {
    throw new ConfigurationError('Invalid scenario', [`number of cycles must be a positive integer, got ${passes}`]);
  }
  return { name: parsed.data.name, events: parsed.data.events, passes };
}
