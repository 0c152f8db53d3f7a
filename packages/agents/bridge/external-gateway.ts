// External gateway — the seam between the broker and the outside world.
// Events come in through pull(), decisions go out through push().

import type { BrokerEvent } from '../types/broker-events.js';
import type { Decision, TraceRecord } from '../types/coordination.js';

export interface ExternalGateway {
  /** Publish a decision. Rejections are logged by the broker and never fail the cycle. */
  push(decision: Decision, record: TraceRecord): void | Promise<void>;
  /** Next pending external event, or undefined when there is none. */
  pull(): BrokerEvent | undefined | Promise<BrokerEvent | undefined>;
}

type DecisionHandler = (decision: Decision, record: TraceRecord) => void;

/** In-process gateway backed by a FIFO queue; used by the CLI, MCP server and tests. */
export class QueueGateway implements ExternalGateway {
  private readonly queue: BrokerEvent[];
  private readonly published: Decision[] = [];
  private readonly handlers = new Set<DecisionHandler>();

  constructor(events: readonly BrokerEvent[] = []) {
    this.queue = [...events];
  }

  enqueue(...events: BrokerEvent[]): void {
    this.queue.push(...events);
  }

  get size(): number {
    return this.queue.length;
  }

  pull(): BrokerEvent | undefined {
    return this.queue.shift();
  }

  push(decision: Decision, record: TraceRecord): void {
    this.published.push(decision);
    for (const handler of this.handlers) handler(decision, record);
  }

  subscribe(handler: DecisionHandler): () => void {
    this.handlers.add(handler);
    return () => this.handlers.delete(handler);
  }

  get decisions(): readonly Decision[] {
    return this.published;
  }
}
