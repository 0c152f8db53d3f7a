// SubAgent — one department of the brokerage
// Wraps a decision function with role-scoped state, an inbox and a per-call timeout.
// Calls on the same SubAgent never overlap: each receive waits for the previous one.

import { z } from 'zod';
import type { Role } from '../types/roles.js';
import { ROLE_LABELS } from '../types/roles.js';
import type { SequencedEvent } from '../types/broker-events.js';
import type { DecisionFailure, Message, Opinion, OutgoingMessage } from '../types/coordination.js';
import type { DecisionFunction, DecisionInput, DecisionOutput } from '../types/decision.js';
import { DEFAULT_DECISION_TIMEOUT_MS } from '../config/department-mappings.js';
import { RoleSchema } from '../schemas/events.js';
import { withTimeout } from '../utils/timeout.js';
import { errorMessage } from '../utils/errors.js';

export interface SubAgentConfig {
  role: Role;
  name?: string;
  decide: DecisionFunction;
  decisionTimeoutMs?: number;
  initialState?: Record<string, unknown>;
}

export interface ReceiveResult {
  message: Message;
  opinion?: Opinion;
  failure?: DecisionFailure;
  outgoing: OutgoingMessage[];
}

const DecisionOutputSchema = z.object({
  opinion: z.object({
    payload: z.record(z.unknown()),
    confidence: z.number().min(0).max(1).optional(),
    blocking: z.boolean().optional(),
    rationale: z.string().optional(),
  }).optional(),
  messages: z.array(z.object({
    to: z.union([RoleSchema, z.literal('broadcast')]),
    topic: z.string().min(1),
    payload: z.record(z.unknown()),
  })).optional(),
  state: z.record(z.unknown()).optional(),
});

export class SubAgent {
  readonly role: Role;
  readonly name: string;
  readonly decisionTimeoutMs: number;
  private readonly decide: DecisionFunction;
  private readonly initialState: Record<string, unknown>;
  private state: Record<string, unknown>;
  private inbox: Array<{ message: Message; event: SequencedEvent }> = [];
  private tail: Promise<unknown> = Promise.resolve();
  private handled = 0;
  private failures = 0;

  constructor(config: SubAgentConfig) {
    this.role = config.role;
    this.name = config.name ?? ROLE_LABELS[config.role];
    this.decide = config.decide;
    this.decisionTimeoutMs = config.decisionTimeoutMs ?? DEFAULT_DECISION_TIMEOUT_MS;
    this.initialState = { ...config.initialState };
    this.state = { ...this.initialState };
  }

  /**
   * Run the decision function for one message. Failures, timeouts and malformed
   * outputs come back as a DecisionFailure instead of a rejection.
   */
  receive(message: Message, event: SequencedEvent): Promise<ReceiveResult> {
    const run = this.tail.then(() => this.process(message, event));
    this.tail = run.catch(() => undefined);
    return run;
  }

  enqueue(message: Message, event: SequencedEvent): void {
    this.inbox.push({ message, event });
  }

  /** Process queued messages strictly in arrival order. */
  async drain(): Promise<ReceiveResult[]> {
    const results: ReceiveResult[] = [];
    while (this.inbox.length > 0) {
      const next = this.inbox.shift();
      if (!next) break;
      results.push(await this.receive(next.message, next.event));
    }
    return results;
  }

  get pending(): number {
    return this.inbox.length;
  }

  snapshot(): Record<string, unknown> {
    return structuredClone(this.state);
  }

  /** Restore the starting state (or a given one); used to replay a department in isolation. */
  reset(state?: Record<string, unknown>): void {
    this.state = structuredClone(state ?? this.initialState);
    this.inbox = [];
  }

  statusReport(): { role: Role; name: string; handled: number; failures: number; pending: number; stateKeys: string[] } {
    return {
      role: this.role,
      name: this.name,
      handled: this.handled,
      failures: this.failures,
      pending: this.inbox.length,
      stateKeys: Object.keys(this.state).sort(),
    };
  }

  private async process(message: Message, event: SequencedEvent): Promise<ReceiveResult> {
    this.handled++;
    const input: DecisionInput = {
      role: this.role,
      name: this.name,
      state: Object.freeze(structuredClone(this.state)),
      message,
      event,
    };

    let output: DecisionOutput;
    let nextState: Record<string, unknown>;
    try {
      const raw = await withTimeout(signal => this.decide(input, signal), this.decisionTimeoutMs);
      output = DecisionOutputSchema.parse(raw ?? {});
      nextState = output.state ? { ...this.state, ...structuredClone(output.state) } : this.state;
    } catch (err) {
      this.failures++;
      return {
        message,
        failure: {
          role: this.role,
          eventId: message.eventId,
          cycle: message.cycle,
          hop: message.hop,
          failed: true,
          reason: err instanceof z.ZodError ? `invalid decision output: ${err.issues[0]?.message ?? 'unknown'}` : errorMessage(err),
        },
        outgoing: [],
      };
    }

    this.state = nextState;

    const opinion: Opinion | undefined = output.opinion
      ? {
          role: this.role,
          eventId: message.eventId,
          cycle: message.cycle,
          hop: message.hop,
          payload: output.opinion.payload,
          confidence: output.opinion.confidence ?? 0.5,
          blocking: output.opinion.blocking ?? false,
          ...(output.opinion.rationale !== undefined ? { rationale: output.opinion.rationale } : {}),
        }
      : undefined;

    return { message, opinion, outgoing: output.messages ?? [] };
  }
}
