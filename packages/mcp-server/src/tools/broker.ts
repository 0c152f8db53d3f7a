import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import {
  BrokerEventSchema,
  ConfigurationError,
  QueueGateway,
  ScenarioRunner,
  type BrokerAgent,
  type TraceRecord,
} from "../../../agents/index.js";
import {
  IngestEventSchema,
  RunScenarioSchema,
  TraceQuerySchema,
} from "../schemas/broker.js";
import { wrapResponse, coerceNumbers, type ToolResponse } from "../formatters/response.js";

export interface BrokerToolHandlers {
  ingestEvent(params: unknown): Promise<ToolResponse>;
  runScenario(params: unknown): Promise<ToolResponse>;
  trace(params: unknown): ToolResponse;
  topology(): ToolResponse;
}

function toError(err: unknown): Error {
  if (err instanceof z.ZodError) {
    return new ConfigurationError(
      "Invalid parameters",
      err.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    );
  }
  return err instanceof Error ? err : new Error(String(err));
}

function summarizeRecord(record: TraceRecord) {
  return {
    cycle: record.cycle,
    pass: record.pass,
    event_id: record.event.id,
    decision: record.decision,
    opinions: record.opinions.map((o) => ({ role: o.role, hop: o.hop, payload: o.payload })),
    failures: record.failures.map((f) => ({ role: f.role, reason: f.reason })),
    dropped: record.dropped.map((d) => ({ message_id: d.message.id, reason: d.reason })),
  };
}

/**
 * Tool handlers over one broker. Calls are serialized so that cycles
 * from concurrent requests never interleave.
 */
export function createBrokerToolHandlers(broker: BrokerAgent): BrokerToolHandlers {
  const gateway = new QueueGateway();
  const runner = new ScenarioRunner(broker);
  let tail: Promise<unknown> = Promise.resolve();

  function serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = tail.then(task);
    tail = run.catch(() => undefined);
    return run;
  }

  return {
    ingestEvent: (params) =>
      serialize(async () => {
        try {
          const { event } = IngestEventSchema.parse(params);
          const parsed = BrokerEventSchema.safeParse(event);
          if (!parsed.success) throw parsed.error;
          gateway.enqueue(parsed.data);
          const trace = await runner.runLive(gateway, { maxEvents: 1 });
          const record = trace.last;
          if (!record) throw new Error("event was not processed");
          return wrapResponse(summarizeRecord(record));
        } catch (err) {
          return wrapResponse(toError(err));
        }
      }),

    runScenario: (params) =>
      serialize(async () => {
        try {
          const { name, events, num_cycles } = RunScenarioSchema.parse(params);
          const trace = await runner.run({ name: name ?? "mcp-scenario", events }, num_cycles);
          return wrapResponse({
            summary: trace.summary(),
            records: trace.records.map(summarizeRecord),
          });
        } catch (err) {
          return wrapResponse(toError(err));
        }
      }),

    trace: (params) => {
      try {
        const { since_cycle, outcome, limit } = TraceQuerySchema.parse(coerceNumbers(params));
        let records = broker.trace.records.filter(
          (r) => (since_cycle === undefined || r.cycle > since_cycle) &&
            (outcome === undefined || r.decision.outcome === outcome)
        );
        if (limit !== undefined) records = records.slice(-limit);
        return wrapResponse({
          summary: broker.trace.summary(),
          records: records.map(summarizeRecord),
        });
      } catch (err) {
        return wrapResponse(toError(err));
      }
    },

    topology: () => {
      const { topology, hopLimit } = broker.network;
      return wrapResponse({
        name: broker.name,
        roles: topology.roles,
        edges: topology.edges(),
        hop_limit: hopLimit,
        has_cycle: topology.hasCycle(),
        central_roles: broker.network.centralRoles(),
        status: broker.status(),
      });
    },
  };
}

export function registerBrokerTools(server: McpServer, broker: BrokerAgent): BrokerToolHandlers {
  const handlers = createBrokerToolHandlers(broker);

  server.tool(
    "broker_ingest_event",
    "Feed one external event (client request, market update, regulatory announcement or trading opportunity) into the brokerage. Runs a full coordination cycle: routing to subscribed departments, internal follow-ups bounded by the hop limit, and conflict resolution. Returns the decision with every opinion, failure and dropped message of the cycle.",
    IngestEventSchema.shape,
    async (params) => handlers.ingestEvent(params)
  );

  server.tool(
    "broker_run_scenario",
    "Replay an ordered list of events through the brokerage for one or more passes. All events are validated before the first cycle runs. Returns a per-cycle summary and outcome counts.",
    RunScenarioSchema.shape,
    async (params) => handlers.runScenario(params)
  );

  server.tool(
    "broker_trace",
    "Read the brokerage's decision trace, optionally filtered by cycle and outcome.",
    TraceQuerySchema.shape,
    async (params) => handlers.trace(params)
  );

  server.tool(
    "broker_topology",
    "Describe the department roster, internal routing edges, hop limit, the most central departments and current department status.",
    async () => handlers.topology()
  );

  return handlers;
}
