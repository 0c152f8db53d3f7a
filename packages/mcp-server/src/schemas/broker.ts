import { z } from "zod";
import { DECISION_OUTCOMES } from "../../../agents/index.js";

export const IngestEventSchema = z.object({
  event: z
    .record(z.unknown())
    .describe(
      "External event: { id, type: client_request | market_update | regulatory_announcement | trading_opportunity, content, data, ... }"
    ),
});

export const RunScenarioSchema = z.object({
  name: z.string().min(1).optional().describe("Scenario name used in logs"),
  events: z
    .array(z.record(z.unknown()))
    .min(1)
    .describe("Ordered list of external events to replay"),
  num_cycles: z.coerce
    .number()
    .int()
    .positive()
    .optional()
    .describe("Number of passes over the event list (default 1)"),
});

export const TraceQuerySchema = z.object({
  since_cycle: z.coerce
    .number()
    .int()
    .nonnegative()
    .optional()
    .describe("Only return cycles after this one"),
  outcome: z
    .enum(DECISION_OUTCOMES)
    .optional()
    .describe("Only return cycles that ended with this outcome"),
  limit: z.coerce
    .number()
    .int()
    .positive()
    .optional()
    .describe("Maximum number of records, most recent last"),
});
