// Broker configuration — JSON file + environment overrides, validated with zod
// Env: BROKER_CONFIG (file path), BROKER_HOP_LIMIT, BROKER_DECISION_TIMEOUT_MS, BROKER_NUM_CYCLES

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ROLES } from '../types/roles.js';
import { RoleSchema, ScenarioSchema } from '../schemas/events.js';
import type { Scenario } from '../types/broker-events.js';
import {
  DEFAULT_DECISION_TIMEOUT_MS, DEFAULT_HOP_LIMIT, DEFAULT_PRIMARY_OWNER_PRIORITY, DEFAULT_SUBSCRIPTIONS,
  type SubscriptionTable,
} from './department-mappings.js';
import { BrokerAgent, type BrokerAgentConfig } from '../orchestrator/broker-agent.js';
import { createDecisionFunction } from '../orchestrator/decision-factory.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';

const RouteSchema = z.union([z.array(RoleSchema), z.literal('keywords')]);

const SubscriptionOverridesSchema = z.object({
  client_request: z.object({
    investment_banking: RouteSchema,
    trading: RouteSchema,
    research: RouteSchema,
    wealth_management: RouteSchema,
    asset_management: RouteSchema,
    general: RouteSchema,
  }).partial().optional(),
  market_update: z.array(RoleSchema).optional(),
  regulatory_announcement: z.array(RoleSchema).optional(),
  trading_opportunity: z.array(RoleSchema).optional(),
}).strict();

const DepartmentFileSchema = z.object({
  role: RoleSchema,
  name: z.string().min(1).optional(),
  binding: z.enum(['rules', 'silent']).default('rules'),
  initial_state: z.record(z.unknown()).optional(),
  decision_timeout_ms: z.number().int().positive().optional(),
}).strict();

export const BrokerConfigFileSchema = z.object({
  name: z.string().min(1).default('Brokerage'),
  departments: z.array(DepartmentFileSchema).min(1).optional()
    .describe('Roster; defaults to every role bound to its built-in desk'),
  edges: z.array(z.object({
    from: RoleSchema,
    to: RoleSchema,
    bidirectional: z.boolean().optional(),
  }).strict()).optional()
    .describe('Topology edge list; defaults to the house topology'),
  hop_limit: z.number().int().positive().default(DEFAULT_HOP_LIMIT),
  role_priority: z.record(RoleSchema, z.number()).optional(),
  primary_owner_priority: z.number().default(DEFAULT_PRIMARY_OWNER_PRIORITY),
  num_cycles: z.number().int().positive().default(1),
  decision_timeout_ms: z.number().int().positive().default(DEFAULT_DECISION_TIMEOUT_MS),
  concurrent_delivery: z.boolean().default(true),
  subscriptions: SubscriptionOverridesSchema.optional(),
}).strict();

const EnvOverridesSchema = z.object({
  BROKER_HOP_LIMIT: z.coerce.number().int().positive().optional(),
  BROKER_DECISION_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  BROKER_NUM_CYCLES: z.coerce.number().int().positive().optional(),
});

type ConfigFile = z.output<typeof BrokerConfigFileSchema>;

export type BrokerSettings = Omit<ConfigFile, 'departments' | 'subscriptions'> & {
  departments: z.output<typeof DepartmentFileSchema>[];
  subscriptions: SubscriptionTable;
};

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
}

function readJson(path: string, what: string): unknown {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (err) {
    throw new ConfigurationError(`Cannot read ${what}`, [`${path}: ${errorMessage(err)}`]);
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`Invalid ${what}`, [`${path}: ${errorMessage(err)}`]);
  }
}

export function mergeSubscriptions(overrides: z.output<typeof SubscriptionOverridesSchema> = {}): SubscriptionTable {
  return {
    client_request: { ...DEFAULT_SUBSCRIPTIONS.client_request, ...overrides.client_request },
    market_update: overrides.market_update ?? DEFAULT_SUBSCRIPTIONS.market_update,
    regulatory_announcement: overrides.regulatory_announcement ?? DEFAULT_SUBSCRIPTIONS.regulatory_announcement,
    trading_opportunity: overrides.trading_opportunity ?? DEFAULT_SUBSCRIPTIONS.trading_opportunity,
  };
}

/** Validate a parsed config object and apply environment overrides on top of it. */
export function parseBrokerConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): BrokerSettings {
  const file = BrokerConfigFileSchema.safeParse(raw ?? {});
  if (!file.success) throw new ConfigurationError('Invalid broker configuration', formatIssues(file.error));

  const overrides = EnvOverridesSchema.safeParse(env);
  if (!overrides.success) throw new ConfigurationError('Invalid environment overrides', formatIssues(overrides.error));

  const { departments, subscriptions, ...rest } = file.data;
  const { BROKER_HOP_LIMIT, BROKER_DECISION_TIMEOUT_MS, BROKER_NUM_CYCLES } = overrides.data;
  return {
    ...rest,
    hop_limit: BROKER_HOP_LIMIT ?? rest.hop_limit,
    decision_timeout_ms: BROKER_DECISION_TIMEOUT_MS ?? rest.decision_timeout_ms,
    num_cycles: BROKER_NUM_CYCLES ?? rest.num_cycles,
    departments: departments ?? ROLES.map(role => ({ role, binding: 'rules' as const })),
    subscriptions: mergeSubscriptions(subscriptions),
  };
}

/** Load settings from `path` (or BROKER_CONFIG); with neither, defaults plus env overrides. */
export function loadBrokerConfig(path?: string, env: NodeJS.ProcessEnv = process.env): BrokerSettings {
  const source = path ?? env.BROKER_CONFIG;
  const raw = source ? readJson(source, 'broker configuration') : {};
  return parseBrokerConfig(raw, env);
}

export function loadScenario(path: string): Scenario {
  const parsed = ScenarioSchema.safeParse(readJson(path, 'scenario file'));
  if (!parsed.success) throw new ConfigurationError('Invalid scenario file', formatIssues(parsed.error));
  return parsed.data;
}

/** Build a broker from settings, binding each department to its decision function. */
export function createBrokerAgent(
  settings: BrokerSettings,
  overrides: Partial<Omit<BrokerAgentConfig, 'departments'>> = {},
): BrokerAgent {
  return new BrokerAgent({
    name: settings.name,
    departments: settings.departments.map(d => ({
      role: d.role,
      name: d.name,
      decide: createDecisionFunction(d.role, d.binding),
      initialState: d.initial_state,
      decisionTimeoutMs: d.decision_timeout_ms,
    })),
    edges: settings.edges,
    hopLimit: settings.hop_limit,
    subscriptions: settings.subscriptions,
    rolePriority: settings.role_priority,
    primaryOwnerPriority: settings.primary_owner_priority,
    decisionTimeoutMs: settings.decision_timeout_ms,
    concurrentDelivery: settings.concurrent_delivery,
    ...overrides,
  });
}
