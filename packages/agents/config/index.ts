export {
  DEFAULT_EDGES, DEFAULT_SUBSCRIPTIONS, ROUTING_KEYWORDS, DEFAULT_ROLE_PRIORITY,
  DEFAULT_PRIMARY_OWNER_PRIORITY, DEFAULT_HOP_LIMIT, DEFAULT_DECISION_TIMEOUT_MS,
  classifyByKeywords, primaryOwnerOf,
} from './department-mappings.js';
export type { EdgeSpec, SubscriptionTable, ClientRequestRoute } from './department-mappings.js';
export {
  BrokerConfigFileSchema, parseBrokerConfig, loadBrokerConfig, loadScenario,
  createBrokerAgent, mergeSubscriptions,
} from './broker-config.js';
export type { BrokerSettings } from './broker-config.js';
