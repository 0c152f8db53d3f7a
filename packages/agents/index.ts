// Composite brokerage agent
// Department sub-agents coordinated over an internal routing network, with conflict resolution and scenario replay

export { BrokerAgent, ScenarioRunner, ConflictResolver, Trace, latestByRole } from './orchestrator/index.js';
export type {
  BrokerAgentConfig, BrokerStatus, DepartmentConfig, RunCycleOptions,
  ConflictResolverConfig, Resolution, RunOptions, LiveRunOptions, RunWarning, ScenarioInput,
  TraceExport, TraceSummary, DecisionBinding,
} from './orchestrator/index.js';
export { createDepartment, createDecisionFunction } from './orchestrator/index.js';

export { SubAgent } from './agents/sub-agent.js';
export type { SubAgentConfig, ReceiveResult } from './agents/sub-agent.js';
export { BaseDepartment } from './agents/base-department.js';
export { InvestmentBankingDesk } from './agents/investment-banking.js';
export { SalesTradingDesk } from './agents/sales-trading.js';
export { ResearchDesk } from './agents/research.js';
export { WealthManagementDesk } from './agents/wealth-management.js';
export { AssetManagementDesk } from './agents/asset-management.js';
export { RiskComplianceDesk } from './agents/risk-compliance.js';
export { ExecutiveDesk } from './agents/executive.js';

export { Topology } from './collaboration/topology.js';
export type { Edge } from './collaboration/topology.js';
export { InternalNetwork } from './collaboration/internal-network.js';
export type { CommunicationRecord, CommunicationStats, ForwardResult, DeliveryResult } from './collaboration/internal-network.js';

export { QueueGateway } from './bridge/external-gateway.js';
export type { ExternalGateway } from './bridge/external-gateway.js';

export * from './config/index.js';
export * from './schemas/events.js';
export * from './types/index.js';

export { ConfigurationError, DecisionTimeoutError, errorMessage } from './utils/errors.js';
export { createLogger, resolveLogLevel, silentLogger } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';
export { stableStringify, payloadsEqual } from './utils/stable-stringify.js';
