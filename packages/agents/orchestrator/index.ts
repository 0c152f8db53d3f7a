export { BrokerAgent } from './broker-agent.js';
export type { BrokerAgentConfig, BrokerStatus, DepartmentConfig, RunCycleOptions } from './broker-agent.js';
export { ConflictResolver, latestByRole } from './conflict-resolver.js';
export type { ConflictResolverConfig, Resolution } from './conflict-resolver.js';
export { ScenarioRunner } from './scenario-runner.js';
export type { RunOptions, LiveRunOptions, RunWarning, ScenarioInput } from './scenario-runner.js';
export { Trace } from './trace.js';
export type { TraceExport, TraceSummary } from './trace.js';
export { createDepartment, createDecisionFunction } from './decision-factory.js';
export type { DecisionBinding } from './decision-factory.js';
