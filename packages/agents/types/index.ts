export * from './roles.js';
export type * from './broker-events.js';
export * from './coordination.js';
export type * from './decision.js';
export * from './events.js';
