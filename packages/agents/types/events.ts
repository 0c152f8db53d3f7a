// Domain events emitted while the broker coordinates a cycle
// Observability only: nothing in the core depends on a handler being attached.

export type DomainEventType =
  // Orchestration
  | 'CycleStarted'
  | 'CycleCompleted'
  | 'CycleAborted'
  // Network
  | 'MessageDelivered'
  | 'MessageDropped'
  // Departments
  | 'OpinionRecorded'
  | 'DecisionFailed'
  // Conflict resolution
  | 'ConflictEscalated'
  | 'DecisionReached'
  | 'DecisionUnresolved'
  // Gateway
  | 'DecisionPushed'
  | 'GatewayPushFailed';

export interface DomainEvent<T = unknown> {
  type: DomainEventType;
  cycle: number;
  sourceContext: string;   // component name
  payload: T;
}

export interface EventBus {
  emit(event: DomainEvent): void;
  on(type: DomainEventType, handler: (event: DomainEvent) => void): void;
  off(type: DomainEventType, handler: (event: DomainEvent) => void): void;
}

// Simple in-process event bus implementation
export class SimpleEventBus implements EventBus {
  private handlers = new Map<DomainEventType, Set<(event: DomainEvent) => void>>();

  emit(event: DomainEvent): void {
    const typeHandlers = this.handlers.get(event.type);
    if (typeHandlers) {
      for (const handler of typeHandlers) {
        handler(event);
      }
    }
  }

  on(type: DomainEventType, handler: (event: DomainEvent) => void): void {
    let typeHandlers = this.handlers.get(type);
    if (!typeHandlers) {
      typeHandlers = new Set();
      this.handlers.set(type, typeHandlers);
    }
    typeHandlers.add(handler);
  }

  off(type: DomainEventType, handler: (event: DomainEvent) => void): void {
    this.handlers.get(type)?.delete(handler);
  }
}

export const DOMAIN_EVENT_TYPES: readonly DomainEventType[] = [
  'CycleStarted', 'CycleCompleted', 'CycleAborted',
  'MessageDelivered', 'MessageDropped',
  'OpinionRecorded', 'DecisionFailed',
  'ConflictEscalated', 'DecisionReached', 'DecisionUnresolved',
  'DecisionPushed', 'GatewayPushFailed',
];
