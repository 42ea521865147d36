import { EventEmitter } from 'events';
import type { InterruptPayload, NodeId, Outcome } from '../agent/transition';

export interface TransitionEvent {
  sessionId: string;
  from: NodeId;
  to: NodeId;
  step: number;
  timestamp: string;
}

export interface SuspendedEvent {
  sessionId: string;
  node: NodeId;
  resumeNode: NodeId;
  payload: InterruptPayload;
  timestamp: string;
}

export interface TerminatedEvent {
  sessionId: string;
  node: NodeId | null;
  outcome: Outcome;
  step: number;
  timestamp: string;
}

export class ControlLoopEvents extends EventEmitter {
  emitTransition(event: TransitionEvent): void {
    this.emit('transition', event);
  }

  emitSuspended(event: SuspendedEvent): void {
    this.emit('suspended', event);
  }

  emitTerminated(event: TerminatedEvent): void {
    this.emit('terminated', event);
  }
}
