import type { StateDelta } from './state';

export type NodeId =
  | 'reasoning'
  | 'validator'
  | 'human_confirmation'
  | 'tool_execution'
  | 'self_corrector'
  | 'progress_analyzer'
  | 'strategy_adapter'
  | 'quality_evaluator'
  | 'goal_validator'
  | 'memory_manager'
  | 'progress_reporter';

export const NODE_IDS: readonly NodeId[] = [
  'reasoning',
  'validator',
  'human_confirmation',
  'tool_execution',
  'self_corrector',
  'progress_analyzer',
  'strategy_adapter',
  'quality_evaluator',
  'goal_validator',
  'memory_manager',
  'progress_reporter',
];

export function isNodeId(value: unknown): value is NodeId {
  return typeof value === 'string' && (NODE_IDS as readonly string[]).includes(value);
}

/** Payload handed to the caller when the loop suspends for human input */
export interface InterruptPayload {
  kind: 'confirmation' | 'question';
  message: string;
  options: string[];
}

export type Outcome = { status: 'success'; reason: string; answer?: string } | { status: 'failure'; reason: string; detail?: string };

export type Transition =
  | { type: 'continue'; next: NodeId; delta?: StateDelta }
  | { type: 'suspend'; payload: InterruptPayload; resumeNode: NodeId; delta?: StateDelta }
  | { type: 'terminal'; outcome: Outcome; delta?: StateDelta };

export function goTo(next: NodeId, delta?: StateDelta): Transition {
  return { type: 'continue', next, delta };
}

export function suspend(payload: InterruptPayload, resumeNode: NodeId, delta?: StateDelta): Transition {
  return { type: 'suspend', payload, resumeNode, delta };
}

export function succeed(reason: string, answer?: string, delta?: StateDelta): Transition {
  return { type: 'terminal', outcome: { status: 'success', reason, answer }, delta };
}

export function fail(reason: string, detail?: string, delta?: StateDelta): Transition {
  return { type: 'terminal', outcome: { status: 'failure', reason, detail }, delta };
}

// Terminal failure reasons
export const STEP_LIMIT_EXCEEDED = 'step_limit_exceeded';
export const CANCELLED = 'cancelled';

export function retryExhausted(kind: string): string {
  return `retry_exhausted:${kind}`;
}
