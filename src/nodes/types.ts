import type { TaskState } from '../agent/state';
import type { NodeId, Transition } from '../agent/transition';
import type { AgentLogger } from '../utils/logger';

export interface NodeContext {
  signal: AbortSignal;
  logger: AgentLogger;
  /** Response supplied by the caller when the loop resumes at this node */
  resume?: string;
}

/** A unit of the control loop; it picks its own successor */
export interface RoutingNode {
  readonly id: NodeId;
  run(state: Readonly<TaskState>, ctx: NodeContext): Promise<Transition>;
}

/** Policy constants for routing decisions */
export interface LoopSettings {
  maxSteps: number;
  /** errorCount above this value ends the task */
  maxRetries: number;
  /** Complex tasks run the progress analyzer every N steps */
  progressCadence: number;
  /** Progress reports every N steps; 0 disables them */
  reportCadence: number;
  lowProgressThreshold: number;
  /** stuckCounter above this value triggers a strategy change */
  stuckLimit: number;
  qualityThreshold: number;
  /** Guidance is dropped from reasoning requests after this step */
  minimalGuidanceAfterStep: number;
}

export const DEFAULT_LOOP_SETTINGS: LoopSettings = {
  maxSteps: 150,
  maxRetries: 3,
  progressCadence: 5,
  reportCadence: 3,
  lowProgressThreshold: 0.3,
  stuckLimit: 2,
  qualityThreshold: 0.7,
  minimalGuidanceAfterStep: 25,
};
