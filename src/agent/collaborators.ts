import type { ActionBatch, ErrorKind, Message } from './state';

/** Schema of an action the reasoning step may request */
export interface ActionSchema {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export interface InferenceOptions {
  /** Guidance text for the reasoning engine; omitted on long-running tasks */
  guidance?: string;
  signal?: AbortSignal;
}

export type Inference = ({ type: 'actions'; content?: string } & ActionBatch) | { type: 'complete'; answer: string };

export interface ReasoningClient {
  infer(history: readonly Message[], availableActions: readonly ActionSchema[], options?: InferenceOptions): Promise<Inference>;
}

/** Tool failures come back as values, never as thrown errors */
export type ToolOutcome = { ok: string } | { error: string; kind?: ErrorKind };

export interface ToolExecutor {
  execute(name: string, args: Record<string, unknown>, signal?: AbortSignal): Promise<ToolOutcome>;
  listActions?(): Promise<ActionSchema[]>;
}

export interface HumanInterface {
  ask(prompt: string, options: readonly string[]): Promise<string>;
}

export interface ProgressEvent {
  sessionId: string;
  step: number;
  lastAction: string | null;
  progressScore: number;
  status: string;
  errorCount: number;
  timestamp: string;
}

export interface ObservabilitySink {
  report(event: ProgressEvent): void | Promise<void>;
}

