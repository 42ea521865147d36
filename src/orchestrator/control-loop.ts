import { applyDelta } from '../agent/state';
import type { MessageDraft, StateDelta, TaskState } from '../agent/state';
import { CANCELLED, STEP_LIMIT_EXCEEDED, isNodeId } from '../agent/transition';
import type { InterruptPayload, NodeId, Outcome, Transition } from '../agent/transition';
import { RoutingError } from '../agent/errors';
import type { NodeRegistry } from '../nodes';
import { DEFAULT_LOOP_SETTINGS } from '../nodes';
import { silentLogger } from '../utils/logger';
import type { AgentLogger } from '../utils/logger';
import { ControlLoopEvents } from './events';

// ── Types ───────────────────────────────────────────────────────────────

/** Everything needed to continue a suspended task, in plain JSON */
export interface Continuation {
  sessionId: string;
  resumeNode: NodeId;
  payload: InterruptPayload;
  state: TaskState;
}

export type LoopResult = { type: 'terminal'; outcome: Outcome; state: TaskState } | { type: 'suspended'; continuation: Continuation };

export interface ControlLoopOptions {
  maxSteps?: number;
  logger?: AgentLogger;
  /** Awaited after every applied transition, before the next node runs */
  checkpoint?: (state: TaskState, next: NodeId) => Promise<void>;
}

export interface LoopRunOptions {
  entry?: NodeId;
  signal?: AbortSignal;
}

/** Only this node may end a task successfully */
const SUCCESS_NODE: NodeId = 'goal_validator';

// ── Control loop ────────────────────────────────────────────────────────

/**
 * Repeatedly invokes the current node and follows the transition it returns.
 * The loop owns step counting, the step limit, cancellation and the protocol
 * checks; routing decisions belong to the nodes.
 */
export class ControlLoop {
  readonly events = new ControlLoopEvents();
  private maxSteps: number;
  private logger: AgentLogger;

  constructor(
    private registry: NodeRegistry,
    private options: ControlLoopOptions = {},
  ) {
    this.maxSteps = options.maxSteps ?? DEFAULT_LOOP_SETTINGS.maxSteps;
    this.logger = options.logger ?? silentLogger;
    const missing = registry.missing();
    if (missing.length) {
      throw new RoutingError(`No node registered for: ${missing.join(', ')}`);
    }
  }

  run(state: TaskState, options: LoopRunOptions = {}): Promise<LoopResult> {
    return this.drive(state, options.entry ?? 'reasoning', options.signal ?? new AbortController().signal);
  }

  /** Continues a suspended task; the response is handed to the resume node */
  resume(continuation: Continuation, response: string, options: Omit<LoopRunOptions, 'entry'> = {}): Promise<LoopResult> {
    if (!isNodeId(continuation.resumeNode)) {
      throw new RoutingError(`Unknown resume node: ${String(continuation.resumeNode)}`);
    }
    this.logger.info(`Resuming at ${continuation.resumeNode}`, { response });
    return this.drive(continuation.state, continuation.resumeNode, options.signal ?? new AbortController().signal, response);
  }

  private async drive(initial: TaskState, entry: NodeId, signal: AbortSignal, response?: string): Promise<LoopResult> {
    let state = initial;
    let current: NodeId = entry;
    let resume = response;

    for (;;) {
      if (signal.aborted) {
        state = applyDelta(state, cancellationDelta(state));
        return this.terminate(state, null, { status: 'failure', reason: CANCELLED, detail: 'Task cancelled' });
      }
      if (state.step >= this.maxSteps) {
        this.logger.warn(`Step limit reached (${this.maxSteps})`);
        return this.terminate(state, null, { status: 'failure', reason: STEP_LIMIT_EXCEEDED, detail: `Stopped after ${state.step} steps` });
      }

      const node = this.registry.get(current);
      if (!node) throw new RoutingError(`No node registered for: ${current}`);

      this.logger.debug(`Step ${state.step}: ${current}`);
      const transition: Transition = await node.run(state, { signal, logger: this.logger, resume });
      resume = undefined;
      state = { ...this.apply(state, transition.delta), lastNode: current };

      switch (transition.type) {
        case 'continue': {
          const next = transition.next;
          if (!isNodeId(next) || !this.registry.has(next)) {
            throw new RoutingError(`Node ${current} routed to unknown node: ${String(next)}`);
          }
          state = { ...state, step: state.step + 1 };
          this.events.emitTransition({ sessionId: state.sessionId, from: current, to: next, step: state.step, timestamp: new Date().toISOString() });
          if (this.options.checkpoint) await this.options.checkpoint(state, next);
          current = next;
          break;
        }

        case 'suspend': {
          const continuation: Continuation = { sessionId: state.sessionId, resumeNode: transition.resumeNode, payload: transition.payload, state };
          this.logger.info(`Suspended at ${current}`, { kind: transition.payload.kind });
          this.events.emitSuspended({
            sessionId: state.sessionId,
            node: current,
            resumeNode: transition.resumeNode,
            payload: transition.payload,
            timestamp: new Date().toISOString(),
          });
          return { type: 'suspended', continuation };
        }

        case 'terminal': {
          if (transition.outcome.status === 'success' && current !== SUCCESS_NODE) {
            throw new RoutingError(`Node ${current} attempted to end the task successfully`);
          }
          state = { ...state, step: state.step + 1 };
          return this.terminate(state, current, transition.outcome);
        }
      }
    }
  }

  private apply(state: TaskState, delta: StateDelta | undefined): TaskState {
    return delta ? applyDelta(state, delta) : state;
  }

  private terminate(state: TaskState, node: NodeId | null, outcome: Outcome): LoopResult {
    const message = `Task ended: ${outcome.status} (${outcome.reason})`;
    if (outcome.status === 'success') this.logger.info(message, { step: state.step });
    else this.logger.warn(message, { step: state.step, detail: outcome.detail });
    this.events.emitTerminated({ sessionId: state.sessionId, node, outcome, step: state.step, timestamp: new Date().toISOString() });
    return { type: 'terminal', outcome, state };
  }
}

/** Clears in-flight work and records the abort when an action was pending */
function cancellationDelta(state: TaskState): StateDelta {
  const pending = state.pendingBatch?.actions.map((a) => a.name) ?? (state.pendingAction ? [state.pendingAction.name] : []);
  const messages: MessageDraft[] = pending.length ? [{ role: 'system', kind: 'abort', content: `Task cancelled before running: ${pending.join(', ')}` }] : [];
  return {
    patch: { pendingAction: null, pendingBatch: null, needsValidation: false, validationPassed: false, requiresHumanApproval: false },
    messages,
  };
}
