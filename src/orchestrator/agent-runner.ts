import { createTaskState } from '../agent/state';
import type { TaskState } from '../agent/state';
import type { HumanInterface } from '../agent/collaborators';
import { AgentError } from '../agent/errors';
import { CANCELLED } from '../agent/transition';
import type { InterruptPayload, NodeId, Outcome } from '../agent/transition';
import type { NodeRegistry } from '../nodes';
import { ConsoleAgentLogger } from '../utils/logger';
import type { AgentLogger } from '../utils/logger';
import { ControlLoop } from './control-loop';
import type { Continuation, LoopResult } from './control-loop';
import type { SessionRecord, SessionStore } from './session-store';

// ── Types ───────────────────────────────────────────────────────────────

export type RunStatus = 'completed' | 'failed' | 'cancelled' | 'suspended';

/** Result returned when a task finishes or stops waiting for a human */
export interface RunResult {
  status: RunStatus;
  sessionId: string;
  steps: number;
  outcome?: Outcome;
  answer?: string;
  /** Set when the task is suspended and no human interface was available */
  pending?: InterruptPayload;
  state: TaskState;
  durationMs: number;
}

export interface AgentRunnerOptions {
  registry: NodeRegistry;
  store?: SessionStore;
  /** Without one, a suspension ends the run and is persisted for a later resume */
  human?: HumanInterface;
  logger?: AgentLogger;
  maxSteps?: number;
}

export interface StartOptions {
  sessionId?: string;
  complex?: boolean;
  signal?: AbortSignal;
}

export interface ResumeOptions {
  /** Answer to the pending question; asked through the human interface when omitted */
  response?: string;
  signal?: AbortSignal;
}

// ── Runner ──────────────────────────────────────────────────────────────

/**
 * Drives a task end to end: runs the control loop, answers suspensions
 * through the human interface and persists the session after every step.
 */
export class AgentRunner {
  private loop: ControlLoop;
  private logger: AgentLogger;
  private controller = new AbortController();
  private createdAt = new Map<string, string>();

  constructor(private options: AgentRunnerOptions) {
    this.logger = options.logger ?? new ConsoleAgentLogger();
    this.loop = new ControlLoop(options.registry, {
      maxSteps: options.maxSteps,
      logger: this.logger,
      checkpoint: (state, next) => this.persist({ status: 'running', state, nextNode: next }),
    });
    this.loop.events.on('transition', (event: { from: NodeId; to: NodeId; step: number }) => {
      this.logger.debug('Transition', { from: event.from, to: event.to, step: event.step });
    });
  }

  get events(): ControlLoop['events'] {
    return this.loop.events;
  }

  // ── Public API ──────────────────────────────────────────────────────

  async run(task: string, options: StartOptions = {}): Promise<RunResult> {
    const started = Date.now();
    const state = createTaskState(task, { sessionId: options.sessionId, complex: options.complex });
    const signal = this.arm(options.signal);

    this.logger.info('Starting task', { sessionId: state.sessionId, complex: state.complex });
    await this.persist({ status: 'running', state, nextNode: 'reasoning' });

    const result = await this.loop.run(state, { signal });
    return this.settle(result, signal, started);
  }

  /** Continues a suspended or interrupted session from its persisted record */
  async resume(sessionId: string, options: ResumeOptions = {}): Promise<RunResult> {
    const store = this.options.store;
    if (!store) throw new AgentError('Resuming requires a session store', 'NO_SESSION_STORE');

    const record = await store.load(sessionId);
    if (!record) throw new AgentError(`Session not found: ${sessionId}`, 'SESSION_NOT_FOUND');
    if (record.status === 'succeeded' || record.status === 'failed') {
      throw new AgentError(`Session ${sessionId} already finished (${record.status})`, 'SESSION_FINISHED');
    }

    const started = Date.now();
    this.createdAt.set(sessionId, record.createdAt);
    const signal = this.arm(options.signal);
    this.logger.info('Resuming session', { sessionId, status: record.status });

    if (record.status === 'suspended' && record.continuation) {
      const continuation: Continuation = { sessionId, ...record.continuation, state: record.state };
      const response = options.response ?? (await this.ask(continuation.payload));
      if (response === undefined) {
        return this.buildResult('suspended', record.state, started, { pending: continuation.payload });
      }
      const result = await this.loop.resume(continuation, response, { signal });
      return this.settle(result, signal, started);
    }

    // Interrupted mid-run: pick up at the node that was about to execute.
    const result = await this.loop.run(record.state, { entry: record.nextNode ?? 'reasoning', signal });
    return this.settle(result, signal, started);
  }

  /** Stops the current task before its next step; in-flight actions are abandoned */
  cancel(): void {
    this.logger.info('Cancel requested');
    this.controller.abort();
  }

  // ── Helpers ─────────────────────────────────────────────────────────

  private arm(external?: AbortSignal): AbortSignal {
    this.controller = new AbortController();
    const controller = this.controller;
    if (external) {
      if (external.aborted) controller.abort();
      else external.addEventListener('abort', () => controller.abort(), { once: true });
    }
    return controller.signal;
  }

  /** Answers suspensions until the loop terminates or no one can answer */
  private async settle(initial: LoopResult, signal: AbortSignal, started: number): Promise<RunResult> {
    let result = initial;
    while (result.type === 'suspended') {
      const { continuation } = result;
      await this.persist({
        status: 'suspended',
        state: continuation.state,
        continuation: { resumeNode: continuation.resumeNode, payload: continuation.payload },
      });

      const response = await this.ask(continuation.payload);
      if (response === undefined) {
        this.logger.info('Waiting for human input', { sessionId: continuation.sessionId });
        return this.buildResult('suspended', continuation.state, started, { pending: continuation.payload });
      }
      result = await this.loop.resume(continuation, response, { signal });
    }

    const { outcome, state } = result;
    await this.persist({ status: outcome.status === 'success' ? 'succeeded' : 'failed', state, outcome });

    const status: RunStatus = outcome.status === 'success' ? 'completed' : outcome.reason === CANCELLED ? 'cancelled' : 'failed';
    return this.buildResult(status, state, started, { outcome, answer: outcome.status === 'success' ? outcome.answer : undefined });
  }

  private async ask(payload: InterruptPayload): Promise<string | undefined> {
    if (!this.options.human) return undefined;
    return this.options.human.ask(payload.message, payload.options);
  }

  private async persist(record: Omit<SessionRecord, 'sessionId' | 'createdAt' | 'updatedAt'>): Promise<void> {
    const store = this.options.store;
    if (!store) return;

    const sessionId = record.state.sessionId;
    const now = new Date().toISOString();
    const createdAt = this.createdAt.get(sessionId) ?? now;
    this.createdAt.set(sessionId, createdAt);
    await store.save(sessionId, { ...record, sessionId, createdAt, updatedAt: now });
  }

  private buildResult(status: RunStatus, state: TaskState, started: number, extra: Pick<RunResult, 'outcome' | 'answer' | 'pending'>): RunResult {
    const result: RunResult = { status, sessionId: state.sessionId, steps: state.step, state, durationMs: Date.now() - started, ...extra };
    this.logger.info('Task result', { status, steps: result.steps, reason: extra.outcome?.reason, durationMs: result.durationMs });
    return result;
  }
}
