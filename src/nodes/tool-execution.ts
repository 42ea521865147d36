import type { ToolExecutor } from '../agent/collaborators';
import type { ActionPolicy } from '../agent/action-policy';
import type { ErrorClassifier } from '../agent/error-classifier';
import type { ActionRequest, ActionResult, ErrorKind, MessageDraft, StatePatch, TaskState } from '../agent/state';
import { CANCELLED, fail, goTo, retryExhausted } from '../agent/transition';
import type { NodeId, Transition } from '../agent/transition';
import { errorMessage } from '../agent/errors';
import { ABORTED, raceAbort } from '../utils/abort';
import type { LoopSettings, NodeContext, RoutingNode } from './types';

const CLEARED: StatePatch = {
  pendingAction: null,
  pendingBatch: null,
  needsValidation: false,
  validationPassed: false,
  requiresHumanApproval: false,
};

export interface ToolExecutionNodeDeps {
  executor: ToolExecutor;
  classifier: ErrorClassifier;
  policy: ActionPolicy;
  settings: LoopSettings;
}

/**
 * Runs the pending action batch and routes on the classified outcome of every
 * result, not only the last one.
 */
export class ToolExecutionNode implements RoutingNode {
  readonly id = 'tool_execution' as const;

  constructor(private deps: ToolExecutionNodeDeps) {}

  async run(state: Readonly<TaskState>, ctx: NodeContext): Promise<Transition> {
    const batch = state.pendingBatch;
    if (!batch || batch.actions.length === 0) {
      ctx.logger.warn('Tool execution reached without pending actions');
      return goTo('reasoning', { patch: CLEARED });
    }

    const unapproved = batch.actions.find((a) => this.deps.policy.requiresApproval(a));
    if (unapproved && !state.validationPassed) {
      ctx.logger.warn(`Refusing to run unvalidated critical action: ${unapproved.name}`);
      return goTo('validator', { patch: { pendingAction: { name: unapproved.name, args: unapproved.args }, needsValidation: true } });
    }

    const results = batch.concurrent ? await this.runConcurrent(batch.actions, ctx.signal) : await this.runSequential(batch.actions, ctx.signal);
    const messages = results.map(toMessage);
    for (const r of results) {
      ctx.logger.debug(`Tool result: ${r.name} ${r.status}`, { output: r.output.slice(0, 500) });
    }

    if (ctx.signal.aborted) {
      return fail(CANCELLED, 'Cancelled during tool execution', { patch: { ...CLEARED, errorType: 'none' }, messages });
    }

    const failure = this.classify(results);
    if (!failure) {
      return goTo(this.nextAfterSuccess(state), { patch: { ...CLEARED, errorType: 'none', errorCount: 0 }, messages });
    }

    const { kind, result } = failure;
    const lastError = { kind, message: result.output };
    if (kind === 'stale_ref') {
      ctx.logger.info('Stale reference detected, routing to self-corrector', { action: result.name });
      return goTo('self_corrector', { patch: { ...CLEARED, errorType: kind, lastError }, messages });
    }

    const errorCount = state.errorCount + 1;
    const patch: StatePatch = { ...CLEARED, errorType: kind, lastError, errorCount };
    if (errorCount > this.deps.settings.maxRetries) {
      ctx.logger.error(`Retry budget exhausted after ${kind} error`, { errorCount, action: result.name });
      return fail(retryExhausted(kind), result.output, { patch, messages });
    }

    ctx.logger.warn(`Action ${result.name} failed (${kind})`, { errorCount, maxRetries: this.deps.settings.maxRetries });
    const feedback: MessageDraft = {
      role: 'user',
      kind: 'feedback',
      content: `Action ${result.name} failed (${kind}): ${result.output}. Attempt ${errorCount} of ${this.deps.settings.maxRetries}; adjust the next step.`,
    };
    return goTo('reasoning', { patch, messages: [...messages, feedback] });
  }

  /**
   * First failing result in batch order; a stale reference anywhere in the batch
   * takes precedence because it is corrected without spending a retry.
   */
  private classify(results: ActionResult[]): { kind: ErrorKind; result: ActionResult } | undefined {
    const { classifier } = this.deps;
    const stale = results.find((r) => classifier.classifyResult(r) === 'stale_ref');
    if (stale) return { kind: 'stale_ref', result: stale };

    const { kind, result } = classifier.classifyBatch(results);
    return kind !== 'none' && result ? { kind, result } : undefined;
  }

  private nextAfterSuccess(state: Readonly<TaskState>): NodeId {
    const { progressCadence, reportCadence } = this.deps.settings;
    if (state.complex && state.step > 0 && progressCadence > 0 && state.step % progressCadence === 0) return 'progress_analyzer';
    if (reportCadence > 0 && state.step > 0 && state.step % reportCadence === 0) return 'progress_reporter';
    return 'reasoning';
  }

  private runConcurrent(actions: ActionRequest[], signal: AbortSignal): Promise<ActionResult[]> {
    return Promise.all(actions.map((a) => this.execute(a, signal)));
  }

  /** Dependent actions: once one fails, the rest are recorded as skipped */
  private async runSequential(actions: ActionRequest[], signal: AbortSignal): Promise<ActionResult[]> {
    const results: ActionResult[] = [];
    let blocked = false;
    for (const action of actions) {
      if (blocked) {
        results.push(signal.aborted ? aborted(action) : skipped(action));
        continue;
      }
      const result = await this.execute(action, signal);
      results.push(result);
      blocked = result.status !== 'ok';
    }
    return results;
  }

  private async execute(action: ActionRequest, signal: AbortSignal): Promise<ActionResult> {
    if (signal.aborted) return aborted(action);
    try {
      const outcome = await raceAbort(this.deps.executor.execute(action.name, action.args, signal), signal);
      if (outcome === ABORTED) return aborted(action);
      if ('ok' in outcome) return { actionId: action.id, name: action.name, status: 'ok', output: outcome.ok };
      return { actionId: action.id, name: action.name, status: 'error', output: outcome.error, kind: outcome.kind };
    } catch (error) {
      // Executors report failures as values; a throw is still an error result.
      return { actionId: action.id, name: action.name, status: 'error', output: errorMessage(error) };
    }
  }
}

function aborted(action: ActionRequest): ActionResult {
  return { actionId: action.id, name: action.name, status: 'aborted', output: 'Aborted: task cancelled' };
}

function skipped(action: ActionRequest): ActionResult {
  return { actionId: action.id, name: action.name, status: 'skipped', output: 'Skipped: an earlier action in this batch failed' };
}

function toMessage(result: ActionResult): MessageDraft {
  const content = result.status === 'error' ? `Error: ${result.output}` : result.output;
  return { role: 'tool', kind: result.status === 'aborted' ? 'abort' : 'tool_result', content, result };
}
