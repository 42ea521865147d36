import type { ActionSchema, Inference, ReasoningClient } from '../agent/collaborators';
import type { ActionPolicy } from '../agent/action-policy';
import type { ErrorClassifier } from '../agent/error-classifier';
import type { MessageDraft, TaskState } from '../agent/state';
import { CANCELLED, fail, goTo, retryExhausted } from '../agent/transition';
import type { Transition } from '../agent/transition';
import { errorMessage } from '../agent/errors';
import type { HistoryCompactor } from '../memory/history-compactor';
import type { LoopSettings, NodeContext, RoutingNode } from './types';

export interface ReasoningNodeDeps {
  reasoner: ReasoningClient;
  availableActions: readonly ActionSchema[];
  policy: ActionPolicy;
  classifier: ErrorClassifier;
  compactor: HistoryCompactor;
  settings: LoopSettings;
  /** Guidance sent with early reasoning requests */
  guidance?: string;
}

/**
 * Calls the reasoning engine and routes on what it asks for: questions to the
 * user, critical actions to the validator, everything else to tool execution,
 * and a completion signal to the quality evaluator.
 */
export class ReasoningNode implements RoutingNode {
  readonly id = 'reasoning' as const;

  constructor(private deps: ReasoningNodeDeps) {}

  async run(state: Readonly<TaskState>, ctx: NodeContext): Promise<Transition> {
    const { compactor, settings, policy } = this.deps;

    // Compact first, but never bounce straight back when compaction could not shrink anything.
    if (compactor.needsCompaction(state.history) && state.lastNode !== 'memory_manager') {
      ctx.logger.info('History over pre-threshold, routing to memory manager', { messages: state.history.length });
      return goTo('memory_manager');
    }

    const guidance = state.step <= settings.minimalGuidanceAfterStep ? this.deps.guidance : undefined;

    let inference: Inference;
    try {
      inference = await this.deps.reasoner.infer(state.history, this.deps.availableActions, { guidance, signal: ctx.signal });
    } catch (error) {
      return this.onFailure(state, ctx, error);
    }

    if (inference.type === 'complete' || inference.actions.length === 0) {
      const answer = inference.type === 'complete' ? inference.answer : (inference.content ?? '');
      ctx.logger.info('Reasoning signalled completion');
      return goTo('quality_evaluator', { messages: [{ role: 'assistant', kind: 'answer', content: answer }] });
    }

    const { actions, concurrent } = inference;
    const message: MessageDraft = { role: 'assistant', kind: 'reasoning', content: inference.content ?? '', actions };
    const batch = { actions, concurrent };

    const question = actions.find((a) => policy.isAskUser(a.name));
    if (question) {
      ctx.logger.info('Reasoning asked the user a question');
      return goTo('human_confirmation', {
        messages: [message],
        patch: { pendingAction: { name: question.name, args: question.args }, pendingBatch: batch },
      });
    }

    const critical = policy.pendingApproval(actions);
    if (critical) {
      ctx.logger.warn(`Critical action detected: ${critical.name}`);
      return goTo('validator', {
        messages: [message],
        patch: { pendingAction: { name: critical.name, args: critical.args }, pendingBatch: batch, needsValidation: true },
      });
    }

    ctx.logger.info(`Executing ${actions.length} action(s)`, { actions: actions.map((a) => a.name), concurrent });
    return goTo('tool_execution', { messages: [message], patch: { pendingBatch: batch } });
  }

  private onFailure(state: Readonly<TaskState>, ctx: NodeContext, error: unknown): Transition {
    const message = errorMessage(error);
    if (ctx.signal.aborted) return fail(CANCELLED, message);

    const kind = this.deps.classifier.classifyText(message);
    const errorCount = state.errorCount + 1;
    const lastError = { kind, message };
    ctx.logger.error('Reasoning request failed', { kind, errorCount, error: message });

    if (errorCount > this.deps.settings.maxRetries) {
      return fail(retryExhausted(kind), message, { patch: { errorCount, lastError } });
    }
    return goTo('reasoning', {
      patch: { errorCount, lastError },
      messages: [{ role: 'user', kind: 'feedback', content: `The previous reasoning request failed (${kind}): ${message}. Continue with the task.` }],
    });
  }
}
