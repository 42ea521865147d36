import type { ActionPolicy } from '../agent/action-policy';
import { describeAction } from '../agent/state';
import type { ActionRequest, MessageDraft, StatePatch, TaskState } from '../agent/state';
import { goTo, suspend } from '../agent/transition';
import type { InterruptPayload, Transition } from '../agent/transition';
import type { NodeContext, RoutingNode } from './types';

const AFFIRMATIVE = new Set(['yes', 'y']);

const CLEARED: StatePatch = {
  pendingAction: null,
  pendingBatch: null,
  needsValidation: false,
  validationPassed: false,
  requiresHumanApproval: false,
};

/**
 * Suspends the loop for a human decision. The first visit emits the interrupt
 * payload; the loop re-enters this node with the caller's response.
 */
export class HumanConfirmationNode implements RoutingNode {
  readonly id = 'human_confirmation' as const;

  constructor(private policy: ActionPolicy) {}

  run(state: Readonly<TaskState>, ctx: NodeContext): Promise<Transition> {
    const action = state.pendingAction;
    if (!action) {
      ctx.logger.warn('Confirmation reached without a pending action');
      return Promise.resolve(goTo('reasoning', { patch: CLEARED }));
    }

    const isQuestion = this.policy.isAskUser(action.name);
    if (ctx.resume === undefined) {
      const payload = isQuestion ? this.questionPayload(action.args) : this.confirmationPayload(state);
      ctx.logger.info(`Pausing for human ${payload.kind}`, { action: action.name });
      return Promise.resolve(suspend(payload, this.id));
    }

    const response = ctx.resume.trim();
    ctx.logger.info('Human response received', { response });
    return Promise.resolve(isQuestion ? this.answerQuestion(state, response) : this.confirm(state, response));
  }

  private confirm(state: Readonly<TaskState>, response: string): Transition {
    if (AFFIRMATIVE.has(response.toLowerCase())) {
      return goTo('tool_execution', { patch: { validationPassed: true, requiresHumanApproval: false } });
    }

    const rejected = this.criticalActions(state)
      .map((a) => describeAction(a))
      .join(', ');
    return goTo('reasoning', {
      patch: CLEARED,
      messages: [{ role: 'user', kind: 'feedback', content: `User declined ${rejected} (answered "${response}"). Do not perform it; adjust your approach.` }],
    });
  }

  private answerQuestion(state: Readonly<TaskState>, response: string): Transition {
    const actions = state.pendingBatch?.actions ?? [];
    const messages: MessageDraft[] = actions.map((a) => {
      const asked = this.policy.isAskUser(a.name);
      const output = asked ? `User chose: ${response}` : 'Skipped: waiting for the user to answer';
      return { role: 'tool', kind: 'tool_result', content: output, result: { actionId: a.id, name: a.name, status: asked ? 'ok' : 'skipped', output } };
    });
    return goTo('reasoning', { patch: CLEARED, messages });
  }

  private confirmationPayload(state: Readonly<TaskState>): InterruptPayload {
    const actions = this.criticalActions(state).map((a) => describeAction(a));
    return { kind: 'confirmation', message: `Allow critical action ${actions.join(', ')}?`, options: ['yes', 'no'] };
  }

  private questionPayload(args: Record<string, unknown>): InterruptPayload {
    const message = typeof args.question === 'string' && args.question.trim() ? args.question : 'The agent needs your input to continue.';
    return { kind: 'question', message, options: questionOptions(args) };
  }

  private criticalActions(state: Readonly<TaskState>): ActionRequest[] {
    const batch = state.pendingBatch?.actions ?? [];
    const critical = batch.filter((a) => this.policy.isCritical(a.name));
    if (critical.length) return critical;
    return state.pendingAction ? [{ id: 'pending', ...state.pendingAction }] : [];
  }
}

/** Options offered by the reasoning step: an explicit list, or the y/n pair */
export function questionOptions(args: Record<string, unknown>): string[] {
  if (Array.isArray(args.options)) {
    const options = args.options.filter((o): o is string => typeof o === 'string' && o.trim().length > 0);
    if (options.length) return options;
  }
  const pair = [args.option_y, args.option_n].filter((o): o is string => typeof o === 'string' && o.trim().length > 0);
  return pair.length === 2 ? pair : ['yes', 'no'];
}
