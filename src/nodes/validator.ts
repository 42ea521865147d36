import type { ActionPolicy } from '../agent/action-policy';
import { describeAction } from '../agent/state';
import type { TaskState } from '../agent/state';
import { goTo } from '../agent/transition';
import type { Transition } from '../agent/transition';
import type { NodeContext, RoutingNode } from './types';

/** Decides whether any critical action in the pending batch needs a human decision */
export class CriticalActionValidatorNode implements RoutingNode {
  readonly id = 'validator' as const;

  constructor(private policy: ActionPolicy) {}

  run(state: Readonly<TaskState>, ctx: NodeContext): Promise<Transition> {
    const action = state.pendingAction;
    if (!action) {
      ctx.logger.warn('Validator reached without a pending action');
      return Promise.resolve(goTo('reasoning', { patch: { needsValidation: false, pendingBatch: null } }));
    }

    const batch = state.pendingBatch?.actions ?? [];
    const unapproved = this.policy.requiresApproval(action) ? action : batch.find((a) => this.policy.requiresApproval(a));
    if (unapproved) {
      ctx.logger.warn(`Action requires confirmation: ${describeAction(unapproved)}`);
      return Promise.resolve(
        goTo('human_confirmation', {
          patch: { pendingAction: { name: unapproved.name, args: unapproved.args }, requiresHumanApproval: true, validationPassed: false },
        }),
      );
    }

    ctx.logger.info(`Action pre-approved: ${action.name}`);
    return Promise.resolve(goTo('tool_execution', { patch: { needsValidation: false, validationPassed: true, requiresHumanApproval: false } }));
  }
}
