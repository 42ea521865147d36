import { latestAnswer } from '../agent/state';
import type { TaskState } from '../agent/state';
import { goTo, succeed } from '../agent/transition';
import type { Transition } from '../agent/transition';
import type { GoalJudge } from '../reflection/goal';
import type { NodeContext, RoutingNode } from './types';

/** The only node allowed to end a task successfully */
export class GoalValidatorNode implements RoutingNode {
  readonly id = 'goal_validator' as const;

  constructor(private judge: GoalJudge) {}

  async run(state: Readonly<TaskState>, ctx: NodeContext): Promise<Transition> {
    const verdict = await this.judge.validate(state);

    if (verdict.achieved) {
      ctx.logger.info('Goal achieved');
      return succeed(verdict.explanation, latestAnswer(state.history), { patch: { goalAchieved: true } });
    }

    ctx.logger.warn('Goal not achieved', { gap: verdict.explanation });
    return goTo('reasoning', { patch: { goalAchieved: false }, messages: [{ role: 'user', kind: 'feedback', content: verdict.explanation }] });
  }
}
