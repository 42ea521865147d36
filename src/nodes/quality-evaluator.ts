import type { TaskState } from '../agent/state';
import { goTo } from '../agent/transition';
import type { Transition } from '../agent/transition';
import type { QualityJudge } from '../reflection/quality';
import type { LoopSettings, NodeContext, RoutingNode } from './types';

export class QualityEvaluatorNode implements RoutingNode {
  readonly id = 'quality_evaluator' as const;

  constructor(
    private judge: QualityJudge,
    private settings: LoopSettings,
  ) {}

  async run(state: Readonly<TaskState>, ctx: NodeContext): Promise<Transition> {
    const verdict = await this.judge.evaluate(state);
    ctx.logger.info(`Quality score: ${verdict.score}`);

    if (verdict.score < this.settings.qualityThreshold) {
      const content = verdict.feedback ?? `Quality evaluation: score ${verdict.score} is below ${this.settings.qualityThreshold}. Improve the result.`;
      return goTo('reasoning', { patch: { qualityScore: verdict.score }, messages: [{ role: 'user', kind: 'feedback', content }] });
    }
    return goTo('goal_validator', { patch: { qualityScore: verdict.score } });
  }
}
