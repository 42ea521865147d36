import type { TaskState } from '../agent/state';
import { goTo } from '../agent/transition';
import type { Transition } from '../agent/transition';
import { estimateProgress } from '../reflection/progress';
import type { LoopSettings, NodeContext, RoutingNode } from './types';

/** Scores progress and sends a stuck task to the strategy adapter */
export class ProgressAnalyzerNode implements RoutingNode {
  readonly id = 'progress_analyzer' as const;

  constructor(private settings: LoopSettings) {}

  run(state: Readonly<TaskState>, ctx: NodeContext): Promise<Transition> {
    const estimate = estimateProgress(state);
    const progressScore = estimate.score;
    ctx.logger.info(`Progress: ${progressScore.toFixed(2)}`, { successRate: estimate.successRate, errorCount: state.errorCount, stuckCounter: state.stuckCounter });

    if (progressScore >= this.settings.lowProgressThreshold) {
      return Promise.resolve(goTo('reasoning', { patch: { progressScore, stuckCounter: 0 } }));
    }

    const stuckCounter = state.stuckCounter + 1;
    if (stuckCounter > this.settings.stuckLimit) {
      ctx.logger.warn('Agent appears stuck', { stuckCounter });
      return Promise.resolve(goTo('strategy_adapter', { patch: { progressScore, stuckCounter } }));
    }
    return Promise.resolve(goTo('reasoning', { patch: { progressScore, stuckCounter } }));
  }
}
