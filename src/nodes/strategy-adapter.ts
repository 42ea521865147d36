import type { TaskState } from '../agent/state';
import { goTo } from '../agent/transition';
import type { Transition } from '../agent/transition';
import { proposeStrategy } from '../reflection/strategy';
import type { NodeContext, RoutingNode } from './types';

export class StrategyAdapterNode implements RoutingNode {
  readonly id = 'strategy_adapter' as const;

  run(state: Readonly<TaskState>, ctx: NodeContext): Promise<Transition> {
    const proposal = proposeStrategy(state);
    ctx.logger.warn('Adapting strategy', { strategyChanges: state.strategyChanges + 1 });
    return Promise.resolve(
      goTo('reasoning', {
        patch: { stuckCounter: 0, strategyChanges: state.strategyChanges + 1 },
        messages: [{ role: 'user', kind: 'strategy', content: proposal }],
      }),
    );
  }
}
