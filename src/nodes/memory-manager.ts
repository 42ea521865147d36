import type { TaskState } from '../agent/state';
import { goTo } from '../agent/transition';
import type { Transition } from '../agent/transition';
import { estimateTokens } from '../memory/history-compactor';
import type { HistoryCompactor } from '../memory/history-compactor';
import type { NodeContext, RoutingNode } from './types';

export class MemoryManagerNode implements RoutingNode {
  readonly id = 'memory_manager' as const;

  constructor(private compactor: HistoryCompactor) {}

  async run(state: Readonly<TaskState>, ctx: NodeContext): Promise<Transition> {
    const before = estimateTokens(state.history);
    const compaction = await this.compactor.compact(state.history, state.summaryContext);

    if (!compaction) {
      ctx.logger.debug('No compaction needed', { tokens: before });
      return goTo('reasoning');
    }

    ctx.logger.info(`Compacted history: ${state.history.length} -> ${compaction.history.length} messages`, {
      tokensBefore: before,
      tokensAfter: estimateTokens(compaction.history),
      boundary: compaction.summaryContext.boundary,
    });
    return goTo('reasoning', { compaction });
  }
}
