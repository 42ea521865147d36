import type { ObservabilitySink, ProgressEvent } from '../agent/collaborators';
import type { TaskState } from '../agent/state';
import { recentToolResults } from '../agent/state';
import { goTo } from '../agent/transition';
import type { Transition } from '../agent/transition';
import { errorMessage } from '../agent/errors';
import { progressStatus } from '../reflection/progress';
import type { NodeContext, RoutingNode } from './types';

/** Side channel only: reports progress without touching the conversation */
export class ProgressReporterNode implements RoutingNode {
  readonly id = 'progress_reporter' as const;

  constructor(private sink: ObservabilitySink) {}

  run(state: Readonly<TaskState>, ctx: NodeContext): Promise<Transition> {
    const event: ProgressEvent = {
      sessionId: state.sessionId,
      step: state.step,
      lastAction: recentToolResults(state.history, 1)[0]?.name ?? null,
      progressScore: state.progressScore,
      status: progressStatus(state.progressScore),
      errorCount: state.errorCount,
      timestamp: new Date().toISOString(),
    };

    const onError = (error: unknown): void => ctx.logger.warn('Progress sink failed', { error: errorMessage(error) });
    try {
      const pending = this.sink.report(event);
      if (pending) pending.catch(onError);
    } catch (error) {
      onError(error);
    }

    return Promise.resolve(goTo('reasoning'));
  }
}
