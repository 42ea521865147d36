import type { ObservabilitySink, ProgressEvent } from '../agent/collaborators';
import type { AgentLogger } from './logger';

/** Writes progress events to the agent log */
export class LoggerProgressSink implements ObservabilitySink {
  constructor(private logger: AgentLogger) {}

  report(event: ProgressEvent): void {
    this.logger.info(`Progress ${Math.round(event.progressScore * 100)}%: ${event.status}`, {
      step: event.step,
      lastAction: event.lastAction,
      errorCount: event.errorCount,
    });
  }
}
