import type { Config } from '../config/validator';
import type { HumanInterface, ObservabilitySink, ReasoningClient, ToolExecutor } from '../agent/collaborators';
import { ActionPolicy } from '../agent/action-policy';
import { HistoryCompactor } from '../memory/history-compactor';
import { OpenAIReasoner } from '../llm/openai-reasoner';
import { DEFAULT_GUIDANCE } from '../llm/guidance';
import { HttpToolExecutor } from '../tools/http-tool-executor';
import { createNodeRegistry } from '../nodes';
import type { LoopSettings } from '../nodes';
import type { AgentLogger } from '../utils/logger';
import { AgentRunner } from './agent-runner';
import { FileSessionStore } from './session-store';
import type { SessionStore } from './session-store';

export interface RunnerRuntimeOptions {
  logger: AgentLogger;
  sink: ObservabilitySink;
  human?: HumanInterface;
  /** Approve every critical action without asking */
  autoApproveAll?: boolean;
  /** Collaborator overrides, mainly for tests */
  reasoner?: ReasoningClient;
  executor?: ToolExecutor;
  store?: SessionStore;
}

export function loopSettingsFromConfig(config: Config): LoopSettings {
  const a = config.agent;
  return {
    maxSteps: a.max_steps,
    maxRetries: a.max_retries,
    progressCadence: a.progress_cadence,
    reportCadence: a.report_cadence,
    lowProgressThreshold: a.low_progress_threshold,
    stuckLimit: a.stuck_limit,
    qualityThreshold: a.quality_threshold,
    minimalGuidanceAfterStep: a.minimal_guidance_after_step,
  };
}

/**
 * Builds a runner wired to the configured reasoning endpoint, tool bridge and
 * session directory. The tool bridge is asked for its action list up front.
 */
export async function createRunnerFromConfig(config: Config, runtime: RunnerRuntimeOptions): Promise<AgentRunner> {
  const { logger } = runtime;
  const settings = loopSettingsFromConfig(config);

  const reasoner =
    runtime.reasoner ??
    new OpenAIReasoner({
      baseUrl: config.llm.base_url,
      model: config.llm.model,
      apiKey: config.llm.api_key,
      temperature: config.llm.temperature,
      timeoutMs: config.llm.timeout_ms,
      logger,
    });
  const executor = runtime.executor ?? new HttpToolExecutor({ endpoint: config.tools.endpoint, timeoutMs: config.tools.timeout_ms, logger });
  const availableActions = executor.listActions ? await executor.listActions() : [];
  logger.debug(`Tool bridge offers ${availableActions.length} action(s)`);

  const policy = new ActionPolicy({
    criticalActions: config.agent.critical_actions,
    autoApprove: runtime.autoApproveAll ? config.agent.critical_actions : config.agent.auto_approve,
    askUserAction: config.agent.ask_user_action,
  });
  const compactor = new HistoryCompactor({
    maxTokens: config.memory.max_tokens,
    preThreshold: config.memory.pre_threshold,
    keepRecent: config.memory.keep_recent,
    maxSummaryTokens: config.memory.max_summary_tokens,
  });

  const registry = createNodeRegistry({
    reasoner,
    executor,
    availableActions,
    sink: runtime.sink,
    policy,
    compactor,
    settings,
    guidance: DEFAULT_GUIDANCE,
  });

  return new AgentRunner({
    registry,
    store: runtime.store ?? new FileSessionStore(config.storage.dir),
    human: runtime.human,
    logger,
    maxSteps: settings.maxSteps,
  });
}
