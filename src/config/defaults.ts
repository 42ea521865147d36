import type { Config } from './validator';
import { DEFAULT_CRITICAL_ACTIONS } from '../agent/action-policy';
import { DEFAULT_COMPACTOR_OPTIONS } from '../memory/history-compactor';
import { DEFAULT_LOOP_SETTINGS } from '../nodes/types';
import { DEFAULT_SESSION_DIR } from '../orchestrator/session-store';

export const defaults: Config = {
  llm: {
    base_url: 'https://api.openai.com/v1',
    model: 'gpt-4o-mini',
    temperature: 0.2,
    timeout_ms: 60000,
  },
  tools: {
    endpoint: 'http://localhost:8931',
    timeout_ms: 30000,
  },
  agent: {
    max_steps: DEFAULT_LOOP_SETTINGS.maxSteps,
    max_retries: DEFAULT_LOOP_SETTINGS.maxRetries,
    progress_cadence: DEFAULT_LOOP_SETTINGS.progressCadence,
    report_cadence: DEFAULT_LOOP_SETTINGS.reportCadence,
    low_progress_threshold: DEFAULT_LOOP_SETTINGS.lowProgressThreshold,
    stuck_limit: DEFAULT_LOOP_SETTINGS.stuckLimit,
    quality_threshold: DEFAULT_LOOP_SETTINGS.qualityThreshold,
    minimal_guidance_after_step: DEFAULT_LOOP_SETTINGS.minimalGuidanceAfterStep,
    critical_actions: [...DEFAULT_CRITICAL_ACTIONS],
    auto_approve: [],
    ask_user_action: 'request_user_confirmation',
  },
  memory: {
    max_tokens: DEFAULT_COMPACTOR_OPTIONS.maxTokens,
    pre_threshold: DEFAULT_COMPACTOR_OPTIONS.preThreshold,
    keep_recent: DEFAULT_COMPACTOR_OPTIONS.keepRecent,
    max_summary_tokens: DEFAULT_COMPACTOR_OPTIONS.maxSummaryTokens,
  },
  storage: {
    dir: DEFAULT_SESSION_DIR,
  },
  logging: {
    level: 'info',
  },
};
