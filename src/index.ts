// Core model
export * from './agent/state';
export * from './agent/transition';
export * from './agent/collaborators';
export * from './agent/errors';
export { ActionPolicy, DEFAULT_CRITICAL_ACTIONS } from './agent/action-policy';
export type { ActionPolicyOptions } from './agent/action-policy';
export { ErrorClassifier } from './agent/error-classifier';

// Nodes and loop
export { NodeRegistry, createNodeRegistry, DEFAULT_LOOP_SETTINGS } from './nodes';
export type { LoopSettings, NodeContext, NodeRegistryDeps, RoutingNode } from './nodes';
export { ControlLoop } from './orchestrator/control-loop';
export type { Continuation, ControlLoopOptions, LoopResult } from './orchestrator/control-loop';
export { AgentRunner } from './orchestrator/agent-runner';
export type { AgentRunnerOptions, RunResult, RunStatus } from './orchestrator/agent-runner';
export { FileSessionStore } from './orchestrator/session-store';
export type { SessionRecord, SessionStatus, SessionStore } from './orchestrator/session-store';
export { createRunnerFromConfig, loopSettingsFromConfig } from './orchestrator/register-nodes';

// Memory and reflection
export { HistoryCompactor, ExtractiveSummarizer, estimateTokens } from './memory/history-compactor';
export type { CompactorOptions, Summarizer } from './memory/history-compactor';
export { HeuristicQualityJudge } from './reflection/quality';
export type { QualityJudge, QualityVerdict } from './reflection/quality';
export { HeuristicGoalJudge } from './reflection/goal';
export type { GoalJudge, GoalVerdict } from './reflection/goal';
export { estimateProgress, progressStatus } from './reflection/progress';

// Collaborators
export { OpenAIReasoner } from './llm/openai-reasoner';
export { HttpToolExecutor } from './tools/http-tool-executor';
export { LoggerProgressSink } from './utils/progress-sink';
export { ConsoleAgentLogger, silentLogger } from './utils/logger';
export type { AgentLogger, LogLevel } from './utils/logger';

// Configuration
export { loadConfig } from './config/loader';
export type { Config } from './config/validator';
