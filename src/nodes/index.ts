import type { ActionSchema, ObservabilitySink, ReasoningClient, ToolExecutor } from '../agent/collaborators';
import { ActionPolicy } from '../agent/action-policy';
import { ErrorClassifier } from '../agent/error-classifier';
import type { NodeId } from '../agent/transition';
import { NODE_IDS, isNodeId } from '../agent/transition';
import { HistoryCompactor } from '../memory/history-compactor';
import { HeuristicGoalJudge } from '../reflection/goal';
import type { GoalJudge } from '../reflection/goal';
import { HeuristicQualityJudge } from '../reflection/quality';
import type { QualityJudge } from '../reflection/quality';
import { GoalValidatorNode } from './goal-validator';
import { HumanConfirmationNode } from './human-confirmation';
import { MemoryManagerNode } from './memory-manager';
import { ProgressAnalyzerNode } from './progress-analyzer';
import { ProgressReporterNode } from './progress-reporter';
import { QualityEvaluatorNode } from './quality-evaluator';
import { ReasoningNode } from './reasoning';
import { SelfCorrectorNode } from './self-corrector';
import { StrategyAdapterNode } from './strategy-adapter';
import { ToolExecutionNode } from './tool-execution';
import { CriticalActionValidatorNode } from './validator';
import { DEFAULT_LOOP_SETTINGS } from './types';
import type { LoopSettings, RoutingNode } from './types';

export type { LoopSettings, NodeContext, RoutingNode } from './types';
export { DEFAULT_LOOP_SETTINGS } from './types';

/**
 * Maps node ids to their implementations. Built once per loop and frozen;
 * nodes are registered externally, with real collaborators in production or
 * fakes in tests.
 */
export class NodeRegistry {
  private nodes = new Map<NodeId, RoutingNode>();
  private frozen = false;

  register(node: RoutingNode): this {
    if (this.frozen) {
      throw new Error(`Node registry is frozen; cannot register ${node.id}`);
    }
    this.nodes.set(node.id, node);
    return this;
  }

  has(id: string): boolean {
    return isNodeId(id) && this.nodes.has(id);
  }

  get(id: NodeId): RoutingNode | undefined {
    return this.nodes.get(id);
  }

  /** Node ids the registry has no implementation for */
  missing(): NodeId[] {
    return NODE_IDS.filter((id) => !this.nodes.has(id));
  }

  registeredIds(): NodeId[] {
    return [...this.nodes.keys()];
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }
}

export interface NodeRegistryDeps {
  reasoner: ReasoningClient;
  executor: ToolExecutor;
  availableActions: readonly ActionSchema[];
  sink: ObservabilitySink;
  policy?: ActionPolicy;
  classifier?: ErrorClassifier;
  compactor?: HistoryCompactor;
  qualityJudge?: QualityJudge;
  goalJudge?: GoalJudge;
  settings?: Partial<LoopSettings>;
  guidance?: string;
}

/** Wires every node of the loop to the given collaborators */
export function createNodeRegistry(deps: NodeRegistryDeps): NodeRegistry {
  const settings: LoopSettings = { ...DEFAULT_LOOP_SETTINGS, ...deps.settings };
  const policy = deps.policy ?? new ActionPolicy();
  const classifier = deps.classifier ?? new ErrorClassifier();
  const compactor = deps.compactor ?? new HistoryCompactor();

  return new NodeRegistry()
    .register(
      new ReasoningNode({
        reasoner: deps.reasoner,
        availableActions: deps.availableActions,
        policy,
        classifier,
        compactor,
        settings,
        guidance: deps.guidance,
      }),
    )
    .register(new CriticalActionValidatorNode(policy))
    .register(new HumanConfirmationNode(policy))
    .register(new ToolExecutionNode({ executor: deps.executor, classifier, policy, settings }))
    .register(new SelfCorrectorNode())
    .register(new ProgressAnalyzerNode(settings))
    .register(new StrategyAdapterNode())
    .register(new QualityEvaluatorNode(deps.qualityJudge ?? new HeuristicQualityJudge(), settings))
    .register(new GoalValidatorNode(deps.goalJudge ?? new HeuristicGoalJudge()))
    .register(new MemoryManagerNode(compactor))
    .register(new ProgressReporterNode(deps.sink))
    .freeze();
}
