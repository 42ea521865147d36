import { SelfCorrectorNode } from '../../../src/nodes/self-corrector';
import { ProgressAnalyzerNode } from '../../../src/nodes/progress-analyzer';
import { StrategyAdapterNode } from '../../../src/nodes/strategy-adapter';
import { QualityEvaluatorNode } from '../../../src/nodes/quality-evaluator';
import { GoalValidatorNode } from '../../../src/nodes/goal-validator';
import { DEFAULT_LOOP_SETTINGS } from '../../../src/nodes/types';
import { applyDelta, createTaskState } from '../../../src/agent/state';
import type { TaskState } from '../../../src/agent/state';
import type { GoalJudge } from '../../../src/reflection/goal';
import type { QualityJudge } from '../../../src/reflection/quality';
import { createContext } from '../../helpers/fakes';

function baseState(): TaskState {
  return createTaskState('Find the title', { sessionId: 's' });
}

describe('SelfCorrectorNode', () => {
  it('should add stale-reference guidance and clear the error type', async () => {
    const state: TaskState = { ...baseState(), errorType: 'stale_ref', lastError: { kind: 'stale_ref', message: 'Ref not found: e7' } };

    await expect(new SelfCorrectorNode().run(state, createContext())).resolves.toEqual({
      type: 'continue',
      next: 'reasoning',
      delta: {
        patch: { errorType: 'none' },
        messages: [
          {
            role: 'user',
            kind: 'correction',
            content: 'Stale reference: the element changed in the DOM. Inspect the page again to obtain a fresh reference, then repeat the operation with it.',
          },
        ],
      },
    });
  });

  it('should add specific advice when the error names the viewport', async () => {
    const state: TaskState = { ...baseState(), errorType: 'stale_ref', lastError: { kind: 'stale_ref', message: 'Stale element: element is outside of the viewport' } };

    const transition = await new SelfCorrectorNode().run(state, createContext());

    expect(transition.delta?.messages?.[0]?.content.split('\n')[1]).toBe(
      'The element is outside the viewport. Scroll it into view (or close the overlay covering it) before repeating the action.',
    );
  });
});

describe('ProgressAnalyzerNode', () => {
  const node = new ProgressAnalyzerNode(DEFAULT_LOOP_SETTINGS);

  it('should reset the stuck counter when progress is adequate', async () => {
    let state = applyDelta(baseState(), {
      messages: [{ role: 'tool', kind: 'tool_result', content: 'ok', result: { actionId: 'c1', name: 'navigate', status: 'ok', output: 'ok' } }],
    });
    state = { ...state, stuckCounter: 2 };

    const transition = await node.run(state, createContext());

    // 1.0 * 0.5 + 2/40 + 0.5 * 0.2
    expect(transition.type === 'continue' && transition.next).toBe('reasoning');
    expect(transition.delta?.patch?.stuckCounter).toBe(0);
    expect(transition.delta?.patch?.progressScore).toBeCloseTo(0.65);
  });

  it('should count low-progress checks and adapt strategy past the limit', async () => {
    const low: TaskState = { ...baseState(), errorCount: 3 };

    const first = await node.run({ ...low, stuckCounter: 1 }, createContext());
    expect(first.type === 'continue' && first.next).toBe('reasoning');
    expect(first.delta?.patch?.stuckCounter).toBe(2);

    const second = await node.run({ ...low, stuckCounter: 2 }, createContext());
    expect(second.type === 'continue' && second.next).toBe('strategy_adapter');
    expect(second.delta?.patch?.stuckCounter).toBe(3);
  });
});

describe('StrategyAdapterNode', () => {
  it('should add a strategy message and reset the stuck counter', async () => {
    const state: TaskState = { ...baseState(), stuckCounter: 3, strategyChanges: 1 };

    const transition = await new StrategyAdapterNode().run(state, createContext());

    expect(transition.type === 'continue' && transition.next).toBe('reasoning');
    expect(transition.delta?.patch).toEqual({ stuckCounter: 0, strategyChanges: 2 });
    expect(transition.delta?.messages?.[0]).toEqual({
      role: 'user',
      kind: 'strategy',
      content:
        'Strategy adaptation #2: the current approach is not making progress on "Find the title".\nTry a different approach: Close any modal or overlay that may block the page, then retry the interaction.',
    });
  });
});

describe('QualityEvaluatorNode', () => {
  function judge(score: number, feedback?: string): QualityJudge {
    return { evaluate: jest.fn().mockResolvedValue({ score, feedback }) };
  }

  it('should pass a good answer to goal validation', async () => {
    const node = new QualityEvaluatorNode(judge(0.8), DEFAULT_LOOP_SETTINGS);
    await expect(node.run(baseState(), createContext())).resolves.toEqual({ type: 'continue', next: 'goal_validator', delta: { patch: { qualityScore: 0.8 } } });
  });

  it('should return a weak answer to reasoning with the feedback', async () => {
    const node = new QualityEvaluatorNode(judge(0.4, 'Quality evaluation: too vague.'), DEFAULT_LOOP_SETTINGS);
    await expect(node.run(baseState(), createContext())).resolves.toEqual({
      type: 'continue',
      next: 'reasoning',
      delta: { patch: { qualityScore: 0.4 }, messages: [{ role: 'user', kind: 'feedback', content: 'Quality evaluation: too vague.' }] },
    });
  });

  it('should describe the shortfall when the judge gives no feedback', async () => {
    const node = new QualityEvaluatorNode(judge(0.5), DEFAULT_LOOP_SETTINGS);
    const transition = await node.run(baseState(), createContext());
    expect(transition.delta?.messages?.[0]?.content).toBe('Quality evaluation: score 0.5 is below 0.7. Improve the result.');
  });
});

describe('GoalValidatorNode', () => {
  it('should end the task successfully with the latest answer', async () => {
    const goal: GoalJudge = { validate: jest.fn().mockResolvedValue({ achieved: true, explanation: 'Title found' }) };
    const state = applyDelta(baseState(), { messages: [{ role: 'assistant', kind: 'answer', content: 'Example Domain' }] });

    await expect(new GoalValidatorNode(goal).run(state, createContext())).resolves.toEqual({
      type: 'terminal',
      outcome: { status: 'success', reason: 'Title found', answer: 'Example Domain' },
      delta: { patch: { goalAchieved: true } },
    });
  });

  it('should send an unmet goal back to reasoning with the gap', async () => {
    const goal: GoalJudge = { validate: jest.fn().mockResolvedValue({ achieved: false, explanation: 'Verify the cart' }) };

    await expect(new GoalValidatorNode(goal).run(baseState(), createContext())).resolves.toEqual({
      type: 'continue',
      next: 'reasoning',
      delta: { patch: { goalAchieved: false }, messages: [{ role: 'user', kind: 'feedback', content: 'Verify the cart' }] },
    });
  });
});
