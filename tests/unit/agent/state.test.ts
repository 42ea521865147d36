import { applyDelta, createTaskState, describeAction, isComplexTask, latestAnswer, recentToolResults } from '../../../src/agent/state';
import type { Message } from '../../../src/agent/state';

describe('createTaskState', () => {
  it('should start with the task as the first message and zeroed counters', () => {
    const state = createTaskState('  Find the title of example.com  ', { sessionId: 'session-1' });

    expect(state.sessionId).toBe('session-1');
    expect(state.originalTask).toBe('Find the title of example.com');
    expect(state.history).toEqual([{ id: 'm1', role: 'user', kind: 'task', content: 'Find the title of example.com' }]);
    expect(state.step).toBe(0);
    expect(state.errorCount).toBe(0);
    expect(state.errorType).toBe('none');
    expect(state.pendingAction).toBeNull();
    expect(state.goalAchieved).toBe(false);
  });

  it('should reject an empty task', () => {
    expect(() => createTaskState('   ')).toThrow('Task description must not be empty');
  });

  it('should honour an explicit complexity flag', () => {
    expect(createTaskState('Open the page', { complex: true }).complex).toBe(true);
    expect(createTaskState('Open the page').complex).toBe(false);
  });
});

describe('isComplexTask', () => {
  it('should treat short single-sentence tasks as simple', () => {
    expect(isComplexTask('Find the title of example.com')).toBe(false);
  });

  it('should treat sequenced or multi-sentence tasks as complex', () => {
    expect(isComplexTask('Open the shop, then add a kettle to the cart')).toBe(true);
    expect(isComplexTask('Open the shop. Add a kettle.')).toBe(true);
  });
});

describe('applyDelta', () => {
  it('should assign sequential ids to appended messages and apply patches', () => {
    const state = createTaskState('Do a thing', { sessionId: 's' });
    const next = applyDelta(state, {
      patch: { errorCount: 2, errorType: 'network' },
      messages: [
        { role: 'assistant', kind: 'reasoning', content: 'first' },
        { role: 'user', kind: 'feedback', content: 'second' },
      ],
    });

    expect(next.history.map((m) => m.id)).toEqual(['m1', 'm2', 'm3']);
    expect(next.messageSeq).toBe(3);
    expect(next.errorCount).toBe(2);
    expect(next.errorType).toBe('network');
    // the input state is not modified
    expect(state.history).toHaveLength(1);
    expect(state.errorCount).toBe(0);
  });

  it('should accept a compaction that keeps a suffix of the history', () => {
    let state = createTaskState('Do a thing', { sessionId: 's' });
    state = applyDelta(state, { messages: [{ role: 'assistant', kind: 'reasoning', content: 'a' }, { role: 'user', kind: 'feedback', content: 'b' }] });
    const summary: Message = { id: 's1', role: 'system', kind: 'summary', content: 'Summary of earlier steps:\n- task: Do a thing' };
    const tail = state.history.slice(2);

    const next = applyDelta(state, { compaction: { history: [summary, ...tail], summaryContext: { summary: '- task: Do a thing', boundary: 'm2', compactions: 1 } } });

    expect(next.history.map((m) => m.id)).toEqual(['s1', 'm3']);
    expect(next.summaryContext?.boundary).toBe('m2');
  });

  it('should reject a compaction that drops messages from the middle', () => {
    let state = createTaskState('Do a thing', { sessionId: 's' });
    state = applyDelta(state, { messages: [{ role: 'assistant', kind: 'reasoning', content: 'a' }, { role: 'user', kind: 'feedback', content: 'b' }] });
    const first = state.history[0];
    if (!first) throw new Error('missing task message');

    expect(() => applyDelta(state, { compaction: { history: [first], summaryContext: { summary: '', boundary: 'm3', compactions: 1 } } })).toThrow(
      'Compaction must preserve a contiguous suffix of the history',
    );
  });

  it('should keep message ids unique after a compaction', () => {
    let state = createTaskState('Do a thing', { sessionId: 's' });
    state = applyDelta(state, { messages: [{ role: 'assistant', kind: 'reasoning', content: 'a' }] });
    const summary: Message = { id: 's1', role: 'system', kind: 'summary', content: 'x' };
    state = applyDelta(state, {
      compaction: { history: [summary, ...state.history.slice(1)], summaryContext: { summary: 'x', boundary: 'm1', compactions: 1 } },
      messages: [{ role: 'user', kind: 'feedback', content: 'c' }],
    });

    expect(state.history.map((m) => m.id)).toEqual(['s1', 'm2', 'm3']);
  });
});

describe('history helpers', () => {
  const history: Message[] = [
    { id: 'm1', role: 'user', kind: 'task', content: 'task' },
    { id: 'm2', role: 'tool', kind: 'tool_result', content: 'one', result: { actionId: 'c1', name: 'a', status: 'ok', output: 'one' } },
    { id: 'm3', role: 'assistant', kind: 'answer', content: 'early answer' },
    { id: 'm4', role: 'tool', kind: 'tool_result', content: 'two', result: { actionId: 'c2', name: 'b', status: 'error', output: 'two' } },
    { id: 'm5', role: 'assistant', kind: 'answer', content: 'final answer' },
  ];

  it('recentToolResults should return the newest results oldest first', () => {
    expect(recentToolResults(history, 1).map((r) => r.name)).toEqual(['b']);
    expect(recentToolResults(history, 5).map((r) => r.name)).toEqual(['a', 'b']);
  });

  it('latestAnswer should return the most recent answer', () => {
    expect(latestAnswer(history)).toBe('final answer');
    expect(latestAnswer(history.slice(0, 2))).toBeUndefined();
  });

  it('describeAction should include arguments only when present', () => {
    expect(describeAction({ name: 'close_tab', args: {} })).toBe('close_tab');
    expect(describeAction({ name: 'submit_form', args: { ref: 'e12' } })).toBe('submit_form {"ref":"e12"}');
  });
});
