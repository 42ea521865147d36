import type { TaskState } from '../agent/state';
import { goTo } from '../agent/transition';
import type { Transition } from '../agent/transition';
import type { NodeContext, RoutingNode } from './types';

const CORRECTIONS: ReadonlyArray<{ match: (text: string) => boolean; guidance: string }> = [
  {
    match: (t) => t.includes('invalidselectorerror') || t.includes('unexpected symbol'),
    guidance: 'Invalid selector syntax. Use a single role per role-based query, or one well-formed CSS selector list, then repeat the previous action.',
  },
  {
    match: (t) => t.includes('outside of the viewport'),
    guidance: 'The element is outside the viewport. Scroll it into view (or close the overlay covering it) before repeating the action.',
  },
  {
    match: (t) => t.includes('networkidle'),
    guidance: 'The page never reached network idle. Wait for the DOM content to load instead, then continue.',
  },
];

const STALE_REFERENCE_GUIDANCE = 'Stale reference: the element changed in the DOM. Inspect the page again to obtain a fresh reference, then repeat the operation with it.';

/** Turns a stale-reference failure into guidance for the next reasoning step */
export class SelfCorrectorNode implements RoutingNode {
  readonly id = 'self_corrector' as const;

  run(state: Readonly<TaskState>, ctx: NodeContext): Promise<Transition> {
    const text = state.lastError?.message.toLowerCase() ?? '';
    const specific = CORRECTIONS.find((c) => c.match(text));
    const guidance = specific ? `${STALE_REFERENCE_GUIDANCE}\n${specific.guidance}` : STALE_REFERENCE_GUIDANCE;

    ctx.logger.info(`Self-correcting error: ${state.errorType}`);
    return Promise.resolve(
      goTo('reasoning', {
        patch: { errorType: 'none' },
        messages: [{ role: 'user', kind: 'correction', content: guidance }],
      }),
    );
  }
}
