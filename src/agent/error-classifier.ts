import type { ActionResult, ErrorKind } from './state';

type Classified = Exclude<ErrorKind, 'none'>;

/**
 * Maps tool failures to an error kind.
 *
 * A structured kind reported by the tool bridge always wins; free-text matching
 * is the fallback for upstream failures that carry only a message. Patterns are
 * checked in table order, so the more specific phrases come first.
 */
export class ErrorClassifier {
  private static readonly PATTERNS: ReadonlyArray<[Classified, readonly string[]]> = [
    ['stale_ref', ['ref not found', 'stale element', 'stale reference', 'element is not attached', 'detached from the dom', 'no element with ref', 'reference is stale']],
    ['captcha', ['captcha', 'recaptcha', 'hcaptcha', 'are you a robot', 'verify you are human']],
    ['rate_limit', ['rate limit', 'too many requests', 'status 429', 'quota exceeded']],
    ['auth', ['unauthorized', 'authentication failed', 'login required', 'not logged in', 'sign in to continue', 'status 401', 'status 403', 'forbidden']],
    ['element_not_found', ['element not found', 'no element matches', 'no such element', 'waiting for selector', 'not visible', 'outside of the viewport', 'invalidselectorerror']],
    [
      'network',
      ['net::err', 'econnrefused', 'econnreset', 'etimedout', 'enotfound', 'socket hang up', 'network error', 'timeout', 'timed out', 'status 502', 'status 503', 'status 504', 'connection closed'],
    ],
  ];

  /** Classify free text; unmatched text is `unknown` */
  classifyText(text: string): Classified {
    const lower = text.toLowerCase();
    for (const [kind, patterns] of ErrorClassifier.PATTERNS) {
      if (patterns.some((p) => lower.includes(p))) return kind;
    }
    return 'unknown';
  }

  classifyResult(result: ActionResult): ErrorKind {
    if (result.status !== 'error') return 'none';
    if (result.kind && result.kind !== 'none') return result.kind;
    return this.classifyText(result.output);
  }

  /** First non-`none` kind in batch order, with the result that produced it */
  classifyBatch(results: readonly ActionResult[]): { kind: ErrorKind; result?: ActionResult } {
    for (const result of results) {
      const kind = this.classifyResult(result);
      if (kind !== 'none') return { kind, result };
    }
    return { kind: 'none' };
  }
}
