import { ErrorClassifier } from '../../../src/agent/error-classifier';
import type { ActionResult } from '../../../src/agent/state';

function result(output: string, overrides: Partial<ActionResult> = {}): ActionResult {
  return { actionId: 'c1', name: 'click', status: 'error', output, ...overrides };
}

describe('ErrorClassifier', () => {
  const classifier = new ErrorClassifier();

  it.each([
    ['Ref not found: e42', 'stale_ref'],
    ['Element is not attached to the DOM', 'stale_ref'],
    ['Please solve the reCAPTCHA', 'captcha'],
    ['429 Too Many Requests', 'rate_limit'],
    ['Login required to view this page', 'auth'],
    ['Timeout 30000ms exceeded waiting for selector "#buy"', 'element_not_found'],
    ['net::ERR_NAME_NOT_RESOLVED', 'network'],
    ['Navigation timed out', 'network'],
    ['Something odd happened', 'unknown'],
  ])('should classify "%s" as %s', (text, kind) => {
    expect(classifier.classifyText(text)).toBe(kind);
  });

  it('should prefer a structured kind over text matching', () => {
    expect(classifier.classifyResult(result('ref not found', { kind: 'captcha' }))).toBe('captcha');
  });

  it('should fall back to text when the structured kind is none', () => {
    expect(classifier.classifyResult(result('ref not found', { kind: 'none' }))).toBe('stale_ref');
  });

  it('should report none for successful and skipped results', () => {
    expect(classifier.classifyResult(result('ref not found', { status: 'ok' }))).toBe('none');
    expect(classifier.classifyResult(result('Skipped', { status: 'skipped' }))).toBe('none');
  });

  it('should return the first failing result of a batch', () => {
    const ok = result('fine', { actionId: 'c1', status: 'ok' });
    const network = result('ECONNRESET', { actionId: 'c2' });
    const stale = result('stale element reference', { actionId: 'c3' });

    const classified = classifier.classifyBatch([ok, network, stale]);
    expect(classified.kind).toBe('network');
    expect(classified.result?.actionId).toBe('c2');
    expect(classifier.classifyBatch([ok]).kind).toBe('none');
  });
});
