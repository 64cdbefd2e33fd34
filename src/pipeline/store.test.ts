import { describe, expect, it } from 'vitest';

import { PipelineError } from './errors.js';
import { SharedStateStore } from './store.js';

function kindOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (e) {
    return e instanceof PipelineError ? e.kind : 'not-a-pipeline-error';
  }
  return undefined;
}

describe('SharedStateStore', () => {
  it('returns what was put', () => {
    const store = new SharedStateStore();
    store.put('decision', { alert_needed: true, severity: 'high' });
    expect(store.get('decision')).toEqual({ alert_needed: true, severity: 'high' });
  });

  it('fails with MissingNamespace when reading an unwritten namespace', () => {
    const store = new SharedStateStore();
    expect(kindOf(() => store.get('collector'))).toBe('MissingNamespace');
  });

  it('fails with DuplicateNamespace on a second write and keeps the first record', () => {
    const store = new SharedStateStore();
    store.put('decision', { alert_needed: false, severity: 'low' });
    expect(kindOf(() => store.put('decision', { alert_needed: true, severity: 'critical' }))).toBe('DuplicateNamespace');
    expect(store.get('decision').severity).toBe('low');
  });

  it('commits a frozen copy detached from the caller', () => {
    const store = new SharedStateStore();
    const lines = ['INFO: a', 'WARN: b'];
    store.put('collector', { raw_logs: lines.join('\n'), lines, line_count: 2 });
    lines.push('ERROR: c');

    const rec = store.get('collector');
    expect(rec.lines).toEqual(['INFO: a', 'WARN: b']);
    expect(Object.isFrozen(rec)).toBe(true);
    expect(Object.isFrozen(rec.lines)).toBe(true);
    expect(() => rec.lines.push('x')).toThrow(TypeError);
  });

  it('exposes committed records through all() and has()', () => {
    const store = new SharedStateStore();
    expect(store.all()).toEqual({});
    store.put('decision', { alert_needed: false, severity: 'medium' });

    expect(store.has('decision')).toBe(true);
    expect(store.has('analyzer')).toBe(false);
    expect(Object.keys(store.all())).toEqual(['decision']);
    expect(Object.isFrozen(store.all())).toBe(true);
  });
});
