import { describe, expect, it } from 'vitest';

import { SharedStateStore } from '../store.js';
import type { AnalysisRecord } from '../types.js';
import { decideAlert } from './decision.js';
import { runReporter } from './reporter.js';

function filledStore(analysis: AnalysisRecord): SharedStateStore {
  const store = new SharedStateStore();
  store.put('collector', { raw_logs: 'ERROR: x\nWARN: y', lines: ['ERROR: x', 'WARN: y'], line_count: 2 });
  store.put('analyzer', analysis);
  store.put('decision', decideAlert(analysis.severity));
  return store;
}

describe('runReporter', () => {
  it('renders the alert banner and the analysis fields', () => {
    const report = runReporter(
      filledStore({ severity: 'critical', root_cause: 'Disk full on db-1', summary: 'Writes failing', recommended_action: 'Expand volume' })
    );

    expect(report.status).toBe('alert');
    expect(report.alert_needed).toBe(true);
    expect(report.text).toBe(
      [
        '*** ALERT: severity critical, action required ***',
        'Severity: critical',
        'Root cause: Disk full on db-1',
        'Summary: Writes failing',
        'Recommended action: Expand volume',
        'Lines analyzed: 2',
      ].join('\n')
    );
    expect(report.markdown.split('\n')[0]).toBe('## 🚨 Log Sentinel: alert');
  });

  it('renders the healthy banner for medium severity', () => {
    const report = runReporter(
      filledStore({ severity: 'medium', root_cause: 'Slow cache', summary: 'Latency up', recommended_action: 'Watch it' })
    );

    expect(report.status).toBe('healthy');
    expect(report.text.split('\n')[0]).toBe('*** OK: severity medium, no alert needed ***');
    expect(report.markdown.split('\n')[0]).toBe('## ✅ Log Sentinel: healthy');
  });

  it('writes nothing back to the store', () => {
    const store = filledStore({ severity: 'low', root_cause: 'r', summary: 's', recommended_action: 'a' });
    const before = Object.keys(store.all());
    runReporter(store);
    expect(Object.keys(store.all())).toEqual(before);
  });

  it('fails with MissingNamespace when the decision is missing', () => {
    const store = new SharedStateStore();
    store.put('collector', { raw_logs: 'INFO: x', lines: ['INFO: x'], line_count: 1 });
    store.put('analyzer', { severity: 'low', root_cause: 'r', summary: 's', recommended_action: 'a' });
    expect(() => runReporter(store)).toThrow('namespace "decision" has not been written');
  });
});
