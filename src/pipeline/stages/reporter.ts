import { renderMarkdown, renderText } from '../render.js';
import type { SharedStateStore } from '../store.js';
import { REPORT_SCHEMA_VERSION, type FinalReport } from '../types.js';

export function runReporter(store: SharedStateStore): FinalReport {
  const collected = store.get('collector');
  const analysis = store.get('analyzer');
  const decision = store.get('decision');

  const view = { analysis, decision, lineCount: collected.line_count };

  return {
    schemaVersion: REPORT_SCHEMA_VERSION,
    status: decision.alert_needed ? 'alert' : 'healthy',
    alert_needed: decision.alert_needed,
    severity: decision.severity,
    analysis: { ...analysis },
    line_count: collected.line_count,
    text: renderText(view),
    markdown: renderMarkdown(view),
  };
}
