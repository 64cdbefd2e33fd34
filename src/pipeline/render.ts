import type { AlertDecision, AnalysisRecord } from './types.js';

export type ReportView = {
  analysis: AnalysisRecord;
  decision: AlertDecision;
  lineCount: number;
};

export function statusBanner(decision: AlertDecision): string {
  return decision.alert_needed
    ? `*** ALERT: severity ${decision.severity}, action required ***`
    : `*** OK: severity ${decision.severity}, no alert needed ***`;
}

export function renderText({ analysis, decision, lineCount }: ReportView): string {
  return [
    statusBanner(decision),
    `Severity: ${analysis.severity}`,
    `Root cause: ${analysis.root_cause}`,
    `Summary: ${analysis.summary}`,
    `Recommended action: ${analysis.recommended_action}`,
    `Lines analyzed: ${lineCount}`,
  ].join('\n');
}

export function renderMarkdown({ analysis, decision, lineCount }: ReportView): string {
  const lines: string[] = [];
  lines.push(decision.alert_needed ? '## 🚨 Log Sentinel: alert' : '## ✅ Log Sentinel: healthy');
  lines.push('');
  lines.push(`Severity: **${analysis.severity}** · Lines analyzed: ${lineCount}`);
  lines.push('');
  lines.push('### Root cause');
  lines.push('');
  lines.push(analysis.root_cause);
  lines.push('');
  lines.push('### Summary');
  lines.push('');
  lines.push(analysis.summary);
  lines.push('');
  lines.push('### Recommended action');
  lines.push('');
  lines.push(analysis.recommended_action);
  lines.push('');
  return lines.join('\n');
}
