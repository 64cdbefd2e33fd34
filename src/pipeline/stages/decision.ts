import type { SharedStateStore } from '../store.js';
import type { AlertDecision, Severity } from '../types.js';

const ALERTING: ReadonlySet<Severity> = new Set<Severity>(['high', 'critical']);

export function decideAlert(severity: Severity): AlertDecision {
  return { alert_needed: ALERTING.has(severity), severity };
}

export function runDecision(store: SharedStateStore): void {
  const { severity } = store.get('analyzer');
  store.put('decision', decideAlert(severity));
}
