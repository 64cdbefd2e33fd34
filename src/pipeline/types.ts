import type { LLMCapability } from '../lib/llm.js';

export const SEVERITIES = ['low', 'medium', 'high', 'critical'] as const;

export type Severity = (typeof SEVERITIES)[number];

export type StageName = 'collector' | 'analyzer' | 'decision' | 'reporter';

export type CollectorRecord = {
  raw_logs: string; // lines joined with "\n"
  lines: string[];
  line_count: number;
};

export type AnalysisRecord = {
  severity: Severity;
  root_cause: string;
  summary: string;
  recommended_action: string;
};

export type AlertDecision = {
  alert_needed: boolean;
  severity: Severity; // kept for auditability
};

// One entry per writing stage. The reporter reads, never writes.
export type StageRecords = {
  collector: CollectorRecord;
  analyzer: AnalysisRecord;
  decision: AlertDecision;
};

export const REPORT_SCHEMA_VERSION = 1 as const;

export type FinalReport = {
  schemaVersion: typeof REPORT_SCHEMA_VERSION;
  status: 'alert' | 'healthy';
  alert_needed: boolean;
  severity: Severity;
  analysis: AnalysisRecord;
  line_count: number;
  text: string;
  markdown: string;
};

export type LogSource = {
  describe(): string;
  read(): Promise<string>;
};

export type AnalysisCapability = LLMCapability;

export type PipelineDeps = {
  source: LogSource;
  analyze: AnalysisCapability;
};
