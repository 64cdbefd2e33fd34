import * as core from '@actions/core';

import { LLMTimeoutError } from '../../lib/errors.js';
import { buildAnalysisMessages } from '../../lib/prompts.js';
import { PipelineError } from '../errors.js';
import { extractFirstJsonObject } from '../json.js';
import { AnalysisRecordSchema, describeIssues } from '../schema.js';
import type { SharedStateStore } from '../store.js';
import type { AnalysisCapability, AnalysisRecord } from '../types.js';

export function parseAnalysis(text: string): AnalysisRecord {
  const extracted = extractFirstJsonObject(text);
  if (!extracted.ok) {
    throw new PipelineError('MalformedAnalysis', extracted.reason);
  }

  const parsed = AnalysisRecordSchema.safeParse(extracted.value);
  if (!parsed.success) {
    throw new PipelineError('MalformedAnalysis', describeIssues(parsed.error), { cause: parsed.error });
  }
  return parsed.data;
}

async function requestAnalysis(analyze: AnalysisCapability, rawLogs: string, lineCount: number): Promise<string> {
  try {
    return await analyze(buildAnalysisMessages(rawLogs, lineCount));
  } catch (e) {
    if (e instanceof LLMTimeoutError) {
      throw new PipelineError('AnalysisTimeout', e.message, { cause: e });
    }
    const reason = e instanceof Error ? e.message : String(e);
    throw new PipelineError('AnalysisUnavailable', `analysis request failed: ${reason}`, { cause: e });
  }
}

export async function runAnalyzer(store: SharedStateStore, analyze: AnalysisCapability): Promise<void> {
  const { raw_logs: rawLogs, line_count: lineCount } = store.get('collector');

  core.debug(`Requesting analysis of ${lineCount} lines (${rawLogs.length} chars)`);
  const text = await requestAnalysis(analyze, rawLogs, lineCount);

  store.put('analyzer', parseAnalysis(text));
}
