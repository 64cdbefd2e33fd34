import * as core from '@actions/core';

import { loadConfig } from './config.js';
import { createLLMCapability } from './lib/llm.js';
import { runPipeline } from './pipeline/orchestrator.js';
import { fileLogSource } from './pipeline/stages/collector.js';
import type { FinalReport } from './pipeline/types.js';

function reportJson(report: FinalReport): string {
  const { text: _text, markdown: _markdown, ...rest } = report;
  return JSON.stringify(rest);
}

async function run() {
  const cfg = loadConfig();
  core.setSecret(cfg.apiKey);
  core.info(`Analyzing ${cfg.logPath} with ${cfg.provider}:${cfg.model}`);

  const report = await runPipeline({
    source: fileLogSource(cfg.logPath),
    analyze: createLLMCapability(cfg),
  });

  core.info(report.text);

  core.setOutput('alert_needed', String(report.alert_needed));
  core.setOutput('severity', report.severity);
  core.setOutput('report', report.text);
  core.setOutput('report_json', reportJson(report));

  if (process.env.GITHUB_STEP_SUMMARY) {
    await core.summary.addRaw(report.markdown).write();
  }
}

(async () => {
  try {
    await run();
  } catch (err) {
    core.setFailed(err instanceof Error ? err.message : String(err));
  }
})();
