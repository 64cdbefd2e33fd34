#!/usr/bin/env node
import 'dotenv/config';

import { loadConfig } from '../config.js';
import { createLLMCapability } from '../lib/llm.js';
import { runPipeline } from '../pipeline/orchestrator.js';
import { fileLogSource } from '../pipeline/stages/collector.js';

function getArg(name: string): string | undefined {
  const idx = process.argv.indexOf(`--${name}`);
  if (idx === -1) return undefined;
  return process.argv[idx + 1];
}

async function main() {
  // no action inputs outside of a workflow
  const cfg = loadConfig(() => '');
  const logPath = getArg('logs') || cfg.logPath;

  const report = await runPipeline({
    source: fileLogSource(logPath),
    analyze: createLLMCapability(cfg),
  });

  console.log(report.text);
}

main().catch((e) => {
  console.error(e instanceof Error ? e.message : e);
  process.exit(1);
});
