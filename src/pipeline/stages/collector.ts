import fs from 'node:fs/promises';

import { PipelineError } from '../errors.js';
import type { SharedStateStore } from '../store.js';
import type { LogSource } from '../types.js';

export function fileLogSource(filePath: string): LogSource {
  return {
    describe: () => filePath,
    read: () => fs.readFile(filePath, 'utf8'),
  };
}

export function splitLogLines(text: string): string[] {
  return text.split(/\r?\n/).filter((line) => line.trim() !== '');
}

export async function runCollector(store: SharedStateStore, source: LogSource): Promise<void> {
  let text: string;
  try {
    text = await source.read();
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new PipelineError('SourceUnavailable', `cannot read ${source.describe()}: ${reason}`, { cause: e });
  }

  const lines = splitLogLines(text);
  if (!lines.length) {
    throw new PipelineError('SourceUnavailable', `${source.describe()} contains no log lines`);
  }

  store.put('collector', {
    raw_logs: lines.join('\n'),
    lines,
    line_count: lines.length,
  });
}
