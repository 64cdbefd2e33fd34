import type { LLMMessage } from './llm.js';

export function buildAnalysisSystemPrompt(): string {
  return [
    'You are an SRE assistant analyzing application logs.',
    'Lines usually carry a level prefix such as INFO:, WARN: or ERROR:. Line order is chronological.',
    'Identify the most likely root cause and how urgent it is.',
    'Output JSON ONLY. Do not wrap in Markdown or code fences.',
    '',
    'Return a single JSON object with exactly these keys and no others:',
    '{',
    '  "severity": "low"|"medium"|"high"|"critical",',
    '  "root_cause": string,',
    '  "summary": string,',
    '  "recommended_action": string',
    '}',
  ].join('\n');
}

export function buildAnalysisMessages(rawLogs: string, lineCount: number): LLMMessage[] {
  return [
    { role: 'system', content: buildAnalysisSystemPrompt() },
    { role: 'user', content: `Logs (${lineCount} lines):\n\n${rawLogs}` },
  ];
}
