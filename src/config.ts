import * as core from '@actions/core';

import { isLLMProvider, type LLMProvider } from './lib/llm.js';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type SentinelConfig = {
  provider: LLMProvider;
  model: string;
  apiKey: string;
  logPath: string;
  timeoutMs?: number;
};

export type InputReader = (name: string) => string;

export const DEFAULT_LOG_PATH = 'logs/sample.log';

const DEFAULT_MODELS: Record<LLMProvider, string> = {
  google: 'gemini-2.0-flash',
  openai: 'gpt-4o-mini',
  'github-models': 'gpt-4o-mini',
};

const CREDENTIAL_ENV: Record<LLMProvider, string> = {
  google: 'GOOGLE_API_KEY',
  openai: 'OPENAI_API_KEY',
  'github-models': 'GITHUB_TOKEN',
};

function parseTimeout(s: string): number | undefined {
  if (!s) return undefined;
  const n = Number(s);
  if (!Number.isInteger(n) || n <= 0) throw new ConfigError(`timeout must be a positive integer (ms), got "${s}"`);
  return n;
}

/**
 * Action inputs win over environment variables, the same way every
 * `core.getInput(x) || process.env.X` pair in an action does.
 */
export function loadConfig(
  getInput: InputReader = (name) => core.getInput(name),
  env: NodeJS.ProcessEnv = process.env
): SentinelConfig {
  const providerRaw = (getInput('llm_provider') || env.LLM_PROVIDER || 'google').trim();
  if (!isLLMProvider(providerRaw)) {
    throw new ConfigError(`Unknown llm_provider "${providerRaw}" (expected openai, github-models or google)`);
  }
  const provider = providerRaw;

  const apiKey = getInput('api_key') || env[CREDENTIAL_ENV[provider]];
  if (!apiKey) {
    throw new ConfigError(`Missing credential for provider=${provider} (api_key input / ${CREDENTIAL_ENV[provider]} env)`);
  }

  return {
    provider,
    model: getInput('model') || env.LLM_MODEL || DEFAULT_MODELS[provider],
    apiKey,
    logPath: getInput('log_path') || env.LOG_PATH || DEFAULT_LOG_PATH,
    timeoutMs: parseTimeout(getInput('timeout_ms') || env.ANALYSIS_TIMEOUT_MS || ''),
  };
}
