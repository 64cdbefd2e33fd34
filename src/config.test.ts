import { describe, expect, it } from 'vitest';

import { ConfigError, DEFAULT_LOG_PATH, loadConfig } from './config.js';

const noInputs = () => '';

function inputs(values: Record<string, string>) {
  return (name: string) => values[name] ?? '';
}

describe('loadConfig', () => {
  it('defaults to google with the key from GOOGLE_API_KEY', () => {
    expect(loadConfig(noInputs, { GOOGLE_API_KEY: 'test-key' })).toEqual({
      provider: 'google',
      model: 'gemini-2.0-flash',
      apiKey: 'test-key',
      logPath: DEFAULT_LOG_PATH,
      timeoutMs: undefined,
    });
  });

  it('reads the provider credential from its own variable', () => {
    const cfg = loadConfig(noInputs, { LLM_PROVIDER: 'github-models', GITHUB_TOKEN: 'test-token', LOG_PATH: 'app.log' });
    expect(cfg.provider).toBe('github-models');
    expect(cfg.apiKey).toBe('test-token');
    expect(cfg.model).toBe('gpt-4o-mini');
    expect(cfg.logPath).toBe('app.log');
  });

  it('prefers action inputs over the environment', () => {
    const cfg = loadConfig(
      inputs({ llm_provider: 'openai', api_key: 'input-key', model: 'gpt-4.1', timeout_ms: '30000' }),
      { OPENAI_API_KEY: 'env-key', LLM_MODEL: 'other', ANALYSIS_TIMEOUT_MS: '5' }
    );
    expect(cfg).toMatchObject({ provider: 'openai', apiKey: 'input-key', model: 'gpt-4.1', timeoutMs: 30000 });
  });

  it('fails at startup without a credential', () => {
    expect(() => loadConfig(noInputs, { OPENAI_API_KEY: 'wrong-provider' })).toThrow(ConfigError);
    expect(() => loadConfig(noInputs, {})).toThrow(
      'Missing credential for provider=google (api_key input / GOOGLE_API_KEY env)'
    );
  });

  it('rejects an unknown provider', () => {
    expect(() => loadConfig(noInputs, { LLM_PROVIDER: 'anthropic-ish' })).toThrow(/Unknown llm_provider "anthropic-ish"/);
  });

  it('raises its own error type, not a pipeline error', () => {
    const err = (() => {
      try {
        return loadConfig(noInputs, {});
      } catch (e) {
        return e;
      }
    })();
    expect(err).toBeInstanceOf(ConfigError);
    expect(err).toMatchObject({ name: 'ConfigError' });
    expect(err).not.toHaveProperty('kind');
  });

  it.each(['0', '-5', 'soon', '1.5'])('rejects timeout %s', (value) => {
    expect(() => loadConfig(noInputs, { GOOGLE_API_KEY: 'test-key', ANALYSIS_TIMEOUT_MS: value })).toThrow(ConfigError);
  });
});
