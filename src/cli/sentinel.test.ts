import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { config as loadDotenv } from 'dotenv';
import { afterEach, describe, expect, it } from 'vitest';

import { loadConfig } from '../config.js';

const noInputs = () => '';

describe('sentinel CLI', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('loads .env before anything reads configuration', () => {
    const source = readFileSync(fileURLToPath(new URL('./sentinel.ts', import.meta.url)), 'utf8');
    const imports = source.split('\n').filter((line) => line.startsWith('import '));

    expect(imports[0]).toBe("import 'dotenv/config';");
  });

  it('takes provider and credential from a .env file', () => {
    dir = mkdtempSync(join(tmpdir(), 'sentinel-env-'));
    const path = join(dir, '.env');
    writeFileSync(path, 'LLM_PROVIDER=openai\nOPENAI_API_KEY=test-secret\nLOG_PATH=app.log\n');

    const env: Record<string, string> = {};
    loadDotenv({ path, processEnv: env });

    expect(loadConfig(noInputs, env)).toMatchObject({
      provider: 'openai',
      apiKey: 'test-secret',
      model: 'gpt-4o-mini',
      logPath: 'app.log',
    });
  });
});
