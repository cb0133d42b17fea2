import { describe, expect, test } from '@jest/globals';
import { ConfigError, loadConfig, parseSmokeInput } from '../config.js';

const minimalEnv = {
  GAMESYNTH_PRIMARY_BASE_URL: 'http://localhost:11434/v1',
  GAMESYNTH_FALLBACK_API_KEY: 'test-secret',
};

describe('loadConfig', () => {
  test('should apply defaults', () => {
    const config = loadConfig(minimalEnv);

    expect(config.primary).toEqual({
      name: 'primary',
      baseUrl: 'http://localhost:11434/v1',
      apiKey: '',
      models: { code: 'codellama', rules: 'llama3.1' },
    });
    expect(config.fallback.baseUrl).toBe('https://api.openai.com/v1');
    expect(config.fallback.models).toEqual({ code: 'gpt-4o', rules: 'gpt-4o' });
    expect(config.retryBudget).toBe(3);
    expect(config.probeTimeoutMs).toBe(5000);
    expect(config.requestTimeoutMs).toBe(120000);
    expect(config.temperature).toBe(0.5);
    expect(config.sandbox).toEqual({
      timeoutMs: 5000,
      timeoutIsSuccess: false,
      maxHeapMb: 64,
      smokeInput: ['1', '2', '3', 'q'],
    });
    expect(config.server).toEqual({ apiKey: undefined, port: 3000, host: '0.0.0.0' });
    expect(config.debugMode).toBe(false);
  });

  test('should read overrides and treat blank values as unset', () => {
    const config = loadConfig({
      ...minimalEnv,
      GAMESYNTH_RETRY_BUDGET: '5',
      GAMESYNTH_SANDBOX_TIMEOUT_IS_SUCCESS: 'true',
      GAMESYNTH_SMOKE_INPUT: 'north\\nsouth',
      GAMESYNTH_PRIMARY_CODE_MODEL: '',
    });

    expect(config.retryBudget).toBe(5);
    expect(config.sandbox.timeoutIsSuccess).toBe(true);
    expect(config.sandbox.smokeInput).toEqual(['north', 'south']);
    expect(config.primary.models.code).toBe('codellama');
  });

  test('should take the fallback key from OPENAI_API_KEY', () => {
    const config = loadConfig({ GAMESYNTH_PRIMARY_BASE_URL: 'http://localhost:11434/v1', OPENAI_API_KEY: 'test-secret' });
    expect(config.fallback.apiKey).toBe('test-secret');
  });

  test('should freeze the whole configuration', () => {
    const config = loadConfig(minimalEnv);

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.primary.models)).toBe(true);
    expect(Object.isFrozen(config.sandbox.smokeInput)).toBe(true);
  });

  test('should list every invalid variable', () => {
    let caught: unknown;
    try {
      loadConfig({ GAMESYNTH_RETRY_BUDGET: '0' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.issues.map((issue) => issue.path.join('.')).sort()).toEqual([
      'GAMESYNTH_PRIMARY_BASE_URL',
      'GAMESYNTH_RETRY_BUDGET',
    ]);
    expect(caught.message).toContain('GAMESYNTH_PRIMARY_BASE_URL: is required');
  });

  test('should require a key for the fallback provider', () => {
    expect(() => loadConfig({ GAMESYNTH_PRIMARY_BASE_URL: 'http://localhost:11434/v1' })).toThrow(
      'GAMESYNTH_FALLBACK_API_KEY: is required (or set OPENAI_API_KEY)'
    );
  });
});

describe('parseSmokeInput', () => {
  test('should split on real and escaped newlines', () => {
    expect(parseSmokeInput('1\n2\\n3')).toEqual(['1', '2', '3']);
  });
});
