import { describe, it, expect } from 'vitest';
import { loadAppConfig, resolveContextLimits, slashCommand } from '../src/config/app-config.js';

describe('resolveContextLimits', () => {
  it('uses 50 and 250 when nothing is set', () => {
    expect(resolveContextLimits()).toEqual({ min: 50, max: 250 });
  });

  it('accepts sane values', () => {
    expect(resolveContextLimits('20', '400')).toEqual({ min: 20, max: 400 });
  });

  it('raises max to min when max is smaller', () => {
    expect(resolveContextLimits('10', '5')).toEqual({ min: 10, max: 10 });
  });

  it('falls back to both defaults on non-numeric input', () => {
    expect(resolveContextLimits('abc', '100')).toEqual({ min: 50, max: 250 });
    expect(resolveContextLimits('10', '1.5')).toEqual({ min: 50, max: 250 });
  });

  it('replaces non-positive values with the defaults', () => {
    expect(resolveContextLimits('0', '-3')).toEqual({ min: 50, max: 250 });
  });

  it('caps oversized values', () => {
    expect(resolveContextLimits('2000', '20000')).toEqual({ min: 1000, max: 10000 });
  });
});

describe('loadAppConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadAppConfig({});

    expect(config.botName).toBe('ThreadSage');
    expect(config.qa.timeoutMs).toBe(500000);
    expect(config.context).toEqual({ min: 50, max: 250, extractTimeoutMs: 30000, maxHistoryPages: 10 });
    expect(config.maxPayloadBytes).toBe(200000);
    expect(config.modelOverride).toBeUndefined();
    expect(config.defaultAssistants).toEqual([]);
    expect(config.databasePath).toBe('./data/threadsage.db');
  });

  it('caps the QA timeout at one hour', () => {
    expect(loadAppConfig({ QA_TIMEOUT_SECONDS: '9999' }).qa.timeoutMs).toBe(3600000);
  });

  it('falls back to the default QA timeout on garbage', () => {
    expect(loadAppConfig({ QA_TIMEOUT_SECONDS: 'soon' }).qa.timeoutMs).toBe(500000);
  });

  it('ignores a blank model override', () => {
    expect(loadAppConfig({ MODEL_OVERRIDE: '   ' }).modelOverride).toBeUndefined();
    expect(loadAppConfig({ MODEL_OVERRIDE: ' model-x ' }).modelOverride).toBe('model-x');
  });

  it('parses default assistants as a de-duplicated list', () => {
    expect(loadAppConfig({ DEFAULT_ASSISTANTS: 'docs, runbooks,,docs' }).defaultAssistants).toEqual([
      'docs',
      'runbooks',
    ]);
  });

  it('trims a trailing slash from the QA URL', () => {
    expect(loadAppConfig({ QA_API_URL: 'https://qa.test/' }).qa.apiUrl).toBe('https://qa.test');
  });

  it('freezes the whole config', () => {
    const config = loadAppConfig({});

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.context)).toBe(true);
    expect(Object.isFrozen(config.defaultAssistants)).toBe(true);
  });
});

describe('slashCommand', () => {
  it('derives command names from the bot name', () => {
    expect(slashCommand('ThreadSage', 'ask')).toBe('/threadsage-ask');
    expect(slashCommand('Thread Sage', 'config')).toBe('/thread-sage-config');
  });
});
