import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';
import { DEFAULT_CATALOG_PATH, loadConfig } from '../../src/infrastructure/config.js';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      logLevel: 'info',
      llmProvider: 'stub',
      groqApiKey: undefined,
      llmModel: undefined,
      countyCatalogPath: DEFAULT_CATALOG_PATH,
    });
  });

  it('points the default catalog at the bundled file, not the working directory', () => {
    expect(DEFAULT_CATALOG_PATH).toBe(fileURLToPath(new URL('../../data/counties.json', import.meta.url)));
  });

  it('resolves a relative catalog path against the working directory', () => {
    expect(loadConfig({ COUNTY_CATALOG_PATH: 'catalogs/ca.json' }).countyCatalogPath).toBe(resolve('catalogs/ca.json'));
  });

  it('reads every variable', () => {
    const config = loadConfig({
      PORT: '8080',
      LOG_LEVEL: 'debug',
      LLM_PROVIDER: 'groq',
      GROQ_API_KEY: 'test-secret',
      LLM_MODEL: 'test-model',
      COUNTY_CATALOG_PATH: '/srv/catalog.json',
    });

    expect(config).toEqual({
      port: 8080,
      logLevel: 'debug',
      llmProvider: 'groq',
      groqApiKey: 'test-secret',
      llmModel: 'test-model',
      countyCatalogPath: '/srv/catalog.json',
    });
  });

  it('requires an API key for groq', () => {
    expect(() => loadConfig({ LLM_PROVIDER: 'groq' })).toThrow(
      'Invalid configuration: GROQ_API_KEY: GROQ_API_KEY is required when LLM_PROVIDER is groq',
    );
  });

  it('rejects an unknown provider', () => {
    expect(() => loadConfig({ LLM_PROVIDER: 'openai' })).toThrow(/^Invalid configuration: LLM_PROVIDER: /);
  });

  it('rejects a port that is not a positive integer', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(/^Invalid configuration: PORT: /);
    expect(() => loadConfig({ PORT: '-1' })).toThrow(/^Invalid configuration: PORT: /);
  });
});
