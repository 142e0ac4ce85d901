import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../index.js';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      provider: 'openai',
      model: undefined,
      openaiApiKey: '',
      openaiBaseUrl: 'https://api.openai.com/v1',
      anthropicApiKey: '',
      maxRounds: 10,
      schemaMaxDepth: 10,
      memory: false,
      debugLlm: false,
    });
  });

  it('should read and coerce values', () => {
    const config = loadConfig({
      MODEL_PROVIDER: 'anthropic',
      MODEL_NAME: 'claude-test',
      ANTHROPIC_API_KEY: 'test-secret',
      OPENAI_BASE_URL: 'http://localhost:8080/v1',
      AGENT_MAX_ROUNDS: '4',
      SCHEMA_MAX_DEPTH: '0',
      AGENT_MEMORY: 'Yes',
      DEBUG_LLM: 'off',
    });

    expect(config).toMatchObject({
      provider: 'anthropic',
      model: 'claude-test',
      anthropicApiKey: 'test-secret',
      openaiBaseUrl: 'http://localhost:8080/v1',
      maxRounds: 4,
      schemaMaxDepth: 0,
      memory: true,
      debugLlm: false,
    });
  });

  it('should treat blank values as unset', () => {
    expect(loadConfig({ MODEL_PROVIDER: ' ', AGENT_MAX_ROUNDS: '', MODEL_NAME: '' })).toMatchObject({
      provider: 'openai',
      model: undefined,
      maxRounds: 10,
    });
  });

  it('should reject invalid values with every issue listed', () => {
    try {
      loadConfig({ MODEL_PROVIDER: 'gemini', AGENT_MAX_ROUNDS: '0' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues.map((issue) => issue.split(':')[0])).toEqual(['MODEL_PROVIDER', 'AGENT_MAX_ROUNDS']);
        expect(error.message.startsWith('invalid configuration: MODEL_PROVIDER: ')).toBe(true);
      }
    }
  });
});
