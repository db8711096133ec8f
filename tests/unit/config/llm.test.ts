import { describe, it, expect, afterEach } from '@jest/globals';
import { DEFAULT_SYSTEM_PROMPT, loadLlmConfig } from '../../../src/config/llm.js';

const ENV_KEYS = ['LLM_PROVIDER_BASEURL', 'LLM_API_KEY', 'OPENAI_API_KEY', 'LLM_MODEL', 'LLM_TEMPERATURE'];

describe('llm config', () => {
  afterEach(() => {
    for (const key of ENV_KEYS) delete process.env[key];
  });

  it('has defaults and no key', () => {
    expect(loadLlmConfig()).toEqual({
      baseUrl: 'https://api.openai.com/v1',
      model: 'gpt-4.1-mini',
      maxTokens: 250,
      temperature: 0.4,
      systemPrompt: DEFAULT_SYSTEM_PROMPT,
    });
  });

  it('prefers LLM_API_KEY over OPENAI_API_KEY', () => {
    process.env.OPENAI_API_KEY = 'test-openai';
    expect(loadLlmConfig().apiKey).toBe('test-openai');
    process.env.LLM_API_KEY = 'test-secret';
    expect(loadLlmConfig().apiKey).toBe('test-secret');
  });

  it('reads provider settings', () => {
    process.env.LLM_PROVIDER_BASEURL = 'http://localhost:11434/v1';
    process.env.LLM_MODEL = 'local-model';
    process.env.LLM_TEMPERATURE = '0';
    const config = loadLlmConfig();
    expect(config.baseUrl).toBe('http://localhost:11434/v1');
    expect(config.model).toBe('local-model');
    expect(config.temperature).toBe(0);
  });

  it('rejects a malformed base URL', () => {
    process.env.LLM_PROVIDER_BASEURL = 'not a url';
    expect(() => loadLlmConfig()).toThrow();
  });
});
