import { DEFAULT_BASE_URL, DEFAULT_MODEL, loadAssistantConfig } from './assistant.config';

describe('loadAssistantConfig', () => {
  it('should fall back to defaults and local mode without a key', () => {
    const config = loadAssistantConfig({});

    expect(config).toEqual({
      apiKey: undefined,
      baseUrl: DEFAULT_BASE_URL,
      model: DEFAULT_MODEL,
      runtime: 'local',
      maxToolRounds: 5,
      port: 3000,
    });
  });

  it('should default to hosted mode when a key is present', () => {
    const config = loadAssistantConfig({ OPENAI_API_KEY: 'test-secret' });

    expect(config.runtime).toBe('hosted');
    expect(config.apiKey).toBe('test-secret');
  });

  it('should pass key and base URL through untouched', () => {
    const config = loadAssistantConfig({
      OPENAI_API_KEY: '  not-a-real-key ',
      OPENAI_BASE_URL: 'not even a url',
    });

    expect(config.apiKey).toBe('  not-a-real-key ');
    expect(config.baseUrl).toBe('not even a url');
  });

  it('should honour an explicit runtime override', () => {
    const config = loadAssistantConfig({ OPENAI_API_KEY: 'test-secret', ASSISTANT_RUNTIME: 'LOCAL' });
    expect(config.runtime).toBe('local');
  });

  it('should reject an unknown runtime mode', () => {
    expect(() => loadAssistantConfig({ ASSISTANT_RUNTIME: 'cloud' })).toThrow(
      'ASSISTANT_RUNTIME must be "local" or "hosted", got "cloud"',
    );
  });

  it('should parse numeric settings', () => {
    const config = loadAssistantConfig({ ASSISTANT_MAX_TOOL_ROUNDS: '3', PORT: '8080' });

    expect(config.maxToolRounds).toBe(3);
    expect(config.port).toBe(8080);
  });

  it('should reject a non-positive port', () => {
    expect(() => loadAssistantConfig({ PORT: '0' })).toThrow('PORT must be a positive integer, got "0"');
  });
});
