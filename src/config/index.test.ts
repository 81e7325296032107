/**
 * Tests for configuration module
 *
 * @module config/index.test
 */

import { describe, it, expect } from '@jest/globals';
import {
  loadConfig,
  requireApiKey,
  ConfigurationError,
  getModelConfig,
  DEFAULT_COMPLETION_MODEL,
} from './index.js';

describe('config', () => {
  describe('loadConfig', () => {
    it('should apply defaults for an empty environment', () => {
      const config = loadConfig({});

      expect(config.apiKey).toBeUndefined();
      expect(config.transcript.languages).toEqual(['es', 'en']);
      expect(config.transcript.timeoutMs).toBe(10000);
      expect(config.transcript.ytdlpBin).toBe('yt-dlp');
      expect(config.chunking).toEqual({ maxSeconds: 30, maxChars: 500 });
      expect(config.server.port).toBe(8000);
      expect(config.server.corsOrigins).toEqual(['http://localhost:*', 'chrome-extension://*']);
      expect(config.completion.model).toEqual(DEFAULT_COMPLETION_MODEL);
      expect(config.completion.baseUrl).toBe('https://api.groq.com/openai/v1');
      expect(config.completion.timeoutMs).toBe(60000);
    });

    it('should parse overrides from the environment', () => {
      const config = loadConfig({
        GROQ_API_KEY: 'test-secret',
        TRANSCRIPT_LANGUAGES: ' en , fr ,,',
        CHUNK_MAX_SECONDS: '45.5',
        CHUNK_MAX_CHARS: '800',
        PORT: '3000',
        YTDLP_BIN: '/usr/local/bin/yt-dlp',
      });

      expect(config.apiKey).toBe('test-secret');
      expect(config.transcript.languages).toEqual(['en', 'fr']);
      expect(config.chunking).toEqual({ maxSeconds: 45.5, maxChars: 800 });
      expect(config.server.port).toBe(3000);
      expect(config.transcript.ytdlpBin).toBe('/usr/local/bin/yt-dlp');
    });

    it('should treat blank variables as unset', () => {
      const config = loadConfig({ CHUNK_MAX_CHARS: '', TRANSCRIPT_LANGUAGES: '  ' });

      expect(config.chunking.maxChars).toBe(500);
      expect(config.transcript.languages).toEqual(['es', 'en']);
    });

    it('should keep the Groq endpoint when the model is overridden', () => {
      const config = loadConfig({ COMPLETION_MODEL: 'llama-3.1-8b-instant' });

      expect(config.completion.model.modelId).toBe('llama-3.1-8b-instant');
      expect(config.completion.baseUrl).toBe('https://api.groq.com/openai/v1');
    });

    it('should prefer an explicit base URL', () => {
      const config = loadConfig({ COMPLETION_BASE_URL: 'http://localhost:11434/v1' });
      expect(config.completion.baseUrl).toBe('http://localhost:11434/v1');
    });

    it('should reject invalid numeric values', () => {
      expect(() => loadConfig({ CHUNK_MAX_CHARS: 'lots' })).toThrow(ConfigurationError);
    });

    it('should list every invalid variable', () => {
      try {
        loadConfig({ PORT: '70000', COMPLETION_BASE_URL: 'not a url' });
        throw new Error('expected loadConfig to throw');
      } catch (error) {
        if (!(error instanceof ConfigurationError)) throw error;
        const issues = error.issues;
        expect(issues).toHaveLength(2);
        expect(issues.some((issue) => issue.startsWith('PORT:'))).toBe(true);
        expect(issues.some((issue) => issue.startsWith('COMPLETION_BASE_URL:'))).toBe(true);
      }
    });
  });

  describe('requireApiKey', () => {
    it('should return the configured key', () => {
      const config = loadConfig({ GROQ_API_KEY: 'test-secret' });
      expect(requireApiKey(config)).toBe('test-secret');
    });

    it('should throw when the key is missing', () => {
      const config = loadConfig({});
      expect(() => requireApiKey(config)).toThrow('Missing required API key: GROQ_API_KEY');
    });
  });

  describe('models', () => {
    it('should keep sampling parameters fixed under an override', () => {
      const model = getModelConfig('mixtral-8x7b-32768');
      expect(model.modelId).toBe('mixtral-8x7b-32768');
      expect(model.temperature).toBe(0.7);
      expect(model.topP).toBe(1);
      expect(model.maxOutputTokens).toBe(1024);
    });
  });
});
