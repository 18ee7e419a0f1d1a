import { describe, it, expect } from 'vitest';
import { loadEnvConfig, resolveClientConfig } from './config.js';

describe('resolveClientConfig', () => {
  it('fills in defaults', () => {
    expect(resolveClientConfig()).toEqual({
      maxRetries: 5,
      minConnectionTimeoutMs: 10_000,
      pollIntervalMs: 5_000,
      retryServiceUnavailable: true,
      sendPlatformInfo: true,
    });
  });

  it('keeps explicit values', () => {
    const config = resolveClientConfig({ maxRetries: 0, retryServiceUnavailable: false, userAgent: 'custom/1' });

    expect(config.maxRetries).toBe(0);
    expect(config.retryServiceUnavailable).toBe(false);
    expect(config.userAgent).toBe('custom/1');
  });

  it('reports the first invalid value', () => {
    expect(() => resolveClientConfig({ maxRetries: -1 })).toThrow('maxRetries must not be negative');
    expect(() => resolveClientConfig({ pollIntervalMs: 1.5 })).toThrow('pollIntervalMs must be an integer');
    expect(() => resolveClientConfig({ proxyUrl: 'not a url' })).toThrow('proxyUrl must be a valid URL');
  });
});

describe('loadEnvConfig', () => {
  it('reads and trims the environment', () => {
    expect(
      loadEnvConfig({
        TRANSLATOR_AUTH_KEY: ' test-secret ',
        TRANSLATOR_SERVER_URL: 'http://localhost:3000',
        TRANSLATOR_PROXY_URL: '',
      }),
    ).toEqual({ authKey: 'test-secret', serverUrl: 'http://localhost:3000', proxyUrl: undefined });
  });

  it('treats missing variables as unset', () => {
    expect(loadEnvConfig({})).toEqual({ authKey: undefined, serverUrl: undefined, proxyUrl: undefined });
  });

  it('rejects invalid URLs', () => {
    expect(() => loadEnvConfig({ TRANSLATOR_SERVER_URL: 'localhost' })).toThrow('Invalid TRANSLATOR_SERVER_URL');
  });
});
