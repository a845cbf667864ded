import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig, resolveOptions } from '../src/config.js';

describe('loadConfig', () => {
  it('uses defaults when nothing is set', () => {
    expect(loadConfig({})).toEqual({ logLevel: 'warn', mode: 'fail-fast' });
  });

  it('reads log level and parse mode from the environment', () => {
    expect(loadConfig({ WGPEERS_LOG_LEVEL: 'debug', WGPEERS_PARSE_MODE: 'collect' })).toEqual({
      logLevel: 'debug',
      mode: 'collect',
    });
  });

  it('ignores unrelated variables', () => {
    expect(loadConfig({ HOME: '/home/test', LOG_LEVEL: 'trace' })).toEqual({
      logLevel: 'warn',
      mode: 'fail-fast',
    });
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({ WGPEERS_LOG_LEVEL: 'loud' })).toThrow(ConfigError);
    try {
      loadConfig({ WGPEERS_LOG_LEVEL: 'loud' });
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.code).toBe('E_INVALID_CONFIG');
        expect(err.issues[0].path).toEqual(['WGPEERS_LOG_LEVEL']);
        expect(err.message).toMatch(/^Invalid configuration: WGPEERS_LOG_LEVEL: /);
      }
    }
  });

  it('rejects an unknown parse mode', () => {
    expect(() => loadConfig({ WGPEERS_PARSE_MODE: 'partial' })).toThrow(ConfigError);
  });
});

describe('resolveOptions', () => {
  const config = { logLevel: 'warn' as const, mode: 'fail-fast' as const };

  it('falls back to configuration when no flags are given', () => {
    expect(resolveOptions(config, {})).toEqual({ json: false, mode: 'fail-fast', logLevel: 'warn' });
  });

  it('lets flags override configuration', () => {
    expect(resolveOptions(config, { json: true, verbose: true, mode: 'collect' })).toEqual({
      json: true,
      mode: 'collect',
      logLevel: 'debug',
    });
  });

  it('rejects an unknown --mode value', () => {
    expect(() => resolveOptions(config, { mode: 'bogus' })).toThrow(ConfigError);
    expect(() => resolveOptions(config, { mode: 'bogus' })).toThrow(/^Invalid --mode: /);
  });
});
