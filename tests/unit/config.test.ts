/**
 * Unit tests for configuration merging and CLI argument parsing.
 */

import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  DEFAULT_CONFIG,
  configFromEnv,
  mergeConfigs,
  parseArgs,
  resolveConfig,
  resolveEnvironment,
} from '../../src/app/config.js';

describe('mergeConfigs', () => {
  it('starts from the defaults', () => {
    expect(mergeConfigs()).toEqual({
      appDir: 'app',
      hotReloading: false,
      fps: 60,
      tickMs: 0,
      logLevel: 'warn',
    });
  });

  it('lets later sources win and skips undefined fields', () => {
    const config = mergeConfigs({ fps: 30, logLevel: 'info' }, { fps: 10, logLevel: undefined });
    expect(config.fps).toBe(10);
    expect(config.logLevel).toBe('info');
  });

  it('rejects a non-positive fps and a negative tick interval', () => {
    expect(() => mergeConfigs({ fps: 0 })).toThrow(RangeError);
    expect(() => mergeConfigs({ tickMs: -5 })).toThrow('tickMs must be a non-negative number, got -5');
  });

  it('does not modify the defaults', () => {
    mergeConfigs({ fps: 5 });
    expect(DEFAULT_CONFIG.fps).toBe(60);
  });
});

describe('resolveEnvironment', () => {
  it('defaults to production', () => {
    expect(resolveEnvironment({})).toBe('production');
    expect(resolveEnvironment({ STEEP_ENV: 'staging' })).toBe('production');
  });

  it('reads STEEP_ENV before APP_ENV', () => {
    expect(resolveEnvironment({ APP_ENV: 'test' })).toBe('test');
    expect(resolveEnvironment({ STEEP_ENV: 'development', APP_ENV: 'test' })).toBe('development');
  });
});

describe('configFromEnv', () => {
  it('reads every supported variable', () => {
    expect(
      configFromEnv({ STEEP_ENV: 'development', STEEP_LOG_LEVEL: 'debug', STEEP_FPS: '30', STEEP_APP_DIR: 'lib' }),
    ).toEqual({ hotReloading: true, logLevel: 'debug', fps: 30, appDir: 'lib' });
  });

  it('ignores invalid values', () => {
    expect(configFromEnv({ STEEP_FPS: '-1', STEEP_LOG_LEVEL: 'loud' })).toEqual({});
  });
});

describe('resolveConfig', () => {
  it('applies overrides over the environment', () => {
    const config = resolveConfig({ fps: 10 }, { STEEP_FPS: '30', STEEP_LOG_LEVEL: 'error' });
    expect(config.fps).toBe(10);
    expect(config.logLevel).toBe('error');
  });
});

describe('parseArgs', () => {
  it('parses the app name and every option', () => {
    const parsed = parseArgs([
      'counter',
      '--fps', '30',
      '--tick', '250',
      '--log-level', 'debug',
      '--hot',
      '--app-dir', 'lib',
      '--record', 'session.cbor',
    ]);

    expect(parsed).toEqual({
      config: { fps: 30, tickMs: 250, logLevel: 'debug', hotReloading: true, appDir: 'lib' },
      app: 'counter',
      record: 'session.cbor',
      replay: undefined,
      list: false,
      help: false,
    });
  });

  it('parses flags without an app', () => {
    const parsed = parseArgs(['--list', '-h', '--unknown']);
    expect(parsed.list).toBe(true);
    expect(parsed.help).toBe(true);
    expect(parsed.app).toBeUndefined();
  });

  it('takes the first positional argument as the app', () => {
    expect(parseArgs(['layout', 'ticker']).app).toBe('layout');
  });

  it('reads the replay file', () => {
    expect(parseArgs(['counter', '--replay', 'in.cbor']).replay).toBe('in.cbor');
  });

  it('rejects missing and invalid values', () => {
    expect(() => parseArgs(['--fps'])).toThrow(ConfigError);
    expect(() => parseArgs(['--fps'])).toThrow('Missing value for --fps');
    expect(() => parseArgs(['--fps', 'fast'])).toThrow('Invalid value for --fps: fast');
    expect(() => parseArgs(['--tick', '-1'])).toThrow('Invalid value for --tick: -1');
    expect(() => parseArgs(['--log-level', 'loud'])).toThrow('Invalid value for --log-level: loud');
  });
});
