/**
 * Application configuration.
 *
 * Merged from multiple sources, later ones overriding earlier ones:
 *   defaults → environment variables → CLI args / explicit overrides
 *
 * Environment variables:
 *   STEEP_ENV / APP_ENV   development | production | test (default production)
 *   STEEP_LOG_LEVEL       silent | error | warn | info | debug
 *   STEEP_FPS             frames per second for the program loop
 *   STEEP_APP_DIR         directory watched for hot reloading
 */

import { isLogLevel, type LogLevel } from './logger.js';

export type Environment = 'development' | 'production' | 'test';

export interface AppConfig {
  /** Directory the hot-reload loader watches. */
  appDir: string;
  /** Watch `appDir` and enqueue reload messages on change. */
  hotReloading: boolean;
  /** Program loop frequency. */
  fps: number;
  /** Interval for periodic tick messages in ms. 0 disables them. */
  tickMs: number;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: Readonly<AppConfig> = Object.freeze({
  appDir: 'app',
  hotReloading: false,
  fps: 60,
  tickMs: 0,
  logLevel: 'warn',
});

export function resolveEnvironment(env: NodeJS.ProcessEnv = process.env): Environment {
  const value = env['STEEP_ENV'] || env['APP_ENV'] || 'production';
  return value === 'development' || value === 'test' ? value : 'production';
}

/** Partial config derived from environment variables. */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<AppConfig> {
  const config: Partial<AppConfig> = {};

  if (resolveEnvironment(env) === 'development') config.hotReloading = true;

  const logLevel = env['STEEP_LOG_LEVEL'];
  if (isLogLevel(logLevel)) config.logLevel = logLevel;

  const fps = parsePositive(env['STEEP_FPS']);
  if (fps !== undefined) config.fps = fps;

  const appDir = env['STEEP_APP_DIR'];
  if (appDir) config.appDir = appDir;

  return config;
}

/** Merge partial configs over the defaults. Undefined fields are skipped. */
export function mergeConfigs(...sources: Partial<AppConfig>[]): AppConfig {
  const result: AppConfig = { ...DEFAULT_CONFIG };

  for (const source of sources) {
    if (source.appDir !== undefined) result.appDir = source.appDir;
    if (source.hotReloading !== undefined) result.hotReloading = source.hotReloading;
    if (source.fps !== undefined) result.fps = source.fps;
    if (source.tickMs !== undefined) result.tickMs = source.tickMs;
    if (source.logLevel !== undefined) result.logLevel = source.logLevel;
  }

  if (!Number.isFinite(result.fps) || result.fps <= 0) {
    throw new RangeError(`fps must be a positive number, got ${result.fps}`);
  }
  if (!Number.isFinite(result.tickMs) || result.tickMs < 0) {
    throw new RangeError(`tickMs must be a non-negative number, got ${result.tickMs}`);
  }

  return result;
}

/** Resolve the full configuration: defaults → env → overrides. */
export function resolveConfig(
  overrides: Partial<AppConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  return mergeConfigs(configFromEnv(env), overrides);
}

// ── CLI Argument Parsing ─────────────────────────────────────────

/**
 * Recognized flags:
 *   --fps <n>            Program loop frequency
 *   --tick <ms>          Periodic tick interval
 *   --log-level <level>  Logging level
 *   --app-dir <path>     Hot-reload directory
 *   --hot                Enable hot reloading
 *   --record <file>      Write the session's input to a recording
 *   --replay <file>      Replay a recording and print the final frame
 *   --list               List the available apps
 *   --help, -h           Show usage
 * The first positional argument names the app to run.
 */
export interface ParsedCli {
  config: Partial<AppConfig>;
  app?: string;
  record?: string;
  replay?: string;
  list: boolean;
  help: boolean;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function parseArgs(argv: readonly string[]): ParsedCli {
  const config: Partial<AppConfig> = {};
  let app: string | undefined;
  let record: string | undefined;
  let replay: string | undefined;
  let list = false;
  let help = false;

  const valueAfter = (i: number, flag: string): string => {
    const value = argv[i + 1];
    if (value === undefined) throw new ConfigError(`Missing value for ${flag}`);
    return value;
  };

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i];

    switch (arg) {
      case '--fps': {
        const fps = parsePositive(valueAfter(i, arg));
        if (fps === undefined) throw new ConfigError(`Invalid value for --fps: ${argv[i + 1]}`);
        config.fps = fps;
        i++;
        break;
      }
      case '--tick': {
        const tickMs = Number(valueAfter(i, arg));
        if (!Number.isFinite(tickMs) || tickMs < 0) {
          throw new ConfigError(`Invalid value for --tick: ${argv[i + 1]}`);
        }
        config.tickMs = tickMs;
        i++;
        break;
      }
      case '--log-level': {
        const level = valueAfter(i, arg);
        if (!isLogLevel(level)) throw new ConfigError(`Invalid value for --log-level: ${level}`);
        config.logLevel = level;
        i++;
        break;
      }
      case '--app-dir':
        config.appDir = valueAfter(i, arg);
        i++;
        break;
      case '--hot':
        config.hotReloading = true;
        break;
      case '--record':
        record = valueAfter(i, arg);
        i++;
        break;
      case '--replay':
        replay = valueAfter(i, arg);
        i++;
        break;
      case '--list':
        list = true;
        break;
      case '--help':
      case '-h':
        help = true;
        break;
      default:
        if (!arg.startsWith('-') && app === undefined) app = arg;
        // Unknown flags are ignored
        break;
    }

    i++;
  }

  return { config, app, record, replay, list, help };
}

function parsePositive(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const n = Number(value);
  return Number.isFinite(n) && n > 0 ? n : undefined;
}
