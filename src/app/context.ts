/**
 * AppContext: everything a driver needs, passed explicitly.
 *
 * There is no process-wide registry: build a context at startup and hand
 * it to the program, loader and application.
 */

import { Runtime } from '../core/runtime.js';
import { Renderer, type RenderOutput } from '../terminal/renderer.js';
import { resolveConfig, type AppConfig } from './config.js';
import { createLogger, type Logger } from './logger.js';

export interface AppContext {
  readonly config: AppConfig;
  readonly runtime: Runtime;
  readonly renderer: Renderer;
  readonly logger: Logger;
}

export interface ContextOptions {
  config?: Partial<AppConfig>;
  env?: NodeJS.ProcessEnv;
  runtime?: Runtime;
  renderer?: Renderer;
  logger?: Logger;
  /** Where frames are written when no renderer is given. */
  output?: RenderOutput;
}

export function createContext(options: ContextOptions = {}): AppContext {
  const config = resolveConfig(options.config, options.env);
  return {
    config,
    runtime: options.runtime ?? new Runtime(),
    renderer: options.renderer ?? new Renderer(options.output),
    logger: options.logger ?? createLogger(config.logLevel),
  };
}
