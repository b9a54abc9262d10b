/**
 * Application framework.
 *
 * Provides defineApplication(), the entry point for writing apps. An
 * application names its root component; `boot` builds a context, runs the
 * program until the runtime stops, and wires hot reloading when enabled.
 */

import { Container } from '../core/container.js';
import { SteepError } from '../core/errors.js';
import { isModelClass, type Model, type ModelClass } from '../core/model.js';
import type { StateInput } from '../core/state.js';
import type { KeyboardInput, ResizeSource } from '../terminal/input.js';
import type { AppConfig } from './config.js';
import { createContext, type AppContext, type ContextOptions } from './context.js';
import { Loader, type WatchFn } from './loader.js';
import { Program } from './program.js';

export interface ApplicationDefinition {
  name: string;
  description?: string;
  root: ModelClass;
  /** State the root is first built with. */
  initialState?: StateInput;
  /** Config the application prefers; environment and boot options override it. */
  config?: Partial<AppConfig>;
  /** Re-import the root class after a source change. */
  reloadRoot?: () => Promise<unknown>;
}

export interface BootOptions extends ContextOptions {
  keyboard?: KeyboardInput | false;
  resize?: ResizeSource | false;
  /** File watcher for hot reloading. Defaults to `fs.watch`. */
  watch?: WatchFn;
  /** Receives the context and program once they exist. */
  onStart?: (context: AppContext, program: Program) => void;
}

export interface Application {
  readonly name: string;
  readonly description: string;
  readonly root: ModelClass;
  /** Build the root model, overriding the initial state with `state`. */
  createModel(state?: StateInput): Model;
  /** Run until the runtime stops. */
  boot(options?: BootOptions): Promise<void>;
}

/** Define a steep application. */
export function defineApplication(definition: ApplicationDefinition): Application {
  const root: unknown = definition.root;
  if (!isModelClass(root)) {
    throw new SteepError(`No root model defined for application "${definition.name}"`);
  }

  const Root: ModelClass = root;
  const createModel = (state: StateInput = {}): Model => new Root({ ...definition.initialState, ...state });

  return {
    name: definition.name,
    description: definition.description ?? '',
    root: Root,
    createModel,

    async boot(options: BootOptions = {}): Promise<void> {
      const context = createContext({
        ...options,
        config: { ...definition.config, ...options.config },
      });
      const { config, runtime, renderer, logger } = context;

      const program = new Program(createModel(), {
        runtime,
        renderer,
        logger,
        fps: config.fps,
        tickMs: config.tickMs,
        keyboard: options.keyboard,
        resize: options.resize,
      });

      let loader: Loader | undefined;
      if (config.hotReloading) {
        loader = new Loader({
          appDir: config.appDir,
          runtime,
          logger,
          watch: options.watch,
          onReload: async () => {
            if (!definition.reloadRoot) return;
            const next = await definition.reloadRoot();
            if (!isModelClass(next)) {
              throw new SteepError(`Reloaded root for "${definition.name}" is not a Model class`);
            }
            program.replaceModel(rebuild(program.model, next));
          },
        });
        loader.start();
      }

      logger.info(`starting ${definition.name}`);
      options.onStart?.(context, program);

      try {
        await program.run();
      } finally {
        loader?.stop();
      }
    },
  };
}

/** Build `Next` from the current root's state, keeping a container's geometry. */
function rebuild(current: Model, Next: ModelClass): Model {
  const geometry = current instanceof Container ? current.bounds : {};
  return new Next({ ...current.state, ...geometry });
}
