/**
 * steep: an Elm-style runtime for terminal user interfaces.
 *
 * Components are immutable models: `update` returns the next model and a
 * command, `view` renders to a string. A runtime folds queued messages
 * through the root model once per tick; a program drives the runtime from
 * timers and terminal input and redraws when something changed.
 */

// Core
export { createBounds, boundsEqual, GEOMETRY_KEYS, type Bounds, type GeometryKey } from './core/bounds.js';
export {
  Message,
  isCommand,
  messagesEqual,
  describeMessage,
  type Command,
  type MessageKind,
  type NoneMessage,
  type ExitMessage,
  type ReloadMessage,
  type TickMessage,
  type KeyPressMessage,
  type KeyPressInit,
  type BatchMessage,
  type ResizeMessage,
  type CustomMessage,
} from './core/message.js';
export {
  SteepError,
  NotImplementedError,
  InvalidChildTypeError,
  MethodNotFoundError,
  describeType,
} from './core/errors.js';
export {
  mergeState,
  stateEqual,
  readNumber,
  readString,
  readBoolean,
  pick,
  type State,
  type StateInput,
} from './core/state.js';
export {
  Model,
  child,
  isModelClass,
  type ModelClass,
  type ChildDefinition,
  type ChildSelector,
  type StateMapper,
  type UpdateResult,
} from './core/model.js';
export { Container } from './core/container.js';
export { distributeBounds, type Direction } from './core/layout.js';
export { screenSize, DEFAULT_SCREEN, type ScreenSize } from './core/screen.js';
export { MessageQueue } from './core/queue.js';
export {
  Runtime,
  type RuntimeOptions,
  type RuntimeObserver,
  type MessageSource,
} from './core/runtime.js';

// Components
export { Text } from './components/text.js';
export { measureCells, wrapText } from './components/wrap.js';

// Terminal
export { CLEAR_SCREEN, HIDE_CURSOR, SHOW_CURSOR, moveTo, stripAnsi } from './terminal/ansi.js';
export { Renderer, type RenderOutput } from './terminal/renderer.js';
export {
  attachKeyboard,
  attachResize,
  decodeKey,
  type KeyboardInput,
  type ResizeSource,
} from './terminal/input.js';

// Application
export {
  DEFAULT_CONFIG,
  ConfigError,
  configFromEnv,
  mergeConfigs,
  parseArgs,
  resolveConfig,
  resolveEnvironment,
  type AppConfig,
  type Environment,
  type ParsedCli,
} from './app/config.js';
export { createLogger, isLogLevel, silentLogger, LOG_LEVELS, type Logger, type LogLevel } from './app/logger.js';
export { createContext, type AppContext, type ContextOptions } from './app/context.js';
export { Program, type ProgramOptions } from './app/program.js';
export {
  Loader,
  clearSnapshots,
  importFresh,
  reloadExport,
  type LoaderOptions,
  type WatchFn,
  type Watcher,
} from './app/loader.js';
export {
  defineApplication,
  type Application,
  type ApplicationDefinition,
  type BootOptions,
} from './app/application.js';

// Replay
export {
  createRecorder,
  replayRecording,
  encodeRecording,
  decodeRecording,
  RecordingFormatError,
  RECORDING_VERSION,
  type Recorder,
  type Recording,
  type RecordedFrame,
  type ReplayResult,
} from './replay/recording.js';
