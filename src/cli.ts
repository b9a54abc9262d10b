#!/usr/bin/env node
/**
 * CLI entry point.
 *
 * Usage:
 *   steep counter                      # Run the counter demo
 *   steep ticker --tick 500            # Tick twice a second
 *   steep layout --hot                 # Reload the app when its source changes
 *   steep counter --record session.cbor
 *   steep counter --replay session.cbor
 *   steep --list                       # List the demo apps
 */

import { readFileSync, writeFileSync } from 'node:fs';
import type { Application } from './app/application.js';
import { ConfigError, parseArgs, resolveConfig, type ParsedCli } from './app/config.js';
import { createLogger } from './app/logger.js';
import { ALL_APPS, APP_NAMES } from './demo-apps/index.js';
import { createRecorder, decodeRecording, encodeRecording, replayRecording, type Recorder } from './replay/recording.js';
import { Renderer } from './terminal/renderer.js';

function printHelp(): void {
  console.log(`
steep: Elm-style terminal UI runtime

Usage:
  steep <app> [options]

Options:
  --fps <n>            Frames per second (default 60).
  --tick <ms>          Enqueue a tick message every <ms> milliseconds.
  --log-level <level>  silent, error, warn, info or debug.
  --app-dir <path>     Directory watched for hot reloading.
  --hot                Reload the app when its source changes.
  --record <file>      Save the session's input as a recording.
  --replay <file>      Replay a recording and print the final frame.
  --list               List the demo apps.
  --help, -h           Show this help.

Available apps:
  ${APP_NAMES.join(', ')}
`);
}

function printApps(): void {
  for (const name of APP_NAMES) {
    console.log(`  ${name.padEnd(10)} ${ALL_APPS[name].description}`);
  }
}

async function main(): Promise<void> {
  let cli: ParsedCli;
  try {
    cli = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      process.exitCode = 2;
      return;
    }
    throw error;
  }

  if (cli.help) {
    printHelp();
    return;
  }
  if (cli.list) {
    printApps();
    return;
  }

  const app: Application | undefined = cli.app === undefined ? undefined : ALL_APPS[cli.app];
  if (!app) {
    console.error(
      cli.app === undefined ? 'No app specified.' : `Unknown app: ${cli.app}`,
      `Available: ${APP_NAMES.join(', ')}`,
    );
    process.exitCode = 1;
    return;
  }

  if (cli.replay) {
    const recording = decodeRecording(readFileSync(cli.replay));
    const result = replayRecording(app.createModel(), recording);
    new Renderer(process.stdout).render(result.model);
    process.stdout.write('\n');
    return;
  }

  const session: { recorder?: Recorder } = {};
  await app.boot({
    config: cli.config,
    onStart: (context) => {
      if (cli.record) session.recorder = createRecorder(context.runtime);
    },
  });

  if (cli.record && session.recorder) {
    session.recorder.stop();
    writeFileSync(cli.record, encodeRecording(session.recorder.recording()));
    createLogger(resolveConfig(cli.config).logLevel).info(`recording written to ${cli.record}`);
  }
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? (error.stack ?? error.message) : error);
  process.exitCode = 1;
});
