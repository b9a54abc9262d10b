/**
 * Demo app registry.
 *
 * All demo applications are exported here for the CLI and the tests.
 */

import type { Application } from '../app/application.js';
import { counterApp } from './counter.js';
import { layoutApp } from './layout.js';
import { tickerApp } from './ticker.js';

export { counterApp, Counter, COUNTER_HELP } from './counter.js';
export { layoutApp, LayoutDemo, RowBody, ColumnBody } from './layout.js';
export { tickerApp, Ticker } from './ticker.js';

/** All demo apps, keyed by name. */
export const ALL_APPS: Record<string, Application> = {
  counter: counterApp,
  layout: layoutApp,
  ticker: tickerApp,
};

/** App names in a stable order. */
export const APP_NAMES = Object.keys(ALL_APPS);

/**
 * What each demo exercises:
 *
 * counter:  key handling, mapped child state, batch commands, exit
 * layout:   weighted row/column containers, method-selected children
 * ticker:   periodic tick messages, pause state
 */
