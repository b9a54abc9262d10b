/**
 * Component state: an immutable mapping from keys to values.
 */

export type State = Readonly<Record<string, unknown>>;

/** What callers pass to a component constructor or to `with`. */
export type StateInput = Readonly<Record<string, unknown>>;

/** Shallow-merge `overrides` over `base` into a new frozen mapping. */
export function mergeState(base: StateInput, overrides: StateInput): State {
  return Object.freeze({ ...base, ...overrides });
}

/** Shallow equality: same keys, values compared with `Object.is`. */
export function stateEqual(a: State, b: State): boolean {
  const aKeys = Object.keys(a);
  if (aKeys.length !== Object.keys(b).length) return false;
  return aKeys.every((key) => Object.prototype.hasOwnProperty.call(b, key) && Object.is(a[key], b[key]));
}

// ── Typed readers ──────────────────────────────────────────────────

export function readNumber(state: State, key: string, fallback = 0): number {
  const value = state[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

export function readString(state: State, key: string, fallback = ''): string {
  const value = state[key];
  return typeof value === 'string' ? value : fallback;
}

export function readBoolean(state: State, key: string, fallback = false): boolean {
  const value = state[key];
  return typeof value === 'boolean' ? value : fallback;
}

/** Copy of `state` restricted to `keys` that are present. */
export function pick(state: State, keys: readonly string[]): State {
  const out: Record<string, unknown> = {};
  for (const key of keys) {
    if (Object.prototype.hasOwnProperty.call(state, key)) out[key] = state[key];
  }
  return out;
}
