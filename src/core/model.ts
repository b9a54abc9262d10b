/**
 * Model: the immutable unit of state and behavior in a component tree.
 *
 * A component subclasses Model, overrides `view` and `update`, optionally
 * provides `defaultState`, and declares its children on the class:
 *
 *   class Dashboard extends Model {
 *     static children = [
 *       child(Header, (state) => ({ title: state.title })),
 *       child('body'),            // resolved by calling this.body()
 *     ];
 *
 *     body() { return this.state.compact ? CompactBody : FullBody; }
 *   }
 *
 * Construction merges default state with the given overrides, freezes it,
 * and builds every declared child. There is no incremental diffing: `with`
 * produces a new instance and rebuilds the whole subtree.
 */

import type { Command, Message } from './message.js';
import { describeType, InvalidChildTypeError, MethodNotFoundError, NotImplementedError } from './errors.js';
import { mergeState, stateEqual, type State, type StateInput } from './state.js';

// ── Child declarations ─────────────────────────────────────────────

/** Maps the parent's state to the state handed to a child. */
export type StateMapper = (state: State) => StateInput;

export type ChildSelector =
  | { readonly kind: 'type'; readonly type: ModelClass }
  | { readonly kind: 'method'; readonly method: string };

export interface ChildDefinition {
  readonly selector: ChildSelector;
  readonly mapper: StateMapper;
  /** Share of the parent's space; only containers use it. */
  readonly weight: number;
}

export interface ModelClass<M extends Model = Model> {
  new (state?: StateInput): M;
  readonly children: readonly ChildDefinition[];
  readonly name: string;
}

/** What `update` returns: the next model and the side effect to run. */
export type UpdateResult = readonly [Model, Command];

const isolated: StateMapper = () => ({});

/**
 * Declare a child component.
 *
 * `selector` is either a component class, or the name of an instance method
 * that returns one when the parent is constructed.
 */
export function child(selector: ModelClass | string, mapper: StateMapper = isolated, weight = 1): ChildDefinition {
  if (!Number.isFinite(weight) || weight < 0) {
    throw new RangeError(`Child weight must be a finite, non-negative number, got ${weight}`);
  }
  return Object.freeze({
    selector: Object.freeze(
      typeof selector === 'string'
        ? { kind: 'method' as const, method: selector }
        : { kind: 'type' as const, type: selector },
    ),
    mapper,
    weight,
  });
}

/** True when `value` is Model or a subclass of it. */
export function isModelClass(value: unknown): value is ModelClass {
  return typeof value === 'function' && (value === Model || value.prototype instanceof Model);
}

// ── Model ──────────────────────────────────────────────────────────

export class Model {
  /** Declared children, in order. Subclasses replace this. */
  static children: readonly ChildDefinition[] = [];

  readonly state: State;
  readonly children: readonly Model[];

  constructor(state: StateInput = {}) {
    const own = this.absorbState(state);
    this.state = mergeState(this.defaultState(), own);
    this.children = Object.freeze(this.buildChildren(this.componentClass().children));
  }

  /** Render to a string. Every concrete component overrides this. */
  view(): string {
    throw new NotImplementedError(this.constructor.name, 'view');
  }

  /** Handle a message. Every concrete component overrides this. */
  update(_message: Message): UpdateResult {
    throw new NotImplementedError(this.constructor.name, 'update');
  }

  /**
   * A new instance of this component's current class with `partial` merged
   * over the state. The class is read from the instance at call time, so a
   * reloaded definition takes effect on the next transition.
   */
  with(partial: StateInput = {}): Model {
    const Component = this.componentClass();
    return new Component(mergeState(this.state, partial));
  }

  /** Child views concatenated in declaration order. */
  childrenViews(): string {
    return this.children.map((c) => c.view()).join('');
  }

  /** Same class and shallow-equal state. */
  equals(other: Model): boolean {
    return other === this || (other.constructor === this.constructor && stateEqual(this.state, other.state));
  }

  // ── Hooks ────────────────────────────────────────────────────────

  /** Default state merged under the constructor's overrides. */
  protected defaultState(): StateInput {
    return {};
  }

  /**
   * Called first during construction with the raw constructor state.
   * Returns the part that becomes ordinary state.
   */
  protected absorbState(input: StateInput): StateInput {
    return input;
  }

  /** Instantiate every declared child. */
  protected buildChildren(definitions: readonly ChildDefinition[]): Model[] {
    return definitions.map((definition) => {
      const Child = this.resolveChild(definition.selector);
      return new Child(definition.mapper(this.state));
    });
  }

  /** Turn a selector into a concrete component class. */
  protected resolveChild(selector: ChildSelector): ModelClass {
    if (selector.kind === 'type') return selector.type;

    const component = this.constructor.name;
    const method: unknown = Reflect.get(this, selector.method);
    if (typeof method !== 'function') {
      throw new MethodNotFoundError(component, selector.method);
    }

    const resolved: unknown = method.call(this);
    if (!isModelClass(resolved)) {
      throw new InvalidChildTypeError(component, selector.method, describeType(resolved));
    }
    return resolved;
  }

  protected componentClass(): ModelClass {
    const ctor: unknown = this.constructor;
    if (!isModelClass(ctor)) {
      throw new InvalidChildTypeError('Model', 'constructor', describeType(ctor));
    }
    return ctor;
  }
}
